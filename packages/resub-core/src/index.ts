export { mapLimit } from "./common/async.ts";
export type { MapLimitOptions } from "./common/async.ts";
export { createTracer, formatMs, nowNs, nsToMs } from "./common/trace.ts";
export type { TraceLogger, Tracer } from "./common/trace.ts";

export {
  compileFileFilter,
  DEFAULT_EXCLUDE_GLOBS,
  DEFAULT_INCLUDE_GLOBS,
  isFileIncluded,
} from "./files/filter.ts";
export type { FileFilterOptions, FileNameFilter } from "./files/filter.ts";
export { describeTargetSource, enumerateTargets } from "./files/targets.ts";
export type { EnumerateTargetsOptions, TargetSource } from "./files/targets.ts";

export {
  DEFAULT_DECODERS,
  LATIN1_DECODER,
  readTextFile,
  UTF8_DECODER,
  WRITE_ENCODING,
  writeTextFile,
} from "./io/text-file.ts";
export type {
  DecodedTextFile,
  ReadTextFileOptions,
  TextEncodingName,
  TextFileDecoder,
  TextFileFs,
  WriteTextFileOptions,
} from "./io/text-file.ts";

export { compilePattern } from "./text/pattern.ts";
export type { CompiledPattern } from "./text/pattern.ts";
export { applyReplacementSpans, createLineStarts, toLineColumn } from "./text/spans.ts";
export type { ReplacementSpan } from "./text/spans.ts";
export { compileSubstitution, substitute, substituteAll } from "./text/substitute.ts";
export type { Substitution, SubstitutionMatch, SubstitutionResult } from "./text/substitute.ts";
export { compileReplacementTemplate, renderReplacementTemplate } from "./text/template.ts";
export type {
  CompiledReplacementTemplate,
  ReplacementToken,
  TemplateMatch,
} from "./text/template.ts";
