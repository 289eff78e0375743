export type TraceLogger = (line: string) => void;

export type Tracer = {
  level: number;
  enabled: (level?: number) => boolean;
  log: (message: string, level?: number) => void;
  /** Runs `task`, then logs its duration as `<name> <elapsed> <detail>`. */
  time: <T>(name: string, task: () => Promise<T>, detail?: (value: T) => string) => Promise<T>;
};

export function createTracer(prefix: string, level: number, logger?: TraceLogger): Tracer {
  const enabled = (minimum = 1) => logger !== undefined && level >= minimum;
  const log = (message: string, minimum = 1) => {
    if (enabled(minimum)) {
      logger?.(`[${prefix}] ${message}`);
    }
  };

  return {
    level,
    enabled,
    log,
    async time(name, task, detail) {
      if (!enabled()) {
        return task();
      }
      const started = nowNs();
      const value = await task();
      const suffix = detail ? ` ${detail(value)}` : "";
      log(`${name} ${formatMs(nsToMs(nowNs() - started))}${suffix}`);
      return value;
    },
  };
}

export function nowNs(): bigint {
  return process.hrtime.bigint();
}

export function nsToMs(ns: bigint): number {
  return Number(ns) / 1e6;
}

export function formatMs(ms: number): string {
  if (!Number.isFinite(ms)) {
    return `${ms}ms`;
  }
  if (ms >= 1000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  if (ms >= 10) {
    return `${ms.toFixed(1)}ms`;
  }
  return `${ms.toFixed(2)}ms`;
}
