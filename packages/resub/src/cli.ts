#!/usr/bin/env -S node --import tsx
import { run } from "@stricli/core";
import { app } from "./app.ts";
import { expandListFlagValues } from "./command/argv.ts";

await run(app, expandListFlagValues(process.argv.slice(2)), { process });
