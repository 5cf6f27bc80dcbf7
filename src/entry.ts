#!/usr/bin/env node
import { buildProgram } from "./cli/program/build-program.js";
import { defaultRuntime } from "./runtime.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err) => {
    defaultRuntime.error(String(err));
    defaultRuntime.exit(1);
  });
