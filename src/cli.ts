#!/usr/bin/env node
// src/cli.ts
import { buildProgram } from "./program.js";
import { errorMessage } from "./errors.js";

const program = buildProgram();

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`${program.name()} fatal: ${errorMessage(err)}`);
  process.exit(1);
});
