#!/usr/bin/env node
import { createProgram } from "./program.js";
import { describeError } from "../utils/errors.js";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${describeError(error)}`);
    process.exitCode = 1;
  });
