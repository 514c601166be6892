#!/usr/bin/env node
import { renderUnknownError } from "./lib/errors/renderer.js";
import { buildProgram } from "./program.js";

export async function main(argv = process.argv): Promise<void> {
  const program = buildProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
