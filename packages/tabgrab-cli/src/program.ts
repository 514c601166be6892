import { readFileSync } from "fs";
import { Command } from "commander";
import { z } from "zod";
import { registerFetchCommand, type FetchTabsOptions } from "./modules/fetch-tabs.js";

const PackageJsonSchema = z.object({ version: z.string() });

export function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  return PackageJsonSchema.parse(raw).version;
}

export function buildProgram(options: FetchTabsOptions = {}): Command {
  const program = new Command()
    .name("tabgrab")
    .description("Download Guitar Pro tabs from Songsterr by URL or search")
    .version(readVersion());

  registerFetchCommand(program, options);
  return program;
}
