import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { Readable } from "stream";
import {
  collectTargets,
  dedupePreserveOrder,
  parseTargetLines,
  readTargetsFile,
  targetsFromArgs,
} from "./targets.js";

const URL_A = "https://www.songsterr.com/a/wsa/band-a-tab-s1";
const URL_B = "https://www.songsterr.com/a/wsa/band-b-tab-s2";

describe("parseTargetLines", () => {
  it("keeps one trimmed target per line, skipping blanks and comments", () => {
    const raw = `# favourites\r\n${URL_A}\n\n   \n  band song  \n#${URL_B}\n`;
    expect(parseTargetLines(raw)).toEqual([URL_A, "band song"]);
  });
});

describe("targetsFromArgs", () => {
  it("treats every URL argument as its own target", () => {
    expect(targetsFromArgs([URL_A, URL_B])).toEqual([URL_A, URL_B]);
  });

  it("joins search words into one phrase", () => {
    expect(targetsFromArgs(["pissgrave", "rusted", "wind"])).toEqual(["pissgrave rusted wind"]);
  });

  it("returns nothing for empty arguments", () => {
    expect(targetsFromArgs(["", "  "])).toEqual([]);
  });
});

describe("dedupePreserveOrder", () => {
  it("keeps the first occurrence", () => {
    expect(dedupePreserveOrder(["b", "a", "b", "c", "a"])).toEqual(["b", "a", "c"]);
  });
});

describe("readTargetsFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tabgrab-targets-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads targets from a file", async () => {
    const path = join(dir, "urls.txt");
    await writeFile(path, `${URL_A}\n# skip\n${URL_B}\n`);

    await expect(readTargetsFile(path)).resolves.toEqual([URL_A, URL_B]);
  });

  it("reads targets from stdin for '-'", async () => {
    const stdin = Readable.from([`${URL_A}\nband `, "song\n"]);

    await expect(readTargetsFile("-", stdin)).resolves.toEqual([URL_A, "band song"]);
  });

  it("turns a missing file into a usage error", async () => {
    const path = join(dir, "missing.txt");

    await expect(readTargetsFile(path)).rejects.toMatchObject({
      kind: "usage",
      code: "INPUT_NOT_READABLE",
      message: `Can't read targets from "${path}"`,
    });
  });
});

describe("collectTargets", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tabgrab-targets-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("combines arguments and the targets file without duplicates", async () => {
    const path = join(dir, "urls.txt");
    await writeFile(path, `${URL_B}\n${URL_A}\n`);

    await expect(
      collectTargets({ args: [URL_A], file: path, interactive: false, stdinIsTTY: true })
    ).resolves.toEqual([URL_A, URL_B]);
  });

  it("reads piped stdin when nothing else is given", async () => {
    const stdin = Readable.from([`${URL_A}\n${URL_A}\n`]);

    await expect(collectTargets({ args: [], interactive: false, stdin, stdinIsTTY: false })).resolves.toEqual([
      URL_A,
    ]);
  });

  it("ignores stdin when it is a terminal", async () => {
    const stdin = Readable.from([URL_A]);

    await expect(collectTargets({ args: [], interactive: false, stdin, stdinIsTTY: true })).resolves.toEqual([]);
  });

  it("leaves stdin to the prompt in interactive mode", async () => {
    const stdin = Readable.from([URL_A]);

    await expect(collectTargets({ args: [], interactive: true, stdin, stdinIsTTY: false })).resolves.toEqual([]);
  });
});
