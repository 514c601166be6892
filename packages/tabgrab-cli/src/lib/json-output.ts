/**
 * JSON output for `--json` runs: one document on stdout at the end.
 */

import type { CLIError, ErrorCode, ErrorKind } from "./errors/types.js";

export interface JsonSuccess<T> {
  success: boolean;
  data: T;
  meta?: {
    durationMs?: number;
  };
}

export interface ItemResultJson {
  target: string;
  status: "ok" | "failed";
  file?: {
    path: string;
    name: string;
    songId: number;
    revisionId: number;
    url: string;
  };
  error?: {
    kind: ErrorKind;
    code: ErrorCode;
    message: string;
  };
}

export interface DownloadResultJson {
  items: ItemResultJson[];
  summary: {
    total: number;
    downloaded: number;
    failed: number;
  };
}

export function errorToJson(error: CLIError): NonNullable<ItemResultJson["error"]> {
  return { kind: error.kind, code: error.code, message: error.message };
}

/**
 * Print a result document to stdout. `success` is false when any item failed.
 */
export function outputResult<T>(data: T, success: boolean, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}
