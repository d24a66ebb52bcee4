import crypto from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";

import type { z } from "zod";

import { isErrnoCode } from "../errors.js";

/** Writes through a temp file and rename, so readers see the old or the new file, never half of one. */
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.${crypto.randomBytes(4).toString("hex")}.tmp`;
  try {
    await fs.writeFile(tmpPath, JSON.stringify(value), "utf-8");
    await fs.rename(tmpPath, filePath);
  } catch (err: unknown) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}

/** Returns undefined when the file does not exist. */
export async function readJsonFile<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): Promise<z.infer<T> | undefined> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err: unknown) {
    if (isErrnoCode(err, "ENOENT")) {
      return undefined;
    }
    throw err;
  }

  const parsed = schema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid file ${filePath}: ${parsed.error.issues[0]?.message ?? "schema mismatch"}`);
  }
  return parsed.data;
}
