import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { z } from 'zod';
import type { Logger } from './log.js';

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read a file, or null if it does not exist.
 */
export async function readFileOrNull(filePath: string): Promise<Buffer | null> {
  try {
    return await readFile(filePath);
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}

/**
 * Read, parse and validate a JSON file. Missing files give null; unreadable
 * or invalid ones are logged and also give null.
 */
export async function readJson<T>(
  filePath: string,
  schema: z.ZodType<T>,
  logger: Logger,
): Promise<T | null> {
  const data = await readFileOrNull(filePath);
  if (!data) return null;
  let raw: unknown;
  try {
    raw = JSON.parse(data.toString('utf8'));
  } catch (err) {
    logger.warn(`Ignoring unreadable ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    return null;
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(`Ignoring invalid ${filePath}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
    return null;
  }
  return parsed.data;
}

export async function writeJson(filePath: string, value: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(value, null, 2));
}

export async function writeBytes(filePath: string, data: Buffer): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, data);
}
