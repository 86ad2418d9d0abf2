import * as fs from 'fs';
import * as path from 'path';
import type { z } from 'zod';
import { ArtifactError } from './errors';

export function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
}

/**
 * Writes JSON next to the target and renames it into place, so an interrupted
 * run leaves the previous artifact intact.
 */
export function writeJsonAtomic(filePath: string, data: unknown, indent = 2): void {
  ensureDir(path.dirname(filePath));
  const tmp = `${filePath}.tmp-${process.pid}`;
  try {
    fs.writeFileSync(tmp, JSON.stringify(data, null, indent) + '\n');
    fs.renameSync(tmp, filePath);
  } catch (e) {
    if (fs.existsSync(tmp)) fs.rmSync(tmp, { force: true });
    throw e;
  }
}

export function readJsonArtifact<T extends z.ZodTypeAny>(filePath: string, schema: T): z.infer<T> {
  if (!fs.existsSync(filePath)) throw new ArtifactError(filePath, 'not found');
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ArtifactError(filePath, `invalid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    throw new ArtifactError(filePath, `schema mismatch at ${first?.path.join('.') ?? '?'}: ${first?.message ?? ''}`);
  }
  return parsed.data;
}

/** Like readJsonArtifact, but a missing file yields the fallback. */
export function readOptionalArtifact<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T,
  fallback: z.infer<T>
): z.infer<T> {
  if (!fs.existsSync(filePath)) return fallback;
  return readJsonArtifact(filePath, schema);
}

/** Object with keys in sorted order, for byte-stable JSON output. */
export function sortKeys<V>(obj: Record<string, V>): Record<string, V> {
  const out: Record<string, V> = {};
  for (const k of Object.keys(obj).sort()) out[k] = obj[k];
  return out;
}
