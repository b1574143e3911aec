/**
 * Working-folder helpers: deterministic "first file with a known extension"
 * lookup, folder preparation, and staging-area clearing.
 */
import * as fs from 'fs';
import * as path from 'path';
import { logger } from './logger.js';

/**
 * Pick the first entry, by file name, whose extension (case-insensitive) is
 * in `extensions`. Independent of the order the listing came in.
 */
export function pickFirstByExtension(
  listing: readonly string[],
  extensions: readonly string[],
): string | null {
  const wanted = new Set(extensions.map((e) => e.toLowerCase()));
  const sorted = [...listing].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  return sorted.find((name) => wanted.has(path.extname(name).toLowerCase())) ?? null;
}

/** Absolute path of the first matching regular file in `dir`, or null. */
export function findFirstMatching(dir: string, extensions: readonly string[]): string | null {
  if (!fs.existsSync(dir)) return null;
  const files = fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((d) => d.isFile())
    .map((d) => d.name);
  const picked = pickFirstByExtension(files, extensions);
  return picked ? path.resolve(dir, picked) : null;
}

export function ensureDirs(...dirs: string[]): void {
  for (const dir of dirs) fs.mkdirSync(dir, { recursive: true });
}

/**
 * Remove everything inside `dir`, keeping the folder. Entries that cannot be
 * removed are logged and reported back; nothing is thrown.
 */
export function clearDir(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
    return [];
  }
  const leftovers: string[] = [];
  for (const name of fs.readdirSync(dir)) {
    const target = path.join(dir, name);
    try {
      fs.rmSync(target, { recursive: true, force: true });
    } catch (err) {
      logger.warn('Workspace: could not remove staging entry', { path: target, err });
      leftovers.push(target);
    }
  }
  return leftovers;
}

/** Delete one file; failures are logged, never thrown. */
export function discardFile(filePath: string): void {
  try {
    fs.rmSync(filePath, { force: true });
  } catch (err) {
    logger.warn('Workspace: could not delete file', { path: filePath, err });
  }
}
