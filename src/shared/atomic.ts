import fs from 'node:fs';
import path from 'node:path';
import { generateId } from './utils.js';

/**
 * Replace `filePath` with `contents` via a sibling temp file and a rename,
 * so readers see either the old or the new document, never a torn one.
 */
export function writeFileAtomicSync(filePath: string, contents: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.${generateId(8)}.tmp`;
  fs.writeFileSync(tmpPath, contents, 'utf-8');
  try {
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw err;
  }
}

export function writeJsonAtomicSync(filePath: string, data: unknown): void {
  writeFileAtomicSync(filePath, JSON.stringify(data, null, 2) + '\n');
}

/**
 * Read and parse a JSON file. Returns `undefined` when the file is missing,
 * unreadable or not valid JSON.
 */
export function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return undefined;
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8')) as unknown;
  } catch {
    return undefined;
  }
}
