/**
 * fileIO.ts: Save / Open project files
 *
 * Graph snapshots are plain UTF-8 JSON on disk. Errors from the file system
 * (missing file, permissions) propagate to the caller.
 */
import { readFile, writeFile } from 'node:fs/promises';

export async function saveTextFile(content: string, path = 'shader-graph.json'): Promise<void> {
  await writeFile(path, content, 'utf8');
}

export async function openTextFile(path: string): Promise<string> {
  return readFile(path, 'utf8');
}
