import { access, mkdir, readFile } from 'node:fs/promises';
import { constants } from 'node:fs';

export async function ensureDir(path: string) {
  await mkdir(path, { recursive: true });
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function readJson(file: string): Promise<unknown> {
  const buf = await readFile(file, 'utf8');
  return JSON.parse(buf);
}
