import { access, readFile } from 'node:fs/promises';
import path from 'node:path';

export const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await access(filePath);
    return true;
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return false;
    throw err;
  }
};

export const readTextFile = async (filePath: string): Promise<string> => {
  return readFile(filePath, 'utf8');
};

/** Walks from `startDir` to the filesystem root looking for `filename`. */
export const findUp = async (filename: string, startDir: string): Promise<string | null> => {
  let dir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(dir, filename);
    if (await fileExists(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
};
