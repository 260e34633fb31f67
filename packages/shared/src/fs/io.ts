import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir as fseEnsureDir } from 'fs-extra';

export interface WriteOptions {
  /** Permission bits applied to the final file */
  mode?: number;
}

export async function ensureDir(path: string): Promise<void> {
  await fseEnsureDir(dirname(path));
}

/**
 * Writes through a sibling temp file and renames it into place.
 * The mode is set explicitly so the process umask cannot strip bits.
 */
export async function atomicWrite(
  path: string,
  content: string | Buffer,
  options: WriteOptions = {},
): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path) });
  await fs.writeFile(tempPath, content);
  if (options.mode !== undefined) {
    await fs.chmod(tempPath, options.mode);
  }
  await fs.rename(tempPath, path);
}
