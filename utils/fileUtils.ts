import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export const sanitizeFilename = (filename: string): string => {
  const base = path.basename(filename.replace(/\\/g, '/'));
  const sanitized = base.replace(/[^a-zA-Z0-9._-]/g, '_');
  return sanitized.replace(/^\.+/, '_') || 'archivo';
};

export interface StagedFile {
  name: string;
  bytes: Buffer;
}

/**
 * Writes the given payloads into a fresh temporary directory, runs `fn` with their absolute
 * paths, and removes the directory afterwards whatever `fn` returns or throws.
 * Names are sanitized; a clash between two sanitized names gets a numeric prefix.
 */
export async function withStagedFiles<T>(
  files: StagedFile[],
  fn: (paths: string[]) => Promise<T>,
  prefix = 'invoice-pair-',
): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), prefix));
  try {
    const used = new Set<string>();
    const paths: string[] = [];
    for (const [index, file] of files.entries()) {
      let name = sanitizeFilename(file.name);
      if (used.has(name)) {
        name = `${index}_${name}`;
      }
      used.add(name);
      const target = path.join(dir, name);
      await writeFile(target, file.bytes);
      paths.push(target);
    }
    return await fn(paths);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
