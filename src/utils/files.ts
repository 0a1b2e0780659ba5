import { mkdir, writeFile, access, readdir, rm } from 'fs/promises';
import { join } from 'path';

export async function ensureDirectory(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function writeTextFile(path: string, content: string): Promise<void> {
  await writeFile(path, content, 'utf-8');
}

export async function removePath(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * All regular files below `root`, skipping any directory named in `skipDirs`.
 */
export async function listFiles(root: string, skipDirs: string[] = ['.git']): Promise<string[]> {
  const files: string[] = [];
  const entries = await readdir(root, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(root, entry.name);
    if (entry.isDirectory()) {
      if (skipDirs.includes(entry.name)) continue;
      files.push(...await listFiles(fullPath, skipDirs));
    } else if (entry.isFile()) {
      files.push(fullPath);
    }
  }

  return files.sort();
}
