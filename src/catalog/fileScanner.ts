import fs from 'fs/promises';
import path from 'path';

const PHOTO_EXTENSIONS = new Set(['.jpg', '.jpeg']);

/**
 * A photo discovered on disk.
 */
export interface SourceFile {
  path: string;
  /** Modification time, epoch milliseconds */
  mtimeMs: number;
}

export function isPhotoFile(fileName: string): boolean {
  return PHOTO_EXTENSIONS.has(path.extname(fileName).toLowerCase());
}

/**
 * Recursively collects JPG/JPEG files under a directory, sorted by path.
 */
export async function scanPhotos(root: string): Promise<SourceFile[]> {
  const found: SourceFile[] = [];
  const pending = [path.resolve(root)];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) {
      break;
    }

    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        pending.push(fullPath);
      } else if (entry.isFile() && isPhotoFile(entry.name)) {
        const stats = await fs.stat(fullPath);
        found.push({ path: fullPath, mtimeMs: stats.mtimeMs });
      }
    }
  }

  return found.sort((a, b) => a.path.localeCompare(b.path));
}
