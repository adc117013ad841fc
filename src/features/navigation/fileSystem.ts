import { promises as fs } from 'fs';

/**
 * Existence check used to tell local media apart from directory listings.
 * Directories and missing paths both report false.
 */
export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}
