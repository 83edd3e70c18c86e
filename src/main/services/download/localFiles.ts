import fs from 'node:fs';

export const EMPTY_FILE_MESSAGE = 'Locally downloaded file is empty.';

/** True when `filePath` is a regular file with at least one byte. */
export async function isUsableFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.isFile() && stats.size > 0;
  } catch {
    return false;
  }
}

export async function readPayload(filePath: string): Promise<Buffer | null> {
  if (!(await isUsableFile(filePath))) {
    return null;
  }

  try {
    const bytes = await fs.promises.readFile(filePath);
    return bytes.length > 0 ? bytes : null;
  } catch {
    return null;
  }
}
