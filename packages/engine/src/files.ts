import fs from 'node:fs/promises';

const statOrNull = async (filePath: string) => {
  try {
    return await fs.stat(filePath);
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return null;
    }
    throw error;
  }
};

export const isRegularFile = async (filePath: string): Promise<boolean> =>
  (await statOrNull(filePath))?.isFile() ?? false;

export const pathExists = async (filePath: string): Promise<boolean> =>
  (await statOrNull(filePath)) !== null;
