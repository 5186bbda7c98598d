import fs from 'fs/promises';
import path from 'path';

/**
 * Write a value as 2-space indented UTF-8 JSON, creating parent directories
 */
export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(value, null, 2), 'utf-8');
}
