/**
 * File checks shared by the collaborators
 */

import { stat } from 'node:fs/promises';
import { ResourceError } from '../workflow/errors.js';

/**
 * ResourceError unless `filePath` is a non-empty file
 */
export async function assertNonEmptyFile(filePath: string, label: string): Promise<number> {
  let size: number;
  try {
    const stats = await stat(filePath);
    if (!stats.isFile()) {
      throw new ResourceError(`${label} is not a file: ${filePath}`);
    }
    size = stats.size;
  } catch (error) {
    if (error instanceof ResourceError) throw error;
    throw new ResourceError(`${label} not found: ${filePath}`, { cause: error });
  }

  if (size === 0) {
    throw new ResourceError(`${label} is empty: ${filePath}`);
  }
  return size;
}
