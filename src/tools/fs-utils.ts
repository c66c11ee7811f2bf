import * as fs from 'node:fs/promises';
import { hasErrorCode } from '../errors';

/** `fs.stat`, or null when nothing exists at `target` */
export async function statIfExists(target: string) {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}
