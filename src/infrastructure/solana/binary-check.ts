import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export type BinaryChecker = (binary: string) => Promise<boolean>;

/**
 * Check if a binary exists on the system PATH.
 */
export async function checkBinaryExists(binary: string): Promise<boolean> {
  try {
    await execFileAsync('which', [binary]);
    return true;
  } catch {
    return false;
  }
}
