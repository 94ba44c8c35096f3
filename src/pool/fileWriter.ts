import * as fs from 'fs';
import * as path from 'path';
import { WriteError } from '../core/errors';
import { log } from '../util/log';

let tempCounter = 0;

/**
 * Replace a file's contents atomically: write a sibling temp file with the
 * original mode, then rename it over the target. On failure the original
 * is left as it was.
 */
export function writeFileAtomic(filePath: string, content: string | Uint8Array): void {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${tempCounter++}.tmp`);

  try {
    const { mode } = fs.statSync(filePath);
    fs.writeFileSync(tempPath, content, { mode });
    // writeFileSync applies the umask; set the exact bits
    fs.chmodSync(tempPath, mode);
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    try {
      if (fs.existsSync(tempPath)) {
        fs.unlinkSync(tempPath);
      }
    } catch (cleanupError) {
      log(`[Writer] Could not remove temp file ${tempPath}: ${String(cleanupError)}`);
    }
    throw new WriteError(filePath, { cause: error });
  }
}
