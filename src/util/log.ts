/**
 * Logging for code-translator
 *
 * Every line goes to stderr (so stdout stays clean for reports and summaries)
 * and is appended to ~/.code-translator/logs/translator.log.
 * Set CODE_TRANSLATOR_LOG_DIR to log somewhere else.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

const LOG_DIR = process.env.CODE_TRANSLATOR_LOG_DIR || path.join(os.homedir(), '.code-translator', 'logs');
const LOG_FILE = path.join(LOG_DIR, 'translator.log');

let fileLoggingEnabled = true;

// Ensure log directory exists
try {
  if (!fs.existsSync(LOG_DIR)) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
  }
} catch (error) {
  fileLoggingEnabled = false;
  console.error('[code-translator] Failed to create log directory:', error);
}

/**
 * Log to both stderr and file
 */
export function log(message: string, ...args: unknown[]): void {
  const timestamp = new Date().toISOString();
  const formattedMessage = `[${timestamp}] ${message}`;
  const fullMessage = args.length > 0
    ? `${formattedMessage} ${args.map(a => JSON.stringify(a)).join(' ')}`
    : formattedMessage;

  console.error(fullMessage);

  if (!fileLoggingEnabled) {
    return;
  }

  try {
    fs.appendFileSync(LOG_FILE, fullMessage + '\n', 'utf-8');
  } catch (error) {
    // One failure is enough to know the file is not writable
    fileLoggingEnabled = false;
    console.error('[code-translator] Failed to write to log file:', error);
  }
}

/**
 * Path of the log file, for the end-of-run summary
 */
export function getLogFilePath(): string {
  return LOG_FILE;
}
