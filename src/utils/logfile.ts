/**
 * Run log files
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

const BYTES_PER_MB = 1024 * 1024;

export const SHRINK_MARKER = 'WARNING: YOUR LOGFILE WAS TOO LONG, SOME LINES IN THE MIDDLE WERE REMOVED.';

function isContinuationByte(byte: number | undefined): boolean {
  return byte !== undefined && (byte & 0xc0) === 0x80;
}

/**
 * Keep the beginning and the end of an oversized log, each half of the
 * allowed size in UTF-8 bytes. Cuts never split a character. A limit of -1
 * disables shrinking.
 */
export function shrinkLog(content: string, maxSizeMb: number): string {
  if (maxSizeMb < 0) {
    return content;
  }
  const maxBytes = maxSizeMb * BYTES_PER_MB;
  const bytes = Buffer.from(content, 'utf-8');
  if (bytes.length <= maxBytes) {
    return content;
  }
  const half = Math.floor(maxBytes / 2);

  let headEnd = half;
  while (headEnd > 0 && isContinuationByte(bytes[headEnd])) {
    headEnd -= 1;
  }
  let tailStart = bytes.length - half;
  while (tailStart < bytes.length && isContinuationByte(bytes[tailStart])) {
    tailStart += 1;
  }

  const head = bytes.subarray(0, headEnd).toString('utf-8');
  const tail = bytes.subarray(tailStart).toString('utf-8');
  return `${head}\n\n\n${SHRINK_MARKER}\n\n\n${tail}`;
}

export function formatCommandLine(cmdline: readonly string[]): string {
  return cmdline.map((arg) => (/^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`)).join(' ');
}

export async function writeRunLog(
  logFile: string,
  cmdline: readonly string[],
  output: string,
  maxSizeMb: number
): Promise<void> {
  await mkdir(dirname(logFile), { recursive: true });
  const header = `${formatCommandLine(cmdline)}\n\n\n${'-'.repeat(80)}\n\n\n`;
  await writeFile(logFile, header + shrinkLog(output, maxSizeMb), 'utf-8');
}
