/**
 * .env File Loader
 * Parses a .env file with dotenv, accepting UTF-8 and UTF-16LE (with BOM)
 */

import fs from 'fs';
import dotenv from 'dotenv';

const UTF16LE_BOM = [0xff, 0xfe] as const;
const UTF8_BOM = [0xef, 0xbb, 0xbf] as const;

function startsWith(buffer: Buffer, bom: readonly number[]): boolean {
  return bom.every((byte, index) => buffer[index] === byte);
}

/**
 * Decode raw .env bytes to text
 */
export function decodeEnvFile(raw: Buffer): string {
  if (startsWith(raw, UTF16LE_BOM)) {
    return raw.subarray(UTF16LE_BOM.length).toString('utf16le');
  }
  if (startsWith(raw, UTF8_BOM)) {
    return raw.subarray(UTF8_BOM.length).toString('utf8');
  }
  return raw.toString('utf8');
}

/**
 * Load variables from a .env file into process.env.
 * Variables already present in the environment win. A missing file is ignored.
 *
 * @returns the names of the variables that were set
 */
export function loadEnvFile(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }

  const parsed = dotenv.parse(decodeEnvFile(fs.readFileSync(filePath)));
  const applied: string[] = [];

  for (const [key, value] of Object.entries(parsed)) {
    if (process.env[key] === undefined) {
      process.env[key] = value;
      applied.push(key);
    }
  }

  return applied;
}
