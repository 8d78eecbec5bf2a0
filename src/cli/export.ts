import { writeFile } from 'fs/promises';
import type { StrengthLabel } from '../strength/index.js';
import { UTF8 } from '../strength/const.js';
import { EXPORT_JSON_INDENT } from './const.js';

// Passwords are written in cleartext, exactly as they were checked.
export interface CheckRecord {
  password: string;
  strength: StrengthLabel;
  message: string;
}

export async function exportResults(records: readonly CheckRecord[], path: string): Promise<void> {
  await writeFile(path, JSON.stringify(records, null, EXPORT_JSON_INDENT), UTF8);
}
