/**
 * UUID Utility
 * Time-ordered ids (uuidv7), so generated file names sort by creation time
 */

import { v7 as uuidv7 } from 'uuid';

export function generateId(): string {
  return uuidv7();
}
