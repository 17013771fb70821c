/**
 * ID Generation Tests
 */

import { describe, it, expect } from 'vitest';
import { generateId } from '@/shared/utils/uuid';

const UUID_V7 = /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('generateId', () => {
  it('should produce lowercase UUIDv7 strings', () => {
    expect(generateId()).toMatch(UUID_V7);
  });

  it('should not repeat across a batch', () => {
    const ids = Array.from({ length: 100 }, () => generateId());

    expect(new Set(ids).size).toBe(100);
  });

  it('should sort in creation order', () => {
    const ids = Array.from({ length: 20 }, () => generateId());

    expect([...ids].sort()).toEqual(ids);
  });
});
