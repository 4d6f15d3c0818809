import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';

import { isErr, unwrap } from '../../types/result.js';
import { loadTargetHashes, parseTargetHashes } from '../target-hashes.js';

describe('parseTargetHashes', () => {
  it('normalizes and deduplicates digests', () => {
    const digests = unwrap(parseTargetHashes('["ABCDEF", " abcdef ", "0123"]'));
    expect(Array.from(digests)).toEqual(['abcdef', '0123']);
  });

  it('accepts an empty list', () => {
    expect(unwrap(parseTargetHashes('[]')).size).toBe(0);
  });

  it('rejects entries that are not hex', () => {
    const result = parseTargetHashes('["abc", "xyz"]');
    if (!isErr(result)) throw new Error('expected an error result');
    expect(result.error.message).toBe('Invalid target hash document');
    expect(result.error.issues).toHaveLength(1);
    expect(result.error.issues[0]).toMatch(/^\/1 must match pattern/);
  });

  it('rejects invalid JSON', () => {
    const result = parseTargetHashes('[abc');
    if (!isErr(result)) throw new Error('expected an error result');
    expect(result.error.message).toBe('Target hash list is not valid JSON');
  });
});

describe('loadTargetHashes', () => {
  it('reads digests from a file', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'phrasemask-hashes-'));
    try {
      const file = path.join(dir, 'hashes.json');
      await writeFile(file, '["A9993E364706816ABA3E25717850C26C9CD0D89D"]', 'utf8');
      const digests = unwrap(await loadTargetHashes(file));
      expect(Array.from(digests)).toEqual([
        'a9993e364706816aba3e25717850c26c9cd0d89d',
      ]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('reports an unreadable file', async () => {
    const result = await loadTargetHashes(
      path.join(os.tmpdir(), 'phrasemask-no-such-dir', 'hashes.json')
    );
    if (!isErr(result)) throw new Error('expected an error result');
    expect(result.error.message).toBe('Cannot read target hash file');
  });
});
