import fs from 'node:fs';
import path from 'node:path';

import { makeTempDir } from '../../__tests__/fixtures/fmuFixtures';
import { writeFileAtomic } from '../atomicWrite';
import { stableStringify } from '../deterministicJson';

describe('stableStringify', () => {
  test('sorts keys recursively, keeps array order and drops undefined members', () => {
    const json = stableStringify({ b: 1, a: { d: [3, 1], c: undefined, b: 'x' } }, 0);
    expect(json).toBe('{"a":{"b":"x","d":[3,1]},"b":1}\n');
  });
});

describe('writeFileAtomic', () => {
  test('replaces the target and leaves no temp file behind', async () => {
    const dir = makeTempDir('fmu-md-atomic-');
    const target = path.join(dir, 'sub', 'x.bin');

    await writeFileAtomic(target, Buffer.from('one'));
    await writeFileAtomic(target, Buffer.from('two'));

    expect(fs.readFileSync(target, 'utf8')).toBe('two');
    expect(fs.readdirSync(path.dirname(target))).toEqual(['x.bin']);
  });

  test('removes the temp file when the rename fails', async () => {
    const dir = makeTempDir('fmu-md-atomic-');
    const target = path.join(dir, 'taken');
    fs.mkdirSync(path.join(target, 'child'), { recursive: true });

    await expect(writeFileAtomic(target, Buffer.from('data'))).rejects.toThrow();
    expect(fs.readdirSync(dir)).toEqual(['taken']);
  });
});
