import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { isMissingPathError, pathIsFile, pathStat } from '../../src/utils/fs-helpers.js';

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.map((dir) => rm(dir, { recursive: true, force: true })));
  tempDirs.length = 0;
});

describe('fs helpers', () => {
  it('distinguishes files, directories, and missing paths', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'usage-fs-helpers-'));
    tempDirs.push(dir);
    const filePath = path.join(dir, 'usage.json');
    await writeFile(filePath, '[]', 'utf8');

    await expect(pathIsFile(filePath)).resolves.toBe(true);
    await expect(pathIsFile(dir)).resolves.toBe(false);
    await expect(pathIsFile(path.join(dir, 'missing.json'))).resolves.toBe(false);
    expect((await pathStat(filePath))?.size).toBe(2);
    await expect(pathStat(path.join(dir, 'missing.json'))).resolves.toBeUndefined();
  });

  it('rethrows stat failures other than a missing path', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'usage-fs-helpers-'));
    tempDirs.push(dir);
    const filePath = path.join(dir, 'usage.json');
    await writeFile(filePath, '[]', 'utf8');

    await expect(pathStat(path.join(filePath, 'child.json'))).rejects.toMatchObject({
      code: 'ENOTDIR',
    });
    expect(isMissingPathError(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe(true);
    expect(isMissingPathError(Object.assign(new Error('denied'), { code: 'EACCES' }))).toBe(false);
  });
});
