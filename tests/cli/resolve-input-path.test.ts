import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { getDefaultInputPath, resolveInputPath } from '../../src/cli/resolve-input-path.js';

const cwd = path.resolve('/work/billing');
const defaultPath = path.resolve('/opt/usage-invoicing/usage-data.json');

function filesThatExist(...existing: string[]): (filePath: string) => Promise<boolean> {
  return (filePath) => Promise.resolve(existing.includes(filePath));
}

describe('resolveInputPath', () => {
  it('resolves an explicit path against the working directory', async () => {
    await expect(
      resolveInputPath({ explicitPath: 'data/usage.json', envPath: 'ignored.json', cwd }),
    ).resolves.toBe(path.resolve(cwd, 'data/usage.json'));
  });

  it('keeps surrounding spaces in an explicit file name', async () => {
    await expect(resolveInputPath({ explicitPath: ' usage.json ', cwd })).resolves.toBe(
      path.join(cwd, ' usage.json '),
    );
  });

  it('uses the environment path when no argument is given', async () => {
    await expect(resolveInputPath({ explicitPath: '  ', envPath: 'env.json', cwd })).resolves.toBe(
      path.resolve(cwd, 'env.json'),
    );
  });

  it('prefers the packaged default when it exists', async () => {
    await expect(
      resolveInputPath({ cwd, defaultPath, isFile: filesThatExist(defaultPath) }),
    ).resolves.toBe(defaultPath);
  });

  it('falls back to the working directory file when the default is missing', async () => {
    const workingDirectoryPath = path.join(cwd, 'usage-data.json');

    await expect(
      resolveInputPath({ cwd, defaultPath, isFile: filesThatExist(workingDirectoryPath) }),
    ).resolves.toBe(workingDirectoryPath);
  });

  it('returns the default path when no candidate exists', async () => {
    await expect(resolveInputPath({ cwd, defaultPath, isFile: filesThatExist() })).resolves.toBe(
      defaultPath,
    );
  });

  it('places the packaged default at the package root', () => {
    expect(getDefaultInputPath()).toBe(path.resolve('usage-data.json'));
  });
});
