/**
 * Unit tests for FsChangeSource lifecycle
 */

import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'path';
import { FsChangeSource } from '../watcher/fs-change-source.js';
import { makeTempDir, removeDir } from './helpers.js';

describe('FsChangeSource', () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) removeDir(dir);
  });

  it('should watch existing roots until closed', () => {
    const root = makeTempDir();
    dirs.push(root);
    const source = new FsChangeSource([root]);

    source.start(() => undefined);
    expect(source.isWatching).toBe(true);

    source.close();
    expect(source.isWatching).toBe(false);
  });

  it('should skip roots that do not exist', () => {
    const root = makeTempDir();
    dirs.push(root);
    const source = new FsChangeSource([join(root, 'missing')]);

    source.start(() => undefined);
    expect(source.isWatching).toBe(false);
    source.close();
  });
});
