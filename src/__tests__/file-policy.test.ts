/**
 * Unit tests for FilePolicy
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { FilePolicy } from '../orchestrator/file-policy.js';
import { DEFAULT_CONFIG } from '../config/config.js';
import { ErrorCode, IOError } from '../shared/errors.js';
import { makeTempDir, removeDir } from './helpers.js';

describe('FilePolicy', () => {
  let root: string;
  let policy: FilePolicy;

  beforeEach(() => {
    root = makeTempDir();
    policy = new FilePolicy(root, { ...DEFAULT_CONFIG.exclusion, maxFileSizeBytes: 64, utf8ProbeBytes: 16 });
  });

  afterEach(() => {
    removeDir(root);
  });

  describe('Path checks', () => {
    it('should accept ordinary source files', () => {
      expect(policy.checkPath(join(root, 'src', 'app.ts'))).toEqual({ ok: true });
    });

    it('should exclude files inside excluded directories', () => {
      expect(policy.checkPath(join(root, 'node_modules', 'pkg', 'index.js'))).toMatchObject({
        ok: false,
        code: ErrorCode.IO_EXCLUDED,
      });
    });

    it('should exclude paths outside the root', () => {
      expect(policy.checkPath(join(root, '..', 'elsewhere.txt'))).toMatchObject({
        ok: false,
        code: ErrorCode.IO_EXCLUDED,
      });
    });

    it('should treat binary extensions as binary regardless of case', () => {
      expect(policy.checkPath(join(root, 'logo.PNG'))).toMatchObject({ ok: false, code: ErrorCode.IO_BINARY });
    });

    it('should report paths relative to the root with forward slashes', () => {
      expect(policy.relativePath(join(root, 'src', 'app.ts'))).toBe('src/app.ts');
    });
  });

  describe('Size limit', () => {
    it('should accept a file of exactly the maximum size', () => {
      expect(policy.checkSize(64)).toEqual({ ok: true });
      expect(policy.checkSize(65)).toMatchObject({ ok: false, code: ErrorCode.IO_OVERSIZED });
    });

    it('should read a file at the limit and refuse one byte more', async () => {
      writeFileSync(join(root, 'exact.txt'), 'x'.repeat(64));
      writeFileSync(join(root, 'over.txt'), 'x'.repeat(65));

      await expect(policy.read(join(root, 'exact.txt'), 1000)).resolves.toBe('x'.repeat(64));
      await expect(policy.read(join(root, 'over.txt'), 1000)).rejects.toMatchObject({
        code: ErrorCode.IO_OVERSIZED,
      });
    });
  });

  describe('Content probe', () => {
    it('should reject a NUL byte', () => {
      expect(policy.probe(Buffer.from([0x61, 0x00, 0x62]))).toMatchObject({ ok: false, code: ErrorCode.IO_BINARY });
    });

    it('should reject invalid UTF-8', () => {
      expect(policy.probe(Buffer.from([0xff, 0xfe, 0x41]))).toMatchObject({ ok: false, code: ErrorCode.IO_BINARY });
    });

    it('should accept a multi-byte character cut by the probe boundary', () => {
      const buffer = Buffer.concat([Buffer.from('a'.repeat(15)), Buffer.from('é')]);
      expect(policy.probe(buffer)).toEqual({ ok: true });
    });

    it('should only inspect the leading bytes', () => {
      const buffer = Buffer.concat([Buffer.from('a'.repeat(16)), Buffer.from([0x00])]);
      expect(policy.probe(buffer)).toEqual({ ok: true });
    });

    it('should refuse to read binary content', async () => {
      writeFileSync(join(root, 'data.txt'), Buffer.from([0x61, 0x00, 0x62]));
      await expect(policy.read(join(root, 'data.txt'), 1000)).rejects.toMatchObject({ code: ErrorCode.IO_BINARY });
    });
  });

  describe('Reading', () => {
    it('should report a missing file as unreadable with its errno', async () => {
      const missing = join(root, 'missing.txt');
      const error = await policy.read(missing, 1000).then(
        () => null,
        (err: unknown) => err
      );

      expect(error).toBeInstanceOf(IOError);
      expect(error).toMatchObject({
        code: ErrorCode.IO_UNREADABLE,
        details: { filePath: missing, errno: 'ENOENT' },
      });
    });

    it('should refuse directories', async () => {
      mkdirSync(join(root, 'sub'));
      await expect(policy.read(join(root, 'sub'), 1000)).rejects.toMatchObject({ code: ErrorCode.IO_EXCLUDED });
    });
  });

  describe('Listing', () => {
    it('should list files recursively, sorted, without excluded directories', async () => {
      mkdirSync(join(root, 'src'));
      mkdirSync(join(root, 'node_modules'));
      writeFileSync(join(root, 'src', 'b.ts'), '');
      writeFileSync(join(root, 'a.ts'), '');
      writeFileSync(join(root, 'node_modules', 'c.js'), '');

      expect(await policy.listFiles()).toEqual([join(root, 'a.ts'), join(root, 'src', 'b.ts')]);
    });
  });
});
