/**
 * File exclusion policy and safe reading for one monitored root.
 */

import { readdir, readFile, stat } from 'fs/promises';
import { extname, join, relative, sep } from 'path';
import type { ExclusionConfig } from '../config/config.js';
import { ErrorCode, IOError, errorMessage } from '../shared/errors.js';
import type { IOErrorCode } from '../shared/errors.js';

export type PolicyVerdict = { ok: true } | { ok: false; code: IOErrorCode; reason: string };

const OK: PolicyVerdict = { ok: true };

function errnoOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Settles with `operation`, or rejects with IO_TIMEOUT after `timeoutMs`. */
async function withinTimeout<T>(operation: Promise<T>, timeoutMs: number, filePath: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(new IOError(ErrorCode.IO_TIMEOUT, `stat timed out after ${timeoutMs}ms`, { filePath })),
      timeoutMs
    );
  });
  try {
    return await Promise.race([operation, expired]);
  } finally {
    clearTimeout(timer);
  }
}

export class FilePolicy {
  readonly root: string;
  private readonly extensions: ReadonlySet<string>;
  private readonly directories: ReadonlySet<string>;
  readonly maxFileSizeBytes: number;
  readonly probeBytes: number;

  constructor(root: string, exclusion: ExclusionConfig) {
    this.root = root;
    this.extensions = new Set(exclusion.extensions.map(e => e.toLowerCase()));
    this.directories = new Set(exclusion.directories);
    this.maxFileSizeBytes = exclusion.maxFileSizeBytes;
    this.probeBytes = exclusion.utf8ProbeBytes;
  }

  /** Path relative to the root, `/`-separated. */
  relativePath(filePath: string): string {
    return relative(this.root, filePath).split(sep).join('/');
  }

  isExcludedDirectory(name: string): boolean {
    return this.directories.has(name);
  }

  checkPath(filePath: string): PolicyVerdict {
    const rel = this.relativePath(filePath);
    if (rel.startsWith('..')) {
      return { ok: false, code: ErrorCode.IO_EXCLUDED, reason: 'outside monitored root' };
    }

    const segments = rel.split('/');
    const dirs = segments.slice(0, -1);
    const excludedDir = dirs.find(d => this.directories.has(d));
    if (excludedDir !== undefined) {
      return { ok: false, code: ErrorCode.IO_EXCLUDED, reason: `inside excluded directory ${excludedDir}` };
    }

    const ext = extname(filePath).toLowerCase();
    if (ext && this.extensions.has(ext)) {
      return { ok: false, code: ErrorCode.IO_BINARY, reason: `binary extension ${ext}` };
    }

    return OK;
  }

  checkSize(sizeBytes: number): PolicyVerdict {
    if (sizeBytes > this.maxFileSizeBytes) {
      return {
        ok: false,
        code: ErrorCode.IO_OVERSIZED,
        reason: `${sizeBytes} bytes exceeds limit of ${this.maxFileSizeBytes}`,
      };
    }
    return OK;
  }

  /** Rejects content whose leading bytes hold a NUL or invalid UTF-8. */
  probe(buffer: Buffer): PolicyVerdict {
    const sample = buffer.subarray(0, this.probeBytes);
    if (sample.includes(0)) {
      return { ok: false, code: ErrorCode.IO_BINARY, reason: 'NUL byte in sample' };
    }
    try {
      // stream: a multi-byte sequence cut by the sample boundary is not an error
      new TextDecoder('utf-8', { fatal: true }).decode(sample, { stream: true });
    } catch {
      return { ok: false, code: ErrorCode.IO_BINARY, reason: 'sample is not valid UTF-8' };
    }
    return OK;
  }

  /**
   * Reads a file as text after the size and content checks.
   * @throws IOError when the file is excluded, unreadable or times out
   */
  async read(filePath: string, timeoutMs: number): Promise<string> {
    const pathVerdict = this.checkPath(filePath);
    if (!pathVerdict.ok) throw new IOError(pathVerdict.code, pathVerdict.reason, { filePath });

    const deadline = Date.now() + timeoutMs;
    let buffer: Buffer;
    try {
      const stats = await withinTimeout(stat(filePath), timeoutMs, filePath);
      if (!stats.isFile()) {
        throw new IOError(ErrorCode.IO_EXCLUDED, 'not a regular file', { filePath });
      }
      const sizeVerdict = this.checkSize(stats.size);
      if (!sizeVerdict.ok) throw new IOError(sizeVerdict.code, sizeVerdict.reason, { filePath, size: stats.size });

      buffer = await readFile(filePath, { signal: AbortSignal.timeout(Math.max(1, deadline - Date.now())) });
    } catch (error) {
      if (error instanceof IOError) throw error;
      if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
        throw new IOError(ErrorCode.IO_TIMEOUT, `read timed out after ${timeoutMs}ms`, { filePath });
      }
      throw new IOError(ErrorCode.IO_UNREADABLE, errorMessage(error), { filePath, errno: errnoOf(error) });
    }

    // The file may have grown between stat and read.
    const sizeVerdict = this.checkSize(buffer.length);
    if (!sizeVerdict.ok) throw new IOError(sizeVerdict.code, sizeVerdict.reason, { filePath, size: buffer.length });

    const probeVerdict = this.probe(buffer);
    if (!probeVerdict.ok) throw new IOError(probeVerdict.code, probeVerdict.reason, { filePath });

    return buffer.toString('utf-8');
  }

  /** Every file under the root, excluded directories pruned, sorted. */
  async listFiles(dir: string = this.root): Promise<string[]> {
    const files: string[] = [];
    const entries = await readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!this.isExcludedDirectory(entry.name)) {
          files.push(...(await this.listFiles(fullPath)));
        }
      } else if (entry.isFile()) {
        files.push(fullPath);
      }
    }

    return files.sort();
  }
}

export default FilePolicy;
