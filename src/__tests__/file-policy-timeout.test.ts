/**
 * Unit tests for FilePolicy read deadlines on a filesystem that never answers
 */

import { describe, it, expect, vi } from 'vitest';
import { FilePolicy } from '../orchestrator/file-policy.js';
import { DEFAULT_CONFIG } from '../config/config.js';
import { ErrorCode, IOError } from '../shared/errors.js';

vi.mock('fs/promises', async importOriginal => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return {
    ...actual,
    stat: vi.fn(() => new Promise(() => undefined)),
  };
});

describe('FilePolicy deadlines', () => {
  it('should time out a stat that never settles', async () => {
    const policy = new FilePolicy('/srv/app', DEFAULT_CONFIG.exclusion);
    const read = policy.read('/srv/app/config.ini', 20);

    await expect(read).rejects.toBeInstanceOf(IOError);
    await expect(read).rejects.toMatchObject({ code: ErrorCode.IO_TIMEOUT });
  });
});
