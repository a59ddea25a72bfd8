/**
 * Unit tests for value masking and context previews
 */

import { describe, it, expect } from 'vitest';
import { contextPreview, maskSpans, maskValue } from '../scanner/redaction.js';
import { FAKE_AWS_KEY } from './helpers.js';

describe('maskValue', () => {
  it('should keep two characters at each end and preserve length', () => {
    expect(maskValue(FAKE_AWS_KEY)).toBe('AK****************OP');
    expect(maskValue('abcdefgh')).toBe('ab****gh');
  });

  it('should mask short values entirely', () => {
    expect(maskValue('short')).toBe('*****');
    expect(maskValue('')).toBe('');
  });
});

describe('maskSpans', () => {
  it('should mask every span without shifting columns', () => {
    const line = 'id=ABCDEFGHIJ pw=0123456789';
    const masked = maskSpans(line, [
      { start: 3, end: 13 },
      { start: 17, end: 27 },
    ]);
    expect(masked).toBe('id=AB******IJ pw=01******89');
    expect(masked).toHaveLength(line.length);
  });
});

describe('contextPreview', () => {
  it('should bracket the target and truncate beyond the window', () => {
    const line = 'aaaaaaaaaa' + 'KEYVALUE99' + 'bbbbbbbbbb';
    const target = { start: 10, end: 20 };
    expect(contextPreview(line, target, [target], 5)).toBe('...aaaaa[KE******99]bbbbb...');
  });

  it('should omit ellipses when the line fits in the window', () => {
    const line = `key = ${FAKE_AWS_KEY}`;
    const target = { start: 6, end: 26 };
    expect(contextPreview(line, target, [target], 40)).toBe('key = [AK****************OP]');
  });

  it('should mask other sensitive spans that fall inside the window', () => {
    const line = 'id=ABCDEFGHIJ pw=0123456789';
    const id = { start: 3, end: 13 };
    const pw = { start: 17, end: 27 };
    expect(contextPreview(line, pw, [id, pw], 40)).toBe('id=AB******IJ pw=[01******89]');
  });
});
