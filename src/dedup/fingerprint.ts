import { createHash } from 'crypto';

/**
 * Masks letters and digits while keeping length and punctuation, so the
 * shape of a value survives but the value does not.
 */
export function shapeNormalize(value: string): string {
  return value.replace(/[A-Z]/g, 'A').replace(/[a-z]/g, 'a').replace(/[0-9]/g, '9');
}

export interface FingerprintInput {
  filePath: string;
  detectorName: string;
  lineNumber: number;
  shape: string;
  /** Position among same-shaped matches of one detector on one line. */
  ordinal: number;
}

export function fingerprint(input: FingerprintInput): string {
  return createHash('sha256')
    .update([input.filePath, input.detectorName, String(input.lineNumber), input.shape, String(input.ordinal)].join('\0'))
    .digest('hex')
    .slice(0, 24);
}
