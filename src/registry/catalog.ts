/**
 * Built-in detector catalog.
 */

import { DetectorKind, Severity } from '../shared/types.js';
import type { Detector } from './types.js';

export const DEFAULT_STRUCTURAL_PRIOR = 0.9;
export const DEFAULT_ENTROPY_THRESHOLD = 0.75;
export const DEFAULT_MIN_TOKEN_LENGTH = 20;

export const BUILTIN_DETECTORS: readonly Detector[] = [
  // ─── High ─────────────────────────────────────────────────
  {
    kind: DetectorKind.STRUCTURAL,
    name: 'aws_access_key',
    description: 'AWS Access Key ID',
    severity: Severity.HIGH,
    pattern: '\\b(?:AKIA|ASIA)[0-9A-Z]{16}\\b',
  },
  {
    kind: DetectorKind.STRUCTURAL,
    name: 'aws_secret_key',
    description: 'AWS Secret Access Key',
    severity: Severity.HIGH,
    pattern: '(?<![A-Za-z0-9/+=])[A-Za-z0-9/+=]{40}(?![A-Za-z0-9/+=])',
    requiredContext: ['aws', 'secret', 'key'],
    prior: 0.7,
  },
  {
    kind: DetectorKind.STRUCTURAL,
    name: 'private_key',
    description: 'Private Key',
    severity: Severity.HIGH,
    pattern: '-----BEGIN (?:RSA |EC |DSA |OPENSSH )?PRIVATE KEY-----',
  },
  {
    kind: DetectorKind.STRUCTURAL,
    name: 'jwt_token',
    description: 'JWT Token',
    severity: Severity.HIGH,
    pattern: '\\beyJ[A-Za-z0-9_-]+\\.eyJ[A-Za-z0-9_-]+\\.[A-Za-z0-9_-]*',
  },

  // ─── Medium ───────────────────────────────────────────────
  {
    kind: DetectorKind.STRUCTURAL,
    name: 'github_token',
    description: 'GitHub Token',
    severity: Severity.MEDIUM,
    pattern: '\\bgh[pousr]_[A-Za-z0-9]{36}\\b',
  },
  {
    kind: DetectorKind.STRUCTURAL,
    name: 'openai_api_key',
    description: 'OpenAI API Key',
    severity: Severity.MEDIUM,
    pattern: '\\bsk-[A-Za-z0-9]{48}\\b',
  },
  {
    kind: DetectorKind.STRUCTURAL,
    name: 'stripe_key',
    description: 'Stripe Live Secret Key',
    severity: Severity.MEDIUM,
    pattern: '\\b(?:sk|rk)_live_[A-Za-z0-9]{24,}\\b',
  },
  {
    kind: DetectorKind.STRUCTURAL,
    name: 'slack_token',
    description: 'Slack Token',
    severity: Severity.MEDIUM,
    pattern: '\\bxox[baprs]-[A-Za-z0-9-]{10,}',
  },
  {
    kind: DetectorKind.STRUCTURAL,
    name: 'database_url',
    description: 'Database Connection String',
    severity: Severity.MEDIUM,
    pattern: '\\b(?:mysql|postgres(?:ql)?|mongodb(?:\\+srv)?|redis)://[^\\s:@/]+:[^\\s@/]+@[^\\s/]+',
    flags: 'i',
  },
  {
    kind: DetectorKind.STRUCTURAL,
    name: 'credit_card',
    description: 'Credit Card Number',
    severity: Severity.MEDIUM,
    pattern: '\\b(?:4[0-9]{12}(?:[0-9]{3})?|5[1-5][0-9]{14}|3[47][0-9]{13}|3[0-9]{13}|6(?:011|5[0-9]{2})[0-9]{12})\\b',
    prior: 0.7,
    validate: 'luhn',
  },
  {
    kind: DetectorKind.STRUCTURAL,
    name: 'ssn',
    description: 'Social Security Number',
    severity: Severity.MEDIUM,
    pattern: '\\b\\d{3}-\\d{2}-\\d{4}\\b',
    prior: 0.7,
    validate: 'ssn',
  },
  {
    kind: DetectorKind.STATISTICAL,
    name: 'high_entropy_string',
    description: 'High Entropy String',
    severity: Severity.MEDIUM,
    alphabet: 'A-Za-z0-9+/',
    minLength: DEFAULT_MIN_TOKEN_LENGTH,
    threshold: DEFAULT_ENTROPY_THRESHOLD,
    requireDigit: true,
  },

  // ─── Low ──────────────────────────────────────────────────
  {
    kind: DetectorKind.STRUCTURAL,
    name: 'email',
    description: 'Email Address',
    severity: Severity.LOW,
    pattern: '\\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\\.[A-Za-z]{2,}\\b',
    prior: 0.6,
  },
  {
    kind: DetectorKind.STRUCTURAL,
    name: 'phone_number',
    description: 'Phone Number',
    severity: Severity.LOW,
    pattern: '(?:\\b\\d{3}-\\d{3}-\\d{4}\\b|\\(\\d{3}\\)\\s*\\d{3}-\\d{4}\\b)',
    prior: 0.6,
  },
];
