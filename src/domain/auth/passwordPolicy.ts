import { WeakPasswordError } from './errors.js';

export const SPECIAL_CHARACTERS = '!@#$%^&*(),.?":{}|<>';

export type PasswordRule = 'length' | 'uppercase' | 'lowercase' | 'digit' | 'special';

export interface PolicyViolation {
  rule: PasswordRule;
  reason: string;
}

export type PolicyResult = { ok: true } | { ok: false; violation: PolicyViolation };

export const MIN_PASSWORD_LENGTH = 8;

interface Rule {
  rule: PasswordRule;
  reason: string;
  test: (password: string) => boolean;
}

// Checked in this order; the first failure is reported.
const RULES: readonly Rule[] = [
  {
    rule: 'length',
    reason: `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`,
    test: (p) => [...p].length >= MIN_PASSWORD_LENGTH,
  },
  {
    rule: 'uppercase',
    reason: 'Password must contain at least one uppercase letter',
    test: (p) => /[A-Z]/.test(p),
  },
  {
    rule: 'lowercase',
    reason: 'Password must contain at least one lowercase letter',
    test: (p) => /[a-z]/.test(p),
  },
  {
    rule: 'digit',
    reason: 'Password must contain at least one digit',
    test: (p) => /\d/.test(p),
  },
  {
    rule: 'special',
    reason: `Password must contain at least one special character (${SPECIAL_CHARACTERS})`,
    test: (p) => [...p].some((c) => SPECIAL_CHARACTERS.includes(c)),
  },
];

export class PasswordPolicy {
  static validate(password: string): PolicyResult {
    for (const { rule, reason, test } of RULES) {
      if (!test(password)) {
        return { ok: false, violation: { rule, reason } };
      }
    }
    return { ok: true };
  }

  static assertValid(password: string): void {
    const result = PasswordPolicy.validate(password);
    if (!result.ok) {
      throw new WeakPasswordError(result.violation.rule, result.violation.reason);
    }
  }
}
