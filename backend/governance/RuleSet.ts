import { DomainError } from '../reliability/DomainError';
import type { AssetRule } from './AssetRule';

export type RuleSetEntry = {
  readonly pattern: string;
  readonly compiled: RegExp;
  readonly rules: readonly AssetRule[];
};

export type RuleRegistration = {
  /** Regular expression searched against the asset type, e.g. `^vm/` or `.*`. */
  pattern: string;
  rules: readonly AssetRule[];
};

const compile = (pattern: string): RegExp => {
  try {
    return new RegExp(pattern);
  } catch (err) {
    throw new DomainError({
      code: 'VALIDATION_ERROR',
      message: `Invalid rule pattern "${pattern}".`,
      details: { pattern },
      cause: err,
    });
  }
};

/**
 * RuleSet (pattern-keyed rule table).
 *
 * Patterns are compiled once here. Registrations sharing a pattern string are
 * merged under the first one; rule order follows registration order.
 */
export class RuleSet {
  private readonly entries: readonly RuleSetEntry[];

  constructor(registrations: readonly RuleRegistration[]) {
    const byPattern = new Map<string, AssetRule[]>();
    for (const r of registrations) {
      const list = byPattern.get(r.pattern);
      if (list) list.push(...r.rules);
      else byPattern.set(r.pattern, [...r.rules]);
    }

    this.entries = Object.freeze(
      Array.from(byPattern.entries()).map(([pattern, rules]) =>
        Object.freeze({ pattern, compiled: compile(pattern), rules: Object.freeze(rules) }),
      ),
    );
  }

  /** Every rule whose pattern matches `assetType`, in registration order. */
  rulesFor(assetType: string): AssetRule[] {
    const out: AssetRule[] = [];
    for (const entry of this.entries) {
      if (entry.compiled.test(assetType)) out.push(...entry.rules);
    }
    return out;
  }

  patterns(): string[] {
    return this.entries.map((e) => e.pattern);
  }

  get ruleCount(): number {
    return this.entries.reduce((n, e) => n + e.rules.length, 0);
  }
}
