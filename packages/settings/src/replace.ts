import { ValidationError } from './errors';
import { asMapping, formatValue } from './untyped';

/**
 * Ordered string substitution table used to rewrite filenames.
 *
 * Rules run one after another in insertion order, each replacing every
 * occurrence of its key in the output of the previous rule, so a later rule
 * also sees text inserted by an earlier one.
 */
export class ReplacementMap {
  private readonly rules: ReadonlyMap<string, string>;

  constructor(entries: Iterable<readonly [string, string]> = []) {
    const rules = new Map<string, string>();
    for (const [key, value] of entries) {
      if (!key) {
        throw new ValidationError(`mapping key cannot be empty: ${formatValue(key)}: ${formatValue(value)}`);
      }
      rules.set(key, value);
    }
    this.rules = rules;
  }

  static fromUntyped(data: unknown): ReplacementMap {
    const mapping = asMapping(data);
    if (!mapping) {
      throw new ValidationError(`invalid replacement map: ${formatValue(data)}`);
    }

    const entries: Array<[string, string]> = [];
    for (const [key, value] of mapping) {
      if (typeof key !== 'string' || typeof value !== 'string') {
        throw new ValidationError(`bad mapping: ${formatValue(key)}: ${formatValue(value)}`);
      }
      entries.push([key, value]);
    }
    return new ReplacementMap(entries);
  }

  get size(): number {
    return this.rules.size;
  }

  apply(target: string): string {
    let result = target;
    for (const [key, value] of this.rules) {
      result = result.split(key).join(value);
    }
    return result;
  }

  /** Returns a copy with one rule added, or overwritten in place. */
  with(key: string, value: string): ReplacementMap {
    const entries: Array<[string, string]> = [...this.rules, [key, value]];
    return new ReplacementMap(entries);
  }

  copy(): ReplacementMap {
    return new ReplacementMap(this.rules);
  }

  entries(): Array<[string, string]> {
    return [...this.rules];
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.rules);
  }
}
