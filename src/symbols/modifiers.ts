/**
 * Modifier Sets
 *
 * An immutable, order-independent set of modifier tokens. The canonical text
 * form joins tokens with `.`, optional tokens carry a `?` suffix:
 * `arrow.r.double?` has the modifiers `r` (required) and `double` (optional).
 */

const TOKEN = /^[A-Za-z]+\??$/;
const OPTIONAL_MARK = '?';

export interface Modifier {
  name: string;
  optional: boolean;
}

function toModifier(raw: string): Modifier {
  return raw.endsWith(OPTIONAL_MARK)
    ? { name: raw.slice(0, -1), optional: true }
    : { name: raw, optional: false };
}

function checkToken(raw: string, existing: readonly Modifier[]): Modifier {
  if (!TOKEN.test(raw)) {
    throw new RangeError(`invalid modifier: ${JSON.stringify(raw)}`);
  }
  const modifier = toModifier(raw);
  if (existing.some(m => m.name === modifier.name)) {
    throw new RangeError(`duplicate modifier: ${modifier.name}`);
  }
  return modifier;
}

export class ModifierSet implements Iterable<Modifier> {
  static readonly EMPTY = new ModifierSet([]);

  private readonly modifiers: readonly Modifier[];

  private constructor(modifiers: readonly Modifier[]) {
    this.modifiers = Object.freeze(modifiers);
  }

  /**
   * Build a set from its dotted form. The empty string is the empty set.
   * Throws a RangeError on an empty segment, an invalid token or a duplicate.
   */
  static fromRawDotted(text: string): ModifierSet {
    if (text === '') return ModifierSet.EMPTY;
    const modifiers: Modifier[] = [];
    for (const raw of text.split('.')) {
      modifiers.push(checkToken(raw, modifiers));
    }
    return new ModifierSet(modifiers);
  }

  static fromRawParts(parts: readonly string[]): ModifierSet {
    return parts.reduce<ModifierSet>((set, part) => set.insertRaw(part), ModifierSet.EMPTY);
  }

  /**
   * Like fromRawDotted, but returns null instead of throwing
   */
  static tryParse(text: string): ModifierSet | null {
    try {
      return ModifierSet.fromRawDotted(text);
    } catch (error) {
      if (error instanceof RangeError) return null;
      throw error;
    }
  }

  /**
   * Return a new set with one more raw token (`name` or `name?`)
   */
  insertRaw(raw: string): ModifierSet {
    return new ModifierSet([...this.modifiers, checkToken(raw, this.modifiers)]);
  }

  get size(): number {
    return this.modifiers.length;
  }

  isEmpty(): boolean {
    return this.modifiers.length === 0;
  }

  /** Whether a modifier with this bare name is in the set, optional or not. */
  contains(name: string): boolean {
    return this.modifiers.some(m => m.name === name);
  }

  /**
   * Iterate the modifiers. The order is for display only.
   */
  iter(): IterableIterator<Modifier> {
    return this.modifiers.values();
  }

  [Symbol.iterator](): Iterator<Modifier> {
    return this.iter();
  }

  names(): string[] {
    return this.modifiers.map(m => m.name);
  }

  /**
   * Every modifier name in this set appears in `other`, ignoring optional markers
   */
  isSubset(other: ModifierSet): boolean {
    return this.modifiers.every(m => other.contains(m.name));
  }

  /**
   * Every required modifier in this set appears in `other`
   */
  requiredIsSubset(other: ModifierSet): boolean {
    return this.modifiers.every(m => m.optional || other.contains(m.name));
  }

  /**
   * Same names with the same optionality, in any order
   */
  equals(other: ModifierSet): boolean {
    return (
      this.size === other.size &&
      this.modifiers.every(m => other.modifiers.some(o => o.name === m.name && o.optional === m.optional))
    );
  }

  /**
   * Same names, optional or not
   */
  sameNames(other: ModifierSet): boolean {
    return this.size === other.size && this.modifiers.every(m => other.contains(m.name));
  }

  /**
   * Pick the best candidate for this set used as a query.
   *
   * A candidate is eligible when all of its required modifiers are requested
   * and every requested modifier is one of its modifiers. Eligible candidates
   * rank by modifiers in common with the query (more first), then by their
   * own size (fewer first); the earliest candidate wins a tie.
   */
  bestMatchIn<T>(candidates: Iterable<readonly [ModifierSet, T]>): T | undefined {
    let best: { common: number; total: number; value: T } | undefined;

    for (const [set, value] of candidates) {
      if (!set.requiredIsSubset(this) || !this.isSubset(set)) continue;

      const common = set.modifiers.filter(m => this.contains(m.name)).length;
      const total = set.size;
      if (!best || common > best.common || (common === best.common && total < best.total)) {
        best = { common, total, value };
      }
    }

    return best?.value;
  }

  toString(): string {
    return this.modifiers.map(m => (m.optional ? m.name + OPTIONAL_MARK : m.name)).join('.');
  }

  toJSON(): string {
    return this.toString();
  }
}
