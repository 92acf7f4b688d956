/**
 * Parse a dotted control number ("1.2.10") into its integer components.
 * Throws when any component is not a non-negative integer.
 */
export function parseControlNumber(num: string): bigint[] {
  const parts = num.split('.');
  return parts.map((part) => {
    if (!/^\d+$/.test(part)) {
      throw new Error(`Invalid control number "${num}": component "${part}" is not an integer`);
    }
    return BigInt(part);
  });
}

/**
 * Compare two parsed control numbers component-wise.
 * A shorter key that is a prefix of the other sorts first.
 */
export function compareControlKeys(left: readonly bigint[], right: readonly bigint[]): number {
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const a = left[i] ?? 0n;
    const b = right[i] ?? 0n;
    if (a !== b) return a < b ? -1 : 1;
  }

  return left.length - right.length;
}

/**
 * Compare two control numbers component-wise as integers.
 */
export function compareControlNumbers(a: string, b: string): number {
  return compareControlKeys(parseControlNumber(a), parseControlNumber(b));
}

/**
 * Top-level section key: the text before the first '.'.
 */
export function getSectionKey(num: string): string {
  const dot = num.indexOf('.');
  return dot === -1 ? num : num.slice(0, dot);
}
