/**
 * Predicate-driven prefixes and suffixes, plus in-place reversal.
 */

/**
 * Longest prefix whose elements all satisfy `predicate`.
 */
export function takeWhile<T>(seq: readonly T[], predicate: (element: T) => boolean): T[] {
  return seq.slice(0, prefixLength(seq, predicate));
}

/**
 * Everything after the longest prefix satisfying `predicate`.
 */
export function dropWhile<T>(seq: readonly T[], predicate: (element: T) => boolean): T[] {
  return seq.slice(prefixLength(seq, predicate));
}

/**
 * Longest suffix whose elements all satisfy `predicate`.
 */
export function takeLastWhile<T>(seq: readonly T[], predicate: (element: T) => boolean): T[] {
  return seq.slice(suffixStart(seq, predicate));
}

/**
 * Everything before the longest suffix satisfying `predicate`.
 */
export function dropLastWhile<T>(seq: readonly T[], predicate: (element: T) => boolean): T[] {
  return seq.slice(0, suffixStart(seq, predicate));
}

/**
 * Reverse `seq` in place and return it. The only operation in this
 * library that mutates its argument.
 */
export function reverse<T>(seq: T[]): T[] {
  for (let i = 0, j = seq.length - 1; i < j; i++, j--) {
    const tmp = seq[i];
    seq[i] = seq[j];
    seq[j] = tmp;
  }
  return seq;
}

// Scans from the front; stops at the first element failing the predicate.
function prefixLength<T>(seq: readonly T[], predicate: (element: T) => boolean): number {
  let i = 0;
  while (i < seq.length && predicate(seq[i])) i++;
  return i;
}

// Scans from the back; stops at the first element failing the predicate.
function suffixStart<T>(seq: readonly T[], predicate: (element: T) => boolean): number {
  let i = seq.length;
  while (i > 0 && predicate(seq[i - 1])) i--;
  return i;
}
