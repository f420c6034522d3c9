/**
 * Eq and Hash instances used for operation identity.
 *
 * Simple hash functions (not cryptographic, just for hash tables).
 */

export interface Eq<A> {
  equals(a: A, b: A): boolean;
}

export interface Hash<A> {
  hash(a: A): number;
}

export const eqString: Eq<string> = {
  equals: (a, b) => a === b,
};

export const hashString: Hash<string> = {
  hash: (a) => {
    // djb2 hash
    let hash = 5381;
    for (let i = 0; i < a.length; i++) {
      hash = ((hash << 5) + hash) ^ a.charCodeAt(i);
    }
    return hash >>> 0; // Ensure unsigned
  },
};

export function eqArray<A>(E: Eq<A>): Eq<readonly A[]> {
  return {
    equals: (xs, ys) => {
      if (xs.length !== ys.length) return false;
      for (let i = 0; i < xs.length; i++) {
        if (!E.equals(xs[i], ys[i])) return false;
      }
      return true;
    },
  };
}

export function hashArray<A>(H: Hash<A>): Hash<readonly A[]> {
  return {
    hash: (arr) => {
      let hash = arr.length;
      for (const x of arr) {
        hash = ((hash << 5) + hash) ^ H.hash(x);
      }
      return hash >>> 0;
    },
  };
}

/**
 * Create an Eq instance by mapping to a comparable value.
 */
export function eqBy<A, B>(f: (a: A) => B, E: Eq<B>): Eq<A> {
  return { equals: (a, b) => E.equals(f(a), f(b)) };
}

export function hashBy<A, B>(f: (a: A) => B, H: Hash<B>): Hash<A> {
  return { hash: (a) => H.hash(f(a)) };
}
