// src/compiler/names.ts

export const TOKEN_ALPHABET = 'abcdefghijklmnopqrstuvwxyz';
export const STEP_ALPHABET = TOKEN_ALPHABET.toUpperCase();

/** a, b, ..., z, aa, ab, ..., az, ba, ... */
export function nameAt(index: number, alphabet: string = TOKEN_ALPHABET): string {
  const base = alphabet.length;
  let name = '';
  let n = index + 1;
  while (n > 0) {
    const digit = (n - 1) % base;
    name = alphabet.charAt(digit) + name;
    n = Math.floor((n - 1) / base);
  }
  return name;
}
