// src/ir/regex.ts

const REGEX_SPECIAL = /[.?*+|()[\]{}^$\\]/g;

/** Escapes CQP regular expression operators so the text matches literally. */
export function escapeRegex(text: string): string {
  return text.replace(REGEX_SPECIAL, (c) => `\\${c}`);
}
