// src/frontends/conllu/reader.ts
// Line reader for CoNLL-U documents.
// Sentences are separated by blank lines, `#` lines are comments, and every
// other line is a token with ten tab-separated columns.

import type { InputError } from '../../errors/errors.ts';
import { formatLocation } from '../../errors/errors.ts';
import { failParseErrors } from '../frontendErrors.ts';

export const COLUMNS = ['id', 'form', 'lemma', 'upos', 'xpos', 'feats', 'head', 'deprel', 'deps', 'misc'] as const;

export type Column = (typeof COLUMNS)[number];

/** Placeholder for a missing value. */
export const NO_VALUE = '_';
/** Placeholder for a value left open on purpose. */
export const UNSPECIFIED_VALUE = '*';

export type TokenId =
  | { kind: 'word'; index: number }
  | { kind: 'multiword'; first: number; last: number }
  | { kind: 'empty'; index: string }
  | { kind: 'omitted' };

export interface ConlluToken {
  /** 1-based line number in the document. */
  line: number;
  id: TokenId;
  columns: Readonly<Record<Column, string>>;
  feats: ReadonlyMap<string, string>;
  misc: ReadonlyMap<string, string>;
}

export type Sentence = ConlluToken[];

function splitColumns(line: string): string[] {
  // two or more spaces are accepted in place of tabs
  return line.includes('\t') ? line.split('\t') : line.split(/ {2,}/);
}

function parseId(text: string): TokenId | null {
  if (text === NO_VALUE) return { kind: 'omitted' };
  if (/^\d+$/.test(text)) return { kind: 'word', index: Number(text) };
  const range = /^(\d+)-(\d+)$/.exec(text);
  if (range) return { kind: 'multiword', first: Number(range[1]), last: Number(range[2]) };
  if (/^\d+\.\d+$/.test(text)) return { kind: 'empty', index: text };
  return null;
}

/** `Key=Value|Key=Value`; entries without a value are dropped. */
function parseFeatures(text: string): Map<string, string> | null {
  const features = new Map<string, string>();
  if (text === NO_VALUE || text === '') return features;
  for (const entry of text.split('|')) {
    const separator = entry.indexOf('=');
    if (separator === 0) return null;
    if (separator > 0) features.set(entry.slice(0, separator), entry.slice(separator + 1));
  }
  return features;
}

class SentenceReader {
  readonly sentences: Sentence[] = [];
  readonly errors: InputError[] = [];
  private current: Sentence = [];

  line(text: string, line: number): void {
    const trimmed = text.trim();
    if (trimmed === '') return this.endSentence();
    if (trimmed.startsWith('#')) return;

    const values = splitColumns(text.replace(/\r$/, ''));
    if (values.length !== COLUMNS.length) {
      return this.error(line, `Expected ${COLUMNS.length} columns, found ${values.length}.`);
    }
    const record = toRecord(values);

    const id = parseId(record.id);
    if (!id) return this.error(line, `Invalid token id '${record.id}'.`);
    const feats = parseFeatures(record.feats);
    if (!feats) return this.error(line, `Invalid features '${record.feats}'.`);
    const misc = parseFeatures(record.misc);
    if (!misc) return this.error(line, `Invalid miscellaneous annotations '${record.misc}'.`);

    this.current.push({ line, id, columns: record, feats, misc });
  }

  endSentence(): void {
    if (this.current.length > 0) this.sentences.push(this.current);
    this.current = [];
  }

  private error(line: number, message: string): void {
    this.errors.push({ position: formatLocation(line, 1), message });
  }
}

function toRecord(values: readonly string[]): Record<Column, string> {
  const record: Record<Column, string> = {
    id: NO_VALUE, form: NO_VALUE, lemma: NO_VALUE, upos: NO_VALUE, xpos: NO_VALUE,
    feats: NO_VALUE, head: NO_VALUE, deprel: NO_VALUE, deps: NO_VALUE, misc: NO_VALUE,
  };
  COLUMNS.forEach((column, i) => {
    record[column] = values[i] ?? NO_VALUE;
  });
  return record;
}

/** Reads every sentence of `input`. Malformed lines raise a ParseError listing all of them. */
export function readSentences(input: string): Sentence[] {
  const reader = new SentenceReader();
  input.split('\n').forEach((text, index) => reader.line(text, index + 1));
  reader.endSentence();
  if (reader.errors.length > 0) failParseErrors(reader.errors);
  return reader.sentences;
}
