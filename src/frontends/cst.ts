// src/frontends/cst.ts
// Typed access to chevrotain CSTs, plus lexing/parsing with errors mapped to ParseError.

import type { CstElement, CstNode, ILexingError, IRecognitionException, IToken, Lexer } from 'chevrotain';
import { formatLocation } from '../errors/errors.ts';
import type { InputError } from '../errors/errors.ts';
import { failParseErrors } from './frontendErrors.ts';

export function isToken(element: CstElement): element is IToken {
  return 'image' in element;
}

export function isNode(element: CstElement): element is CstNode {
  return 'children' in element;
}

export function childNodes(node: CstNode, key: string): CstNode[] {
  return (node.children[key] ?? []).filter(isNode);
}

export function childTokens(node: CstNode, key: string): IToken[] {
  return (node.children[key] ?? []).filter(isToken);
}

export function optionalNode(node: CstNode, key: string): CstNode | undefined {
  return childNodes(node, key)[0];
}

export function optionalToken(node: CstNode, key: string): IToken | undefined {
  return childTokens(node, key)[0];
}

export function requireNode(node: CstNode, key: string): CstNode {
  const child = optionalNode(node, key);
  if (!child) throw new Error(`CST node '${node.name}' has no child '${key}'`);
  return child;
}

export function requireToken(node: CstNode, key: string): IToken {
  const child = optionalToken(node, key);
  if (!child) throw new Error(`CST node '${node.name}' has no token '${key}'`);
  return child;
}

export function startOffset(element: CstElement): number {
  return isToken(element) ? element.startOffset : (element.location?.startOffset ?? 0);
}

/** Children stored under the given keys, in source order. */
export function orderedChildren(node: CstNode, keys: readonly string[]): CstElement[] {
  return keys.flatMap((k) => node.children[k] ?? []).sort((a, b) => startOffset(a) - startOffset(b));
}

function lexingError(error: ILexingError): InputError {
  return { position: formatLocation(error.line, error.column), message: error.message.split('\n')[0] ?? error.message };
}

function recognitionError(error: IRecognitionException): InputError {
  return {
    position: formatLocation(error.token.startLine, error.token.startColumn),
    message: error.message.split('\n')[0] ?? error.message,
  };
}

/** Tokenizes `input`; every lexing error is reported. */
export function tokenize(lexer: Lexer, input: string): IToken[] {
  const result = lexer.tokenize(input);
  if (result.errors.length > 0) {
    const unexpected = result.errors.some((e) => e.message.toLowerCase().includes('unexpected character'));
    failParseErrors(result.errors.map(lexingError), unexpected);
  }
  return result.tokens;
}

export function failOnRecognitionErrors(errors: readonly IRecognitionException[]): void {
  if (errors.length > 0) failParseErrors(errors.map(recognitionError));
}

/** Unquotes a double-quoted token image, resolving backslash escapes. */
export function unquote(image: string): string {
  const body = image.startsWith('"') && image.endsWith('"') && image.length >= 2 ? image.slice(1, -1) : image;
  return body.replace(/\\(.)/g, '$1');
}
