// test/server.test.ts
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { buildServer } from '../src/server/server.ts';
import { limitHooks } from '../src/server/limits.ts';
import { DEFAULT_CONFIG } from '../src/config/config.ts';
import type { ServerConfig } from '../src/config/config.ts';
import { IdentifierAllocator } from '../src/ir/identifier.ts';
import { createQuery, token } from '../src/ir/query.ts';
import { LimitExceededError } from '../src/errors/errors.ts';

const config: ServerConfig = { ...DEFAULT_CONFIG, logLevel: 'silent' };

describe('HTTP service', () => {
  let app: ReturnType<typeof buildServer>;

  beforeEach(() => {
    app = buildServer(config);
  });

  afterEach(async () => {
    await app.close();
  });

  it('lists the translators', async () => {
    const res = await app.inject({ method: 'GET', url: '/translators' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ translators: ['grew', 'depsearch', 'deptreepy', 'conllu'] });
  });

  it('translates with a named translator', async () => {
    const res = await app.inject({ method: 'POST', url: '/translate', payload: { text: '_', translator: 'depsearch' } });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ query: '[]', translator: 'depsearch' });
  });

  it('guesses the translator', async () => {
    const res = await app.inject({ method: 'POST', url: '/translate', payload: { text: 'pattern { X [upos=VERB] }' } });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ query: '[upos = "VERB"]', translator: 'grew' });
  });

  it('returns the named steps of combined queries', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/translate',
      payload: { text: '(OR (TREE_ (pos NOUN)) (TREE_ (pos VERB)))', translator: 'deptreepy' },
    });
    expect(res.json()).toEqual({
      query: 'A | B',
      translator: 'deptreepy',
      additional_steps: ['A = [pos = "NOUN"];', 'B = [pos = "VERB"];'],
      goal: 'C',
    });
  });

  it('renders anchors with a configured span', async () => {
    await app.close();
    app = buildServer({ ...config, span: 's' });
    const text = ['1\ta\t_\t_\t_\t_\t_\t_\t_\tanchored=Yes', '2\tb\t_\t_\t_\t_\t_\t_\t_\t_'].join('\n');
    const res = await app.inject({ method: 'POST', url: '/translate', payload: { text, translator: 'conllu' } });
    expect(res.json()).toEqual({ query: '<s> [word = "a"] []* [word = "b"]', translator: 'conllu' });
  });

  it('answers 404 for unknown translators', async () => {
    const res = await app.inject({ method: 'POST', url: '/translate', payload: { text: '_', translator: 'sql' } });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({ code: 'E_TRANSLATOR_UNKNOWN' });
  });

  it('answers 400 with the parse errors', async () => {
    const res = await app.inject({ method: 'POST', url: '/translate', payload: { text: 'pattern {', translator: 'grew' } });
    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.error).toBe('ParseError');
    expect(body.errors).toHaveLength(1);
  });

  it('answers 400 when no translator matches', async () => {
    const res = await app.inject({ method: 'POST', url: '/translate', payload: { text: '%%%' } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ code: 'E_TRANSLATOR_AMBIGUOUS', matching: [] });
  });

  it('answers 422 for unsupported queries', async () => {
    const res = await app.inject({ method: 'POST', url: '/translate', payload: { text: '_ -> NOUN', translator: 'depsearch' } });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({ code: 'E_NOT_SUPPORTED', reason: 'universally quantified queries' });
  });

  it('answers 422 when a query has too many tokens', async () => {
    await app.close();
    app = buildServer({ ...config, maxTokens: 2 });
    const res = await app.inject({ method: 'POST', url: '/translate', payload: { text: '_ > _ > _', translator: 'depsearch' } });
    expect(res.statusCode).toBe(422);
    expect(res.json()).toMatchObject({ code: 'E_LIMIT_TOKENS', limit: 2 });
  });

  it('validates the request body', async () => {
    const missing = await app.inject({ method: 'POST', url: '/translate', payload: { translator: 'grew' } });
    expect(missing.statusCode).toBe(400);
    const empty = await app.inject({ method: 'POST', url: '/translate', payload: { text: '' } });
    expect(empty.statusCode).toBe(400);
  });
});

describe('limitHooks', () => {
  const ids = new IdentifierAllocator();
  const query = createQuery(ids, { tokens: [token(ids.next()), token(ids.next()), token(ids.next())] });

  it('caps the number of tokens', () => {
    const hooks = limitHooks({ maxTokens: 2, timeoutMs: 100 });
    expect(() => hooks.beforeCompile?.(query)).toThrow('Query has 3 tokens, at most 2 are allowed.');
    const relaxed = limitHooks({ maxTokens: 3, timeoutMs: 100 });
    expect(() => relaxed.beforeCompile?.(query)).not.toThrow();
  });

  it('stops after the deadline', () => {
    let now = 1000;
    const hooks = limitHooks({ maxTokens: 5, timeoutMs: 50 }, () => now);
    now = 1050;
    expect(() => hooks.onArrangement?.(0)).not.toThrow();
    now = 1051;
    expect(() => hooks.onArrangement?.(1)).toThrow(LimitExceededError);
  });
});
