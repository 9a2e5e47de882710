// src/server/error-handler.ts
import type { FastifyInstance } from 'fastify';
import {
  AmbiguousTranslatorError,
  InvariantError,
  LimitExceededError,
  NotSupportedError,
  ParseError,
  UnknownTranslatorError,
} from '../errors/errors.ts';

function hasStatusCode(error: Error): error is Error & { statusCode: number } {
  return 'statusCode' in error && typeof error.statusCode === 'number';
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((unknownError, _request, reply) => {
    const error = unknownError instanceof Error ? unknownError : new Error(String(unknownError));

    // Input in no language we can read → 400 with every problem found
    if (error instanceof ParseError) {
      return reply.status(400).send({ error: error.name, code: error.code, message: error.message, errors: error.errors });
    }

    if (error instanceof UnknownTranslatorError) {
      return reply.status(404).send({ error: error.name, code: error.code, message: error.message });
    }

    if (error instanceof AmbiguousTranslatorError) {
      return reply.status(400).send({
        error: error.name,
        code: error.code,
        message: error.message,
        matching: error.matching,
      });
    }

    // Valid query without a CQP translation → 422
    if (error instanceof NotSupportedError) {
      return reply.status(422).send({ error: error.name, code: error.code, message: error.message, reason: error.reason });
    }

    if (error instanceof LimitExceededError) {
      const status = error.code === 'E_LIMIT_TIMEOUT' ? 408 : 422;
      return reply.status(status).send({ error: error.name, code: error.code, message: error.message, limit: error.limit });
    }

    // A front end built a malformed query graph
    if (error instanceof InvariantError) {
      app.log.error(error);
      return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
    }

    // Fastify built-in errors (body validation, malformed JSON) carry their status
    if (hasStatusCode(error) && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: error.name, message: error.message });
    }

    app.log.error(error);
    return reply.status(500).send({ error: 'InternalError', message: 'Internal server error' });
  });
}
