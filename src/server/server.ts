// src/server/server.ts
import Fastify from 'fastify';
import type { ServerConfig } from '../config/config.ts';
import { createDefaultRegistry } from '../frontends/registry.ts';
import type { TranslatorRegistry } from '../frontends/registry.ts';
import { registerErrorHandler } from './error-handler.ts';
import { registerTranslateRoutes } from './routes.ts';

export function buildServer(config: ServerConfig, registry: TranslatorRegistry = createDefaultRegistry()) {
  const app = Fastify({ logger: { level: config.logLevel } });

  registerErrorHandler(app);

  app.register(async (instance) => {
    await registerTranslateRoutes(instance, registry, {
      limits: { maxTokens: config.maxTokens, timeoutMs: config.timeoutMs },
      span: config.span,
    });
  });

  return app;
}
