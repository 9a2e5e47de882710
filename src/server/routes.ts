// src/server/routes.ts
import type { FastifyInstance } from 'fastify';
import { IdentifierAllocator } from '../ir/identifier.ts';
import { renderPlan, translateRecipe } from '../compiler/translate.ts';
import type { TranslatorRegistry } from '../frontends/registry.ts';
import type { Limits } from './limits.ts';
import { limitHooks } from './limits.ts';

export interface TranslateBody {
  text: string;
  translator?: string;
}

export interface TranslateResponse {
  query: string;
  translator: string;
  additional_steps?: string[];
  goal?: string;
}

export interface TranslateRouteOptions {
  limits: Limits;
  span: string | undefined;
}

const translateSchema = {
  body: {
    type: 'object',
    required: ['text'],
    additionalProperties: false,
    properties: {
      text: { type: 'string', minLength: 1 },
      translator: { type: 'string', minLength: 1 },
    },
  },
} as const;

export async function registerTranslateRoutes(
  app: FastifyInstance,
  registry: TranslatorRegistry,
  options: TranslateRouteOptions,
): Promise<void> {
  // GET /translators: names accepted by POST /translate
  app.get('/translators', async () => ({ translators: registry.names() }));

  // POST /translate: query text → CQP
  app.post<{ Body: TranslateBody }>('/translate', { schema: translateSchema }, async (request, reply) => {
    const { text, translator } = request.body;
    const allocator = new IdentifierAllocator();
    const result = registry.translate(text, allocator, translator);

    const plan = translateRecipe(result.recipe, allocator, { span: options.span, ...limitHooks(options.limits) });
    const rendered = renderPlan(plan);
    request.log.debug({ translator: result.translator, steps: plan.steps.length }, 'translated query');

    const response: TranslateResponse = { query: rendered.query, translator: result.translator };
    if (rendered.additionalSteps.length > 0) {
      response.additional_steps = rendered.additionalSteps;
      response.goal = plan.goal;
    }
    return reply.status(200).send(response);
  });
}
