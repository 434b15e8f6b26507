import Fastify, {
  type FastifyBaseLogger,
  type FastifyError,
  type FastifyServerOptions,
} from 'fastify';
import type { FastifyPluginAsyncTypebox, TypeBoxTypeProvider } from '@fastify/type-provider-typebox';
import {
  SpendQuerySchema,
  CommitQuerySchema,
  TierListResponseSchema,
  FlexPricingResponseSchema,
  CommitPricingResponseSchema,
  RecommendationResponseSchema,
  QuoteRequestSchema,
  QuoteResponseSchema,
  ErrorResponseSchema,
  type TierListResponse,
} from './schemas';
import type { PricingEngine } from '../types/pricing';
import { ConfigurationError, InvalidArgumentError } from '../utils/errors';
import { createPricingEngine } from '../utils/pricing';
import { buildQuote, roundCommitBreakdown, roundFlexBreakdown } from '../utils/quote';
import { formatTier } from '../utils/format';
import { maxTierUpper } from '../utils/tier-table';
import { PRICING_CURRENCY } from '../config/pricing';
import { resolveTierTable } from '../config/tiers';
import { HOST, LOG_LEVEL, PORT, TIER_TABLE_PATH } from '../config/server';

export interface ServerOptions {
  engine: PricingEngine;
  /** Fastify logger settings (false in tests) */
  logger?: FastifyServerOptions['logger'];
}

/**
 * Fastify instance with logging, error handling and the health check
 */
export function createApp(logger?: FastifyServerOptions['logger']) {
  const app = Fastify({
    logger: logger ?? { level: LOG_LEVEL },
  }).withTypeProvider<TypeBoxTypeProvider>();

  /**
   * Schema violations, bad amounts and other client errors Fastify raises
   * (malformed JSON, oversized or unsupported payloads) keep their 4xx;
   * anything else is logged and hidden behind a 500.
   */
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof InvalidArgumentError) {
      request.log.warn({ argument: error.argument }, error.message);
      return reply.status(400).send({ error: error.message });
    }

    if (error.validation) {
      return reply.status(400).send({ error: error.message });
    }

    if (error.statusCode !== undefined && error.statusCode < 500) {
      request.log.warn({ code: error.code }, error.message);
      return reply.status(error.statusCode).send({ error: error.message });
    }

    request.log.error(error);
    return reply.status(500).send({ error: 'Internal server error' });
  });

  // Health check endpoint
  app.get('/health', async () => {
    return { status: 'ok' };
  });

  return app;
}

/**
 * Pricing routes bound to one engine
 */
export const pricingRoutes: FastifyPluginAsyncTypebox<{ engine: PricingEngine }> = async (
  app,
  { engine }
) => {
  /**
   * GET /v1/tiers - List the rate tiers with display strings
   */
  app.get(
    '/v1/tiers',
    {
      schema: {
        response: {
          200: TierListResponseSchema,
        },
      },
    },
    async () => {
      const response: TierListResponse = {
        version: engine.table.version,
        currency: PRICING_CURRENCY,
        tiers: engine.listTiers().map((tier) => ({
          lower: tier.lower,
          upper: tier.upper,
          rate: tier.rate,
          ...formatTier(tier),
        })),
      };
      return response;
    }
  );

  /**
   * GET /v1/pricing/flex - Flex price for a monthly spend
   *
   * Spend is billed tier by tier; spend up to $125,000 pays at least the
   * $2,500 minimum invoice.
   */
  app.get(
    '/v1/pricing/flex',
    {
      schema: {
        querystring: SpendQuerySchema,
        response: {
          200: FlexPricingResponseSchema,
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { spend } = request.query;
      const result = roundFlexBreakdown(engine.flexBreakdown(spend));

      request.log.debug({ spend, total: result.total }, 'flex price calculated');
      return reply.status(200).send(result);
    }
  );

  /**
   * GET /v1/pricing/commit - Commit price for a spend and commitment
   *
   * commit_amount=0 is priced exactly as flex. Overflow above the commitment
   * is priced as a separate flex purchase starting from the first tier.
   */
  app.get(
    '/v1/pricing/commit',
    {
      schema: {
        querystring: CommitQuerySchema,
        response: {
          200: CommitPricingResponseSchema,
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { spend, commit_amount } = request.query;
      const result = roundCommitBreakdown(engine.commitBreakdown(spend, commit_amount));

      request.log.debug({ spend, commit_amount, total: result.total }, 'commit price calculated');
      return reply.status(200).send(result);
    }
  );

  /**
   * GET /v1/pricing/recommendation - Recommended commitment for a spend
   */
  app.get(
    '/v1/pricing/recommendation',
    {
      schema: {
        querystring: SpendQuerySchema,
        response: {
          200: RecommendationResponseSchema,
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const { spend } = request.query;
      return reply.status(200).send(engine.recommendation(spend));
    }
  );

  /**
   * POST /v1/quotes - Flex vs commit quote with savings
   *
   * Without commit_amount the recommended commitment is quoted.
   */
  app.post(
    '/v1/quotes',
    {
      schema: {
        body: QuoteRequestSchema,
        response: {
          200: QuoteResponseSchema,
          400: ErrorResponseSchema,
        },
      },
    },
    async (request, reply) => {
      const quote = buildQuote(engine, request.body);

      request.log.info(
        { quote_id: quote.quote_id, spend: quote.spend, commit_amount: quote.commit_amount },
        'quote generated'
      );
      return reply.status(200).send(quote);
    }
  );
};

export function buildServer(options: ServerOptions) {
  const app = createApp(options.logger);
  app.register(pricingRoutes, { engine: options.engine });
  return app;
}

/**
 * Build the engine from the configured tier table
 *
 * Returns null after logging when the table is invalid.
 */
export function resolveEngine(log: FastifyBaseLogger, tierTablePath?: string): PricingEngine | null {
  try {
    return createPricingEngine(resolveTierTable(tierTablePath));
  } catch (err) {
    if (err instanceof ConfigurationError) {
      log.fatal({ invariant: err.invariant, tier_index: err.tierIndex }, `Invalid tier table: ${err.message}`);
      return null;
    }
    throw err;
  }
}

// Start server
const start = async () => {
  const app = createApp();
  const engine = resolveEngine(app.log, TIER_TABLE_PATH);
  if (!engine) {
    process.exit(1);
  }

  app.register(pricingRoutes, { engine });

  try {
    await app.listen({ port: PORT, host: HOST });
    app.log.info(
      {
        tiers: engine.table.tiers.length,
        version: engine.table.version,
        max_spend: maxTierUpper(engine.table),
      },
      'Pricing API running'
    );
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

if (require.main === module) {
  start().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
