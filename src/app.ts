import Fastify from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { Stores } from '@/contracts';
import { env } from '@/config/env';
import { getRedisClient } from '@/config/redis';
import { getStores } from '@/db/client';
import { productRoutes } from '@/api/routes/products';
import { cartRoutes } from '@/api/routes/cart';
import { checkoutRoutes } from '@/api/routes/checkout';
import { orderRoutes } from '@/api/routes/orders';

declare module 'fastify' {
  interface FastifyInstance {
    stores: Stores;
  }
  interface FastifyRequest {
    userId: string;
  }
}

export interface BuildAppOptions {
  // Defaults to the Redis-backed stores
  stores?: Stores;
}

export function buildApp(options: BuildAppOptions = {}) {
  const fastify = Fastify({
    logger: {
      level: env.LOG_LEVEL,
    },
    trustProxy: true,
  });

  fastify.decorate('stores', options.stores ?? getStores());
  fastify.decorateRequest('userId', '');

  // Any origin; a bare OPTIONS (no Access-Control-Request-Method) still answers 204
  fastify.register(cors, {
    origin: '*',
    methods: ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Idempotency-Key', 'X-Idempotency-Key', 'X-User-Id'],
    strictPreflight: false,
  });

  // Global rate limit per IP, Redis-backed so every API replica shares the counters
  if (env.NODE_ENV !== 'test') {
    fastify.register(rateLimit, {
      global: true,
      max: env.RATE_LIMIT_MAX,
      timeWindow: '1 minute',
      redis: getRedisClient(),
      keyGenerator: (req) => req.ip ?? 'unknown',
      errorResponseBuilder: (_req, context) => ({
        statusCode: 429,
        error: 'rate_limit_exceeded',
        message: `Too many requests. Please retry after ${context.after}.`,
      }),
    });
  }

  // after() so the rate-limit onRoute hook sees every route
  fastify.after(() => {
    fastify.register(productRoutes);
    fastify.register(cartRoutes);
    fastify.register(checkoutRoutes);
    fastify.register(orderRoutes);

    fastify.get('/health', async () => ({ status: 'ok', timestamp: new Date().toISOString() }));
  });

  return fastify;
}
