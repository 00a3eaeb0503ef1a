import Fastify, { type FastifyInstance, type FastifyPluginAsync } from 'fastify';
import pino from 'pino';
import rateLimit from '@fastify/rate-limit';
import helmet from '@fastify/helmet';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { RATE_LIMITS } from './rate-limit.js';
import { env } from './util/env.js';
import { ERROR_MESSAGES, errorResponse } from './util/error-messages.js';
import { HttpError } from './util/http-error.js';
import welcomeRoute from './welcome.js';

declare module 'fastify' {
  interface FastifyInstance {
    /** Indicates whether the HTTP server finished booting */
    isStarted: boolean;
  }
  interface FastifyRequest {
    logContext?: { route: string; cryptoId?: string };
  }
}

function sanitize(obj: unknown): unknown {
  if (!obj || typeof obj !== 'object') return obj;
  const forbidden = ['password', 'token', 'key', 'secret'];
  if (Array.isArray(obj)) return obj.map(sanitize);
  const result: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (forbidden.includes(k.toLowerCase())) continue;
    result[k] = sanitize(v);
  }
  return result;
}

function pickCryptoId(...sources: unknown[]): string | undefined {
  for (const source of sources) {
    if (!source || typeof source !== 'object') continue;
    for (const key of ['id', 'cryptoName']) {
      const value: unknown = Reflect.get(source, key);
      if (typeof value === 'string') return value;
    }
  }
  return undefined;
}

function isPlugin(value: unknown): value is FastifyPluginAsync {
  return typeof value === 'function';
}

function statusOf(err: unknown): number {
  if (err instanceof HttpError) return err.statusCode;
  if (err && typeof err === 'object') {
    const status: unknown = Reflect.get(err, 'statusCode');
    if (typeof status === 'number' && status >= 400 && status < 600) return status;
  }
  return 500;
}

function messageOf(err: unknown): string {
  if (err instanceof Error && err.message) return err.message;
  if (err && typeof err === 'object') {
    const message: unknown = Reflect.get(err, 'error');
    if (typeof message === 'string') return message;
  }
  return 'request failed';
}

export default async function buildServer(
  routesDir: string = path.join(path.dirname(fileURLToPath(import.meta.url)), 'routes'),
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label.toUpperCase() }),
      },
    },
    disableRequestLogging: true,
  });

  app.decorate('isStarted', false);

  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:'],
        connectSrc: ["'self'"],
        fontSrc: ["'self'", 'data:'],
        objectSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    frameguard: { action: 'deny' },
    referrerPolicy: { policy: 'no-referrer' },
  });

  await app.register(rateLimit, {
    global: false,
    ...RATE_LIMITS.LAX,
    errorResponseBuilder: (_req, context) => ({
      statusCode: 429,
      ...errorResponse(`Too many requests, please try again in ${context.after}.`),
    }),
  });

  app.addHook('preHandler', (req, _reply, done) => {
    const cryptoId = pickCryptoId(req.params, req.query);
    const route = req.routeOptions.url ?? req.raw.url ?? '';
    req.logContext = { route, cryptoId };
    const params = sanitize({ params: req.params, query: req.query });
    req.log.info({ cryptoId, route, params }, 'request start');
    done();
  });

  app.addHook('onResponse', (req, reply, done) => {
    const ctx = req.logContext ?? {};
    if (reply.statusCode < 400) {
      req.log.info({ ...ctx, statusCode: reply.statusCode }, 'request success');
    }
    done();
  });

  app.setErrorHandler((err, req, reply) => {
    const ctx = req.logContext ?? {};
    const statusCode = statusOf(err);
    if (statusCode >= 500 && !(err instanceof HttpError)) {
      req.log.error({ err, ...ctx }, 'request error');
      return reply.code(statusCode).send(errorResponse(ERROR_MESSAGES.internal));
    }
    if (statusCode >= 500) req.log.error({ err, ...ctx }, 'request error');
    else req.log.warn({ err, ...ctx, statusCode }, 'request error');
    return reply.code(statusCode).send(errorResponse(messageOf(err)));
  });

  app.setNotFoundHandler((_req, reply) => {
    reply.code(404).send(errorResponse(ERROR_MESSAGES.notFound));
  });

  await app.register(welcomeRoute);

  for (const file of fs.readdirSync(routesDir)) {
    if (fs.statSync(path.join(routesDir, file)).isDirectory()) continue;

    const isScript = /\.([tj])s$/.test(file);
    const isTypes  = /\.d\.([tj])s$/.test(file) || /\.types\.([tj])s$/.test(file);
    const isTest   = /\.(spec|test)\.([tj])s$/.test(file);
    if (!isScript || isTypes || isTest) continue;

    let plugin: FastifyPluginAsync;
    try {
      const mod: unknown = await import(pathToFileURL(path.join(routesDir, file)).href);
      const candidate: unknown =
        mod && typeof mod === 'object' ? Reflect.get(mod, 'default') : mod;
      if (!isPlugin(candidate)) {
        const available = mod && typeof mod === 'object' ? Object.keys(mod) : [];
        app.log.error({ file, exports: available }, 'route module must export a Fastify plugin');
        throw new Error(`Route ${file} does not export a Fastify plugin.`);
      }
      plugin = candidate;
    } catch (err) {
      app.log.error({ err, file }, 'failed to load route module');
      throw err instanceof Error ? err : new Error(String(err));
    }

    try {
      await app.register(plugin, { prefix: '/api' });
    } catch (err) {
      app.log.error({ err, file }, 'failed to register route module');
      throw err instanceof Error ? err : new Error(String(err));
    }
  }

  app.log.info('Server initialized');
  return app;
}
