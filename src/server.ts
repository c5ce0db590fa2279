import Fastify, { type FastifyInstance } from 'fastify';
import { DEFAULT_MAX_BODY_BYTES, loadEnv, loadGatewayConfig } from './config.js';
import { ConfigStore } from './core/GatewayConfig.js';
import { isAbortError } from './core/abort.js';
import { type ClientFactory, initClient } from './providers/registry.js';
import { GatewayError } from './types/request.js';
import { createChatRoutes } from './routes/chat.js';
import { addCorsHeaders, assignRequestId } from './middleware/hooks.js';
import { errorEnvelope } from './streaming/openaiOutput.js';
import { normalizeAddress, splitAddress } from './utils/address.js';

export interface BuildAppOptions {
  store: ConfigStore;
  clientFactory?: ClientFactory;
  logLevel?: string;
  /** Where log lines go; stdout when unset. */
  logStream?: { write(line: string): void };
  /** Largest accepted request body, in bytes. */
  bodyLimit?: number;
  connectTimeoutMs?: number;
  /** Aborting it cancels every in-flight completion. */
  shutdownSignal?: AbortSignal;
}

function statusFor(error: Error & { statusCode?: number }): number {
  if (error instanceof GatewayError) return error.statusCode;
  if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
    return error.statusCode;
  }
  return 500;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: options.logLevel ?? 'info',
      redact: ['req.headers.authorization', 'req.headers["x-api-key"]'],
      ...(options.logStream ? { stream: options.logStream } : {}),
    },
    bodyLimit: options.bodyLimit ?? DEFAULT_MAX_BODY_BYTES,
    disableRequestLogging: false,
  });

  // ── Hooks ───────────────────────────────────────────────────────────────

  fastify.addHook('onRequest', assignRequestId);
  fastify.addHook('onSend', addCorsHeaders);

  // ── Error handling ──────────────────────────────────────────────────────

  fastify.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send(errorEnvelope(`No route for ${request.method} ${request.url}`));
  });

  fastify.setErrorHandler(async (error, request, reply) => {
    const statusCode = statusFor(error);
    if (isAbortError(error)) {
      request.log.debug({ url: request.url }, 'request cancelled');
    } else if (statusCode >= 500) {
      request.log.error({ err: error }, 'request failed');
    } else {
      request.log.warn({ err: error.message, statusCode }, 'request rejected');
    }
    return reply.status(statusCode).send(errorEnvelope(error.message));
  });

  // ── Routes ──────────────────────────────────────────────────────────────

  await fastify.register(
    createChatRoutes({
      store: options.store,
      clientFactory: options.clientFactory ?? initClient,
      connectTimeoutMs: options.connectTimeoutMs,
      shutdownSignal: options.shutdownSignal ?? new AbortController().signal,
    })
  );

  return fastify;
}

/**
 * Load configuration, listen on the bind target and drain on SIGINT/SIGTERM.
 */
export async function startGateway(bindTarget?: string): Promise<FastifyInstance> {
  const env = loadEnv();
  const store = new ConfigStore(await loadGatewayConfig(env.GATEWAY_CONFIG));
  const shutdown = new AbortController();

  const app = await buildApp({
    store,
    logLevel: env.LOG_LEVEL,
    bodyLimit: env.MAX_BODY_BYTES,
    connectTimeoutMs: env.UPSTREAM_CONNECT_TIMEOUT_MS,
    shutdownSignal: shutdown.signal,
  });

  const address = normalizeAddress(bindTarget ?? env.GATEWAY_ADDRESS);
  const { host, port } = splitAddress(address);
  await app.listen({ host, port });
  app.log.info(`Access the chat completion API at: http://${address}/v1/chat/completions`);

  const stop = (signal: NodeJS.Signals): void => {
    app.log.info({ signal }, 'shutting down');
    shutdown.abort();
    void app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  return app;
}

// ── Entrypoint ──────────────────────────────────────────────────────────────

if (process.argv[1]?.endsWith('server.ts') || process.argv[1]?.endsWith('server.js')) {
  try {
    await startGateway(process.argv[2]);
  } catch (err) {
    // eslint-disable-next-line no-console
    console.error(`\n[chat-gateway] ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  }
}
