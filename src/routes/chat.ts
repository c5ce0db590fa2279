import { Readable } from 'stream';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { type ConfigStore, type GatewayConfig } from '../core/GatewayConfig.js';
import { linkAbortSignals } from '../core/abort.js';
import { type ClientFactory } from '../providers/registry.js';
import { type Message, type SendData, CancelledError, RequestError } from '../types/request.js';
import { SseHandler } from '../streaming/SseHandler.js';
import { createCompletionMeta, toCompletionBody, toOpenAIStream } from '../streaming/openaiOutput.js';

/** Model name that selects the gateway's configured default model. */
export const DEFAULT_MODEL_NAME = 'default';

const messageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant']),
  content: z.union([
    z.string(),
    z.array(z.object({ type: z.literal('text'), text: z.string() })),
  ]),
});

const chatBodySchema = z.object({
  model: z.string().min(1),
  messages: z.array(messageSchema).min(1),
  temperature: z.number().nullish(),
  top_p: z.number().nullish(),
  max_tokens: z.number().int().positive().nullish(),
  stream: z.boolean().nullish(),
});

export interface ChatRouteOptions {
  store: ConfigStore;
  clientFactory: ClientFactory;
  connectTimeoutMs?: number | undefined;
  /** Aborted when the server starts shutting down. */
  shutdownSignal: AbortSignal;
}

/**
 * Point the request's config snapshot at the requested model and return the
 * name reported back in the response. `default` and the literal default id
 * keep the snapshot's model; anything else is resolved afresh.
 */
export function selectModel(config: GatewayConfig, requested: string): string {
  if (requested === DEFAULT_MODEL_NAME) return config.model.id;
  if (requested === config.model.id) return requested;
  config.setModel(requested);
  return requested;
}

function parseBody(body: unknown): z.infer<typeof chatBodySchema> {
  const result = chatBodySchema.safeParse(body);
  if (!result.success) {
    const issue = result.error.errors[0];
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : '';
    throw new RequestError(`Invalid request body${where}: ${issue?.message ?? 'unexpected shape'}`);
  }
  return result.data;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function createChatRoutes(options: ChatRouteOptions) {
  return async function chatRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.options('/v1/chat/completions', async (_request, reply) => {
      return reply.status(204).send();
    });

    fastify.post('/v1/chat/completions', async (request: FastifyRequest, reply: FastifyReply) => {
      const body = parseBody(request.body);

      const config = options.store.current();
      const modelName = selectModel(config, body.model);
      const client = options.clientFactory(config, {
        logger: request.log,
        connectTimeoutMs: options.connectTimeoutMs,
      });
      if (body.max_tokens != null) client.setMaxOutputTokens(body.max_tokens);

      const controller = linkAbortSignals(options.shutdownSignal);
      reply.raw.once('close', () => {
        if (!reply.raw.writableFinished) {
          request.log.debug({ model: modelName }, 'client disconnected');
        }
        controller.abort();
      });

      const messages: Message[] = body.messages.map((m) => Object.freeze({ ...m }));
      const data: SendData = {
        messages,
        temperature: body.temperature ?? undefined,
        top_p: body.top_p ?? undefined,
        stream: body.stream ?? false,
      };
      const meta = createCompletionMeta(modelName);

      if (!data.stream) {
        const output = await client.send(data, controller.signal);
        request.log.debug({ model: modelName, ...output.details }, 'completion finished');
        return toCompletionBody(meta, output);
      }

      const handler = new SseHandler(controller.signal, request.log);
      void client.sendStreaming(data, handler, controller.signal).then(
        () => {
          if (!controller.signal.aborted) {
            request.log.debug({ model: modelName, ...handler.details }, 'stream finished');
          }
          handler.done();
        },
        (err: unknown) => handler.fail(toError(err))
      );

      // Hold the status line until the first event (or error) is known.
      const first = await handler.events.next();
      if (first.done) {
        throw new CancelledError();
      }
      if (first.value.type === 'error') {
        throw first.value.error;
      }

      void reply
        .header('Content-Type', 'text/event-stream')
        .header('Cache-Control', 'no-cache')
        .header('Connection', 'keep-alive')
        .header('X-Accel-Buffering', 'no');

      return reply.send(Readable.from(toOpenAIStream(first.value, handler.events, meta)));
    });
  };
}
