import { readFileSync } from 'fs';
import { z } from 'zod';
import {
  type ClientConfig,
  type ModelConfig,
  modelConfigSchema,
  clientName,
  OPEN_MODEL_PROVIDERS,
} from '../types/provider.js';
import { ConfigError } from '../types/request.js';

const CATALOGUE_PATH = new URL('../data/models.json', import.meta.url);

const BUILTIN_MODELS = z
  .record(z.array(modelConfigSchema))
  .parse(JSON.parse(readFileSync(CATALOGUE_PATH, 'utf-8')));

export interface ModelLimits {
  maxInputTokens?: number | undefined;
  maxOutputTokens?: number | undefined;
  extraFields?: Record<string, unknown> | undefined;
}

/**
 * A callable (client, model) pair and its runtime limits.
 */
export class Model {
  maxInputTokens: number | undefined;
  maxOutputTokens: number | undefined;
  readonly extraFields: Record<string, unknown> | undefined;

  constructor(
    public readonly clientName: string,
    public readonly name: string,
    limits: ModelLimits = {}
  ) {
    this.maxInputTokens = limits.maxInputTokens;
    this.maxOutputTokens = limits.maxOutputTokens;
    this.extraFields = limits.extraFields;
  }

  static fromConfig(client: string, config: ModelConfig): Model {
    return new Model(client, config.name, {
      maxInputTokens: config.max_input_tokens,
      maxOutputTokens: config.max_output_tokens,
      extraFields: config.extra_fields,
    });
  }

  get id(): string {
    return `${this.clientName}:${this.name}`;
  }

  /**
   * Override the output limit of this instance only. Callers hold a
   * request-scoped clone, never the shared default model.
   */
  setMaxOutputTokens(value: number | undefined): void {
    this.maxOutputTokens = value;
  }

  clone(): Model {
    return new Model(this.clientName, this.name, {
      maxInputTokens: this.maxInputTokens,
      maxOutputTokens: this.maxOutputTokens,
      extraFields: this.extraFields ? { ...this.extraFields } : undefined,
    });
  }
}

/**
 * Models a client exposes: its configured list, else the built-in catalogue
 * for its provider kind.
 */
export function listModels(config: ClientConfig): Model[] {
  const name = clientName(config);
  const configured = config.models ?? [];
  const source = configured.length > 0 ? configured : BUILTIN_MODELS[config.type] ?? [];
  return source.map((m) => Model.fromConfig(name, m));
}

/**
 * Resolve a model reference against the configured clients.
 *
 * Accepts `client:model` ids, or a bare client name (selects the client's
 * first model). Clients that host arbitrary models also accept names
 * missing from their list.
 */
export function findModel(clients: readonly ClientConfig[], value: string): Model {
  const separator = value.indexOf(':');
  const wantedClient = separator === -1 ? value : value.slice(0, separator);
  const wantedModel = separator === -1 ? null : value.slice(separator + 1);

  const client = clients.find((c) => clientName(c) === wantedClient);
  if (client) {
    const models = listModels(client);
    if (wantedModel === null) {
      const first = models[0];
      if (first) return first;
    } else {
      const match = models.find((m) => m.name === wantedModel);
      if (match) return match;
      if (wantedModel && OPEN_MODEL_PROVIDERS.has(client.type)) {
        return new Model(wantedClient, wantedModel);
      }
    }
  }

  throw new ConfigError(`Unknown model '${value}'`);
}
