import { type ClientConfig, clientName } from '../types/provider.js';
import { ConfigError } from '../types/request.js';
import { Model, findModel, listModels } from './Model.js';

/**
 * The configured clients plus the currently selected model.
 *
 * Instances handed to a request are snapshots: mutating one (selecting a
 * different model, overriding output limits) never reaches the shared copy.
 */
export class GatewayConfig {
  private currentModel: Model;

  constructor(
    public readonly clients: readonly ClientConfig[],
    model?: Model
  ) {
    this.currentModel = model ?? GatewayConfig.defaultModel(clients);
  }

  /**
   * Build a config from clients and an optional `client:model` reference.
   */
  static create(clients: readonly ClientConfig[], modelRef?: string): GatewayConfig {
    const model = modelRef ? findModel(clients, modelRef) : undefined;
    return new GatewayConfig(clients, model);
  }

  private static defaultModel(clients: readonly ClientConfig[]): Model {
    for (const client of clients) {
      const first = listModels(client)[0];
      if (first) return first;
    }
    throw new ConfigError('No model is available: configure at least one client with a model');
  }

  get model(): Model {
    return this.currentModel;
  }

  setModel(value: string): void {
    this.currentModel = findModel(this.clients, value);
  }

  /**
   * The client config the current model belongs to.
   */
  clientFor(model: Model = this.currentModel): ClientConfig {
    const client = this.clients.find((c) => clientName(c) === model.clientName);
    if (!client) {
      throw new ConfigError(`No client configured for model '${model.id}'`);
    }
    return client;
  }

  snapshot(): GatewayConfig {
    return new GatewayConfig(structuredClone(this.clients), this.currentModel.clone());
  }
}

/**
 * Process-wide holder of the active configuration. Readers always receive a
 * consistent snapshot; `replace` swaps the whole config at once.
 */
export class ConfigStore {
  private config: GatewayConfig;

  constructor(initial: GatewayConfig) {
    this.config = initial;
  }

  current(): GatewayConfig {
    return this.config.snapshot();
  }

  replace(next: GatewayConfig): void {
    this.config = next;
  }
}
