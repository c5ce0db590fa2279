import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { GatewayConfig } from './core/GatewayConfig.js';
import { ENV_FIELDS, ProviderKind, clientConfigSchema } from './types/provider.js';
import { ConfigError } from './types/request.js';

/** Largest accepted request body, in bytes. */
export const DEFAULT_MAX_BODY_BYTES = 32 * 1024 * 1024;

const envSchema = z.object({
  // Server
  GATEWAY_CONFIG: z.string().min(1).default('./config.yaml'),
  GATEWAY_ADDRESS: z.string().min(1).optional(),
  MAX_BODY_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_BODY_BYTES),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  // Upstream
  UPSTREAM_CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
});

export type EnvConfig = z.infer<typeof envSchema>;

const fileSchema = z.object({
  model: z.string().min(1).nullish(),
  clients: z.array(z.unknown()).nullish(),
});

const providerKindSchema = z.nativeEnum(ProviderKind);

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `  ${e.path.join('.') || '(root)'}: ${e.message}`).join('\n');
}

/**
 * Validate process settings from the environment.
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Invalid environment:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Environment prefix for a client: its name, upper-cased, `-` → `_`.
 */
export function envPrefix(name: string): string {
  return name.toUpperCase().replace(/-/g, '_');
}

/**
 * Fill missing credential fields of a raw client entry from
 * `<NAME>_<FIELD>` variables.
 */
function withEnvFallback(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) return raw;

  const entry: Record<string, unknown> = { ...raw };
  const kind = providerKindSchema.safeParse(entry['type']);
  if (!kind.success) return entry;

  const name = typeof entry['name'] === 'string' ? entry['name'] : kind.data;
  for (const field of ENV_FIELDS[kind.data]) {
    if (entry[field] !== undefined && entry[field] !== null) continue;
    const value = env[`${envPrefix(name)}_${envPrefix(field)}`];
    if (value) entry[field] = value;
  }
  return entry;
}

/**
 * Parse the YAML configuration document into a GatewayConfig.
 */
export function parseGatewayConfig(source: string, env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  let document: unknown;
  try {
    document = parseYaml(source);
  } catch (err) {
    throw new ConfigError(`Invalid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }

  const file = fileSchema.safeParse(document ?? {});
  if (!file.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(file.error)}`);
  }

  const clients = z
    .array(clientConfigSchema)
    .safeParse((file.data.clients ?? []).map((raw) => withEnvFallback(raw, env)));
  if (!clients.success) {
    throw new ConfigError(`Invalid client configuration:\n${formatIssues(clients.error)}`);
  }

  return GatewayConfig.create(clients.data, file.data.model ?? undefined);
}

export async function loadGatewayConfig(
  path: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<GatewayConfig> {
  let source: string;
  try {
    source = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Cannot read configuration file '${path}': ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseGatewayConfig(source, env);
}
