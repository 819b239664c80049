import { readFileSync } from 'node:fs'

import { config as loadEnv } from 'dotenv'

import { configSchema, type RelayConfig } from './schema.js'

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value)
}

/** Parses comma-separated env values. */
function parseCsv(input: string | undefined): string[] {
  if (!input) return []
  return input
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
}

function parseNumber(input: string | undefined): number | undefined {
  if (input === undefined || input.trim() === '') return undefined
  return Number(input)
}

/** Drops undefined entries so they do not shadow values from the config file. */
function compact(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined))
}

function readConfigFile(path: string | undefined): Record<string, unknown> {
  if (!path) return {}
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'))
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${path} must contain a JSON object`)
  }
  return parsed
}

/**
 * Single-endpoint shortcut: CHATRELAY_ENDPOINT_URL configures an endpoint
 * named "default" without a config file.
 */
function endpointFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const url = env.CHATRELAY_ENDPOINT_URL
  if (!url) return {}
  const modalities = parseCsv(env.CHATRELAY_ENDPOINT_MODALITIES)
  return {
    default: compact({
      kind: env.CHATRELAY_ENDPOINT_KIND,
      url,
      model: env.CHATRELAY_ENDPOINT_MODEL,
      apiKey: env.CHATRELAY_API_KEY,
      modalities: modalities.length > 0 ? modalities : undefined
    })
  }
}

function resolveKey(
  entry: { apiKey?: string; apiKeyEnv?: string },
  env: NodeJS.ProcessEnv
): string | undefined {
  if (entry.apiKey) return entry.apiKey
  return entry.apiKeyEnv ? env[entry.apiKeyEnv] : undefined
}

function resolveCredentials(config: RelayConfig, env: NodeJS.ProcessEnv): RelayConfig {
  const endpoints = Object.fromEntries(
    Object.entries(config.endpoints).map(([name, entry]) => [
      name,
      { ...entry, apiKey: resolveKey(entry, env) }
    ])
  )
  const store = config.vectorStore
  const vectorStore = store
    ? {
        ...store,
        apiKey: resolveKey(store, env),
        embedding: { ...store.embedding, apiKey: resolveKey(store.embedding, env) }
      }
    : undefined
  return { ...config, endpoints, vectorStore }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const inner of Object.values(value)) deepFreeze(inner)
    Object.freeze(value)
  }
  return value
}

/**
 * Loads runtime configuration from the JSON config file and environment,
 * validates it and returns an immutable value. Environment wins over the file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  if (env === process.env) loadEnv()

  const file = readConfigFile(env.CHATRELAY_CONFIG_FILE)
  const server = isRecord(file.server) ? file.server : {}
  const retrieval = isRecord(file.retrieval) ? file.retrieval : {}
  const endpoints = isRecord(file.endpoints) ? file.endpoints : {}

  const parsed = configSchema.parse({
    ...file,
    ...compact({
      defaultEndpoint: env.CHATRELAY_DEFAULT_ENDPOINT,
      systemPrompt: env.CHATRELAY_SYSTEM_PROMPT,
      idleTimeoutMs: parseNumber(env.CHATRELAY_IDLE_TIMEOUT_MS)
    }),
    server: {
      ...server,
      ...compact({ host: env.CHATRELAY_HOST, port: parseNumber(env.CHATRELAY_PORT) })
    },
    retrieval: { ...retrieval, ...compact({ policy: env.CHATRELAY_RETRIEVAL_POLICY }) },
    endpoints: { ...endpoints, ...endpointFromEnv(env) }
  })

  return deepFreeze(resolveCredentials(parsed, env))
}
