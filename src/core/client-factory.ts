import type { RelayConfig } from '../config/schema.js'
import { CaptionClient } from './caption-client.js'
import { ChatCompletionClient } from './chat-client.js'
import { toEndpointDescriptors, type ModelClient } from './model-client.js'
import type { EndpointDescriptor, Logger } from './types.js'

export interface ClientDeps {
  logger: Logger
  backoffMs: number
}

export function createModelClient(endpoint: EndpointDescriptor, deps: ClientDeps): ModelClient {
  switch (endpoint.kind) {
    case 'chat':
      return new ChatCompletionClient(endpoint, deps)
    case 'caption':
      return new CaptionClient(endpoint, deps)
  }
}

/** Builds one shared client per configured endpoint, keyed by endpoint name. */
export function createModelClients(config: RelayConfig, logger: Logger): Map<string, ModelClient> {
  const clients = new Map<string, ModelClient>()
  for (const endpoint of toEndpointDescriptors(config)) {
    clients.set(endpoint.name, createModelClient(endpoint, { logger, backoffMs: config.retry.backoffMs }))
  }
  return clients
}
