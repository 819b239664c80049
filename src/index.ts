import { loadConfig } from './config/load.js'
import { createModelClients } from './core/client-factory.js'
import { errorMessage } from './core/errors.js'
import { logger } from './core/logger.js'
import { toEndpointDescriptors } from './core/model-client.js'
import { createRetrievalAugmenter } from './core/retrieval.js'
import { SessionOrchestrator } from './core/session.js'
import { WsTransport } from './transport/ws-server.js'

async function main(): Promise<void> {
  const config = loadConfig()
  const endpoints = toEndpointDescriptors(config)
  logger.info('config.loaded', {
    endpoints: endpoints.map((endpoint) => endpoint.name),
    defaultEndpoint: config.defaultEndpoint,
    retrieval: config.vectorStore ? config.retrieval.policy : 'disabled'
  })

  const augmenter = createRetrievalAugmenter(config, logger)
  const orchestrator = new SessionOrchestrator({
    clients: createModelClients(config, logger),
    augmenter,
    prompts: { systemPrompt: config.systemPrompt, contextTemplate: config.contextTemplate },
    defaultEndpoint: config.defaultEndpoint,
    idleTimeoutMs: config.idleTimeoutMs,
    logger
  })
  const transport = new WsTransport(
    {
      host: config.server.host,
      port: config.server.port,
      maxPayloadBytes: config.server.maxPayloadBytes,
      maxStagedImages: config.server.maxStagedImages,
      endpoints
    },
    orchestrator,
    logger
  )

  await transport.start()

  let stopping = false
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return
    stopping = true
    logger.info('relay.shutdown', { signal })
    orchestrator.closeAll()
    await transport.stop()
    process.exit(0)
  }

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('relay.shutdown_failed', { error: errorMessage(error) })
        process.exit(1)
      })
    })
  }
}

main().catch((error: unknown) => {
  logger.error('relay.start_failed', { error: errorMessage(error) })
  process.exit(1)
})
