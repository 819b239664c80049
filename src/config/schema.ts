import { z } from 'zod'

export const modalitySchema = z.enum(['text', 'image'])

const credentialsShape = {
  apiKey: z.string().optional(),
  /** Name of an environment variable holding the key. Resolved at load time. */
  apiKeyEnv: z.string().optional()
}

export const endpointSchema = z.object({
  kind: z.enum(['chat', 'caption']).default('chat'),
  url: z.string().url(),
  model: z.string().min(1).optional(),
  modalities: z.array(modalitySchema).nonempty().default(['text']),
  ...credentialsShape
})

export const vectorStoreSchema = z.object({
  url: z.string().url(),
  collection: z.string().min(1),
  topK: z.number().int().positive().default(4),
  textField: z.string().min(1).default('text'),
  sourceField: z.string().min(1).default('source'),
  embedding: z.object({
    url: z.string().url(),
    model: z.string().min(1),
    ...credentialsShape
  }),
  ...credentialsShape
})

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful assistant. Answer concisely and say so when you do not know.'

export const DEFAULT_CONTEXT_TEMPLATE =
  'Use the following passages when they are relevant to the question:\n{{context}}'

export const configSchema = z
  .object({
    server: z
      .object({
        host: z.string().min(1).default('0.0.0.0'),
        port: z.number().int().min(0).max(65_535).default(5000),
        maxPayloadBytes: z.number().int().positive().default(16 * 1024 * 1024),
        maxStagedImages: z.number().int().positive().default(256)
      })
      .default({}),
    endpoints: z
      .record(endpointSchema)
      .refine((value) => Object.keys(value).length > 0, 'at least one endpoint is required'),
    defaultEndpoint: z.string().min(1).optional(),
    systemPrompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
    contextTemplate: z.string().default(DEFAULT_CONTEXT_TEMPLATE),
    idleTimeoutMs: z.number().int().positive().default(60_000),
    retry: z.object({ backoffMs: z.number().int().min(0).default(250) }).default({}),
    retrieval: z
      .object({ policy: z.enum(['degrade', 'fail']).default('degrade') })
      .default({}),
    vectorStore: vectorStoreSchema.optional()
  })
  .transform((value) => ({
    ...value,
    defaultEndpoint: value.defaultEndpoint ?? Object.keys(value.endpoints)[0] ?? ''
  }))
  .refine((value) => value.defaultEndpoint in value.endpoints, {
    message: 'defaultEndpoint must name a configured endpoint',
    path: ['defaultEndpoint']
  })

export type RelayConfig = z.infer<typeof configSchema>
export type EndpointConfig = z.infer<typeof endpointSchema>
export type VectorStoreConfig = z.infer<typeof vectorStoreSchema>
export type RetrievalPolicy = RelayConfig['retrieval']['policy']
