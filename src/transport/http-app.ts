import cors from 'cors'
import express, { type ErrorRequestHandler, type Express, type Request, type Response, type Router } from 'express'
import { z } from 'zod'

import { errorMessage } from '../core/errors.js'
import type { SessionOrchestrator } from '../core/session.js'
import type { EndpointDescriptor, Logger } from '../core/types.js'
import { parseImageDataUrl, type ImageStore } from './image-store.js'

export interface HttpAppOptions {
  endpoints: readonly EndpointDescriptor[]
  images: ImageStore
  maxPayloadBytes: number
  orchestrator: Pick<SessionOrchestrator, 'sessionCount'>
  logger: Logger
}

const uploadSchema = z.object({ image: z.string() })

function methodNotAllowed(_req: Request, res: Response): void {
  res.status(405).json({ error: 'method not allowed' })
}

function statusOf(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status
  }
  return 500
}

/** Health, endpoint listing and image staging. */
export function createApiRoutes(options: HttpAppOptions): Router {
  const { endpoints, images, orchestrator, logger } = options
  const router = express.Router()

  router
    .route('/health')
    .get((_req, res) => {
      res.json({ status: 'ok', sessions: orchestrator.sessionCount })
    })
    .all(methodNotAllowed)

  router
    .route('/api/endpoints')
    .get((_req, res) => {
      res.json(
        endpoints.map((endpoint) => ({
          name: endpoint.name,
          kind: endpoint.kind,
          modalities: [...endpoint.modalities]
        }))
      )
    })
    .all(methodNotAllowed)

  router
    .route('/api/upload-image')
    .post((req, res) => {
      const body = uploadSchema.safeParse(req.body)
      const image = body.success ? parseImageDataUrl(body.data.image) : null
      if (!image) {
        res.status(400).json({ error: 'Invalid image data' })
        return
      }
      const staged = images.put(image.mime, image.data)
      logger.info('http.image_staged', { imageId: staged.id, mime: staged.mime, bytes: staged.data.byteLength })
      res.json({ url: `/api/images/${staged.id}`, id: staged.id })
    })
    .all(methodNotAllowed)

  router
    .route('/api/images/:id')
    .get((req, res) => {
      const image = images.get(req.params.id)
      if (!image) {
        res.status(404).json({ error: 'Image not found' })
        return
      }
      res.type(image.mime).send(Buffer.from(image.data))
    })
    .all(methodNotAllowed)

  return router
}

/**
 * The relay's HTTP surface. CORS is open to any origin so a frontend hosted
 * elsewhere can call it; every error body is JSON.
 */
export function createHttpApp(options: HttpAppOptions): Express {
  const app = express()
  app.disable('x-powered-by')
  app.use(cors())
  app.use(express.json({ limit: options.maxPayloadBytes }))
  app.use(createApiRoutes(options))
  app.use((_req, res) => {
    res.status(404).json({ error: 'not found' })
  })

  const onError: ErrorRequestHandler = (error: unknown, req, res, _next) => {
    const status = statusOf(error)
    if (status >= 500) {
      options.logger.error('http.request_failed', { path: req.path, error: errorMessage(error) })
    }
    res.status(status).json({ error: status >= 500 ? 'internal error' : errorMessage(error) })
  }
  app.use(onError)

  return app
}
