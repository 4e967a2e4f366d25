import Fastify, { type FastifyError, type FastifyInstance } from 'fastify'
import fastifyMultipart from '@fastify/multipart'
import { OsvClient, SeedLookupClient, type LookupClient } from '@depwatch/core'
import type { Config } from './config.js'
import { MemoryStore } from './store/memory.js'
import { ApplicationService } from './services/applications.js'
import { applicationRoutes } from './routes/applications.js'
import { dependencyRoutes } from './routes/dependencies.js'

export interface BuildOptions {
  config: Config
  store?: MemoryStore
  lookup?: LookupClient
  // false disables logging; otherwise pino at config.logLevel
  logger?: boolean
}

export interface BuiltApp {
  app: FastifyInstance
  service: ApplicationService
}

export function createLookupClient(config: Config): LookupClient {
  if (config.vulnSource === 'seed') return new SeedLookupClient(config.seedDir)
  return new OsvClient({
    endpoint: config.scannerEndpoint,
    ecosystem: config.scannerEcosystem,
    timeoutMs: config.lookupTimeoutMs
  })
}

export async function buildApp(opts: BuildOptions): Promise<BuiltApp> {
  const { config } = opts
  const app = Fastify({ logger: opts.logger ?? { level: config.logLevel } })
  await app.register(fastifyMultipart)

  const store = opts.store ?? new MemoryStore()
  const service = new ApplicationService({
    store,
    lookup: opts.lookup ?? createLookupClient(config),
    log: app.log,
    scanConcurrency: config.scanConcurrency
  })

  // Minimal CORS for local dev
  app.addHook('onSend', async (req, reply, payload) => {
    reply.header('Access-Control-Allow-Origin', '*')
    reply.header('Access-Control-Allow-Headers', '*')
    reply.header('Access-Control-Allow-Methods', 'GET,POST,OPTIONS')
    return payload
  })
  app.options('/*', async (req, reply) => {
    reply.code(204).send()
  })

  app.setErrorHandler((err: FastifyError, req, reply) => {
    const status = err.statusCode ?? 500
    if (status < 500) {
      req.log.warn({ err }, 'Request rejected')
      return reply.code(status).send({ code: err.code ?? 'BAD_REQUEST', message: err.message })
    }
    req.log.error({ err }, 'Unhandled error')
    return reply.code(500).send({ code: 'INTERNAL', message: 'An unexpected error occurred.' })
  })

  app.get('/', async () => ({ ready: config.projectName }))
  await app.register(applicationRoutes, { prefix: '/v1', service })
  await app.register(dependencyRoutes, { prefix: '/v1', service })

  return { app, service }
}
