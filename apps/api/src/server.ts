import type { FastifyInstance } from 'fastify'
import { buildApp } from './app.js'
import { loadConfig } from './config.js'
import { loadDemoApplication } from './demo.js'

async function listenWithFallback(app: FastifyInstance, startPort: number, host: string) {
  const attempts = 10
  for (let i = 0; i <= attempts; i++) {
    const tryPort = startPort + i
    try {
      await app.listen({ port: tryPort, host })
      app.log.info(`API listening on http://localhost:${tryPort}`)
      return
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'EADDRINUSE')) {
        app.log.error({ err }, `Failed to start server on port ${tryPort}`)
        throw err
      }
      app.log.warn(`Port ${tryPort} in use. Trying next...`)
    }
  }
  // Last resort: let OS choose an ephemeral port
  await app.listen({ port: 0, host })
  const addr = app.server.address()
  const chosen = typeof addr === 'object' && addr ? addr.port : '(unknown)'
  app.log.warn(`All ports ${startPort}-${startPort + attempts} busy. Using ephemeral port ${chosen}.`)
}

const config = loadConfig()
const { app, service } = await buildApp({ config })
app.log.info({ vulnSource: config.vulnSource, demo: config.demo }, 'Configuration loaded')
if (config.demo) await loadDemoApplication(service, config.seedDir, app.log)

try {
  await listenWithFallback(app, config.port, config.host)
} catch (err) {
  app.log.error({ err }, 'Failed to start server')
  process.exit(1)
}
