import fs from 'node:fs'
import path from 'node:path'
import type { FastifyBaseLogger } from 'fastify'
import type { ApplicationService } from './services/applications.js'

export const DEMO_APPLICATION = 'demo-app'

// Seeds one application from <seedDir>/requirements.txt; no-op when it is missing
export async function loadDemoApplication(service: ApplicationService, seedDir: string, log: FastifyBaseLogger): Promise<boolean> {
  const file = path.join(seedDir, 'requirements.txt')
  if (!fs.existsSync(file)) {
    log.warn({ file }, 'Demo manifest not found; skipping demo seed')
    return false
  }
  const result = await service.createApplication(DEMO_APPLICATION, 'Demo application seeded at startup', fs.readFileSync(file, 'utf8'))
  if (!result.ok) {
    log.warn({ err: result.error }, 'Failed to load demo application')
    return false
  }
  return true
}
