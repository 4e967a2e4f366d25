import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { DEFAULT_OSV_ENDPOINT, DEFAULT_SCAN_CONCURRENCY } from '@depwatch/core'

const __dirname = path.dirname(fileURLToPath(import.meta.url))
export const repoRoot = path.resolve(__dirname, '../../..')
export const repoSeedDir = path.join(repoRoot, 'demo', 'seeds')

export type VulnSource = 'osv' | 'seed'

export interface Config {
  port: number
  host: string
  projectName: string
  scannerEndpoint: string
  scannerEcosystem: string
  scanConcurrency: number
  lookupTimeoutMs: number
  vulnSource: VulnSource
  seedDir: string
  demo: boolean
  logLevel: string
}

type Env = Record<string, string | undefined>

function flag(value: string | undefined): boolean {
  return value === '1' || value === 'true'
}

function positiveInt(value: string | undefined, fallback: number): number {
  const n = Number(value)
  return value && Number.isInteger(n) && n > 0 ? n : fallback
}

export function loadConfig(env: Env = process.env): Config {
  const demo = flag(env.DEMO)
  const vulnSource: VulnSource = env.VULN_SOURCE === 'seed' || (demo && env.VULN_SOURCE !== 'osv') ? 'seed' : 'osv'
  return {
    port: positiveInt(env.PORT, 3333),
    host: env.HOST || '0.0.0.0',
    projectName: env.PROJECT_NAME || 'Vulnerability Scanner',
    scannerEndpoint: env.SCANNER_ENDPOINT || DEFAULT_OSV_ENDPOINT,
    scannerEcosystem: env.SCANNER_ECOSYSTEM || 'PyPI',
    scanConcurrency: positiveInt(env.SCAN_CONCURRENCY, DEFAULT_SCAN_CONCURRENCY),
    lookupTimeoutMs: positiveInt(env.LOOKUP_TIMEOUT_MS, 10_000),
    vulnSource,
    seedDir: env.VULN_SEED_DIR ? path.resolve(env.VULN_SEED_DIR) : repoSeedDir,
    demo,
    logLevel: env.LOG_LEVEL || 'info'
  }
}
