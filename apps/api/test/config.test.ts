import { describe, it, expect } from 'vitest'
import path from 'node:path'
import { OsvClient, SeedLookupClient } from '@depwatch/core'
import { loadConfig, repoSeedDir } from '../src/config.js'
import { createLookupClient } from '../src/app.js'

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 3333,
      host: '0.0.0.0',
      projectName: 'Vulnerability Scanner',
      scannerEndpoint: 'https://api.osv.dev/v1/query',
      scannerEcosystem: 'PyPI',
      scanConcurrency: 8,
      lookupTimeoutMs: 10000,
      vulnSource: 'osv',
      seedDir: repoSeedDir,
      demo: false,
      logLevel: 'info'
    })
  })

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      PROJECT_NAME: 'Scanner',
      SCANNER_ENDPOINT: 'http://osv.internal/v1/query',
      SCAN_CONCURRENCY: '2',
      LOOKUP_TIMEOUT_MS: '500',
      VULN_SEED_DIR: 'fixtures/seeds',
      LOG_LEVEL: 'debug'
    })
    expect(config.port).toBe(8080)
    expect(config.projectName).toBe('Scanner')
    expect(config.scannerEndpoint).toBe('http://osv.internal/v1/query')
    expect(config.scanConcurrency).toBe(2)
    expect(config.lookupTimeoutMs).toBe(500)
    expect(config.seedDir).toBe(path.resolve('fixtures/seeds'))
    expect(config.logLevel).toBe('debug')
  })

  it('ignores numbers that are not positive integers', () => {
    const config = loadConfig({ PORT: 'abc', SCAN_CONCURRENCY: '0', LOOKUP_TIMEOUT_MS: '1.5' })
    expect(config.port).toBe(3333)
    expect(config.scanConcurrency).toBe(8)
    expect(config.lookupTimeoutMs).toBe(10000)
  })

  it('uses seeds in demo mode unless osv is requested', () => {
    expect(loadConfig({ DEMO: '1' }).vulnSource).toBe('seed')
    expect(loadConfig({ DEMO: 'true', VULN_SOURCE: 'osv' }).vulnSource).toBe('osv')
    expect(loadConfig({ VULN_SOURCE: 'seed' }).vulnSource).toBe('seed')
  })
})

describe('createLookupClient', () => {
  it('builds the client for the configured source', () => {
    const osv = createLookupClient(loadConfig({ SCANNER_ENDPOINT: 'http://osv.internal/v1/query', LOOKUP_TIMEOUT_MS: '750' }))
    expect(osv).toBeInstanceOf(OsvClient)
    if (osv instanceof OsvClient) {
      expect(osv.endpoint).toBe('http://osv.internal/v1/query')
      expect(osv.timeoutMs).toBe(750)
    }
    expect(createLookupClient(loadConfig({ DEMO: '1' }))).toBeInstanceOf(SeedLookupClient)
  })
})
