import type { LookupClient, LookupResult, Vulnerability } from '../../types.js'
import { NOT_AVAILABLE } from '../../types.js'

// Single-package OSV query client using global fetch (Node >= 18)
// Docs: https://google.github.io/osv.dev/post-v1-query/

export const DEFAULT_OSV_ENDPOINT = 'https://api.osv.dev/v1/query'

export interface OsvClientOptions {
  endpoint?: string
  ecosystem?: string
  timeoutMs?: number
  fetch?: typeof fetch
}

export class OsvClient implements LookupClient {
  readonly endpoint: string
  readonly ecosystem: string
  readonly timeoutMs: number
  private readonly fetchImpl: typeof fetch

  constructor(opts: OsvClientOptions = {}) {
    this.endpoint = opts.endpoint ?? DEFAULT_OSV_ENDPOINT
    this.ecosystem = opts.ecosystem ?? 'PyPI'
    this.timeoutMs = opts.timeoutMs ?? 10_000
    this.fetchImpl = opts.fetch ?? globalThis.fetch
  }

  async lookup(name: string, version: string): Promise<LookupResult> {
    const failure = (reason: string): LookupResult => ({
      kind: 'error',
      message: `Failed to query vulnerability service for ${name}==${version}: ${reason}`
    })

    const signal = AbortSignal.timeout(this.timeoutMs)
    let res: Response
    try {
      res = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ package: { name, ecosystem: this.ecosystem }, version }),
        signal
      })
    } catch (err) {
      if (signal.aborted) return failure(`timed out after ${this.timeoutMs}ms`)
      return failure(err instanceof Error ? err.message : String(err))
    }
    if (!res.ok) return failure(`HTTP ${res.status}`)

    let body: unknown
    try {
      body = await res.json()
    } catch {
      return failure('invalid JSON response')
    }
    const vulns = parseVulns(body)
    if (!vulns) return failure('unexpected response shape')
    return { kind: 'found', vulnerabilities: vulns }
  }
}

// OSV answers `{}` for packages with no known vulnerabilities
function parseVulns(body: unknown): Vulnerability[] | undefined {
  if (!isRecord(body)) return undefined
  const list = body.vulns
  if (list === undefined) return []
  if (!Array.isArray(list)) return undefined
  return list.filter(isRecord).map(toVulnerability)
}

export function toVulnerability(v: Record<string, unknown>): Vulnerability {
  return Object.freeze({
    id: textOr(v.id),
    summary: textOr(v.summary),
    details: textOr(v.details)
  })
}

function textOr(value: unknown): string {
  return typeof value === 'string' ? value : NOT_AVAILABLE
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
