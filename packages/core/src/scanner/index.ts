import type { Dependency, LookupClient, PackageScanResult } from '../types.js'
import { UNKNOWN_VERSION, VERSION_NOT_SPECIFIED } from '../types.js'
import { parseManifest } from '../parsers/pip/requirements.js'
import { mapConcurrent } from './pool.js'

export const DEFAULT_SCAN_CONCURRENCY = 8

export interface ScanOptions {
  concurrency?: number
  // called once per dependency whose lookup failed
  onLookupError?: (dep: { name: string; version: string }, message: string) => void
}

export async function scanManifest(text: string, client: LookupClient, opts: ScanOptions = {}): Promise<PackageScanResult[]> {
  return scanDependencies(parseManifest(text), client, opts)
}

export async function scanDependencies(deps: readonly Dependency[], client: LookupClient, opts: ScanOptions = {}): Promise<PackageScanResult[]> {
  const concurrency = opts.concurrency ?? DEFAULT_SCAN_CONCURRENCY
  return mapConcurrent(deps, concurrency, async ({ name, version }): Promise<PackageScanResult> => {
    if (!version) {
      return Object.freeze({ name, version: UNKNOWN_VERSION, vulnerabilities: Object.freeze([]), error: VERSION_NOT_SPECIFIED })
    }
    let message: string
    try {
      const res = await client.lookup(name, version)
      if (res.kind === 'found') {
        return Object.freeze({ name, version, vulnerabilities: Object.freeze([...res.vulnerabilities]) })
      }
      message = res.message
    } catch (err) {
      // a client that throws is isolated the same way as a reported failure
      message = err instanceof Error ? err.message : String(err)
    }
    opts.onLookupError?.({ name, version }, message)
    return Object.freeze({ name, version, vulnerabilities: Object.freeze([]), error: message })
  })
}
