import fs from 'node:fs'
import path from 'node:path'
import type { LookupClient, LookupResult, Vulnerability } from '../../types.js'
import { isRecord, toVulnerability } from './osv.js'

interface SeedEntry {
  package: string
  // absent: every version is affected
  version?: string
  vulnerability: Vulnerability
}

export function loadSeedVulnerabilities(seedDir = path.resolve(process.cwd(), 'demo', 'seeds')): SeedEntry[] {
  const file = path.join(seedDir, 'vulnerabilities.json')
  if (!fs.existsSync(file)) return []
  const list: unknown = JSON.parse(fs.readFileSync(file, 'utf8'))
  if (!Array.isArray(list)) throw new Error(`${file}: expected an array of vulnerabilities`)
  return list.map((v, i) => {
    if (!isRecord(v) || typeof v.package !== 'string' || typeof v.id !== 'string') {
      throw new Error(`${file}: entry ${i} needs string "package" and "id"`)
    }
    return {
      package: v.package,
      version: typeof v.version === 'string' ? v.version : undefined,
      vulnerability: toVulnerability(v)
    }
  })
}

// Offline lookup backed by a JSON seed file; used in demo mode and for local runs
export class SeedLookupClient implements LookupClient {
  private entries: SeedEntry[] | undefined
  private loadError: string | undefined

  constructor(readonly seedDir?: string) {}

  async lookup(name: string, version: string): Promise<LookupResult> {
    const entries = this.load()
    if (!entries) return { kind: 'error', message: `Failed to read vulnerability seeds for ${name}==${version}: ${this.loadError}` }
    const matches = entries
      .filter(e => e.package === name && (e.version === undefined || e.version === version))
      .map(e => e.vulnerability)
    return { kind: 'found', vulnerabilities: matches }
  }

  private load(): SeedEntry[] | undefined {
    if (this.entries || this.loadError) return this.entries
    try {
      this.entries = loadSeedVulnerabilities(this.seedDir)
    } catch (err) {
      this.loadError = err instanceof Error ? err.message : String(err)
    }
    return this.entries
  }
}
