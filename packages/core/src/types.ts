export const NOT_AVAILABLE = 'N/A'
export const UNKNOWN_VERSION = 'unknown'
export const VERSION_NOT_SPECIFIED = 'version not specified'

export interface Dependency {
  name: string
  version?: string
}

export interface Vulnerability {
  readonly id: string
  readonly summary: string
  readonly details: string
}

export interface Package {
  readonly name: string
  readonly version: string
  readonly vulnerabilities: readonly Vulnerability[]
  // lookup failure or missing version; vulnerabilities is empty when set
  readonly error?: string
}

export interface Application {
  readonly name: string
  readonly description?: string
  readonly packages: readonly Package[]
}

export type PackageScanResult = Package

export type LookupResult =
  | { kind: 'found'; vulnerabilities: Vulnerability[] }
  | { kind: 'error'; message: string }

export interface LookupClient {
  lookup(name: string, version: string): Promise<LookupResult>
}

export interface PackageSummary {
  name: string
  version: string
  isVulnerable: boolean
}

export interface DependencyRecord extends PackageSummary {
  vulnerabilities: Vulnerability[]
}

export interface DependencyUsage {
  applicationName: string
  applicationDescription?: string
}

export interface DependencyDetail {
  dependency: DependencyRecord
  usage: DependencyUsage[]
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export function isVulnerable(item: { vulnerabilities: readonly Vulnerability[] }): boolean {
  return item.vulnerabilities.length > 0
}

export function dependencyKey(name: string, version: string): string {
  return `${name}==${version}`
}
