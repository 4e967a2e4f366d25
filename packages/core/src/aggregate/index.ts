import type { Application, DependencyDetail, DependencyRecord, DependencyUsage, PackageSummary, Vulnerability } from '../types.js'
import { dependencyKey, isVulnerable } from '../types.js'

// All views are rebuilt from the given applications on every call; nothing is cached.

export function listDependencies(apps: readonly Application[]): DependencyRecord[] {
  const map = new Map<string, { name: string; version: string; vulnerabilities: Vulnerability[] }>()
  for (const app of apps) {
    for (const pkg of app.packages) {
      const key = dependencyKey(pkg.name, pkg.version)
      const entry = map.get(key)
      if (entry) entry.vulnerabilities.push(...pkg.vulnerabilities)
      else map.set(key, { name: pkg.name, version: pkg.version, vulnerabilities: [...pkg.vulnerabilities] })
    }
  }
  return [...map.values()].map(d => ({ ...d, isVulnerable: isVulnerable(d) }))
}

export function getDependency(apps: readonly Application[], name: string, version: string): DependencyDetail | undefined {
  const usage: DependencyUsage[] = []
  const vulnerabilities: Vulnerability[] = []
  for (const app of apps) {
    for (const pkg of app.packages) {
      if (pkg.name !== name || pkg.version !== version) continue
      usage.push({ applicationName: app.name, applicationDescription: app.description })
      vulnerabilities.push(...pkg.vulnerabilities)
    }
  }
  if (!usage.length) return undefined
  return {
    dependency: { name, version, vulnerabilities, isVulnerable: isVulnerable({ vulnerabilities }) },
    usage
  }
}

export function listApplicationDependencies(apps: readonly Application[], applicationName: string): PackageSummary[] | undefined {
  const app = apps.find(a => a.name === applicationName)
  if (!app) return undefined
  return app.packages.map(p => ({ name: p.name, version: p.version, isVulnerable: isVulnerable(p) }))
}
