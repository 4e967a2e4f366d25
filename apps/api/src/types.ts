import type { Vulnerability } from '@depwatch/core'

// Shapes returned by the application service

export interface ApplicationListItem { name: string; description?: string; isVulnerable: boolean }
export interface VulnerablePackage { name: string; version: string; isVulnerable: true }

export interface ApplicationDependencies {
  applicationName: string
  description?: string
  vulnerablePackages: VulnerablePackage[]
}

export interface DependencyIndex {
  totalDependencies: number
  dependencies: { name: string; version: string; isVulnerable: boolean }[]
}

export interface DependencyReport {
  dependency: { name: string; version: string; isVulnerable: boolean; vulnerabilities: Vulnerability[] }
  usage: { applicationName: string; applicationDescription?: string }[]
}
