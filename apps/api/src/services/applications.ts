import type { FastifyBaseLogger } from 'fastify'
import {
  ConflictError,
  NotFoundError,
  ScanError,
  getDependency,
  isVulnerable,
  listApplicationDependencies,
  listDependencies,
  scanManifest,
  type Application,
  type LookupClient,
  type Result
} from '@depwatch/core'
import type { MemoryStore } from '../store/memory.js'
import type { ApplicationDependencies, ApplicationListItem, DependencyIndex, DependencyReport, VulnerablePackage } from '../types.js'

export interface ApplicationServiceOptions {
  store: MemoryStore
  lookup: LookupClient
  log: FastifyBaseLogger
  scanConcurrency?: number
}

export class ApplicationService {
  private readonly store: MemoryStore
  private readonly lookup: LookupClient
  private readonly log: FastifyBaseLogger
  private readonly scanConcurrency?: number
  // names with a scan in flight; a second create for the same name conflicts
  private readonly pending = new Set<string>()

  constructor(opts: ApplicationServiceOptions) {
    this.store = opts.store
    this.lookup = opts.lookup
    this.log = opts.log
    this.scanConcurrency = opts.scanConcurrency
  }

  async createApplication(name: string, description: string | undefined, manifest: string | (() => string)): Promise<Result<Application, ConflictError | ScanError>> {
    this.log.info({ application: name }, 'Received request to create application')
    if (this.store.has(name) || this.pending.has(name)) {
      this.log.warn({ application: name }, 'Application already exists')
      return { ok: false, error: new ConflictError(name) }
    }
    this.pending.add(name)
    try {
      let text: string
      try {
        text = typeof manifest === 'function' ? manifest() : manifest
      } catch (err) {
        const error = err instanceof ScanError ? err : new ScanError('Manifest could not be read.', { cause: err })
        this.log.error({ application: name, err }, 'Failed to read manifest')
        return { ok: false, error }
      }

      const packages = await scanManifest(text, this.lookup, {
        concurrency: this.scanConcurrency,
        onLookupError: (dep, message) => this.log.warn({ application: name, dependency: `${dep.name}==${dep.version}` }, message)
      })
      const created = this.store.create(name, description, packages)
      if (!created.ok) {
        this.log.warn({ application: name }, 'Application was created while scanning; discarding scan')
        return created
      }
      this.log.info({
        application: name,
        packages: packages.length,
        vulnerable: packages.filter(isVulnerable).length,
        errors: packages.filter(p => p.error).length
      }, 'Application created')
      return created
    } finally {
      this.pending.delete(name)
    }
  }

  listApplications(): ApplicationListItem[] {
    return this.store.getAll().map(app => ({
      name: app.name,
      description: app.description,
      isVulnerable: app.packages.some(isVulnerable)
    }))
  }

  getApplicationDependencies(name: string): Result<ApplicationDependencies, NotFoundError> {
    const app = this.store.getByName(name)
    const summaries = listApplicationDependencies(this.store.getAll(), name)
    if (!app || !summaries) return this.notFound(`Application '${name}' not found.`)
    const vulnerablePackages = summaries
      .filter(p => p.isVulnerable)
      .map((p): VulnerablePackage => ({ name: p.name, version: p.version, isVulnerable: true }))
    return { ok: true, value: { applicationName: app.name, description: app.description, vulnerablePackages } }
  }

  listAllDependencies(): DependencyIndex {
    const dependencies = listDependencies(this.store.getAll())
      .map(d => ({ name: d.name, version: d.version, isVulnerable: d.isVulnerable }))
    return { totalDependencies: dependencies.length, dependencies }
  }

  getDependency(name: string, version: string): Result<DependencyReport, NotFoundError> {
    const detail = getDependency(this.store.getAll(), name, version)
    if (!detail) return this.notFound(`Dependency '${name}==${version}' not found in any application.`)
    return { ok: true, value: detail }
  }

  private notFound(message: string): { ok: false; error: NotFoundError } {
    this.log.warn(message)
    return { ok: false, error: new NotFoundError(message) }
  }
}
