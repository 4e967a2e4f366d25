import { ConflictError, type Application, type Package, type Result } from '@depwatch/core'

// Process-lifetime registry of applications, unique by name, append-only.
// `create` checks and inserts without awaiting, so no other request can run
// between the two steps.
export class MemoryStore {
  private readonly applications: Application[] = []
  private readonly byName = new Map<string, Application>()

  create(name: string, description: string | undefined, packages: readonly Package[]): Result<Application, ConflictError> {
    if (this.byName.has(name)) return { ok: false, error: new ConflictError(name) }
    const app: Application = Object.freeze({
      name,
      ...(description !== undefined ? { description } : {}),
      packages: Object.freeze([...packages])
    })
    this.byName.set(name, app)
    this.applications.push(app)
    return { ok: true, value: app }
  }

  has(name: string) { return this.byName.has(name) }
  getByName(name: string) { return this.byName.get(name) }
  getAll(): readonly Application[] { return [...this.applications] }
  get size() { return this.applications.length }
}
