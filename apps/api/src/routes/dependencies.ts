import type { FastifyPluginAsync } from 'fastify'
import type { RouteOptions } from './applications.js'
import { sendError } from './errors.js'

export const dependencyRoutes: FastifyPluginAsync<RouteOptions> = async (app, { service }) => {
  app.get('/get-dependencies/', async () => {
    const { totalDependencies, dependencies } = service.listAllDependencies()
    return {
      total_dependencies: totalDependencies,
      dependencies: dependencies.map(d => ({ name: d.name, version: d.version, is_vulnerable: d.isVulnerable }))
    }
  })

  app.get<{ Querystring: { name?: string; version?: string } }>('/get-dependency/', async (req, reply) => {
    const { name, version } = req.query
    if (!name || !version) return reply.code(400).send({ code: 'BAD_REQUEST', message: 'name and version query parameters are required' })
    const result = service.getDependency(name, version)
    if (!result.ok) return sendError(reply, result.error)
    const { dependency, usage } = result.value
    return {
      dependency: {
        name: dependency.name,
        version: dependency.version,
        is_vulnerable: dependency.isVulnerable,
        vulnerabilities: dependency.vulnerabilities.map(v => ({ id: v.id, summary: v.summary, details: v.details }))
      },
      usage: usage.map(u => ({ application_name: u.applicationName, application_description: u.applicationDescription ?? null }))
    }
  })
}
