import type { FastifyPluginAsync } from 'fastify'
import { decodeManifest } from '@depwatch/core'
import type { ApplicationService } from '../services/applications.js'
import { sendError } from './errors.js'

export interface RouteOptions { service: ApplicationService }

const MANIFEST_FIELD = 'requirements_file'

export const applicationRoutes: FastifyPluginAsync<RouteOptions> = async (app, { service }) => {
  // Multipart form: name, description?, requirements_file (text/plain)
  app.post('/create-application/', async (req, reply) => {
    if (!req.isMultipart()) return reply.code(400).send({ code: 'BAD_REQUEST', message: 'multipart/form-data body required' })
    const fields: Record<string, string> = {}
    let file: { mimetype: string; content: Buffer } | undefined
    for await (const part of req.parts()) {
      if (part.type === 'file') {
        const content = await part.toBuffer()
        if (part.fieldname === MANIFEST_FIELD) file = { mimetype: part.mimetype, content }
      } else if (typeof part.value === 'string') {
        fields[part.fieldname] = part.value
      }
    }

    const name = fields.name?.trim()
    if (!name) return reply.code(400).send({ code: 'BAD_REQUEST', message: 'name is required' })
    if (!file) return reply.code(400).send({ code: 'BAD_REQUEST', message: `${MANIFEST_FIELD} is required` })
    if (file.mimetype !== 'text/plain') {
      req.log.error({ application: name, mimetype: file.mimetype }, 'Invalid manifest file type')
      return reply.code(400).send({ code: 'BAD_REQUEST', message: 'Invalid file type. Only text files are allowed.' })
    }

    const content = file.content
    const description = fields.description || undefined
    const result = await service.createApplication(name, description, () => decodeManifest(content))
    if (!result.ok) return sendError(reply, result.error)
    return reply.code(201).send({
      message: 'Application created successfully.',
      name: result.value.name,
      description: result.value.description ?? null
    })
  })

  app.get('/get-applications', async () => {
    const applications = service.listApplications().map(a => ({
      name: a.name,
      description: a.description ?? null,
      is_vulnerable: a.isVulnerable
    }))
    return { total_applications: applications.length, applications }
  })

  app.get<{ Params: { applicationName: string } }>('/get-application-dependencies/:applicationName', async (req, reply) => {
    const result = service.getApplicationDependencies(req.params.applicationName)
    if (!result.ok) return sendError(reply, result.error)
    const { applicationName, description, vulnerablePackages } = result.value
    return {
      application_name: applicationName,
      description: description ?? null,
      vulnerable_packages: vulnerablePackages.map(p => ({ name: p.name, version: p.version, is_vulnerable: p.isVulnerable }))
    }
  })
}
