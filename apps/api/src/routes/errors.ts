import type { FastifyReply } from 'fastify'
import type { DepwatchError, ErrorCode } from '@depwatch/core'

const STATUS: Record<ErrorCode, number> = {
  CONFLICT: 409,
  SCAN_FAILED: 400,
  NOT_FOUND: 404
}

export function sendError(reply: FastifyReply, err: DepwatchError) {
  return reply.code(STATUS[err.code]).send({ code: err.code, message: err.message })
}
