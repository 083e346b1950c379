import { z } from 'zod'
import type { CheckInOutcome, CheckInRequest } from '../../core/attendance/types.js'
import { MalformedInputError, isAttendanceError } from '../../core/errors.js'

export interface HttpReply {
  status: number
  body: Record<string, unknown>
}

const checkInBodySchema = z.object({
  name: z.string({ invalid_type_error: 'name must be a string' }).default(''),
  when: z.string({ invalid_type_error: 'when must be a string' }).nullish(),
})

export function parseCheckInBody(body: unknown): CheckInRequest {
  const parsed = checkInBodySchema.safeParse(body ?? {})
  if (!parsed.success) {
    throw new MalformedInputError(parsed.error.issues.map(issue => issue.message).join('; '))
  }
  return { name: parsed.data.name, when: parsed.data.when ?? undefined }
}

export function toCheckInReply(outcome: CheckInOutcome): HttpReply {
  switch (outcome.status) {
    case 'duplicate':
      return { status: 200, body: { status: 'duplicate', date: outcome.date } }
    case 'ok':
      return { status: 200, body: { status: 'ok', pushed: true, late: outcome.late, date: outcome.date } }
    case 'notify_failed':
      return {
        status: 502,
        body: {
          status: 'notify_failed',
          detail: outcome.error.body ?? outcome.error.message,
          upstreamStatus: outcome.error.status ?? null,
        },
      }
  }
}

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed'
}

export function toErrorReply(error: unknown): HttpReply {
  if (isBodyParseError(error)) {
    return { status: 400, body: { error: 'MALFORMED_INPUT', message: 'request body is not valid JSON' } }
  }
  if (isAttendanceError(error)) {
    return { status: error.httpStatus, body: { error: error.code, message: error.message } }
  }
  return { status: 500, body: { error: 'INTERNAL', message: 'internal error' } }
}
