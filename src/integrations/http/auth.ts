import { createHash, timingSafeEqual } from 'node:crypto'
import type { NextFunction, Request, Response } from 'express'
import { UnauthorizedError } from '../../core/errors.js'
import { logger } from '../../utils/logger.js'

export const API_KEY_HEADER = 'x-api-key'

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest()
}

/** Constant-time comparison; nothing is authorized when no key is configured. */
export function isAuthorized(provided: string | undefined, apiKey: string | undefined): boolean {
  if (!apiKey || provided === undefined) return false
  return timingSafeEqual(digest(provided), digest(apiKey))
}

export function requireApiKey(apiKey: string | undefined) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const provided = req.header(API_KEY_HEADER)
    if (!isAuthorized(provided, apiKey)) {
      logger.warn('Rejected request with missing or wrong API key', { method: req.method, path: req.path })
      next(new UnauthorizedError())
      return
    }
    next()
  }
}
