import { afterEach, describe, expect, it, vi } from 'vitest'
import { MessageDeliveryError } from '../../src/core/errors.js'
import { configureLogger, formatLine, logger, maskSecret } from '../../src/utils/logger.js'

function metaOf(line: string): unknown {
  return JSON.parse(line.slice(line.indexOf(' | ') + 3))
}

describe('formatLine', () => {
  it('writes errors with their code, status and cause', () => {
    const error = new MessageDeliveryError('push rejected', { status: 400, cause: new Error('socket hang up') })

    const line = formatLine('error', 'Push failed', { error }, false)

    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[error\] Push failed \| /)
    expect(metaOf(line)).toMatchObject({
      error: {
        name: 'MessageDeliveryError',
        message: 'push rejected',
        code: 'NOTIFICATION_DELIVERY_FAILED',
        status: 400,
        cause: { name: 'Error', message: 'socket hang up' },
      },
    })
  })

  it('marks circular references', () => {
    const meta: Record<string, unknown> = { name: 'Alice' }
    meta.self = meta

    expect(formatLine('info', 'Loop', meta, false)).toMatch(/ \| \{"name":"Alice","self":"\[Circular\]"\}$/)
  })

  it('pretty-prints large metadata only in detail lines', () => {
    const meta = { names: Array.from({ length: 30 }, (_, index) => `name-${index}`) }

    const detail = formatLine('info', 'Snapshot', meta, true).split('\n')
    expect(detail[0]).toMatch(/\] \[info\] Snapshot$/)
    expect(detail[1]).toBe('  {')
    expect(detail[2]).toBe('    "names": [')

    expect(formatLine('info', 'Snapshot', meta, false)).toContain(' | {"names":["name-0","name-1",')
  })
})

describe('logger', () => {
  afterEach(async () => {
    vi.restoreAllMocks()
    await configureLogger({ level: 'info' })
  })

  it('drops messages below the configured level', async () => {
    const info = vi.spyOn(console, 'log').mockImplementation(() => undefined)
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    await configureLogger({ level: 'warn' })

    logger.info('hidden')
    logger.warn('shown')

    expect(info).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn.mock.calls[0][0]).toMatch(/\] \[warn\] shown$/)
  })
})

describe('maskSecret', () => {
  it('keeps only the first characters', () => {
    expect(maskSecret('test-secret')).toBe('test*******')
    expect(maskSecret(undefined)).toBe('(empty)')
  })
})
