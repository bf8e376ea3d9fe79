/**
 * Logger output gating and retained entries
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import {
  createAuditEvent,
  createLogger,
  createSecurityEvent,
  LogLevel,
  MemoryLogAggregator,
  silentLogger,
} from '../src/utils/logger.js'

describe('logger', () => {
  let logs: MemoryLogAggregator

  beforeEach(() => {
    logs = new MemoryLogAggregator()
    vi.stubEnv('NODE_ENV', 'test')
    vi.stubEnv('DEBUG', '')
    vi.stubEnv('LOG_FORMAT', '')
    vi.stubEnv('AUDIT_LOG', '')
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
    vi.spyOn(console, 'info').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  describe('MemoryLogAggregator', () => {
    it('should retain every level with its namespace', () => {
      const log = createLogger('Widget', logs)

      log.debug('d')
      log.info('i', { n: 1 })
      log.warn('w')
      log.error('e', new Error('boom'))

      expect(logs.getLogs().map((entry) => [entry.level, entry.message])).toEqual([
        [LogLevel.DEBUG, 'd'],
        [LogLevel.INFO, 'i'],
        [LogLevel.WARN, 'w'],
        [LogLevel.ERROR, 'e'],
      ])
      expect(logs.getLogs()[1]).toMatchObject({ namespace: 'Widget', context: { n: 1 } })
      expect(logs.getLogs()[3]?.error?.message).toBe('boom')
    })

    it('should drop the oldest entries past its bound', () => {
      const small = new MemoryLogAggregator(2)
      const log = createLogger('Widget', small)

      log.warn('one')
      log.warn('two')
      log.warn('three')

      expect(small.getLogs().map((entry) => entry.message)).toEqual(['two', 'three'])
    })

    it('should keep audit and security events in their own streams', () => {
      const log = createLogger('Widget', logs)

      log.auditLog(createAuditEvent('titles.replace', 'TitleIndex', 'titles', 'replace', 'success'))
      log.securityLog(createSecurityEvent('validation.failed', 'medium', 'identifier', 'validate', 'bad name'))

      expect(logs.getAuditEvents().map((event) => event.eventType)).toEqual(['titles.replace'])
      expect(logs.getSecurityEvents().map((event) => event.eventType)).toEqual(['validation.failed'])
      expect(logs.getLogs().map((entry) => entry.level)).toEqual([LogLevel.AUDIT, LogLevel.SECURITY])

      logs.clear()
      expect(logs.getLogs()).toEqual([])
      expect(logs.getAuditEvents()).toEqual([])
    })
  })

  describe('console output', () => {
    it('should keep warnings quiet under test but print errors', () => {
      const log = createLogger('Widget')

      log.warn('quiet')
      log.error('loud')

      expect(console.warn).not.toHaveBeenCalled()
      expect(console.error).toHaveBeenCalledWith('[titlecache:Widget] loud')
    })

    it('should print info only with DEBUG set', () => {
      createLogger('Widget').info('hidden')
      expect(console.info).not.toHaveBeenCalled()

      vi.stubEnv('DEBUG', 'true')
      createLogger('Widget').info('shown', { id: 7 })
      expect(console.info).toHaveBeenCalledWith('[titlecache:Widget] shown {"id":7}')
    })

    it('should print JSON lines with LOG_FORMAT=json', () => {
      vi.stubEnv('LOG_FORMAT', 'json')

      createLogger('Widget').error('failed')

      const line = vi.mocked(console.error).mock.calls[0]?.[0]
      expect(typeof line).toBe('string')
      expect(JSON.parse(String(line))).toMatchObject({ level: 'ERROR', namespace: 'Widget', message: 'failed' })
    })

    it('should print audit events only when asked to', () => {
      const event = createAuditEvent('cache.degraded', 'TieredCache', 'persistent_cache', 'get', 'error')

      createLogger('Widget').auditLog(event)
      expect(console.log).not.toHaveBeenCalled()

      vi.stubEnv('AUDIT_LOG', 'true')
      createLogger('Widget').auditLog(event)
      expect(console.log).toHaveBeenCalledWith(
        '[AUDIT] cache.degraded | TieredCache -> get on persistent_cache = error'
      )
    })

    it('should never print from the silent logger', () => {
      silentLogger.error('nothing')
      silentLogger.warn('nothing')

      expect(console.error).not.toHaveBeenCalled()
    })
  })
})
