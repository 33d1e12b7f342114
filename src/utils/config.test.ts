import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { describeConfig, loadConfig, loadEnvFile } from './config'

describe('Configuration Management', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'user-age-config-'))
    vi.spyOn(console, 'error').mockImplementation(() => undefined)
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  describe('loadConfig', () => {
    it('should load configuration with default values', () => {
      const config = loadConfig({ env: {}, configPaths: [] })

      expect(config.PORT).toBe(3000)
      expect(config.HOST).toBe('0.0.0.0')
      expect(config.NODE_ENV).toBe('development')
      expect(config.DATABASE_DIR).toBeUndefined()
      expect(config.LOG_LEVEL).toBe('info')
      expect(config.LOG_REQUESTS).toBe(true)
      expect(config.CORS_ORIGIN).toBe('*')
      expect(config.APP_NAME).toBe('User Age Service')
      expect(config.APP_VERSION).toBe('1.0.0')
    })

    it('should parse environment variables correctly', () => {
      const config = loadConfig({
        env: {
          PORT: '8080',
          HOST: '127.0.0.1',
          NODE_ENV: 'production',
          DATABASE_DIR: './data',
          LOG_LEVEL: 'error',
          LOG_REQUESTS: 'false',
          CORS_ORIGIN: 'https://app.example.com'
        },
        configPaths: []
      })

      expect(config.PORT).toBe(8080)
      expect(config.HOST).toBe('127.0.0.1')
      expect(config.NODE_ENV).toBe('production')
      expect(config.DATABASE_DIR).toBe('./data')
      expect(config.LOG_LEVEL).toBe('error')
      expect(config.LOG_REQUESTS).toBe(false)
      expect(config.CORS_ORIGIN).toBe('https://app.example.com')
    })

    it('should apply defaults to empty values', () => {
      const config = loadConfig({ env: { PORT: '', LOG_LEVEL: '' }, configPaths: [] })

      expect(config.PORT).toBe(3000)
      expect(config.LOG_LEVEL).toBe('info')
    })

    it('should reject an invalid log level', () => {
      expect(() => loadConfig({ env: { LOG_LEVEL: 'verbose' }, configPaths: [] })).toThrow('Invalid configuration')
      expect(console.error).toHaveBeenCalledWith('Configuration validation failed:')
    })

    it('should reject a port that is not a number', () => {
      expect(() => loadConfig({ env: { PORT: 'http' }, configPaths: [] })).toThrow('Invalid configuration')
    })

    it('should read config files, letting the process environment win', () => {
      const first = join(tempDir, 'first.env')
      const second = join(tempDir, 'second.env')
      writeFileSync(first, 'PORT=4000\nAPP_NAME="From File"\n')
      writeFileSync(second, 'PORT=5000\nLOG_LEVEL=warn\n')

      const config = loadConfig({ env: { LOG_LEVEL: 'debug' }, configPaths: [first, second] })

      expect(config.PORT).toBe(5000)
      expect(config.APP_NAME).toBe('From File')
      expect(config.LOG_LEVEL).toBe('debug')
    })
  })

  describe('loadEnvFile', () => {
    it('should return an empty object for a missing file', () => {
      expect(loadEnvFile(join(tempDir, 'missing.env'))).toEqual({})
    })

    it('should skip comments and keep values containing equals signs', () => {
      const file = join(tempDir, 'app.env')
      writeFileSync(file, '# comment\n\nDATABASE_DIR=/var/lib/users\nCORS_ORIGIN=\'a=b\'\n')

      expect(loadEnvFile(file)).toEqual({
        DATABASE_DIR: '/var/lib/users',
        CORS_ORIGIN: 'a=b'
      })
    })
  })

  it('should summarise the configuration', () => {
    const config = loadConfig({ env: { DATABASE_DIR: './data' }, configPaths: [] })

    expect(describeConfig(config)).toEqual([
      'Environment: development',
      'Server: 0.0.0.0:3000',
      'Database: File-based (./data)',
      'Log Level: info'
    ])
  })
})
