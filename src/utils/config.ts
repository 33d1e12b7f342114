import { z } from 'zod'
import { readFileSync, existsSync } from 'fs'

const booleanString = (defaultValue: 'true' | 'false') =>
  z.string().default(defaultValue).transform(val => val === 'true')

// Environment configuration schema
const configSchema = z.object({
  // Server configuration
  PORT: z.string().default('3000').transform(Number).pipe(z.number().int().min(1).max(65535)),
  HOST: z.string().default('0.0.0.0'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Database configuration
  DATABASE_DIR: z.string().optional(), // undefined for in-memory mode

  // Logging configuration
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_REQUESTS: booleanString('true'),

  // CORS configuration
  CORS_ORIGIN: z.string().default('*'),

  // Application configuration
  APP_NAME: z.string().default('User Age Service'),
  APP_VERSION: z.string().default('1.0.0'),
})

export type Config = z.infer<typeof configSchema>

export type LogLevel = Config['LOG_LEVEL']

type Environment = Record<string, string | undefined>

// Configuration file paths, later entries win
const CONFIG_PATHS = [
  '.env',
  '.env.local',
  'config/app.env'
]

// Load environment variables from file
export function loadEnvFile(filePath: string): Record<string, string> {
  if (!existsSync(filePath)) {
    return {}
  }

  try {
    const content = readFileSync(filePath, 'utf-8')
    const env: Record<string, string> = {}

    content.split('\n').forEach(line => {
      const trimmed = line.trim()
      if (trimmed && !trimmed.startsWith('#')) {
        const [key, ...valueParts] = trimmed.split('=')
        if (key && valueParts.length > 0) {
          env[key.trim()] = valueParts.join('=').trim().replace(/^["']|["']$/g, '')
        }
      }
    })

    return env
  } catch (error) {
    console.warn(`Failed to load config file ${filePath}:`, error)
    return {}
  }
}

// Files fill gaps; variables already set in the process environment take precedence
function loadEnvironmentVariables(env: Environment, paths: string[]): Environment {
  let fileEnv: Record<string, string> = {}

  for (const configPath of paths) {
    fileEnv = { ...fileEnv, ...loadEnvFile(configPath) }
  }

  return { ...fileEnv, ...env }
}

// Drop empty strings so that zod defaults apply to them
function withoutEmptyValues(env: Environment): Environment {
  return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''))
}

// Validate configuration and report every problem
function validateConfig(env: Environment): Config {
  const result = configSchema.safeParse(withoutEmptyValues(env))

  if (!result.success) {
    console.error('Configuration validation failed:')
    result.error.errors.forEach(err => {
      console.error(`  - ${err.path.join('.')}: ${err.message}`)
    })
    throw new Error('Invalid configuration', { cause: result.error })
  }

  return result.data
}

export interface LoadConfigOptions {
  env?: Environment
  configPaths?: string[]
}

/**
 * Load and validate configuration from the environment and the optional config files
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const { env = process.env, configPaths = CONFIG_PATHS } = options

  return validateConfig(loadEnvironmentVariables(env, configPaths))
}

// Log configuration summary
export function describeConfig(config: Config): string[] {
  return [
    `Environment: ${config.NODE_ENV}`,
    `Server: ${config.HOST}:${config.PORT}`,
    `Database: ${config.DATABASE_DIR ? `File-based (${config.DATABASE_DIR})` : 'In-memory'}`,
    `Log Level: ${config.LOG_LEVEL}`,
  ]
}
