// =============================================================================
// SERVER CONFIGURATION
// =============================================================================

import dotenv from 'dotenv'

// Load environment variables
dotenv.config()

// =============================================================================
// ENVIRONMENT VALIDATION
// =============================================================================

const requiredEnvVars = ['DATABASE_URL'] as const

const missingEnvVars = requiredEnvVars.filter(envVar => !process.env[envVar])

if (missingEnvVars.length > 0) {
  throw new Error(`Missing required environment variables: ${missingEnvVars.join(', ')}`)
}

export type CacheDriver = 'memory' | 'redis'
export type InvalidationStrategy = 'prefix' | 'basic'

function parseCacheDriver(value: string | undefined): CacheDriver {
  return value === 'redis' ? 'redis' : 'memory'
}

function parseInvalidationStrategy(value: string | undefined): InvalidationStrategy {
  return value === 'basic' ? 'basic' : 'prefix'
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

export const config = {
  // Server Configuration
  server: {
    port: parseInt(process.env.PORT || '8000', 10),
    host: process.env.HOST || 'localhost',
    env: process.env.NODE_ENV || 'development',
    isDevelopment: process.env.NODE_ENV === 'development',
    isProduction: process.env.NODE_ENV === 'production',
    isTest: process.env.NODE_ENV === 'test'
  },

  // Database Configuration
  database: {
    url: process.env.DATABASE_URL || '',
    maxConnections: parseInt(process.env.DB_MAX_CONNECTIONS || '10', 10),
    connectionTimeout: parseInt(process.env.DB_CONNECTION_TIMEOUT || '60000', 10)
  },

  // Redis Configuration
  redis: {
    url: process.env.REDIS_URL || 'redis://localhost:6379',
    keyPrefix: process.env.REDIS_KEY_PREFIX || 'catalog:'
  },

  // CORS Configuration
  cors: {
    origin: process.env.CORS_ORIGIN?.split(',') || [
      'http://localhost:3000',
      'http://localhost:3001'
    ],
    credentials: true,
    optionsSuccessStatus: 200
  },

  // Rate Limiting Configuration
  rateLimit: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000', 10), // 15 minutes
    max: parseInt(process.env.RATE_LIMIT_MAX || '1000', 10),
    message: 'Too many requests from this IP, please try again later.',
    standardHeaders: true,
    legacyHeaders: false
  },

  // Logging Configuration
  logging: {
    level: process.env.LOG_LEVEL || 'info',
    format: process.env.LOG_FORMAT || 'combined',
    file: {
      enabled: process.env.LOG_FILE_ENABLED === 'true',
      filename: process.env.LOG_FILE_NAME || 'app.log',
      maxSize: parseInt(process.env.LOG_FILE_MAX_SIZE || '10485760', 10), // 10MB
      maxFiles: parseInt(process.env.LOG_FILE_MAX_FILES || '5', 10)
    }
  },

  // Cache Configuration
  cache: {
    driver: parseCacheDriver(process.env.CACHE_DRIVER),
    invalidation: parseInvalidationStrategy(process.env.CACHE_INVALIDATION),
    ttl: parseInt(process.env.CACHE_TTL || '300', 10), // 5 minutes
    listsTtl: parseInt(process.env.CACHE_LISTS_TTL || '3600', 10),
    max: parseInt(process.env.CACHE_MAX || '1000', 10), // Max 1000 items
    checkPeriod: parseInt(process.env.CACHE_CHECK_PERIOD || '600', 10) // Check every 10 minutes
  },

  // Monitoring Configuration
  monitoring: {
    healthCheck: {
      enabled: process.env.HEALTH_CHECK_ENABLED !== 'false',
      path: process.env.HEALTH_CHECK_PATH || '/health'
    }
  }
} as const

// =============================================================================
// CONFIGURATION VALIDATION
// =============================================================================

export function validateConfig(): void {
  // Validate port
  if (config.server.port < 1 || config.server.port > 65535) {
    throw new Error('Invalid port number. Must be between 1 and 65535.')
  }

  // Validate database URL
  if (!/^postgres(ql)?:\/\//.test(config.database.url)) {
    throw new Error('DATABASE_URL must be a valid PostgreSQL connection string.')
  }

  if (config.cache.ttl < 1 || config.cache.listsTtl < 1) {
    throw new Error('Cache TTLs must be positive numbers of seconds.')
  }

  if (config.cache.driver === 'redis' && !config.redis.url.startsWith('redis')) {
    throw new Error('REDIS_URL must be a valid Redis connection string when CACHE_DRIVER=redis.')
  }
}

// =============================================================================
// EXPORTS
// =============================================================================

export default config
