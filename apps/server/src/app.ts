// =============================================================================
// EXPRESS APPLICATION SETUP
// =============================================================================

import express, { Application, Request, Response, NextFunction } from 'express'
import cors from 'cors'
import helmet from 'helmet'
import morgan from 'morgan'
import compression from 'compression'
import rateLimit from 'express-rate-limit'
import { randomUUID } from 'crypto'
import type { CatalogDatabase } from '@catalog/database'
import { config } from './config'
import { TranslationController } from './controllers/translation.controller'
import { asyncHandler, errorHandler, notFoundHandler } from './middleware/error.middleware'
import { createTranslationRouter } from './routes/translation.routes'
import type { TranslationService } from './services/translation.service'
import type { CacheStore } from './types/cache.types'
import { RateLimitError } from './utils/errors'
import { Logger, morganStream } from './utils/logger'

export interface AppDependencies {
  db: CatalogDatabase
  cache: CacheStore
  translations: TranslationService
}

// =============================================================================
// APPLICATION INITIALIZATION
// =============================================================================

export function createApp(deps: AppDependencies): Application {
  const app: Application = express()

  // =============================================================================
  // SECURITY MIDDLEWARE
  // =============================================================================

  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
        objectSrc: ["'none'"],
        frameSrc: ["'none'"]
      }
    },
    crossOriginEmbedderPolicy: false
  }))

  app.use(cors({
    origin: [...config.cors.origin],
    credentials: config.cors.credentials,
    optionsSuccessStatus: config.cors.optionsSuccessStatus,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
    allowedHeaders: [
      'Origin',
      'X-Requested-With',
      'Content-Type',
      'Accept',
      'Cache-Control'
    ]
  }))

  // Rate limiting
  const limiter = rateLimit({
    windowMs: config.rateLimit.windowMs,
    max: config.rateLimit.max,
    standardHeaders: config.rateLimit.standardHeaders,
    legacyHeaders: config.rateLimit.legacyHeaders,
    // Answered and logged by the error handler
    handler: (_req: Request, _res: Response, next: NextFunction) => {
      next(new RateLimitError(config.rateLimit.message))
    }
  })

  app.use('/api/', limiter)

  // =============================================================================
  // GENERAL MIDDLEWARE
  // =============================================================================

  app.use(compression())
  app.use(express.json({ limit: '1mb' }))
  app.use(express.urlencoded({ extended: true, limit: '1mb' }))

  // Request logging
  if (config.server.isDevelopment) {
    app.use(morgan('dev'))
  } else if (!config.server.isTest) {
    app.use(morgan(config.logging.format, { stream: morganStream }))
  }

  // Request ID and timing
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.get('X-Request-ID') || randomUUID()
    res.locals.requestId = requestId
    res.locals.startTime = Date.now()

    res.setHeader('X-Request-ID', requestId)

    next()
  })

  // =============================================================================
  // HEALTH CHECK ENDPOINTS
  // =============================================================================

  if (config.monitoring.healthCheck.enabled) {
    app.get(config.monitoring.healthCheck.path, (req: Request, res: Response) => {
      res.status(200).json({
        success: true,
        data: {
          status: 'healthy',
          timestamp: new Date().toISOString(),
          uptime: process.uptime(),
          environment: config.server.env,
          version: process.env.npm_package_version || '1.0.0'
        }
      })
    })

    app.get('/api/health/detailed', asyncHandler(async (req: Request, res: Response) => {
      const [database, cacheHealthy] = await Promise.all([
        deps.db.healthCheck(),
        deps.cache.ping().catch((error: unknown) => {
          Logger.logError(error instanceof Error ? error : new Error(String(error)), 'Health Check')
          return false
        })
      ])
      const healthy = database.status === 'healthy' && cacheHealthy

      res.status(healthy ? 200 : 503).json({
        success: healthy,
        data: {
          status: healthy ? 'healthy' : 'unhealthy',
          timestamp: new Date().toISOString(),
          uptime: process.uptime(),
          environment: config.server.env,
          services: {
            database: database.status,
            cache: cacheHealthy ? 'healthy' : 'unhealthy',
            cacheDriver: deps.cache.name
          },
          memory: {
            used: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
            total: Math.round(process.memoryUsage().heapTotal / 1024 / 1024)
          }
        }
      })
    }))
  }

  // =============================================================================
  // API ROUTES
  // =============================================================================

  app.get('/api', (req: Request, res: Response) => {
    res.json({
      success: true,
      data: {
        message: 'Translation Catalog API',
        version: '1.0.0',
        environment: config.server.env,
        timestamp: new Date().toISOString()
      }
    })
  })

  app.use('/api', createTranslationRouter(new TranslationController(deps.translations)))

  // =============================================================================
  // ERROR HANDLING
  // =============================================================================

  app.all('*', notFoundHandler)
  app.use(errorHandler)

  return app
}

// =============================================================================
// EXPORTS
// =============================================================================

export default createApp
