import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { errorHandler } from './middleware/error.middleware';
import { optionalAuth } from './middleware/auth.middleware';
import { localeMiddleware } from './i18n/locale';
import { logger } from './utils/logger';
import type { AppDependencies } from './types/dependencies';

// Import routes
import { createItemTypeRouter } from './item-types/item-type.routes';
import { createPropertyRouter } from './properties/property.routes';
import { createMappingRouter } from './mappings/mapping.routes';
import { createHealthRouter } from './health/health.routes';

export function createApp(deps: AppDependencies): Application {
  const app = express();

  // Trust proxy (required behind a load balancer / reverse proxy for correct rate limiting and IP detection)
  app.set('trust proxy', 1);

  // Security middleware
  app.use(helmet());

  const allowedOrigins = deps.corsOrigin.split(',').map((o) => o.trim());
  app.use(cors({
    origin: allowedOrigins.includes('*') ? '*' : allowedOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Accept-Language'],
  }));

  // Rate limiting
  const limiter = rateLimit({
    windowMs: deps.rateLimit.windowMs,
    max: deps.rateLimit.max,
    message: 'Too many requests from this IP, please try again later',
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use(deps.urlPrefix, limiter);

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  app.use(localeMiddleware(deps.defaultLocale));
  app.use(optionalAuth(deps.accessSecret));

  // Request logging (development only)
  if (deps.nodeEnv === 'development') {
    app.use((req, _res, next) => {
      logger.debug(`${req.method} ${req.path}`);
      next();
    });
  }

  app.use('/health', createHealthRouter(deps.records));

  app.use(`${deps.urlPrefix}/property`, createPropertyRouter(deps));
  app.use(`${deps.urlPrefix}/mapping`, createMappingRouter(deps));
  app.use(deps.urlPrefix, createItemTypeRouter(deps));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({
      success: false,
      message: 'Route not found',
    });
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
