import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

const splitList = (value: string) =>
  value
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);

export const config = {
  port: parseInt(process.env.PORT || '3000'),
  nodeEnv: process.env.NODE_ENV || 'development',

  database: {
    url: process.env.DATABASE_URL || '',
    poolMax: parseInt(process.env.DATABASE_POOL_MAX || '10'),
  },

  jwt: {
    // JWT_ACCESS_SECRET takes precedence, falls back to JWT_SECRET
    accessSecret: process.env.JWT_ACCESS_SECRET || process.env.JWT_SECRET || '',
  },

  permissions: {
    adminRoles: splitList(
      process.env.ADMIN_ROLES || 'System Administrator,Repository Administrator'
    ),
  },

  i18n: {
    defaultLocale: process.env.DEFAULT_LOCALE || 'en',
    localesDir: path.resolve(__dirname, '../../locales'),
  },

  itemTypes: {
    urlPrefix: process.env.ITEMTYPES_URL_PREFIX || '/itemtypes',
    templatesDir: path.resolve(__dirname, '../../templates'),
    templates: {
      register: process.env.ITEMTYPES_REGISTER_TEMPLATE || 'itemtypes/register.ejs',
      property: process.env.ITEMTYPES_PROPERTY_TEMPLATE || 'itemtypes/property.ejs',
      mapping: process.env.ITEMTYPES_MAPPING_TEMPLATE || 'itemtypes/mapping.ejs',
      error: process.env.ITEMTYPES_ERROR_TEMPLATE || 'itemtypes/error.ejs',
    },
  },

  cors: {
    origin: process.env.CORS_ORIGIN || 'http://localhost:3001',
  },

  rateLimit: {
    windowMs: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '900000'), // 15 minutes
    max: parseInt(process.env.RATE_LIMIT_MAX || '300'),
  },
};

export type AppConfig = typeof config;

// Validate required environment variables. Called at startup, not on import,
// so tests and scripts can load modules that read the config.
export function validateConfig(): void {
  const requiredEnvVars = ['DATABASE_URL'];

  for (const envVar of requiredEnvVars) {
    if (!process.env[envVar]) {
      throw new Error(`Missing required environment variable: ${envVar}`);
    }
  }

  if (!process.env.JWT_SECRET && !process.env.JWT_ACCESS_SECRET) {
    throw new Error('Missing required environment variable: JWT_SECRET or JWT_ACCESS_SECRET must be set');
  }

  if (config.nodeEnv === 'production') {
    if (config.jwt.accessSecret.length < 32) {
      throw new Error('JWT secret must be at least 32 characters in production');
    }

    if (config.cors.origin === '*') {
      throw new Error('CORS origin cannot be "*" in production. Set CORS_ORIGIN to your frontend domain(s).');
    }
  }
}
