import * as dotenv from 'dotenv';
import * as Joi from 'joi';
import os from 'os';
import path from 'path';

// Load environment variables silently
dotenv.config({ debug: false });

export const DEFAULT_DATASET_URL =
  'https://drive.google.com/uc?export=download&id=1ExK0Dn6SgEzhw9-gE9kOmHXKWIZ2TEHv';

interface EnvVars {
  PORT: number;
  NODE_ENV: 'development' | 'production' | 'test';
  ENABLE_SECURITY_MIDDLEWARE: boolean;
  BYPASS_IPS: string;
  TRUST_PROXY: number;
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  CORS_ALLOWED_ORIGINS: string;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'debug';
  DATASET_URL: string;
  DATASET_PATH: string;
  DATASET_LAYER?: string;
  DATASET_HAZARD_FIELD: string;
  DATASET_DOWNLOAD_TIMEOUT_MS: number;
  PRELOAD_DATASET: boolean;
  GEOLOCATION_BASE_URL: string;
  GEOLOCATION_TIMEOUT_MS: number;
  MAP_DIR: string;
  MAP_CACHE_SIZE: number;
  MAP_TTL_MS: number;
}

// Define validation schema
const envSchema = Joi.object<EnvVars>({
  // Server
  PORT: Joi.number().port().default(5000),
  NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),

  // Security
  ENABLE_SECURITY_MIDDLEWARE: Joi.boolean().default(false),
  BYPASS_IPS: Joi.string().default('127.0.0.1,::1,localhost'),
  // Number of reverse proxies in front of the app whose X-Forwarded-For is trusted
  TRUST_PROXY: Joi.number().integer().min(0).default(0),

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: Joi.number().default(60000),
  RATE_LIMIT_MAX_REQUESTS: Joi.number().default(100),

  // CORS
  CORS_ALLOWED_ORIGINS: Joi.string().default('*'),

  // Logging
  LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'debug').default('info'),

  // Hazard dataset
  DATASET_URL: Joi.string().uri({ scheme: ['http', 'https'] }).default(DEFAULT_DATASET_URL),
  DATASET_PATH: Joi.string().default(path.join(os.tmpdir(), 'revised_map_data.gpkg')),
  DATASET_LAYER: Joi.string().optional(),
  DATASET_HAZARD_FIELD: Joi.string().default('SOIL_FLOOD_HAZARD'),
  DATASET_DOWNLOAD_TIMEOUT_MS: Joi.number().min(1000).default(300000),
  PRELOAD_DATASET: Joi.boolean().default(true),

  // Geolocation
  GEOLOCATION_BASE_URL: Joi.string().uri({ scheme: ['http', 'https'] }).default('https://get.geojs.io'),
  GEOLOCATION_TIMEOUT_MS: Joi.number().min(100).default(5000),

  // Maps
  MAP_DIR: Joi.string().default(path.join(__dirname, '../../maps')),
  MAP_CACHE_SIZE: Joi.number().min(1).max(10000).default(100),
  MAP_TTL_MS: Joi.number().min(1000).default(600000),
}).unknown();

export type Config = ReturnType<typeof buildConfig>;

function buildConfig(envVars: EnvVars) {
  return {
    port: envVars.PORT,
    nodeEnv: envVars.NODE_ENV,
    isProduction: envVars.NODE_ENV === 'production',
    isDevelopment: envVars.NODE_ENV === 'development',
    isTest: envVars.NODE_ENV === 'test',

    security: {
      enableMiddleware: envVars.ENABLE_SECURITY_MIDDLEWARE,
      bypassIPs: envVars.BYPASS_IPS.split(',').map(ip => ip.trim()),
      trustProxy: envVars.TRUST_PROXY,
    },

    rateLimit: {
      windowMs: envVars.RATE_LIMIT_WINDOW_MS,
      maxRequests: envVars.RATE_LIMIT_MAX_REQUESTS,
    },

    cors: {
      allowedOrigins: envVars.CORS_ALLOWED_ORIGINS.split(',').map(origin => origin.trim()),
    },

    logging: {
      level: envVars.LOG_LEVEL,
    },

    dataset: {
      url: envVars.DATASET_URL,
      path: path.resolve(envVars.DATASET_PATH),
      layer: envVars.DATASET_LAYER,
      hazardField: envVars.DATASET_HAZARD_FIELD,
      downloadTimeoutMs: envVars.DATASET_DOWNLOAD_TIMEOUT_MS,
      preload: envVars.PRELOAD_DATASET,
    },

    geolocation: {
      baseUrl: envVars.GEOLOCATION_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: envVars.GEOLOCATION_TIMEOUT_MS,
    },

    maps: {
      dir: path.resolve(envVars.MAP_DIR),
      cacheSize: envVars.MAP_CACHE_SIZE,
      ttlMs: envVars.MAP_TTL_MS,
    },
  };
}

/**
 * Validates an environment map and builds the service configuration from it.
 * Throws when a variable is present but invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
  const { error, value } = envSchema.validate(env);

  if (error) {
    throw new Error(`Config validation error: ${error.message}`);
  }

  return buildConfig(value);
}

// Export configuration
export const config = loadConfig(process.env);
