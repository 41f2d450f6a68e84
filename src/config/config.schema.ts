import * as Joi from 'joi';

export const configValidationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().port().default(3000),
  HOST: Joi.string().default('127.0.0.1'),

  // Sessions and the reaper
  SESSION_IDLE_TIMEOUT_MS: Joi.number().integer().positive().default(7200000),
  REAPER_INTERVAL_MS: Joi.number().integer().positive().default(5000),

  // Event retention
  EVENT_SLIDING_EXPIRATION_MS: Joi.number().integer().positive().default(1800000),
  EVENT_ABSOLUTE_EXPIRATION_MS: Joi.number().integer().positive().default(7200000),

  // Streams
  POLLING_RETRY_INTERVAL_MS: Joi.number().integer().min(0).default(1000),
  STREAM_RETRY_INTERVAL_MS: Joi.number().integer().min(0).default(3000),
  RESPONSE_MODE: Joi.string().valid('sse', 'json').default('sse'),
  PAGE_SIZE: Joi.number().integer().positive().default(50),

  // Host/Origin checks
  DNS_REBINDING_PROTECTION: Joi.boolean().default(true),
  ALLOWED_HOSTS: Joi.string().allow('').default(''),

  // Storage
  STORE_BACKEND: Joi.string().valid('memory', 'redis').default('memory'),
  REDIS_ENABLED: Joi.boolean().default(false),
  REDIS_HOST: Joi.string().default('localhost'),
  REDIS_PORT: Joi.number().port().default(6379),
  REDIS_PASSWORD: Joi.string().allow('').default(''),
  REDIS_DB: Joi.number().integer().min(0).default(0),
  REDIS_KEY_PREFIX: Joi.string().default('mcp:'),

  // Request logging
  LOG_HTTP_REQUESTS: Joi.boolean().default(true),
  LOG_FORMAT: Joi.string().valid('json', 'text').default('json'),
}).custom((value: { STORE_BACKEND: string; REDIS_ENABLED: boolean }, helpers) => {
  if (value.STORE_BACKEND === 'redis' && !value.REDIS_ENABLED) {
    return helpers.message({ custom: 'STORE_BACKEND=redis requires REDIS_ENABLED=true' });
  }
  return value;
});
