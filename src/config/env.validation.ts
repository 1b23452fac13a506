import Joi from 'joi';

export const DEFAULT_UPSTREAM_ENDPOINT = 'https://integrate.api.nvidia.com/v1';

export const envValidationSchema = Joi.object({
  PORT: Joi.number().port().default(8081),
  LOG_LEVEL: Joi.string().valid('fatal', 'error', 'warn', 'info', 'debug', 'trace').default('info'),
  // Max JSON body size in bytes (default 1MB) enforced by Fastify.
  PROXY_BODY_LIMIT: Joi.number().integer().min(1024).default(1048576),
  // Directory holding users.json, sessions.json and credentials.json.
  DATA_DIR: Joi.string().default('./data'),
  // 0 keeps sessions valid until logout.
  SESSION_TTL_SECONDS: Joi.number().integer().min(0).default(86400),
  PASSWORD_HASH_ROUNDS: Joi.number().integer().min(4).max(15).default(10),
  // Used for credentials added without their own endpoint.
  UPSTREAM_DEFAULT_ENDPOINT: Joi.string()
    .uri({ scheme: ['http', 'https'] })
    .default(DEFAULT_UPSTREAM_ENDPOINT),
  // Per-call timeout in ms; an expired call counts as a transient failure.
  UPSTREAM_TIMEOUT: Joi.number().integer().min(100).default(60000),
  POOL_FAILURE_THRESHOLD: Joi.number().integer().min(1).max(100).default(3),
  POOL_COOLDOWN_BASE_SECONDS: Joi.number().integer().min(1).default(30),
  POOL_COOLDOWN_MAX_SECONDS: Joi.number()
    .integer()
    .min(1)
    .default(900)
    .custom((value: number, helpers) => {
      const base = helpers.state.ancestors[0]?.POOL_COOLDOWN_BASE_SECONDS;
      if (typeof base === 'number' && value < base) {
        return helpers.error('any.custom');
      }
      return value;
    }, 'Cooldown bounds validation')
    .messages({
      'any.custom': 'POOL_COOLDOWN_MAX_SECONDS must not be lower than POOL_COOLDOWN_BASE_SECONDS',
    }),
});
