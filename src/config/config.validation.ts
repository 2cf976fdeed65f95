import * as Joi from "joi";

export const configValidation = Joi.object({
  NODE_ENV: Joi.string()
    .valid("development", "production", "test")
    .default("development"),
  PORT: Joi.number().default(4000),

  // Database
  DATABASE_URL: Joi.string().required(),
  DB_POOL_SIZE: Joi.number().integer().min(1).default(10),
  DB_IDLE_TIMEOUT: Joi.number().integer().min(0).default(20),
  DB_CONNECT_TIMEOUT: Joi.number().integer().min(1).default(10),

  // Redis (optional - session cache, cross-instance locks and the sweep queue)
  REDIS_HOST: Joi.string().allow("").optional(),
  REDIS_PORT: Joi.number().default(6379),
  REDIS_PASSWORD: Joi.string().allow("").optional(),

  // USSD dialog
  USSD_SESSION_IDLE_TIMEOUT_SECONDS: Joi.number().integer().min(10).default(180),
  USSD_MAX_VALIDATION_RETRIES: Joi.number().integer().min(0).default(3),
  USSD_MAX_RESPONSE_LENGTH: Joi.number().integer().min(20).default(182),
  USSD_INPUT_DELIMITER: Joi.string().length(1).default("*"),
  USSD_IGNORED_TOKENS: Joi.string().allow("").default("98"),
  USSD_EXIT_INPUTS: Joi.string().allow("").default("00"),
  USSD_SHOW_EXPIRED_NOTICE: Joi.boolean().default(true),
  USSD_MENU_TREE_PATH: Joi.string().default("config/menu-tree.json"),
  USSD_LISTING_PAGE_SIZE: Joi.number().integer().min(1).max(8).default(3),

  // Dependency bounds
  DEPENDENCY_TIMEOUT_MS: Joi.number().integer().min(100).default(2000),
  SESSION_LOCK_TTL_MS: Joi.number().integer().min(100).default(5000),
  SESSION_LOCK_WAIT_MS: Joi.number().integer().min(0).default(3000),
  SESSION_SWEEP_INTERVAL_SECONDS: Joi.number().integer().min(5).default(60),

  // Rate limiting per caller
  THROTTLE_TTL_MS: Joi.number().integer().min(1000).default(60000),
  THROTTLE_LIMIT: Joi.number().integer().min(1).default(30),

  // Admin statistics and contact routing endpoints
  ADMIN_API_TOKEN: Joi.string().allow("").optional(),
});
