export { logger, setLogLevel } from './logger.js';
export { apiRateLimiter } from './rate-limiter.js';
export * from './errors.js';
export { usernameSchema, validateUsername, type UsernameValidation } from './validation.js';
