import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Database
  MONGODB_URI: process.env.MONGODB_URI || 'mongodb://localhost:27017/site-audit',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Crawl defaults (overridable per audit request)
  CRAWL_USER_AGENT: process.env.CRAWL_USER_AGENT || 'SiteAuditBot/1.0',
  CRAWL_MAX_DEPTH: parseInt(process.env.CRAWL_MAX_DEPTH || '3', 10),
  CRAWL_MAX_PAGES: parseInt(process.env.CRAWL_MAX_PAGES || '500', 10),
  CRAWL_CONCURRENCY: parseInt(process.env.CRAWL_CONCURRENCY || '4', 10),
  CRAWL_PER_HOST_CONCURRENCY: parseInt(process.env.CRAWL_PER_HOST_CONCURRENCY || '2', 10),
  CRAWL_DELAY_FLOOR_MS: parseInt(process.env.CRAWL_DELAY_FLOOR_MS || '1000', 10),
  CRAWL_FETCH_TIMEOUT_MS: parseInt(process.env.CRAWL_FETCH_TIMEOUT_MS || '10000', 10),
  CRAWL_TIME_LIMIT_MS: parseInt(process.env.CRAWL_TIME_LIMIT_MS || '0', 10), // 0 = no deadline
  CRAWL_TRAILING_SLASH: process.env.CRAWL_TRAILING_SLASH || 'strip',

  // Resilience
  CRAWL_MAX_RETRIES: parseInt(process.env.CRAWL_MAX_RETRIES || '2', 10),
  CRAWL_RETRY_BACKOFF_BASE_MS: parseInt(process.env.CRAWL_RETRY_BACKOFF_BASE_MS || '500', 10),

  // Circuit Breaker (per crawled host)
  CIRCUIT_BREAKER_ENABLED: process.env.CIRCUIT_BREAKER_ENABLED === 'true', // Default false
  CIRCUIT_BREAKER_ERROR_THRESHOLD: parseInt(process.env.CIRCUIT_BREAKER_ERROR_THRESHOLD || '50', 10), // 50%
  CIRCUIT_BREAKER_RESET_TIMEOUT: parseInt(process.env.CIRCUIT_BREAKER_RESET_TIMEOUT || '30000', 10), // 30 seconds
  CIRCUIT_BREAKER_MIN_REQUESTS: parseInt(process.env.CIRCUIT_BREAKER_MIN_REQUESTS || '5', 10),
} as const;

export default env;
