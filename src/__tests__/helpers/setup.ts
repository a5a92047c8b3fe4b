/**
 * Jest Test Setup
 * Global test configuration and setup
 */

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.MONGODB_URI = process.env.MONGODB_URI || 'mongodb://localhost:27017/site-audit-test';
process.env.CRAWL_DELAY_FLOOR_MS = '0';
process.env.CIRCUIT_BREAKER_ENABLED = 'false';
