/**
 * Gatekeeper module exports
 */

export * from './config.js';
export * from './errors.js';
export * from './types.js';
export * from './requestId.js';
export * from './logger.js';
export * from './token.js';
export * from './credentials.js';
export * from './auth.js';
export * from './authMiddleware.js';
export * from './permissions.js';
export * from './rateLimit.js';
export * from './security.js';
export * from './server.js';
