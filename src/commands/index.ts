/**
 * CLI commands
 */

export { createServeCommand, buildServeConfig } from './serve.js';
export { createTokenCommand, issueTokenFromOptions } from './token.js';
