/**
 * portcullis - control-plane request gatekeeper
 * Programmatic API exports
 */

export * from './gateway/index.js';
