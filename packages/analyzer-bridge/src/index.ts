/**
 * Analyzer Bridge - TypeScript <-> analyzer subprocess communication layer
 *
 * Manages the analyzer subprocess lifecycle and the newline-delimited
 * JSON-RPC protocol spoken over its stdin/stdout.
 */

export * from './types.js';
export * from './bridge.js';
export * from './constants.js';
export * from './process.js';
export { BridgeResponseError, type ResponseValidator } from './response-validator.js';
