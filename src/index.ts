/**
 * TypeScript client for the collection endpoints of a vector database HTTP API
 *
 * @packageDocumentation
 */

// Main client
export { VectorDBClient } from './client.js';
export { VectorDBClient as default } from './client.js';

// Base client, config and transport result
export { BaseClient } from './base-client.js';
export type { BaseClientConfig, TransportResult } from './base-client.js';

// Standalone operations
export { probeLiveness, createCollection, getCollection } from './operations.js';
export { parseCollectionResponse, decodeJson } from './parse.js';

// Response buffer
export { ResponseAccumulator } from './accumulator.js';
export type { AccumulatorOptions } from './accumulator.js';

// Logging
export { ConsoleLogger } from './logger.js';
export type { Logger } from './logger.js';

// Exceptions
export {
  VectorDBError,
  TransportError,
  AllocationError,
  DecodeError,
  ConfigurationError,
} from './exceptions.js';

// All type definitions
export type { Collection } from './types/index.js';

// Version
export { VERSION } from './version.js';
