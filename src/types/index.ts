/**
 * Type definitions for the vector database client
 */

export type { Collection } from './collections.js';
