/**
 * Decoding of collection responses
 */

import type { Collection } from './types/collections.js';
import { DecodeError } from './exceptions.js';
import { ConsoleLogger, type Logger } from './logger.js';

const defaultLogger = new ConsoleLogger();

/**
 * Parse JSON text, reporting the offset where the parser gave up.
 *
 * Text after a complete value is ignored: `{"id":"1"} junk` decodes as `{"id":"1"}`.
 * Duplicate keys keep the last value.
 */
export function decodeJson(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    // Not every parser message carries an offset
    const match = /at position (\d+)/.exec(message);
    const position = match ? Number(match[1]) : undefined;

    if (position !== undefined && position > 0 && message.includes('after JSON')) {
      return decodeJson(text.slice(0, position));
    }
    throw new DecodeError(message, position);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode a collection response body.
 *
 * Keys match exactly and case-sensitively; `id` and `name` are copied only
 * when they are strings. Invalid JSON is logged, with the text from the failing
 * position when the parser reports one, and yields an empty collection.
 *
 * @example
 * ```typescript
 * parseCollectionResponse('{"id":123,"name":"demo"}'); // { name: 'demo' }
 * ```
 */
export function parseCollectionResponse(body: string, logger: Logger = defaultLogger): Collection {
  const collection: Collection = {};

  let json: unknown;
  try {
    json = decodeJson(body);
  } catch (error) {
    if (!(error instanceof DecodeError)) {
      throw error;
    }
    if (error.position !== undefined) {
      logger.error(`Error before: ${body.slice(error.position)}`);
    } else {
      logger.error(`Error decoding JSON: ${error.message}`);
    }
    return collection;
  }

  if (!isRecord(json)) {
    return collection;
  }

  if (typeof json.id === 'string') {
    collection.id = json.id;
  }
  if (typeof json.name === 'string') {
    collection.name = json.name;
  }

  return collection;
}
