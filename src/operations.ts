/**
 * Standalone operations against a base URL.
 *
 * Each call builds its own client, so no state is shared between calls. The
 * base URL is used as given and no VECTORDB_* variable is read. Nothing is
 * thrown: unusable options are logged and reported like a failed request.
 */

import { ResponseAccumulator } from './accumulator.js';
import type { BaseClientConfig } from './base-client.js';
import { VectorDBClient } from './client.js';
import { ConsoleLogger } from './logger.js';

type OperationConfig = Omit<BaseClientConfig, 'baseUrl' | 'useEnv'>;

function createClient(baseUrl: string, config: OperationConfig): VectorDBClient | null {
  try {
    return new VectorDBClient({ ...config, baseUrl, useEnv: false });
  } catch (error) {
    const logger = config.logger || new ConsoleLogger();
    logger.error(`Cannot create client for ${baseUrl}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

/** GET `{baseUrl}/heartbeat`; true when a response was exchanged */
export async function probeLiveness(baseUrl: string, config: OperationConfig = {}): Promise<boolean> {
  const client = createClient(baseUrl, config);
  return client ? client.heartbeat() : false;
}

/** POST `{baseUrl}/api/v1/collections`; true when a response was exchanged */
export async function createCollection(
  baseUrl: string,
  collectionName: string,
  config: OperationConfig = {}
): Promise<boolean> {
  const client = createClient(baseUrl, config);
  return client ? client.collections.create(collectionName) : false;
}

/** GET `{baseUrl}/api/v1/collections/{collectionName}`; the raw body, possibly empty */
export async function getCollection(
  baseUrl: string,
  collectionName: string,
  config: OperationConfig = {}
): Promise<ResponseAccumulator> {
  const client = createClient(baseUrl, config);
  return client ? client.collections.get(collectionName) : new ResponseAccumulator();
}
