/**
 * Main vector database client
 */

import { BaseClient, type BaseClientConfig } from './base-client.js';
import { CollectionsResource } from './resources/index.js';

/**
 * Client for the collection endpoints of a vector database HTTP API.
 *
 * Every call performs exactly one request. Failures are logged and reported
 * as `false` or an empty response, never thrown.
 *
 * @example
 * ```typescript
 * const client = new VectorDBClient({ baseUrl: 'http://localhost:8000' });
 *
 * await client.heartbeat();
 * await client.collections.create('TestCollection');
 *
 * const response = await client.collections.get('TestCollection');
 * const collection = client.collections.parse(response.toString());
 * ```
 */
export class VectorDBClient extends BaseClient {
  /** Collections resource for creating and fetching collections */
  public readonly collections: CollectionsResource;

  constructor(config: BaseClientConfig = {}) {
    super(config);

    this.collections = new CollectionsResource(this);
  }

  /**
   * Check that the server answers at all.
   *
   * Only the exchange is checked: a 500 from `/heartbeat` still counts as alive.
   */
  async heartbeat(): Promise<boolean> {
    const result = await this.request('GET', '/heartbeat');
    if (result.ok) {
      this.logger.info('HEARTBEAT: Success');
    }
    return result.ok;
  }
}

export default VectorDBClient;
