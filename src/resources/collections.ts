/**
 * Collections resource implementation
 */

import type { BaseClient } from '../base-client.js';
import type { ResponseAccumulator } from '../accumulator.js';
import type { Collection } from '../types/collections.js';
import { parseCollectionResponse } from '../parse.js';

// Characters that break the interpolated path or payload
const UNSAFE_NAME = /["\\/\u0000-\u001f]/;

/**
 * Collections resource for creating and fetching collections
 */
export class CollectionsResource {
  constructor(private client: BaseClient) {}

  /**
   * Create a new collection
   *
   * The payload is `{"name":"<name>"}` with the name inserted verbatim, so a
   * name containing a quote or backslash produces invalid JSON.
   *
   * @param name - Collection name
   * @returns true when the request was exchanged, whatever the HTTP status
   *
   * @example
   * ```typescript
   * if (await client.collections.create('TestCollection')) {
   *   console.log('Collection created successfully.');
   * }
   * ```
   */
  async create(name: string): Promise<boolean> {
    this.checkName(name);

    const payload = `{"name":"${name}"}`;
    const result = await this.client.request('POST', '/api/v1/collections', {
      body: payload,
      headers: { 'Content-Type': 'application/json' },
    });

    return result.ok;
  }

  /**
   * Fetch the raw response for a collection
   *
   * Always resolves an accumulator. An empty one means nothing arrived; a
   * non-empty one may still fail to decode.
   *
   * @param name - Collection name, inserted verbatim into the path
   *
   * @example
   * ```typescript
   * const response = await client.collections.get('TestCollection');
   * if (response.length > 0) {
   *   const collection = client.collections.parse(response.toString());
   * }
   * ```
   */
  async get(name: string): Promise<ResponseAccumulator> {
    this.checkName(name);

    const sink = this.client.createAccumulator();
    await this.client.request('GET', `/api/v1/collections/${name}`, { sink });

    return sink;
  }

  /**
   * Decode a collection response body, logging through this client's logger
   */
  parse(body: string): Collection {
    return parseCollectionResponse(body, this.client.logger);
  }

  private checkName(name: string): void {
    if (UNSAFE_NAME.test(name)) {
      this.client.logger.warn(
        `Collection name ${JSON.stringify(name)} contains characters that are sent unescaped`
      );
    }
  }
}
