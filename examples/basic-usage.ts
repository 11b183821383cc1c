/**
 * Basic usage example: heartbeat, create a collection, fetch it back
 *
 * This example shows how to:
 * - Check that the server is reachable
 * - Create a collection by name
 * - Fetch the raw response and decode it
 */

import { VectorDBClient } from '../src/index.js';

// Initialize client
const client = new VectorDBClient({
  baseUrl: process.env.VECTORDB_BASE_URL || 'http://localhost:8000',
});

const COLLECTION_NAME = process.env.COLLECTION_NAME || 'TestCollection';

async function main() {
  // 1. Heartbeat
  await client.heartbeat();

  // 2. Create collection
  console.log('\n\nCreate Collection');
  if (await client.collections.create(COLLECTION_NAME)) {
    console.log('Collection created successfully.');
  } else {
    console.log('Failed to create collection.');
  }

  // 3. Get collection
  const response = await client.collections.get(COLLECTION_NAME);
  console.log('\n\nGet Collection');
  if (response.length > 0) {
    const collection = client.collections.parse(response.toString());
    if (collection.id !== undefined && collection.name !== undefined) {
      console.log(`Collection ID: ${collection.id}`);
      console.log(`Collection Name: ${collection.name}`);
    }
  } else {
    console.log('Collection not found or an error occurred.');
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
