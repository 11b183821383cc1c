/**
 * Resource exports
 */

export { CollectionsResource } from './collections.js';
