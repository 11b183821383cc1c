/**
 * Type definitions for Collections API
 */

/**
 * A collection as decoded from the server. Each field is present only when
 * the response carried it as a string.
 */
export interface Collection {
  id?: string;
  name?: string;
}
