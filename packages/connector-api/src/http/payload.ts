/**
 * Payload decoding
 *
 * Sources return either a bare JSON array of objects or an Overpass
 * envelope whose `elements` hold the records.
 */

import { z } from 'zod';
import { FetchError, type RawRecord } from '@geosync/core';

const recordSchema = z.record(z.unknown());

export const recordArraySchema = z.array(recordSchema);

export const overpassEnvelopeSchema = z
  .object({
    elements: recordArraySchema,
  })
  .passthrough();

export const payloadSchema = z.union([recordArraySchema, overpassEnvelopeSchema]);

export type SourcePayload = z.infer<typeof payloadSchema>;

function describeShape(payload: unknown): string {
  if (payload === null) return 'null';
  if (Array.isArray(payload)) return 'an array containing non-object items';
  if (typeof payload === 'object') return 'an object without an "elements" array of objects';
  return `a ${typeof payload}`;
}

/**
 * Extract the record collection from a decoded response body
 * @throws FetchError (MALFORMED_RESPONSE, terminal) for any other shape
 */
export function decodeRecords(payload: unknown): RawRecord[] {
  const result = payloadSchema.safeParse(payload);
  if (!result.success) {
    throw new FetchError({
      code: 'MALFORMED_RESPONSE',
      message: `Unexpected response shape: got ${describeShape(payload)}`,
      retryable: false,
      suggestion: 'The source must return a JSON array of objects or an object with an "elements" array.',
    });
  }

  return Array.isArray(result.data) ? result.data : result.data.elements;
}
