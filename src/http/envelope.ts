/**
 * Response envelope construction and serialization.
 */
import type { ErrorEnvelope, ResponseEnvelope, SuccessEnvelope, XmppRecords } from '../types/dto.js';
import { EncodingError } from '../errors.js';

export const API_VERSION = '1.0';

/**
 * Build a success envelope. Field order determines the serialized bytes.
 */
export function successEnvelope(records: XmppRecords): SuccessEnvelope {
  return {
    apiVersion: API_VERSION,
    data: {
      servers: records.servers,
      alternatives: records.alternatives,
    },
  };
}

export function errorEnvelope(code: number, message: string): ErrorEnvelope {
  return {
    apiVersion: API_VERSION,
    error: { code, message },
  };
}

/**
 * Serialize an envelope to compact JSON.
 * @throws EncodingError if serialization fails
 */
export function encodeEnvelope(envelope: ResponseEnvelope): string {
  try {
    return JSON.stringify(envelope);
  } catch (error) {
    throw new EncodingError('Failed to encode response envelope', error);
  }
}

/** Pre-serialized 500 body, written verbatim */
export const INTERNAL_SERVER_ERROR_BODY = encodeEnvelope(
  errorEnvelope(500, 'An internal server error has occured.')
);

/** Pre-serialized 404 body, written verbatim */
export const NOT_FOUND_BODY = encodeEnvelope(
  errorEnvelope(404, 'The given domain name does not contain any relevant records.')
);
