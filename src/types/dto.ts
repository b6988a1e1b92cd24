/**
 * DTO types for the XMPP connection metadata API.
 * These are the shapes serialized into the JSON response envelope.
 */

/**
 * One SRV record of the xmpp-client service.
 */
export interface ServerRecord {
  target: string;
  port: number;
  priority: number;
  weight: number;
}

/**
 * One alternative connection method advertised in _xmppconnect TXT records
 * (e.g. name "websocket", value "wss://example.com/ws").
 */
export interface AlternativeRecord {
  name: string;
  value: string;
}

/**
 * Sorted connection metadata for a domain.
 */
export interface XmppRecords {
  servers: ServerRecord[];
  alternatives: AlternativeRecord[];
}

/** API version carried by every envelope */
export type ApiVersion = '1.0';

export interface SuccessEnvelope {
  apiVersion: ApiVersion;
  data: XmppRecords;
}

export interface ErrorEnvelope {
  apiVersion: ApiVersion;
  error: {
    code: number;
    message: string;
  };
}

/**
 * Top-level JSON wrapper. Carries either data or an error, never both.
 */
export type ResponseEnvelope = SuccessEnvelope | ErrorEnvelope;
