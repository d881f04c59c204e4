/**
 * Wire types for the HTTP API. One instance per exchange; nothing here is persisted.
 */

export interface SetRequestBody {
  value: string;
  /** Seconds until expiry. Zero, negative or absent means the entry never expires. */
  expiration?: number;
}

export interface GetResponse {
  key: string;
  value: string;
}

export interface StatusResponse {
  status: 'created' | 'deleted';
  key: string;
}

export interface ListResponse {
  keys: string[];
  count: number;
}

export interface HealthResponse {
  status: 'healthy';
}

export interface ErrorResponse {
  error: string;
}

export interface ListQuery {
  pattern: string;
  limit: number;
}
