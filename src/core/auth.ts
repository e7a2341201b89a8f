/**
 * L2 request signing for authenticated CLOB endpoints
 */

import crypto from 'crypto';
import { getConfig } from './config.js';
import { SdkError } from './errors.js';
import type { L2Credentials, L2Headers } from './types.js';

export type RequestBody = string | Record<string, unknown> | readonly unknown[];

/**
 * Serialize a request body for signing. Strings have single quotes
 * normalized to double quotes; objects go through JSON.stringify, whose key
 * order is the object's insertion order.
 */
export function serializeBody(body: RequestBody): string {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return text.replace(/'/g, '"');
}

/**
 * HMAC-SHA256 over `timestamp + METHOD + path [+ body]`, keyed by the
 * base64url-decoded secret, returned as padded base64url.
 */
export function buildHmacSignature(
  secret: string,
  timestamp: number,
  method: string,
  requestPath: string,
  body?: RequestBody
): string {
  const key = Buffer.from(secret, 'base64url');
  let message = `${timestamp}${method}${requestPath}`;
  if (body !== undefined) {
    message += serializeBody(body);
  }
  return crypto
    .createHmac('sha256', key)
    .update(message, 'utf8')
    .digest('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_');
}

/**
 * Credentials from POLY_* environment variables, or null when none is set.
 */
export function loadL2CredentialsFromEnv(): L2Credentials | null {
  const { apiKey, apiSecret, apiPassphrase, address } = getConfig().polymarket;
  if (!apiKey && !apiSecret && !apiPassphrase && !address) {
    return null;
  }
  return {
    apiKey: apiKey ?? null,
    apiSecret: apiSecret ?? null,
    apiPassphrase: apiPassphrase ?? null,
    address: address ?? null,
  };
}

export interface L2HeaderOptions {
  method?: string;
  body?: RequestBody;
  /** Unix seconds; defaults to now */
  timestamp?: number;
}

/**
 * Build the five L2 headers for one request.
 * Throws a non-retryable config error when any credential field is missing.
 */
export function buildL2Headers(
  credentials: L2Credentials,
  requestPath: string,
  options: L2HeaderOptions = {}
): L2Headers {
  const { apiKey, apiSecret, apiPassphrase, address } = credentials;
  if (!apiKey || !apiSecret || !apiPassphrase || !address) {
    throw SdkError.config(
      'L2 credentials require apiKey, apiSecret, apiPassphrase and address. ' +
        'Set POLY_API_KEY, POLY_API_SECRET, POLY_API_PASSPHRASE, POLY_ADDRESS in .env.'
    );
  }

  const timestamp = options.timestamp ?? Math.floor(Date.now() / 1000);
  const signature = buildHmacSignature(
    apiSecret,
    timestamp,
    (options.method ?? 'GET').toUpperCase(),
    requestPath,
    options.body
  );

  return {
    POLY_ADDRESS: address,
    POLY_SIGNATURE: signature,
    POLY_TIMESTAMP: String(timestamp),
    POLY_API_KEY: apiKey,
    POLY_PASSPHRASE: apiPassphrase,
  };
}
