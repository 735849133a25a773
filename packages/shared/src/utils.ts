/**
 * Shared utility functions
 */

import {
  HASH_ALGORITHMS,
  KEY_SPECS,
  REMOTE_KEY_USAGES,
  SIGNING_ALGORITHMS,
} from "./constants";

import type { CsrApiError } from "./types/common";
import type { HashAlgorithm, KeySpec, RemoteKeyUsage, SigningAlgorithmName } from "./types/csr";

/**
 * Create a standardized API error body
 */
export function createCsrApiError(
  code: string,
  message: string,
  details?: Record<string, unknown>,
): CsrApiError {
  return {
    code,
    message,
    details,
    timestamp: new Date().toISOString(),
  };
}

export function isHashAlgorithm(value: unknown): value is HashAlgorithm {
  return HASH_ALGORITHMS.some((h) => h === value);
}

export function isSigningAlgorithmName(value: unknown): value is SigningAlgorithmName {
  return SIGNING_ALGORITHMS.some((a) => a === value);
}

export function isKeySpec(value: unknown): value is KeySpec {
  return KEY_SPECS.some((s) => s === value);
}

export function isRemoteKeyUsage(value: unknown): value is RemoteKeyUsage {
  return REMOTE_KEY_USAGES.some((u) => u === value);
}

/**
 * Generate a short unique identifier
 */
export function generateShortId(): string {
  return Math.random().toString(36).substring(2, 8);
}
