/**
 * API request and response types for the CSR service
 */

import type { BaseApiResponse, LogEntry } from "./common";
import type {
  ExtensionSummary,
  HashAlgorithm,
  KeySpec,
  RemoteKeyDescriptor,
  RemoteKeyUsage,
  SigningAlgorithmName,
} from "./csr";

// Health check
export interface HealthResponse extends BaseApiResponse {
  status: "OK" | "ERROR";
  timestamp: string;
  service: string;
  version: string;
  logs?: LogEntry[];
}

// Build and sign a CSR against a remote key
export interface BuildCsrRequest {
  keyId: string;
  /** Attribute name → value, e.g. { common_name: "example.org" } */
  subject: Record<string, string>;
  hashAlgorithm?: HashAlgorithm;
  /** Preference; only the PSS/PKCS#1 choice matters for RSA keys */
  signingAlgorithm?: SigningAlgorithmName;
  /** null drops basic constraints; omitted keeps the builder default (false) */
  ca?: boolean | null;
  subjectAltDomains?: string[];
  subjectAltIps?: string[];
  keyUsage?: string[];
  extendedKeyUsage?: string[];
}

export interface BuildCsrResponse extends BaseApiResponse {
  csrPem: string;
  /** Remote algorithm name the request was signed with */
  signingAlgorithm: SigningAlgorithmName;
  signatureAlgorithmOid: string;
  extensions: ExtensionSummary[];
}

// Mock remote key store
export interface CreateMockKeyRequest {
  keySpec: KeySpec;
  keyUsage?: RemoteKeyUsage;
  /** e.g. "alias/web-frontend" */
  alias?: string;
}

export interface MockKeysResponse extends BaseApiResponse {
  keys: RemoteKeyDescriptor[];
}

export interface CreateMockKeyResponse extends BaseApiResponse {
  key: RemoteKeyDescriptor;
}
