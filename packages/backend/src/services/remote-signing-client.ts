/**
 * Contract of the remote key service the builder signs through.
 * Implementations report failures as RemoteServiceError.
 */

import type { KeySpec, RemoteKeyUsage } from "@remote-csr/shared";

export interface PublicKeyResponse {
  keyId: string;
  /** SubjectPublicKeyInfo, DER */
  publicKey: Uint8Array;
  keyUsage: RemoteKeyUsage;
}

export interface KeyDescription {
  keyId: string;
  keySpec: KeySpec;
  keyUsage: RemoteKeyUsage;
  signingAlgorithms: string[];
}

export interface SignResponse {
  keyId: string;
  algorithm: string;
  /** Raw signature; DER ECDSA-Sig-Value for EC keys */
  signature: Uint8Array;
}

export interface RemoteSigningClient {
  getPublicKey(keyId: string): Promise<PublicKeyResponse>;
  describeKey(keyId: string): Promise<KeyDescription>;
  sign(keyId: string, algorithm: string, message: Uint8Array): Promise<SignResponse>;
}
