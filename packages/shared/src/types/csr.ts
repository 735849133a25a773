/**
 * Names shared by the CSR builder, the remote signing contract and the HTTP API
 */

import type {
  EXTENDED_KEY_USAGE_NAMES,
  HASH_ALGORITHMS,
  KEY_SPECS,
  KEY_USAGE_NAMES,
  REMOTE_KEY_USAGES,
  SIGNING_ALGORITHMS,
} from "../constants";

export type HashAlgorithm = (typeof HASH_ALGORITHMS)[number];

/** Algorithm names understood by the remote signing service */
export type SigningAlgorithmName = (typeof SIGNING_ALGORITHMS)[number];

export type RsaPadding = "pss" | "pkcs1v15";

export type KeyUsageName = (typeof KEY_USAGE_NAMES)[number];

export type ExtendedKeyUsageName = (typeof EXTENDED_KEY_USAGE_NAMES)[number];

/** Key shapes a remote key may have */
export type KeySpec = (typeof KEY_SPECS)[number];

/** What the remote service allows a key to be used for */
export type RemoteKeyUsage = (typeof REMOTE_KEY_USAGES)[number];

export interface ExtensionSummary {
  name: string;
  oid: string;
  critical: boolean;
}

export interface RemoteKeyDescriptor {
  keyId: string;
  keySpec: KeySpec;
  keyUsage: RemoteKeyUsage;
  signingAlgorithms: string[];
  createdAt: string;
}
