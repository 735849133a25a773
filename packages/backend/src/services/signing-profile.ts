/**
 * Signature algorithm negotiation
 *
 * Maps (key's reported algorithms, hash, RSA padding preference) to the
 * AlgorithmIdentifier written into the request and the algorithm name sent
 * to the remote signer. Pure: no I/O, no builder state.
 */

import { isSigningAlgorithmName } from "@remote-csr/shared";
import * as asn1js from "asn1js";
import { AlgorithmIdentifier, RSASSAPSSParams } from "pkijs";

import { ConfigurationError, UnsupportedKeyTypeError } from "../errors";

import type { HashAlgorithm, RsaPadding, SigningAlgorithmName } from "@remote-csr/shared";

export type KeyType = "rsa" | "ec";

export interface SigningProfile {
  keyType: KeyType;
  hashAlgorithm: HashAlgorithm;
  /** null for EC keys */
  padding: RsaPadding | null;
  remoteAlgorithm: SigningAlgorithmName;
  signatureAlgorithm: AlgorithmIdentifier;
}

interface HashInfo {
  bits: number;
  oid: string;
  rsa: string;
  ecdsa: string;
}

const HASHES: Record<HashAlgorithm, HashInfo> = {
  sha1: {
    bits: 160,
    oid: "1.3.14.3.2.26",
    rsa: "1.2.840.113549.1.1.5",
    ecdsa: "1.2.840.10045.4.1",
  },
  sha256: {
    bits: 256,
    oid: "2.16.840.1.101.3.4.2.1",
    rsa: "1.2.840.113549.1.1.11",
    ecdsa: "1.2.840.10045.4.3.2",
  },
  sha384: {
    bits: 384,
    oid: "2.16.840.1.101.3.4.2.2",
    rsa: "1.2.840.113549.1.1.12",
    ecdsa: "1.2.840.10045.4.3.3",
  },
  sha512: {
    bits: 512,
    oid: "2.16.840.1.101.3.4.2.3",
    rsa: "1.2.840.113549.1.1.13",
    ecdsa: "1.2.840.10045.4.3.4",
  },
};

export const OID_RSASSA_PSS = "1.2.840.113549.1.1.10";
export const OID_MGF1 = "1.2.840.113549.1.1.8";

/** "RSASSA_PSS_SHA_384" → pss, anything else → pkcs1v15 */
export function paddingFromPreference(preference: string): RsaPadding {
  return preference.includes("PSS") ? "pss" : "pkcs1v15";
}

export function classifyKey(keyId: string, signingAlgorithms: readonly string[]): KeyType {
  if (signingAlgorithms.some((a) => a.startsWith("RSASSA_PSS_"))) return "rsa";
  if (signingAlgorithms.some((a) => a.startsWith("ECDSA_"))) return "ec";
  throw new UnsupportedKeyTypeError(keyId, signingAlgorithms);
}

// RFC 5754: parameters of the SHA-2 identifiers are absent
function hashIdentifier(hash: HashAlgorithm): AlgorithmIdentifier {
  return new AlgorithmIdentifier({ algorithmId: HASHES[hash].oid });
}

function pssIdentifier(hash: HashAlgorithm): AlgorithmIdentifier {
  const params = new RSASSAPSSParams({
    hashAlgorithm: hashIdentifier(hash),
    maskGenAlgorithm: new AlgorithmIdentifier({
      algorithmId: OID_MGF1,
      algorithmParams: hashIdentifier(hash).toSchema(),
    }),
    saltLength: HASHES[hash].bits / 8,
  });
  return new AlgorithmIdentifier({
    algorithmId: OID_RSASSA_PSS,
    algorithmParams: params.toSchema(),
  });
}

export function negotiateSigningProfile(
  keyId: string,
  signingAlgorithms: readonly string[],
  hashAlgorithm: HashAlgorithm,
  padding: RsaPadding,
): SigningProfile {
  const keyType = classifyKey(keyId, signingAlgorithms);
  const info = HASHES[hashAlgorithm];

  let remote: string;
  let signatureAlgorithm: AlgorithmIdentifier;
  if (keyType === "ec") {
    remote = `ECDSA_SHA_${info.bits}`;
    signatureAlgorithm = new AlgorithmIdentifier({ algorithmId: info.ecdsa });
  } else if (padding === "pss") {
    remote = `RSASSA_PSS_SHA_${info.bits}`;
    signatureAlgorithm = pssIdentifier(hashAlgorithm);
  } else {
    remote = `RSASSA_PKCS1_V1_5_SHA_${info.bits}`;
    signatureAlgorithm = new AlgorithmIdentifier({
      algorithmId: info.rsa,
      algorithmParams: new asn1js.Null(),
    });
  }

  if (!isSigningAlgorithmName(remote) || !signingAlgorithms.includes(remote)) {
    throw new ConfigurationError(
      `Key ${keyId} does not support ${remote}; it reports ${signingAlgorithms.join(", ")}`,
      "CONFIG_ALGORITHM_UNSUPPORTED",
      { details: { keyId, requested: remote, signingAlgorithms: [...signingAlgorithms] } },
    );
  }

  return {
    keyType,
    hashAlgorithm,
    padding: keyType === "rsa" ? padding : null,
    remoteAlgorithm: remote,
    signatureAlgorithm,
  };
}
