/**
 * Mock remote key service for development and testing
 *
 * Holds key pairs in memory and answers the RemoteSigningClient calls the way
 * a cloud KMS does: key ids or alias/… names, per-key algorithm lists,
 * exception-style error names. Private keys never leave this class.
 *
 * @example
 * const kms = new MockKmsService();
 * const { keyId } = kms.createKey({ keySpec: "ECC_NIST_P256" });
 * const builder = await CsrBuilder.create(kms, { common_name: "example.org" }, keyId);
 */

import { constants, generateKeyPairSync, randomUUID, sign } from "node:crypto";

import { isKeySpec, isRemoteKeyUsage, isSigningAlgorithmName } from "@remote-csr/shared";

import { RemoteServiceError } from "../errors";
import { csrBackendLogger, logCsr } from "../logger";

import type {
  KeyDescription,
  PublicKeyResponse,
  RemoteSigningClient,
  SignResponse,
} from "./remote-signing-client";
import type {
  KeySpec,
  RemoteKeyDescriptor,
  RemoteKeyUsage,
  SigningAlgorithmName,
} from "@remote-csr/shared";
import type { KeyObject } from "node:crypto";

/** Largest message the service signs without a pre-computed digest */
export const MAX_MESSAGE_BYTES = 4096;

const RSA_ALGORITHMS: SigningAlgorithmName[] = [
  "RSASSA_PSS_SHA_256",
  "RSASSA_PSS_SHA_384",
  "RSASSA_PSS_SHA_512",
  "RSASSA_PKCS1_V1_5_SHA_256",
  "RSASSA_PKCS1_V1_5_SHA_384",
  "RSASSA_PKCS1_V1_5_SHA_512",
];

interface KeySpecInfo {
  type: "rsa" | "ec";
  modulusLength?: number;
  namedCurve?: string;
  signingAlgorithms: SigningAlgorithmName[];
}

const KEY_SPEC_INFO: Record<KeySpec, KeySpecInfo> = {
  RSA_2048: { type: "rsa", modulusLength: 2048, signingAlgorithms: RSA_ALGORITHMS },
  RSA_3072: { type: "rsa", modulusLength: 3072, signingAlgorithms: RSA_ALGORITHMS },
  RSA_4096: { type: "rsa", modulusLength: 4096, signingAlgorithms: RSA_ALGORITHMS },
  ECC_NIST_P256: { type: "ec", namedCurve: "P-256", signingAlgorithms: ["ECDSA_SHA_256"] },
  ECC_NIST_P384: { type: "ec", namedCurve: "P-384", signingAlgorithms: ["ECDSA_SHA_384"] },
  ECC_NIST_P521: { type: "ec", namedCurve: "P-521", signingAlgorithms: ["ECDSA_SHA_512"] },
};

interface MockKey {
  keyId: string;
  keySpec: KeySpec;
  keyUsage: RemoteKeyUsage;
  createdAt: Date;
  publicKey: KeyObject;
  privateKey: KeyObject;
}

export interface CreateKeyOptions {
  keySpec: KeySpec;
  keyUsage?: RemoteKeyUsage;
  /** Extra name the key answers to, e.g. "alias/web-frontend" */
  alias?: string;
}

function generateKeyPair(spec: KeySpecInfo): { publicKey: KeyObject; privateKey: KeyObject } {
  if (spec.type === "rsa") {
    return generateKeyPairSync("rsa", { modulusLength: spec.modulusLength ?? 2048 });
  }
  return generateKeyPairSync("ec", { namedCurve: spec.namedCurve ?? "P-256" });
}

/** "RSASSA_PSS_SHA_384" → "sha384" */
const digestOf = (algorithm: SigningAlgorithmName): string =>
  `sha${algorithm.slice(algorithm.lastIndexOf("_") + 1)}`;

export class MockKmsService implements RemoteSigningClient {
  private readonly keys = new Map<string, MockKey>();
  private readonly aliases = new Map<string, string>();

  /**
   * @param seed key specs to create up front (SIGN_VERIFY)
   */
  constructor(seed: readonly KeySpec[] = []) {
    for (const keySpec of seed) {
      this.createKey({ keySpec });
    }
  }

  createKey(options: CreateKeyOptions): RemoteKeyDescriptor {
    const { keySpec, keyUsage = "SIGN_VERIFY", alias } = options;
    if (!isKeySpec(keySpec)) {
      throw new RemoteServiceError(`Unsupported key spec ${String(keySpec)}`, "ValidationException");
    }
    if (!isRemoteKeyUsage(keyUsage)) {
      throw new RemoteServiceError(`Unsupported key usage ${String(keyUsage)}`, "ValidationException");
    }
    if (alias !== undefined) {
      if (!alias.startsWith("alias/") || alias.length <= "alias/".length) {
        throw new RemoteServiceError("Alias names must start with alias/", "ValidationException");
      }
      if (this.aliases.has(alias)) {
        throw new RemoteServiceError(`Alias ${alias} already exists`, "AlreadyExistsException");
      }
    }

    const started = Date.now();
    const key: MockKey = {
      keyId: randomUUID(),
      keySpec,
      keyUsage,
      createdAt: new Date(),
      ...generateKeyPair(KEY_SPEC_INFO[keySpec]),
    };
    this.keys.set(key.keyId, key);
    if (alias !== undefined) this.aliases.set(alias, key.keyId);

    const duration = Date.now() - started;
    logCsr(
      csrBackendLogger.logTiming("debug", "mock-kms", `Key generation (${keySpec})`, duration, {
        keyId: key.keyId,
      }),
    );

    return this.toDescriptor(key);
  }

  listKeys(): RemoteKeyDescriptor[] {
    return [...this.keys.values()].map((key) => this.toDescriptor(key));
  }

  async getPublicKey(keyId: string): Promise<PublicKeyResponse> {
    const key = this.resolve(keyId);
    return {
      keyId: key.keyId,
      publicKey: new Uint8Array(key.publicKey.export({ type: "spki", format: "der" })),
      keyUsage: key.keyUsage,
    };
  }

  async describeKey(keyId: string): Promise<KeyDescription> {
    const key = this.resolve(keyId);
    return {
      keyId: key.keyId,
      keySpec: key.keySpec,
      keyUsage: key.keyUsage,
      signingAlgorithms: this.signingAlgorithmsOf(key),
    };
  }

  async sign(keyId: string, algorithm: string, message: Uint8Array): Promise<SignResponse> {
    const key = this.resolve(keyId);

    if (message.length === 0 || message.length > MAX_MESSAGE_BYTES) {
      throw new RemoteServiceError(
        `Message must be between 1 and ${MAX_MESSAGE_BYTES} bytes, got ${message.length}`,
        "ValidationException",
      );
    }
    if (!isSigningAlgorithmName(algorithm)) {
      throw new RemoteServiceError(`Unknown signing algorithm ${algorithm}`, "ValidationException");
    }
    if (key.keyUsage !== "SIGN_VERIFY") {
      throw new RemoteServiceError(
        `Key ${key.keyId} has usage ${key.keyUsage}`,
        "InvalidKeyUsageException",
      );
    }
    if (!this.signingAlgorithmsOf(key).includes(algorithm)) {
      throw new RemoteServiceError(
        `Algorithm ${algorithm} is not valid for key ${key.keyId} (${key.keySpec})`,
        "InvalidKeyUsageException",
      );
    }

    const digest = digestOf(algorithm);
    const signature = algorithm.startsWith("RSASSA_PSS_")
      ? sign(digest, message, {
          key: key.privateKey,
          padding: constants.RSA_PKCS1_PSS_PADDING,
          saltLength: constants.RSA_PSS_SALTLEN_DIGEST,
        })
      : sign(digest, message, key.privateKey);

    logCsr(
      csrBackendLogger.createLogEntry("debug", "mock-kms", `Signed ${message.length} bytes`, {
        keyId: key.keyId,
        signingAlgorithm: algorithm,
      }),
    );

    return { keyId: key.keyId, algorithm, signature: new Uint8Array(signature) };
  }

  private resolve(keyId: string): MockKey {
    const id = this.aliases.get(keyId) ?? keyId;
    const key = this.keys.get(id);
    if (!key) {
      throw new RemoteServiceError(`Key ${keyId} does not exist`, "NotFoundException", {
        details: { keyId },
      });
    }
    return key;
  }

  private signingAlgorithmsOf(key: MockKey): string[] {
    return key.keyUsage === "SIGN_VERIFY" ? [...KEY_SPEC_INFO[key.keySpec].signingAlgorithms] : [];
  }

  private toDescriptor(key: MockKey): RemoteKeyDescriptor {
    return {
      keyId: key.keyId,
      keySpec: key.keySpec,
      keyUsage: key.keyUsage,
      signingAlgorithms: this.signingAlgorithmsOf(key),
      createdAt: key.createdAt.toISOString(),
    };
  }
}
