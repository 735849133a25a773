import { createPublicKey, verify } from "node:crypto";

import { describe, it, expect, beforeEach } from "vitest";

import { RemoteServiceError } from "../errors";

import { MAX_MESSAGE_BYTES, MockKmsService } from "./mock-kms-service";

const message = new TextEncoder().encode("to be signed");

describe("MockKmsService", () => {
  let kms: MockKmsService;

  beforeEach(() => {
    kms = new MockKmsService();
  });

  it("seeds keys from the constructor", () => {
    const seeded = new MockKmsService(["ECC_NIST_P256", "ECC_NIST_P384"]);
    expect(seeded.listKeys().map((k) => k.keySpec)).toEqual(["ECC_NIST_P256", "ECC_NIST_P384"]);
  });

  it("reports the algorithms of each key spec", async () => {
    const rsa = kms.createKey({ keySpec: "RSA_2048" });
    const p384 = kms.createKey({ keySpec: "ECC_NIST_P384" });
    const encryption = kms.createKey({ keySpec: "RSA_2048", keyUsage: "ENCRYPT_DECRYPT" });

    expect(rsa.signingAlgorithms).toContain("RSASSA_PSS_SHA_512");
    expect(rsa.signingAlgorithms).toContain("RSASSA_PKCS1_V1_5_SHA_256");
    expect((await kms.describeKey(p384.keyId)).signingAlgorithms).toEqual(["ECDSA_SHA_384"]);
    expect((await kms.describeKey(encryption.keyId)).signingAlgorithms).toEqual([]);
  });

  it("returns a DER SubjectPublicKeyInfo", async () => {
    const { keyId } = kms.createKey({ keySpec: "ECC_NIST_P256" });
    const { publicKey, keyUsage } = await kms.getPublicKey(keyId);
    const key = createPublicKey({ key: Buffer.from(publicKey), format: "der", type: "spki" });

    expect(keyUsage).toBe("SIGN_VERIFY");
    expect(key.asymmetricKeyType).toBe("ec");
    expect(key.asymmetricKeyDetails?.namedCurve).toBe("prime256v1");
  });

  it("produces ECDSA signatures that verify", async () => {
    const { keyId } = kms.createKey({ keySpec: "ECC_NIST_P256" });
    const { signature } = await kms.sign(keyId, "ECDSA_SHA_256", message);
    const { publicKey } = await kms.getPublicKey(keyId);
    const key = createPublicKey({ key: Buffer.from(publicKey), format: "der", type: "spki" });

    expect(verify("sha256", message, key, signature)).toBe(true);
  });

  it("answers to an alias", async () => {
    const { keyId } = kms.createKey({ keySpec: "ECC_NIST_P256", alias: "alias/signer" });
    expect((await kms.describeKey("alias/signer")).keyId).toBe(keyId);
    expect(() => kms.createKey({ keySpec: "ECC_NIST_P256", alias: "alias/signer" })).toThrow(
      "Alias alias/signer already exists",
    );
    expect(() => kms.createKey({ keySpec: "ECC_NIST_P256", alias: "signer" })).toThrow(
      RemoteServiceError,
    );
  });

  describe("errors", () => {
    it("reports unknown keys as NotFoundException", async () => {
      await expect(kms.describeKey("nope")).rejects.toMatchObject({
        remoteCode: "NotFoundException",
        code: "REMOTE_NOTFOUNDEXCEPTION",
      });
    });

    it("refuses to sign with an encryption key", async () => {
      const { keyId } = kms.createKey({ keySpec: "RSA_2048", keyUsage: "ENCRYPT_DECRYPT" });
      await expect(kms.sign(keyId, "RSASSA_PSS_SHA_256", message)).rejects.toMatchObject({
        remoteCode: "InvalidKeyUsageException",
      });
    });

    it("refuses an algorithm the key does not offer", async () => {
      const { keyId } = kms.createKey({ keySpec: "ECC_NIST_P256" });
      await expect(kms.sign(keyId, "ECDSA_SHA_384", message)).rejects.toMatchObject({
        remoteCode: "InvalidKeyUsageException",
      });
    });

    it("validates algorithm names and message size", async () => {
      const { keyId } = kms.createKey({ keySpec: "ECC_NIST_P256" });
      await expect(kms.sign(keyId, "ECDSA_SHA_1", message)).rejects.toMatchObject({
        remoteCode: "ValidationException",
      });
      await expect(
        kms.sign(keyId, "ECDSA_SHA_256", new Uint8Array(MAX_MESSAGE_BYTES + 1)),
      ).rejects.toMatchObject({ remoteCode: "ValidationException" });
      await expect(kms.sign(keyId, "ECDSA_SHA_256", new Uint8Array(0))).rejects.toBeInstanceOf(
        RemoteServiceError,
      );
    });
  });
});
