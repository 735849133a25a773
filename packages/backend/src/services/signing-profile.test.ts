import * as asn1js from "asn1js";
import { AlgorithmIdentifier, RSASSAPSSParams } from "pkijs";
import { describe, it, expect } from "vitest";

import { ConfigurationError, UnsupportedKeyTypeError } from "../errors";

import {
  classifyKey,
  negotiateSigningProfile,
  OID_MGF1,
  OID_RSASSA_PSS,
  paddingFromPreference,
} from "./signing-profile";

const RSA_KEY = [
  "RSASSA_PSS_SHA_256",
  "RSASSA_PSS_SHA_384",
  "RSASSA_PSS_SHA_512",
  "RSASSA_PKCS1_V1_5_SHA_256",
  "RSASSA_PKCS1_V1_5_SHA_384",
  "RSASSA_PKCS1_V1_5_SHA_512",
];

const derOf = (algorithm: AlgorithmIdentifier): number[] =>
  Array.from(new Uint8Array(algorithm.toSchema().toBER(false)));

const reparse = (algorithm: AlgorithmIdentifier): AlgorithmIdentifier =>
  new AlgorithmIdentifier({ schema: asn1js.fromBER(algorithm.toSchema().toBER(false)).result });

describe("signing profile negotiation", () => {
  it("classifies keys by the families they report", () => {
    expect(classifyKey("k", RSA_KEY)).toBe("rsa");
    expect(classifyKey("k", ["ECDSA_SHA_256"])).toBe("ec");
    expect(() => classifyKey("k", ["SM2DSA"])).toThrow(UnsupportedKeyTypeError);
    expect(() => classifyKey("k", [])).toThrow(ConfigurationError);
  });

  it("derives the RSA padding from the preference name", () => {
    expect(paddingFromPreference("RSASSA_PSS_SHA_512")).toBe("pss");
    expect(paddingFromPreference("RSASSA_PKCS1_V1_5_SHA_256")).toBe("pkcs1v15");
    expect(paddingFromPreference("ECDSA_SHA_256")).toBe("pkcs1v15");
  });

  it("builds RSASSA-PSS parameters with MGF1 over the same hash", () => {
    const profile = negotiateSigningProfile("k", RSA_KEY, "sha256", "pss");
    expect(profile.keyType).toBe("rsa");
    expect(profile.padding).toBe("pss");
    expect(profile.remoteAlgorithm).toBe("RSASSA_PSS_SHA_256");

    const algorithm = reparse(profile.signatureAlgorithm);
    expect(algorithm.algorithmId).toBe(OID_RSASSA_PSS);

    const params = new RSASSAPSSParams({ schema: algorithm.algorithmParams });
    expect(params.hashAlgorithm.algorithmId).toBe("2.16.840.1.101.3.4.2.1");
    expect(params.maskGenAlgorithm.algorithmId).toBe(OID_MGF1);
    expect(new AlgorithmIdentifier({ schema: params.maskGenAlgorithm.algorithmParams }).algorithmId).toBe(
      "2.16.840.1.101.3.4.2.1",
    );
    expect(params.saltLength).toBe(32);
    expect(params.trailerField).toBe(1);
  });

  it("sizes the PSS salt to the digest", () => {
    const profile = negotiateSigningProfile("k", RSA_KEY, "sha384", "pss");
    const params = new RSASSAPSSParams({ schema: reparse(profile.signatureAlgorithm).algorithmParams });
    expect(params.saltLength).toBe(48);
    expect(profile.remoteAlgorithm).toBe("RSASSA_PSS_SHA_384");
  });

  it("uses shaNWithRSAEncryption with NULL parameters for PKCS#1 v1.5", () => {
    const profile = negotiateSigningProfile("k", RSA_KEY, "sha256", "pkcs1v15");
    expect(profile.remoteAlgorithm).toBe("RSASSA_PKCS1_V1_5_SHA_256");
    expect(derOf(profile.signatureAlgorithm)).toEqual([
      0x30, 0x0d, 0x06, 0x09, 0x2a, 0x86, 0x48, 0x86, 0xf7, 0x0d, 0x01, 0x01, 0x0b, 0x05, 0x00,
    ]);
  });

  it("uses ecdsa-with-SHA512 without parameters for a P-521 key", () => {
    const profile = negotiateSigningProfile("k", ["ECDSA_SHA_512"], "sha512", "pss");
    expect(profile.keyType).toBe("ec");
    expect(profile.padding).toBeNull();
    expect(profile.remoteAlgorithm).toBe("ECDSA_SHA_512");
    expect(derOf(profile.signatureAlgorithm)).toEqual([
      0x30, 0x0a, 0x06, 0x08, 0x2a, 0x86, 0x48, 0xce, 0x3d, 0x04, 0x03, 0x04,
    ]);
  });

  it("prefers RSA when a key reports both families", () => {
    const profile = negotiateSigningProfile("k", ["ECDSA_SHA_256", "RSASSA_PSS_SHA_256"], "sha256", "pss");
    expect(profile.keyType).toBe("rsa");
  });

  it("fails when the key does not offer the negotiated algorithm", () => {
    let caught: unknown;
    try {
      negotiateSigningProfile("k", ["ECDSA_SHA_256"], "sha384", "pss");
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({
      code: "CONFIG_ALGORITHM_UNSUPPORTED",
      message: "Key k does not support ECDSA_SHA_384; it reports ECDSA_SHA_256",
    });
  });

  it("fails for sha1, which no remote algorithm offers", () => {
    expect(() => negotiateSigningProfile("k", RSA_KEY, "sha1", "pss")).toThrow(ConfigurationError);
    expect(() => negotiateSigningProfile("k", RSA_KEY, "sha1", "pkcs1v15")).toThrow(
      "does not support RSASSA_PKCS1_V1_5_SHA_160",
    );
  });
});
