import { describe, it, expect, beforeAll } from "vitest";

import { ConfigurationError } from "../errors";

import { buildCsr, parseBuildCsrRequest, parseCreateMockKeyRequest } from "./csr-request-service";
import { MockKmsService } from "./mock-kms-service";
import { pemUnarmor } from "./pem-encoder";

import type { LogEntry } from "@remote-csr/shared";

describe("parseBuildCsrRequest", () => {
  it("accepts a minimal body", () => {
    expect(parseBuildCsrRequest({ keyId: "k", subject: { common_name: "example.org" } })).toEqual({
      keyId: "k",
      subject: { common_name: "example.org" },
      hashAlgorithm: undefined,
      signingAlgorithm: undefined,
      ca: undefined,
      subjectAltDomains: undefined,
      subjectAltIps: undefined,
      keyUsage: undefined,
      extendedKeyUsage: undefined,
    });
  });

  it("keeps an explicit null CA flag", () => {
    expect(parseBuildCsrRequest({ keyId: "k", subject: {}, ca: null }).ca).toBeNull();
  });

  it.each([
    [null, "body must be a JSON object"],
    [{ subject: {} }, "keyId must be a non-empty string"],
    [{ keyId: "k", subject: "CN=example.org" }, "subject must be an object of attribute names to strings"],
    [{ keyId: "k", subject: { common_name: 5 } }, "subject.common_name must be a string"],
    [{ keyId: "k", subject: {}, hashAlgorithm: "md5" }, "hashAlgorithm must be one of sha1, sha256, sha384, sha512"],
    [{ keyId: "k", subject: {}, ca: "yes" }, "ca must be true, false or null"],
    [{ keyId: "k", subject: {}, subjectAltIps: "192.0.2.1" }, "subjectAltIps must be an array of strings"],
  ])("rejects %j", (body, message) => {
    expect(() => parseBuildCsrRequest(body)).toThrow(message);
  });

  it("raises ConfigurationError with the request code", () => {
    let caught: unknown;
    try {
      parseBuildCsrRequest({ keyId: "" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(caught).toMatchObject({ code: "CONFIG_REQUEST", details: { field: "keyId" } });
  });
});

describe("parseCreateMockKeyRequest", () => {
  it("accepts a key spec with optional usage and alias", () => {
    expect(
      parseCreateMockKeyRequest({ keySpec: "RSA_3072", keyUsage: "ENCRYPT_DECRYPT", alias: "alias/x" }),
    ).toEqual({ keySpec: "RSA_3072", keyUsage: "ENCRYPT_DECRYPT", alias: "alias/x" });
  });

  it("rejects unknown key specs", () => {
    expect(() => parseCreateMockKeyRequest({ keySpec: "DSA_1024" })).toThrow(
      "keySpec must be a supported key spec",
    );
  });
});

describe("buildCsr", () => {
  let kms: MockKmsService;
  let keyId: string;

  beforeAll(() => {
    kms = new MockKmsService();
    keyId = kms.createKey({ keySpec: "ECC_NIST_P256" }).keyId;
  });

  it("returns the PEM, algorithm and extension summary", async () => {
    const logs: LogEntry[] = [];
    const response = await buildCsr(
      kms,
      parseBuildCsrRequest({
        keyId,
        subject: { common_name: "ca.example" },
        ca: true,
        subjectAltDomains: ["ca.example"],
      }),
      logs,
    );

    expect(response.success).toBe(true);
    expect(response.signingAlgorithm).toBe("ECDSA_SHA_256");
    expect(response.signatureAlgorithmOid).toBe("1.2.840.10045.4.3.2");
    expect(response.extensions).toEqual([
      { name: "basic_constraints", oid: "2.5.29.19", critical: true },
      { name: "extended_key_usage", oid: "2.5.29.37", critical: false },
      { name: "key_usage", oid: "2.5.29.15", critical: true },
      { name: "subject_alt_name", oid: "2.5.29.17", critical: false },
    ]);
    expect(pemUnarmor(response.csrPem).length).toBeGreaterThan(0);
    expect(response.logs).toBe(logs);
    expect(logs.length).toBe(5);
  });

  it("lets explicit key usages override the CA defaults", async () => {
    const response = await buildCsr(
      kms,
      parseBuildCsrRequest({
        keyId,
        subject: { common_name: "example.org" },
        keyUsage: [],
        extendedKeyUsage: [],
      }),
      [],
    );
    expect(response.extensions.map((e) => e.name)).toEqual(["basic_constraints"]);
  });

  it("rejects with the builder's error for a bad subject", async () => {
    await expect(
      buildCsr(kms, parseBuildCsrRequest({ keyId, subject: { shoe_size: "44" } }), []),
    ).rejects.toMatchObject({ code: "CONFIG_SUBJECT" });
  });
});
