/**
 * HTTP-facing CSR operations: body validation and one-shot build
 */

import {
  isHashAlgorithm,
  isKeySpec,
  isRemoteKeyUsage,
  isSigningAlgorithmName,
} from "@remote-csr/shared";

import { ConfigurationError } from "../errors";

import { CsrBuilder } from "./csr-builder";
import { armorCertificationRequest, describeCertificationRequest } from "./pem-encoder";

import type { RemoteSigningClient } from "./remote-signing-client";
import type {
  BuildCsrRequest,
  BuildCsrResponse,
  CreateMockKeyRequest,
  LogEntry,
} from "@remote-csr/shared";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isString = (value: unknown): value is string => typeof value === "string";

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(isString);

function invalid(field: string, expected: string): ConfigurationError {
  return new ConfigurationError(`${field} must be ${expected}`, "CONFIG_REQUEST", {
    details: { field },
  });
}

function optional<T>(
  body: Record<string, unknown>,
  field: string,
  guard: (value: unknown) => value is T,
  expected: string,
): T | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  if (!guard(value)) throw invalid(field, expected);
  return value;
}

const isCaFlag = (value: unknown): value is boolean | null =>
  value === null || typeof value === "boolean";

/** Shape check; subject, SAN and usage values are checked by the builder's setters */
export function parseBuildCsrRequest(body: unknown): BuildCsrRequest {
  if (!isRecord(body)) throw invalid("body", "a JSON object");

  const { keyId, subject } = body;
  if (typeof keyId !== "string" || keyId.length === 0) throw invalid("keyId", "a non-empty string");
  if (!isRecord(subject)) throw invalid("subject", "an object of attribute names to strings");
  const attributes: Record<string, string> = {};
  for (const [name, value] of Object.entries(subject)) {
    if (typeof value !== "string") throw invalid(`subject.${name}`, "a string");
    attributes[name] = value;
  }

  const strings = "an array of strings";
  return {
    keyId,
    subject: attributes,
    hashAlgorithm: optional(body, "hashAlgorithm", isHashAlgorithm, "one of sha1, sha256, sha384, sha512"),
    signingAlgorithm: optional(
      body,
      "signingAlgorithm",
      isSigningAlgorithmName,
      "a supported signing algorithm name",
    ),
    ca: optional(body, "ca", isCaFlag, "true, false or null"),
    subjectAltDomains: optional(body, "subjectAltDomains", isStringArray, strings),
    subjectAltIps: optional(body, "subjectAltIps", isStringArray, strings),
    keyUsage: optional(body, "keyUsage", isStringArray, strings),
    extendedKeyUsage: optional(body, "extendedKeyUsage", isStringArray, strings),
  };
}

export function parseCreateMockKeyRequest(body: unknown): CreateMockKeyRequest {
  if (!isRecord(body)) throw invalid("body", "a JSON object");
  const { keySpec } = body;
  if (!isKeySpec(keySpec)) throw invalid("keySpec", "a supported key spec");
  return {
    keySpec,
    keyUsage: optional(body, "keyUsage", isRemoteKeyUsage, "SIGN_VERIFY or ENCRYPT_DECRYPT"),
    alias: optional(body, "alias", isString, "a string"),
  };
}

/**
 * Build and sign one request. Settings are applied in a fixed order so that
 * explicit key usages override the defaults that the CA flag sets.
 */
export async function buildCsr(
  client: RemoteSigningClient,
  request: BuildCsrRequest,
  logs: LogEntry[],
): Promise<BuildCsrResponse> {
  const builder = await CsrBuilder.create(client, request.subject, request.keyId);

  if (request.hashAlgorithm !== undefined) builder.setHashAlgo(request.hashAlgorithm);
  if (request.signingAlgorithm !== undefined) builder.setSigningAlgorithm(request.signingAlgorithm);
  if (request.ca !== undefined) builder.setCa(request.ca);
  if (request.subjectAltDomains !== undefined) builder.setSubjectAltDomains(request.subjectAltDomains);
  if (request.subjectAltIps !== undefined) builder.setSubjectAltIps(request.subjectAltIps);
  if (request.keyUsage !== undefined) builder.setKeyUsage(request.keyUsage);
  if (request.extendedKeyUsage !== undefined) builder.setExtendedKeyUsage(request.extendedKeyUsage);

  const result = await builder.build(request.keyId, logs);
  const summary = describeCertificationRequest(result.der);

  return {
    success: true,
    csrPem: armorCertificationRequest(result),
    signingAlgorithm: result.signingAlgorithm,
    signatureAlgorithmOid: summary.signatureAlgorithmOid,
    extensions: summary.extensions,
    logs,
  };
}
