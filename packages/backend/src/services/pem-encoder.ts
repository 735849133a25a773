/**
 * PEM armor for certificate requests, and a small inspector used by the API
 * to report what ended up inside a request.
 */

import { CSR_PEM_LABEL } from "@remote-csr/shared";
import * as asn1js from "asn1js";
import { CertificationRequest, Extensions } from "pkijs";

import { EncodingError } from "../errors";

import { toArrayBuffer } from "./asn1-utils";
import { OID_EXTENSION_REQUEST } from "./csr-builder";
import { resolveExtensionIdentity } from "./extension-set";
import { SubjectName } from "./subject-name";

import type { CertificationRequestResult } from "./csr-builder";
import type { SubjectAttributes } from "./subject-name";
import type { ExtensionSummary } from "@remote-csr/shared";

export interface CertificationRequestSummary {
  subject: SubjectAttributes;
  signatureAlgorithmOid: string;
  extensions: ExtensionSummary[];
}

/** Base64 body wrapped at 64 columns, trailing newline */
export function pemArmor(label: string, der: Uint8Array): string {
  const b64 = Buffer.from(der).toString("base64");
  const body = b64.match(/.{1,64}/g)?.join("\n") ?? b64;
  return `-----BEGIN ${label}-----\n${body}\n-----END ${label}-----\n`;
}

export function pemUnarmor(pem: string, label: string = CSR_PEM_LABEL): Uint8Array {
  const match = pem.match(/-----BEGIN ([A-Z0-9 ]+)-----([\s\S]*?)-----END \1-----/);
  if (!match) {
    throw new EncodingError("Input is not PEM armored", "ENCODING_PEM");
  }
  if (match[1] !== label) {
    throw new EncodingError(`Expected a ${label} block, found ${match[1]}`, "ENCODING_PEM", {
      expected: label,
      found: match[1],
    });
  }

  const b64 = match[2].replace(/\s+/g, "");
  if (!/^[A-Za-z0-9+/]*={0,2}$/.test(b64)) {
    throw new EncodingError("PEM body is not base64", "ENCODING_PEM");
  }
  return new Uint8Array(Buffer.from(b64, "base64"));
}

export function armorCertificationRequest(result: Pick<CertificationRequestResult, "der">): string {
  return pemArmor(CSR_PEM_LABEL, result.der);
}

export function parseCertificationRequest(der: Uint8Array): CertificationRequest {
  const asn = asn1js.fromBER(toArrayBuffer(der));
  if (asn.offset === -1) {
    throw new EncodingError("Certificate request is not valid DER", "ENCODING_DER");
  }
  try {
    return new CertificationRequest({ schema: asn.result });
  } catch (error) {
    throw new EncodingError(
      `Not a PKCS#10 certificate request: ${error instanceof Error ? error.message : String(error)}`,
      "ENCODING_DER",
    );
  }
}

/** Subject, signature algorithm and requested extensions of a DER request */
export function describeCertificationRequest(der: Uint8Array): CertificationRequestSummary {
  const request = parseCertificationRequest(der);

  const extensions: ExtensionSummary[] = [];
  const extReq = (request.attributes ?? []).find((a) => a.type === OID_EXTENSION_REQUEST);
  if (extReq && extReq.values.length > 0) {
    const parsed = new Extensions({ schema: extReq.values[0] });
    for (const ext of parsed.extensions) {
      extensions.push({
        name: resolveExtensionIdentity(ext.extnID).name,
        oid: ext.extnID,
        critical: ext.critical,
      });
    }
  }

  return {
    subject: SubjectName.fromRelativeDistinguishedNames(request.subject).toAttributes(),
    signatureAlgorithmOid: request.signatureAlgorithm.algorithmId,
    extensions,
  };
}
