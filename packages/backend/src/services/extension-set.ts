/**
 * Requested X.509v3 extensions
 *
 * Four extensions the builder manages itself (basic constraints, SAN, key
 * usage, extended key usage) live in a dedicated "special" region; every other
 * extension lives in an open map keyed by canonical name. An identity is in
 * exactly one region, decided by resolveExtensionIdentity().
 */

import * as asn1js from "asn1js";
import {
  AuthorityKeyIdentifier,
  BasicConstraints,
  CertificatePolicies,
  CRLDistributionPoints,
  ExtKeyUsage,
  GeneralNames,
  InfoAccess,
  NameConstraints,
  PolicyConstraints,
  PolicyMappings,
  PrivateKeyUsagePeriod,
  SubjectDirectoryAttributes,
} from "pkijs";

import { EncodingError } from "../errors";

/** Anything PKI.js can turn into an ASN.1 block */
export interface SchemaEncodable {
  toSchema(): { toBER(sizeOnly?: boolean): ArrayBuffer };
}

export type ExtensionValue = asn1js.BaseBlock | SchemaEncodable;

export interface KnownExtensionValues {
  subject_directory_attributes: SubjectDirectoryAttributes;
  key_identifier: asn1js.OctetString;
  key_usage: asn1js.BitString;
  private_key_usage_period: PrivateKeyUsagePeriod;
  subject_alt_name: GeneralNames;
  issuer_alt_name: GeneralNames;
  basic_constraints: BasicConstraints;
  name_constraints: NameConstraints;
  crl_distribution_points: CRLDistributionPoints;
  certificate_policies: CertificatePolicies;
  policy_mappings: PolicyMappings;
  authority_key_identifier: AuthorityKeyIdentifier;
  policy_constraints: PolicyConstraints;
  extended_key_usage: ExtKeyUsage;
  freshest_crl: CRLDistributionPoints;
  inhibit_any_policy: asn1js.Integer;
  authority_information_access: InfoAccess;
  subject_information_access: InfoAccess;
  tls_feature: asn1js.Sequence;
  ocsp_no_check: asn1js.Null;
  netscape_certificate_type: ExtensionValue;
  signed_certificate_timestamp_list: ExtensionValue;
  microsoft_enroll_certtype: ExtensionValue;
}

export type KnownExtensionName = keyof KnownExtensionValues;

export type SpecialExtension =
  | { name: "basic_constraints"; value: BasicConstraints }
  | { name: "extended_key_usage"; value: ExtKeyUsage }
  | { name: "key_usage"; value: asn1js.BitString }
  | { name: "subject_alt_name"; value: GeneralNames };

export type SpecialExtensionName = SpecialExtension["name"];

/** Sorted by canonical name, which is also the order they are emitted in */
export const SPECIAL_EXTENSION_NAMES: readonly SpecialExtensionName[] = [
  "basic_constraints",
  "extended_key_usage",
  "key_usage",
  "subject_alt_name",
];

interface ValueShape {
  description: string;
  accepts(value: unknown): value is ExtensionValue;
}

export interface ExtensionIdentity {
  /** Canonical name, or the dotted OID for extensions without one */
  name: string;
  oid: string;
  shape: ValueShape;
}

export interface ExtensionEntry {
  name: string;
  oid: string;
  value: ExtensionValue;
}

export function isSchemaEncodable(value: unknown): value is SchemaEncodable {
  return (
    typeof value === "object" &&
    value !== null &&
    "toSchema" in value &&
    typeof value.toSchema === "function"
  );
}

const instanceShape = (
  ctor: abstract new (...args: never[]) => ExtensionValue,
  description: string,
): ValueShape => ({
  description,
  accepts: (value): value is ExtensionValue => value instanceof ctor,
});

const ANY_ASN1: ValueShape = {
  description: "an ASN.1 value",
  accepts: (value): value is ExtensionValue =>
    value instanceof asn1js.BaseBlock || isSchemaEncodable(value),
};

const TLS_FEATURES: ValueShape = {
  description: "asn1js.Sequence of asn1js.Integer",
  accepts: (value): value is ExtensionValue =>
    value instanceof asn1js.Sequence &&
    value.valueBlock.value.every((item) => item instanceof asn1js.Integer),
};

const IDENTITIES: readonly ExtensionIdentity[] = [
  {
    name: "subject_directory_attributes",
    oid: "2.5.29.9",
    shape: instanceShape(SubjectDirectoryAttributes, "SubjectDirectoryAttributes"),
  },
  {
    name: "key_identifier",
    oid: "2.5.29.14",
    shape: instanceShape(asn1js.OctetString, "asn1js.OctetString"),
  },
  {
    name: "key_usage",
    oid: "2.5.29.15",
    shape: instanceShape(asn1js.BitString, "asn1js.BitString"),
  },
  {
    name: "private_key_usage_period",
    oid: "2.5.29.16",
    shape: instanceShape(PrivateKeyUsagePeriod, "PrivateKeyUsagePeriod"),
  },
  {
    name: "subject_alt_name",
    oid: "2.5.29.17",
    shape: instanceShape(GeneralNames, "GeneralNames"),
  },
  { name: "issuer_alt_name", oid: "2.5.29.18", shape: instanceShape(GeneralNames, "GeneralNames") },
  {
    name: "basic_constraints",
    oid: "2.5.29.19",
    shape: instanceShape(BasicConstraints, "BasicConstraints"),
  },
  {
    name: "name_constraints",
    oid: "2.5.29.30",
    shape: instanceShape(NameConstraints, "NameConstraints"),
  },
  {
    name: "crl_distribution_points",
    oid: "2.5.29.31",
    shape: instanceShape(CRLDistributionPoints, "CRLDistributionPoints"),
  },
  {
    name: "certificate_policies",
    oid: "2.5.29.32",
    shape: instanceShape(CertificatePolicies, "CertificatePolicies"),
  },
  {
    name: "policy_mappings",
    oid: "2.5.29.33",
    shape: instanceShape(PolicyMappings, "PolicyMappings"),
  },
  {
    name: "authority_key_identifier",
    oid: "2.5.29.35",
    shape: instanceShape(AuthorityKeyIdentifier, "AuthorityKeyIdentifier"),
  },
  {
    name: "policy_constraints",
    oid: "2.5.29.36",
    shape: instanceShape(PolicyConstraints, "PolicyConstraints"),
  },
  {
    name: "extended_key_usage",
    oid: "2.5.29.37",
    shape: instanceShape(ExtKeyUsage, "ExtKeyUsage"),
  },
  {
    name: "freshest_crl",
    oid: "2.5.29.46",
    shape: instanceShape(CRLDistributionPoints, "CRLDistributionPoints"),
  },
  {
    name: "inhibit_any_policy",
    oid: "2.5.29.54",
    shape: instanceShape(asn1js.Integer, "asn1js.Integer"),
  },
  {
    name: "authority_information_access",
    oid: "1.3.6.1.5.5.7.1.1",
    shape: instanceShape(InfoAccess, "InfoAccess"),
  },
  {
    name: "subject_information_access",
    oid: "1.3.6.1.5.5.7.1.11",
    shape: instanceShape(InfoAccess, "InfoAccess"),
  },
  { name: "tls_feature", oid: "1.3.6.1.5.5.7.1.24", shape: TLS_FEATURES },
  {
    name: "ocsp_no_check",
    oid: "1.3.6.1.5.5.7.48.1.5",
    shape: instanceShape(asn1js.Null, "asn1js.Null"),
  },
  { name: "netscape_certificate_type", oid: "2.16.840.1.113730.1.1", shape: ANY_ASN1 },
  { name: "signed_certificate_timestamp_list", oid: "1.3.6.1.4.1.11129.2.4.2", shape: ANY_ASN1 },
  { name: "microsoft_enroll_certtype", oid: "1.3.6.1.4.1.311.20.2", shape: ANY_ASN1 },
];

const BY_NAME = new Map(IDENTITIES.map((i) => [i.name, i]));
const BY_OID = new Map(IDENTITIES.map((i) => [i.oid, i]));
const DOTTED_OID = /^[0-2](\.(0|[1-9]\d*))+$/;

/** Like resolveExtensionIdentity, but undefined for anything neither known nor a dotted OID */
export function findExtensionIdentity(identity: string): ExtensionIdentity | undefined {
  const known = BY_NAME.get(identity) ?? BY_OID.get(identity);
  if (known) return known;

  if (DOTTED_OID.test(identity)) {
    return { name: identity, oid: identity, shape: ANY_ASN1 };
  }
  return undefined;
}

/** Canonical name or dotted OID → identity; unknown OIDs keep the OID as their name */
export function resolveExtensionIdentity(identity: string): ExtensionIdentity {
  const found = findExtensionIdentity(identity);
  if (found) return found;

  throw new EncodingError(
    `Unknown extension identity ${JSON.stringify(identity)}; use a known name or a dotted OID`,
    "ENCODING_UNKNOWN_EXTENSION",
    { identity },
  );
}

export function isSpecialExtensionName(name: string): name is SpecialExtensionName {
  return SPECIAL_EXTENSION_NAMES.some((n) => n === name);
}

function toSpecialExtension(name: SpecialExtensionName, value: unknown): SpecialExtension | null {
  switch (name) {
    case "basic_constraints":
      return value instanceof BasicConstraints ? { name, value } : null;
    case "extended_key_usage":
      return value instanceof ExtKeyUsage ? { name, value } : null;
    case "key_usage":
      return value instanceof asn1js.BitString ? { name, value } : null;
    case "subject_alt_name":
      return value instanceof GeneralNames ? { name, value } : null;
  }
}

function isNamed<K extends SpecialExtensionName>(
  entry: SpecialExtension,
  name: K,
): entry is Extract<SpecialExtension, { name: K }> {
  return entry.name === name;
}

function describeValue(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "object" && value !== null) return value.constructor.name;
  return typeof value;
}

/** DER of an extension value, as carried inside extnValue */
export function encodeExtensionValue(value: ExtensionValue): ArrayBuffer {
  if (value instanceof asn1js.BaseBlock) {
    return value.toBER(false);
  }
  return value.toSchema().toBER(false);
}

export class ExtensionSet {
  private readonly special = new Map<SpecialExtensionName, SpecialExtension>();
  private readonly other = new Map<string, ExtensionValue>();

  /**
   * Set or clear (null) an extension by canonical name or dotted OID.
   * The value is checked against the ASN.1 shape for the identity before
   * anything is stored.
   */
  set<K extends KnownExtensionName>(identity: K, value: KnownExtensionValues[K] | null): void;
  set(identity: string, value: unknown): void;
  set(identity: string, value: unknown): void {
    const id = resolveExtensionIdentity(identity);
    const clear = value === null || value === undefined;

    if (isSpecialExtensionName(id.name)) {
      if (clear) {
        this.special.delete(id.name);
        return;
      }
      const entry = toSpecialExtension(id.name, value);
      if (!entry) throw this.shapeError(id, value);
      this.special.set(entry.name, entry);
      return;
    }

    if (clear) {
      this.other.delete(id.name);
      return;
    }
    if (!id.shape.accepts(value)) throw this.shapeError(id, value);
    this.other.set(id.name, value);
  }

  setSpecial(entry: SpecialExtension): void {
    this.special.set(entry.name, entry);
  }

  clearSpecial(name: SpecialExtensionName): void {
    this.special.delete(name);
  }

  getSpecial<K extends SpecialExtensionName>(
    name: K,
  ): Extract<SpecialExtension, { name: K }>["value"] | null {
    const entry = this.special.get(name);
    return entry && isNamed(entry, name) ? entry.value : null;
  }

  get(identity: string): ExtensionValue | null {
    const id = resolveExtensionIdentity(identity);
    if (isSpecialExtensionName(id.name)) {
      return this.special.get(id.name)?.value ?? null;
    }
    return this.other.get(id.name) ?? null;
  }

  isEmpty(): boolean {
    return this.special.size === 0 && this.other.size === 0;
  }

  /** Special extensions by name, then the others by name */
  entries(): ExtensionEntry[] {
    const out: ExtensionEntry[] = [];

    for (const name of SPECIAL_EXTENSION_NAMES) {
      const entry = this.special.get(name);
      if (entry) {
        out.push({ name, oid: resolveExtensionIdentity(name).oid, value: entry.value });
      }
    }

    for (const name of [...this.other.keys()].sort()) {
      const value = this.other.get(name);
      if (value) {
        out.push({ name, oid: resolveExtensionIdentity(name).oid, value });
      }
    }

    return out;
  }

  private shapeError(id: ExtensionIdentity, value: unknown): EncodingError {
    return new EncodingError(
      `value for ${id.name} must be ${id.shape.description}, not ${describeValue(value)}`,
      "ENCODING_SHAPE_MISMATCH",
      { extension: id.name, oid: id.oid },
    );
  }
}
