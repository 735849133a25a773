/**
 * Subject distinguished name for certificate requests
 *
 * Built from an attribute map ({ common_name: "example.org" }) or a
 * pre-built PKI.js RelativeDistinguishedNames. Attributes from a map are
 * emitted one per RDN, in the order of data/name-attributes.json.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import * as asn1js from "asn1js";
import { AttributeTypeAndValue, RelativeDistinguishedNames } from "pkijs";

import { ConfigurationError } from "../errors";

type StringKind = "utf8" | "printable" | "ia5";

export interface NameAttributeDefinition {
  name: string;
  oid: string;
  type: StringKind;
}

export type SubjectAttributes = Record<string, string>;

export type SubjectInput = SubjectName | RelativeDistinguishedNames | SubjectAttributes;

const __dirname = dirname(fileURLToPath(import.meta.url));

const isDefinition = (value: unknown): value is NameAttributeDefinition => {
  if (!value || typeof value !== "object") return false;
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.name === "string" &&
    typeof candidate.oid === "string" &&
    (candidate.type === "utf8" || candidate.type === "printable" || candidate.type === "ia5")
  );
};

const loadDefinitions = (): NameAttributeDefinition[] => {
  const raw: unknown = JSON.parse(
    readFileSync(join(__dirname, "../data/name-attributes.json"), "utf8"),
  );
  if (!Array.isArray(raw) || !raw.every(isDefinition)) {
    throw new Error("Invalid name attribute table");
  }
  return raw;
};

export const NAME_ATTRIBUTES: readonly NameAttributeDefinition[] = loadDefinitions();

const BY_NAME = new Map(NAME_ATTRIBUTES.map((d) => [d.name, d]));
const BY_OID = new Map(NAME_ATTRIBUTES.map((d) => [d.oid, d]));
const ORDER = new Map(NAME_ATTRIBUTES.map((d, i) => [d.name, i]));

const PRINTABLE = /^[A-Za-z0-9 '()+,\-./:=?]+$/;
const IA5 = /^[\x00-\x7F]+$/;
const COUNTRY = /^[A-Za-z]{2}$/;

function encodeValue(
  def: NameAttributeDefinition,
  value: string,
): asn1js.Utf8String | asn1js.PrintableString | asn1js.IA5String {
  switch (def.type) {
    case "printable":
      if (!PRINTABLE.test(value)) {
        throw new ConfigurationError(
          `subject ${def.name} must only contain PrintableString characters, not ${JSON.stringify(value)}`,
          "CONFIG_SUBJECT",
          { details: { attribute: def.name } },
        );
      }
      return new asn1js.PrintableString({ value });
    case "ia5":
      if (!IA5.test(value)) {
        throw new ConfigurationError(
          `subject ${def.name} must be ASCII, not ${JSON.stringify(value)}`,
          "CONFIG_SUBJECT",
          { details: { attribute: def.name } },
        );
      }
      return new asn1js.IA5String({ value });
    default:
      return new asn1js.Utf8String({ value });
  }
}

export class SubjectName {
  private readonly rdn: RelativeDistinguishedNames;

  private constructor(rdn: RelativeDistinguishedNames) {
    this.rdn = rdn;
  }

  /**
   * Build a subject from attribute names to unicode strings.
   * Common keys: country_name, state_or_province_name, locality_name,
   * organization_name, common_name. See data/name-attributes.json for the rest.
   */
  static fromAttributes(attributes: SubjectAttributes): SubjectName {
    const entries = Object.entries(attributes);

    for (const [name, value] of entries) {
      if (!BY_NAME.has(name)) {
        throw new ConfigurationError(`Unknown subject attribute ${name}`, "CONFIG_SUBJECT", {
          details: { attribute: name },
        });
      }
      if (typeof value !== "string" || value.length === 0) {
        throw new ConfigurationError(
          `subject ${name} must be a non-empty string`,
          "CONFIG_SUBJECT",
          { details: { attribute: name } },
        );
      }
      if ((name === "country_name" || name === "incorporation_country") && !COUNTRY.test(value)) {
        throw new ConfigurationError(
          `subject ${name} must be a two-letter country code, not ${JSON.stringify(value)}`,
          "CONFIG_SUBJECT",
          { details: { attribute: name } },
        );
      }
    }

    entries.sort(([a], [b]) => (ORDER.get(a) ?? 0) - (ORDER.get(b) ?? 0));

    const rdns = entries.map(([name, value]) => {
      const def = BY_NAME.get(name);
      if (!def) throw new ConfigurationError(`Unknown subject attribute ${name}`, "CONFIG_SUBJECT");
      const tv = new AttributeTypeAndValue({ type: def.oid, value: encodeValue(def, value) });
      return new asn1js.Set({ value: [tv.toSchema()] });
    });

    return SubjectName.decode(new asn1js.Sequence({ value: rdns }));
  }

  /**
   * Takes a private copy so later changes to the caller's object do not leak in.
   * Empty RDN sets are dropped: a Name with no attributes encodes as an empty SEQUENCE.
   */
  static fromRelativeDistinguishedNames(rdn: RelativeDistinguishedNames): SubjectName {
    const asn = asn1js.fromBER(rdn.toSchema().toBER(false));
    if (asn.offset === -1 || !(asn.result instanceof asn1js.Sequence)) {
      throw new ConfigurationError("subject name could not be encoded", "CONFIG_SUBJECT");
    }
    const rdns = asn.result.valueBlock.value.filter(
      (set) => !(set instanceof asn1js.Set) || set.valueBlock.value.length > 0,
    );
    return SubjectName.decode(new asn1js.Sequence({ value: rdns }));
  }

  // PKI.js re-emits the decoded bytes, so the RDN layout of `name` is kept as is
  private static decode(name: asn1js.Sequence): SubjectName {
    const asn = asn1js.fromBER(name.toBER(false));
    if (asn.offset === -1) {
      throw new ConfigurationError("subject name could not be encoded", "CONFIG_SUBJECT");
    }
    return new SubjectName(new RelativeDistinguishedNames({ schema: asn.result }));
  }

  static from(input: SubjectInput): SubjectName {
    if (input instanceof SubjectName) return input;
    if (input instanceof RelativeDistinguishedNames) {
      return SubjectName.fromRelativeDistinguishedNames(input);
    }
    if (typeof input !== "object" || input === null || Array.isArray(input)) {
      throw new ConfigurationError(
        "subject must be a SubjectName, a RelativeDistinguishedNames or an attribute map",
        "CONFIG_SUBJECT",
      );
    }
    return SubjectName.fromAttributes(input);
  }

  /** Number of attributes */
  get length(): number {
    return this.rdn.typesAndValues.length;
  }

  isEmpty(): boolean {
    return this.length === 0;
  }

  /** First value of the attribute, by name or dotted OID */
  get(nameOrOid: string): string | undefined {
    const oid = BY_NAME.get(nameOrOid)?.oid ?? nameOrOid;
    const tv = this.rdn.typesAndValues.find((t) => t.type === oid);
    return tv ? tv.value.valueBlock.value : undefined;
  }

  /** Attribute map; attributes with no known name are keyed by OID */
  toAttributes(): SubjectAttributes {
    const out: SubjectAttributes = {};
    for (const tv of this.rdn.typesAndValues) {
      const key = BY_OID.get(tv.type)?.name ?? tv.type;
      if (!(key in out)) out[key] = tv.value.valueBlock.value;
    }
    return out;
  }

  toSchema(): asn1js.Sequence {
    return this.rdn.toSchema();
  }

  /** Short form for logs, e.g. "country_name=FR, common_name=example.org" */
  toString(): string {
    return Object.entries(this.toAttributes())
      .map(([k, v]) => `${k}=${v}`)
      .join(", ");
  }
}
