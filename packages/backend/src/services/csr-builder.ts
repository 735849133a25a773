/**
 * PKCS#10 certificate request builder for keys held by a remote signer
 *
 * The private key never leaves the remote service: the builder fetches the
 * public key once, assembles the CertificationRequestInfo locally, and sends
 * its DER to the service for signing.
 *
 * @example
 * const builder = await CsrBuilder.create(client, { common_name: "example.org" }, "key-1");
 * builder.setSubjectAltDomains(["example.org", "www.example.org"]);
 * const result = await builder.build();
 * const pem = armorCertificationRequest(result);
 */

import {
  DEFAULT_HASH_ALGORITHM,
  DEFAULT_SIGNING_ALGORITHM,
  EXTENDED_KEY_USAGE_NAMES,
  KEY_USAGE_NAMES,
  generateShortId,
  isHashAlgorithm,
  isSigningAlgorithmName,
} from "@remote-csr/shared";
import * as asn1js from "asn1js";
import {
  AlgorithmIdentifier,
  Attribute,
  BasicConstraints,
  CertificationRequest,
  ExtKeyUsage,
  Extension,
  Extensions,
  GeneralName,
  GeneralNames,
  PublicKeyInfo,
} from "pkijs";

import { ConfigurationError, CsrError } from "../errors";
import { csrBackendLogger, logCsr } from "../logger";

import {
  bytesToIp,
  decodeNamedBitString,
  encodeNamedBitString,
  ipToBytes,
  toArrayBuffer,
} from "./asn1-utils";
import { determineCriticality } from "./criticality-policy";
import { encodeExtensionValue, ExtensionSet, findExtensionIdentity } from "./extension-set";
import { negotiateSigningProfile, paddingFromPreference } from "./signing-profile";
import { SubjectName } from "./subject-name";

import type { ExtensionValue, KnownExtensionName, KnownExtensionValues } from "./extension-set";
import type { PublicKeyResponse, RemoteSigningClient } from "./remote-signing-client";
import type { SigningProfile } from "./signing-profile";
import type { SubjectInput } from "./subject-name";
import type {
  ExtendedKeyUsageName,
  HashAlgorithm,
  KeyUsageName,
  LogEntry,
  LogLevel,
  RemoteKeyUsage,
  RsaPadding,
  SigningAlgorithmName,
} from "@remote-csr/shared";

export const OID_EXTENSION_REQUEST = "1.2.840.113549.1.9.14";
export const OID_ANY_EXTENDED_KEY_USAGE = "2.5.29.37.0";

const GENERAL_NAME_DNS = 2;
const GENERAL_NAME_IP = 7;

const DOTTED_OID = /^[0-2](\.(0|[1-9]\d*))+$/;
const IA5 = /^[\x00-\x7F]+$/;

/** server_auth → 1.3.6.1.5.5.7.3.1 … ocsp_signing → .9, then anyExtendedKeyUsage */
const EKU_OIDS = new Map<ExtendedKeyUsageName, string>(
  EXTENDED_KEY_USAGE_NAMES.map((name, i) => [
    name,
    name === "any_extended_key_usage" ? OID_ANY_EXTENDED_KEY_USAGE : `1.3.6.1.5.5.7.3.${i + 1}`,
  ]),
);
const EKU_NAMES = new Map([...EKU_OIDS].map(([name, oid]) => [oid, name]));

const isKeyUsageName = (value: string): value is KeyUsageName =>
  KEY_USAGE_NAMES.some((name) => name === value);

const isExtendedKeyUsageName = (value: string): value is ExtendedKeyUsageName =>
  EXTENDED_KEY_USAGE_NAMES.some((name) => name === value);

/** Public key of the remote key, fetched once per key id */
export interface PublicKeyReference {
  keyId: string;
  /** Key id as the remote service reports it, aliases resolved */
  remoteKeyId: string;
  publicKeyInfo: PublicKeyInfo;
  keyUsage: RemoteKeyUsage;
}

export interface CertificationRequestResult {
  readonly der: Uint8Array;
  /** DER of the CertificationRequestInfo that was signed */
  readonly tbsDer: Uint8Array;
  readonly signatureAlgorithm: AlgorithmIdentifier;
  readonly signingAlgorithm: SigningAlgorithmName;
  readonly signature: Uint8Array;
  readonly request: CertificationRequest;
}

async function lookupPublicKey(
  client: RemoteSigningClient,
  keyId: string,
): Promise<PublicKeyReference> {
  if (typeof keyId !== "string" || keyId.length === 0) {
    throw new ConfigurationError("keyId must be a non-empty string", "CONFIG_KEY_ID");
  }

  let response: PublicKeyResponse;
  try {
    response = await client.getPublicKey(keyId);
  } catch (error) {
    throw new ConfigurationError(`Could not fetch the public key of ${keyId}`, "CONFIG_KEY_LOOKUP", {
      cause: error,
      details: { keyId, remoteCode: error instanceof CsrError ? error.code : undefined },
    });
  }

  if (response.keyUsage !== "SIGN_VERIFY") {
    throw new ConfigurationError(
      `Key ${keyId} has usage ${response.keyUsage}; SIGN_VERIFY is required`,
      "CONFIG_KEY_USAGE",
      { details: { keyId, keyUsage: response.keyUsage } },
    );
  }

  const asn = asn1js.fromBER(toArrayBuffer(response.publicKey));
  if (asn.offset === -1) {
    throw new ConfigurationError(`Public key of ${keyId} is not valid DER`, "CONFIG_PUBLIC_KEY", {
      details: { keyId },
    });
  }

  let publicKeyInfo: PublicKeyInfo;
  try {
    publicKeyInfo = new PublicKeyInfo({ schema: asn.result });
  } catch (error) {
    throw new ConfigurationError(
      `Public key of ${keyId} is not a SubjectPublicKeyInfo`,
      "CONFIG_PUBLIC_KEY",
      { cause: error, details: { keyId } },
    );
  }

  return { keyId, remoteKeyId: response.keyId, publicKeyInfo, keyUsage: response.keyUsage };
}

export class CsrBuilder {
  private readonly client: RemoteSigningClient;
  private subject: SubjectName;
  private key: PublicKeyReference;
  private hashAlgo: HashAlgorithm = DEFAULT_HASH_ALGORITHM;
  private signingAlgorithm: SigningAlgorithmName = DEFAULT_SIGNING_ALGORITHM;
  private rsaPadding: RsaPadding = paddingFromPreference(DEFAULT_SIGNING_ALGORITHM);
  private readonly extensions = new ExtensionSet();
  private lastProfile: SigningProfile | null = null;

  private constructor(client: RemoteSigningClient, subject: SubjectName, key: PublicKeyReference) {
    this.client = client;
    this.subject = subject;
    this.key = key;
    this.setCa(false);
  }

  /**
   * Create a builder for a subject and a remote key.
   * Rejects with ConfigurationError when the key cannot be fetched or is not a signing key.
   */
  static async create(
    client: RemoteSigningClient,
    subject: SubjectInput,
    keyId: string,
  ): Promise<CsrBuilder> {
    const subjectName = SubjectName.from(subject);
    const key = await lookupPublicKey(client, keyId);
    return new CsrBuilder(client, subjectName, key);
  }

  // ── subject ──

  getSubject(): SubjectName {
    return this.subject;
  }

  setSubject(subject: SubjectInput): void {
    this.subject = SubjectName.from(subject);
  }

  // ── key ──

  getKeyId(): string {
    return this.key.keyId;
  }

  getPublicKeyInfo(): PublicKeyInfo {
    return this.key.publicKeyInfo;
  }

  /** Fetches the new key's public key; the builder is unchanged if that fails */
  async setKeyId(keyId: string): Promise<void> {
    this.key = await lookupPublicKey(this.client, keyId);
  }

  // ── algorithms ──

  getHashAlgo(): HashAlgorithm {
    return this.hashAlgo;
  }

  setHashAlgo(hash: string): void {
    if (!isHashAlgorithm(hash)) {
      throw new ConfigurationError(
        `Unsupported hash algorithm ${JSON.stringify(hash)}`,
        "CONFIG_HASH_ALGORITHM",
        { details: { hash } },
      );
    }
    this.hashAlgo = hash;
  }

  /** Preference only: for RSA keys it picks the padding, the hash comes from getHashAlgo() */
  getSigningAlgorithm(): SigningAlgorithmName {
    return this.signingAlgorithm;
  }

  setSigningAlgorithm(name: string): void {
    if (!isSigningAlgorithmName(name)) {
      throw new ConfigurationError(
        `Unsupported signing algorithm ${JSON.stringify(name)}`,
        "CONFIG_SIGNING_ALGORITHM",
        { details: { signingAlgorithm: name } },
      );
    }
    this.signingAlgorithm = name;
    this.rsaPadding = paddingFromPreference(name);
  }

  getRsaPadding(): RsaPadding {
    return this.rsaPadding;
  }

  setRsaPadding(padding: RsaPadding): void {
    if (padding !== "pss" && padding !== "pkcs1v15") {
      throw new ConfigurationError(`Unsupported RSA padding ${String(padding)}`, "CONFIG_RSA_PADDING");
    }
    this.rsaPadding = padding;
  }

  /** Profile negotiated by the most recent build(), if any */
  getLastSigningProfile(): SigningProfile | null {
    return this.lastProfile;
  }

  // ── basic constraints ──

  /** cA flag of basic constraints; null when the extension is absent */
  getCa(): boolean | null {
    const bc = this.extensions.getSpecial("basic_constraints");
    return bc ? bc.cA : null;
  }

  /**
   * true: CA request (keyCertSign, cRLSign, OCSP signing).
   * false: end-entity request (digitalSignature, keyEncipherment, TLS server and client).
   * null: drop basic constraints, leave the usages alone.
   */
  setCa(ca: boolean | null): void {
    if (ca === null) {
      this.extensions.clearSpecial("basic_constraints");
      return;
    }
    if (typeof ca !== "boolean") {
      throw new ConfigurationError("ca must be true, false or null", "CONFIG_CA");
    }

    this.extensions.setSpecial({ name: "basic_constraints", value: new BasicConstraints({ cA: ca }) });
    if (ca) {
      this.setKeyUsage(["key_cert_sign", "crl_sign"]);
      this.setExtendedKeyUsage(["ocsp_signing"]);
    } else {
      this.setKeyUsage(["digital_signature", "key_encipherment"]);
      this.setExtendedKeyUsage(["server_auth", "client_auth"]);
    }
  }

  // ── subject alternative name ──

  getSubjectAltDomains(): string[] {
    return this.sanNames()
      .filter((gn) => gn.type === GENERAL_NAME_DNS)
      .flatMap((gn): string[] => (typeof gn.value === "string" ? [gn.value] : []));
  }

  /** Replaces the DNS names; IP addresses already present are kept */
  setSubjectAltDomains(domains: readonly string[] | null): void {
    const list = domains ?? [];
    for (const domain of list) {
      if (typeof domain !== "string" || domain.length === 0 || !IA5.test(domain)) {
        throw new ConfigurationError(
          `subject alternative domain ${JSON.stringify(domain)} must be a non-empty ASCII string`,
          "CONFIG_SUBJECT_ALT_NAME",
        );
      }
    }

    const fresh = list.map((value) => new GeneralName({ type: GENERAL_NAME_DNS, value }));
    const kept = this.sanNames().filter((gn) => gn.type !== GENERAL_NAME_DNS);
    this.writeSan([...fresh, ...kept]);
  }

  getSubjectAltIps(): string[] {
    return this.sanNames()
      .filter((gn) => gn.type === GENERAL_NAME_IP)
      .flatMap((gn): string[] =>
        gn.value instanceof asn1js.OctetString ? [bytesToIp(gn.value.valueBlock.valueHexView)] : [],
      );
  }

  /** Replaces the IP addresses; DNS names already present are kept */
  setSubjectAltIps(ips: readonly string[] | null): void {
    const fresh = (ips ?? []).map((ip) => {
      const bytes = typeof ip === "string" ? ipToBytes(ip) : null;
      if (!bytes) {
        throw new ConfigurationError(
          `subject alternative IP ${JSON.stringify(ip)} is not an IPv4 or IPv6 address`,
          "CONFIG_SUBJECT_ALT_NAME",
        );
      }
      return new GeneralName({
        type: GENERAL_NAME_IP,
        value: new asn1js.OctetString({ valueHex: toArrayBuffer(bytes) }),
      });
    });
    const kept = this.sanNames().filter((gn) => gn.type !== GENERAL_NAME_IP);
    this.writeSan([...kept, ...fresh]);
  }

  private sanNames(): GeneralName[] {
    return this.extensions.getSpecial("subject_alt_name")?.names ?? [];
  }

  private writeSan(names: GeneralName[]): void {
    if (names.length === 0) {
      this.extensions.clearSpecial("subject_alt_name");
      return;
    }
    this.extensions.setSpecial({ name: "subject_alt_name", value: new GeneralNames({ names }) });
  }

  // ── key usage ──

  getKeyUsage(): Set<KeyUsageName> {
    const bits = this.extensions.getSpecial("key_usage");
    const out = new Set<KeyUsageName>();
    if (!bits) return out;
    for (const name of decodeNamedBitString(KEY_USAGE_NAMES, bits)) {
      if (isKeyUsageName(name)) out.add(name);
    }
    return out;
  }

  /** Empty or null removes the extension */
  setKeyUsage(usages: Iterable<string> | null): void {
    const list = usages ? [...usages] : [];
    const unknown = list.filter((u) => !isKeyUsageName(u));
    if (unknown.length > 0) {
      throw new ConfigurationError(`Unknown key usage ${unknown.join(", ")}`, "CONFIG_KEY_USAGE_FLAG", {
        details: { unknown, allowed: [...KEY_USAGE_NAMES] },
      });
    }

    if (list.length === 0) {
      this.extensions.clearSpecial("key_usage");
      return;
    }
    this.extensions.setSpecial({
      name: "key_usage",
      value: encodeNamedBitString(KEY_USAGE_NAMES, new Set(list)),
    });
  }

  // ── extended key usage ──

  /** Purpose names; purposes without a name are returned as dotted OIDs */
  getExtendedKeyUsage(): Set<string> {
    const eku = this.extensions.getSpecial("extended_key_usage");
    return new Set((eku?.keyPurposes ?? []).map((oid) => EKU_NAMES.get(oid) ?? oid));
  }

  /** Named purposes or dotted OIDs, in the order given; empty or null removes the extension */
  setExtendedKeyUsage(purposes: Iterable<string> | null): void {
    const oids: string[] = [];
    for (const purpose of purposes ?? []) {
      const oid = isExtendedKeyUsageName(purpose)
        ? EKU_OIDS.get(purpose)
        : DOTTED_OID.test(purpose)
          ? purpose
          : undefined;
      if (!oid) {
        throw new ConfigurationError(
          `Unknown extended key usage ${JSON.stringify(purpose)}`,
          "CONFIG_EXTENDED_KEY_USAGE",
          { details: { purpose, allowed: [...EXTENDED_KEY_USAGE_NAMES] } },
        );
      }
      if (!oids.includes(oid)) oids.push(oid);
    }

    if (oids.length === 0) {
      this.extensions.clearSpecial("extended_key_usage");
      return;
    }
    this.extensions.setSpecial({
      name: "extended_key_usage",
      value: new ExtKeyUsage({ keyPurposes: oids }),
    });
  }

  // ── arbitrary extensions ──

  /** Set (or clear with null) an extension by canonical name or dotted OID */
  setExtension<K extends KnownExtensionName>(identity: K, value: KnownExtensionValues[K] | null): void;
  setExtension(identity: string, value: unknown): void;
  setExtension(identity: string, value: unknown): void {
    this.extensions.set(identity, value);
  }

  getExtension(identity: string): ExtensionValue | null {
    return this.extensions.get(identity);
  }

  /** Pure lookup; identities the builder does not know are non-critical */
  determineCriticality(identity: string): boolean {
    return determineCriticality(findExtensionIdentity(identity)?.name ?? identity, {
      subjectIsEmpty: this.subject.isEmpty(),
      ca: this.getCa(),
    });
  }

  // ── build ──

  /**
   * Negotiate the algorithm, assemble and sign the request.
   * `keyId` defaults to the configured key; another reference (an alias) to the
   * same key may be given. Entries logged along the way are appended to `logs`.
   */
  async build(keyId: string = this.key.keyId, logs?: LogEntry[]): Promise<CertificationRequestResult> {
    const requestId = generateShortId();
    const started = Date.now();
    const log = (
      level: LogLevel,
      step: "negotiate" | "assemble" | "sign" | "encode",
      message: string,
      context: Record<string, unknown> = {},
    ): void => {
      const entry = csrBackendLogger.logBuildStep(level, "builder", step, message, requestId, {
        keyId,
        ...context,
      });
      logCsr(entry);
      logs?.push(entry);
    };

    const subject = this.subject.isEmpty() ? "(empty subject)" : this.subject.toString();
    log("info", "negotiate", `Building certificate request for ${subject}`);

    const description = await this.client.describeKey(keyId);
    if (description.keyId !== this.key.remoteKeyId) {
      throw new ConfigurationError(
        `Key ${keyId} is not the key whose public key is in the request (${this.key.keyId})`,
        "CONFIG_KEY_MISMATCH",
        { details: { keyId, expected: this.key.remoteKeyId, actual: description.keyId } },
      );
    }
    const profile = negotiateSigningProfile(
      keyId,
      description.signingAlgorithms,
      this.hashAlgo,
      this.rsaPadding,
    );
    this.lastProfile = profile;
    log("debug", "negotiate", `Negotiated ${profile.keyType.toUpperCase()} signature`, {
      signingAlgorithm: profile.remoteAlgorithm,
    });

    const tbs = this.assembleRequestInfo();
    const tbsDer = new Uint8Array(tbs.toBER(false));
    log("debug", "assemble", "Assembled certification request info", {
      extensionCount: this.extensions.entries().length,
      tbsSize: tbsDer.length,
    });

    const signed = await this.client.sign(keyId, profile.remoteAlgorithm, tbsDer);
    log("debug", "sign", "Remote signature received", {
      signingAlgorithm: profile.remoteAlgorithm,
      signatureSize: signed.signature.length,
    });

    const outer = new asn1js.Sequence({
      value: [
        tbs,
        profile.signatureAlgorithm.toSchema(),
        new asn1js.BitString({ valueHex: toArrayBuffer(signed.signature) }),
      ],
    });
    const der = new Uint8Array(outer.toBER(false));
    const request = new CertificationRequest({ schema: asn1js.fromBER(toArrayBuffer(der)).result });

    log("success", "encode", "Certificate request signed", {
      signingAlgorithm: profile.remoteAlgorithm,
      duration: Date.now() - started,
    });

    return Object.freeze({
      der,
      tbsDer,
      signatureAlgorithm: profile.signatureAlgorithm,
      signingAlgorithm: profile.remoteAlgorithm,
      signature: new Uint8Array(signed.signature),
      request,
    });
  }

  /** CertificationRequestInfo; the [0] attributes field is always present */
  private assembleRequestInfo(): asn1js.Sequence {
    const attributes: asn1js.Sequence[] = [];
    const entries = this.extensions.entries();

    if (entries.length > 0) {
      const extensions = new Extensions({
        extensions: entries.map(
          (entry) =>
            new Extension({
              extnID: entry.oid,
              critical: this.determineCriticality(entry.name),
              extnValue: encodeExtensionValue(entry.value),
            }),
        ),
      });
      attributes.push(
        new Attribute({ type: OID_EXTENSION_REQUEST, values: [extensions.toSchema()] }).toSchema(),
      );
    }

    return new asn1js.Sequence({
      value: [
        new asn1js.Integer({ value: 0 }),
        this.subject.toSchema(),
        this.key.publicKeyInfo.toSchema(),
        new asn1js.Constructed({ idBlock: { tagClass: 3, tagNumber: 0 }, value: attributes }),
      ],
    });
  }
}
