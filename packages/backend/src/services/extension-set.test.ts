import * as asn1js from "asn1js";
import { BasicConstraints, ExtKeyUsage, GeneralName, GeneralNames } from "pkijs";
import { describe, it, expect, beforeEach } from "vitest";

import { EncodingError } from "../errors";

import {
  encodeExtensionValue,
  ExtensionSet,
  findExtensionIdentity,
  resolveExtensionIdentity,
} from "./extension-set";

describe("resolveExtensionIdentity", () => {
  it("normalizes known OIDs to their canonical name", () => {
    expect(resolveExtensionIdentity("2.5.29.19").name).toBe("basic_constraints");
    expect(resolveExtensionIdentity("1.3.6.1.5.5.7.1.24").name).toBe("tls_feature");
  });

  it("keeps unknown dotted OIDs as their own name", () => {
    expect(resolveExtensionIdentity("1.3.6.1.4.1.99999.1")).toMatchObject({
      name: "1.3.6.1.4.1.99999.1",
      oid: "1.3.6.1.4.1.99999.1",
    });
  });

  it("rejects names that are neither known nor OIDs", () => {
    expect(() => resolveExtensionIdentity("subject_alternative_names")).toThrow(EncodingError);
    expect(() => resolveExtensionIdentity("1.2.")).toThrow(EncodingError);
  });

  it("has a non-throwing lookup", () => {
    expect(findExtensionIdentity("2.5.29.17")?.name).toBe("subject_alt_name");
    expect(findExtensionIdentity("subject_alternative_names")).toBeUndefined();
  });
});

describe("ExtensionSet", () => {
  let set: ExtensionSet;

  beforeEach(() => {
    set = new ExtensionSet();
  });

  it("routes special identities to their dedicated region", () => {
    set.set("2.5.29.19", new BasicConstraints({ cA: true }));
    expect(set.getSpecial("basic_constraints")?.cA).toBe(true);
    expect(set.get("basic_constraints")).toBeInstanceOf(BasicConstraints);
  });

  it("stores other identities in the open map and clears them with null", () => {
    set.set("inhibit_any_policy", new asn1js.Integer({ value: 0 }));
    expect(set.get("2.5.29.54")).toBeInstanceOf(asn1js.Integer);

    set.set("inhibit_any_policy", null);
    expect(set.get("inhibit_any_policy")).toBeNull();
    expect(set.isEmpty()).toBe(true);
  });

  it("rejects a value of the wrong shape and keeps the previous one", () => {
    const original = new BasicConstraints({ cA: false });
    set.set("basic_constraints", original);

    let caught: unknown;
    try {
      set.set("basic_constraints", new asn1js.Integer({ value: 1 }));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EncodingError);
    expect(caught).toMatchObject({
      code: "ENCODING_SHAPE_MISMATCH",
      message: "value for basic_constraints must be BasicConstraints, not Integer",
    });
    expect(set.getSpecial("basic_constraints")).toBe(original);
  });

  it("checks tls_feature is a sequence of integers", () => {
    expect(() =>
      set.set("tls_feature", new asn1js.Sequence({ value: [new asn1js.Utf8String({ value: "x" })] })),
    ).toThrow(EncodingError);

    set.set("tls_feature", new asn1js.Sequence({ value: [new asn1js.Integer({ value: 5 })] }));
    expect(set.get("tls_feature")).toBeInstanceOf(asn1js.Sequence);
  });

  it("accepts any ASN.1 value for unknown OIDs", () => {
    set.set("1.3.6.1.4.1.99999.1", new asn1js.Utf8String({ value: "hello" }));
    expect(set.get("1.3.6.1.4.1.99999.1")).toBeInstanceOf(asn1js.Utf8String);
    expect(() => set.set("1.3.6.1.4.1.99999.1", "hello")).toThrow(EncodingError);
  });

  it("lists special extensions first, then the others, each sorted by name", () => {
    set.set("ocsp_no_check", new asn1js.Null());
    set.set("1.3.6.1.4.1.99999.1", new asn1js.Null());
    set.set("subject_alt_name", new GeneralNames({ names: [new GeneralName({ type: 2, value: "a.test" })] }));
    set.set("inhibit_any_policy", new asn1js.Integer({ value: 0 }));
    set.set("basic_constraints", new BasicConstraints({ cA: false }));
    set.set("extended_key_usage", new ExtKeyUsage({ keyPurposes: ["1.3.6.1.5.5.7.3.1"] }));

    expect(set.entries().map((e) => e.name)).toEqual([
      "basic_constraints",
      "extended_key_usage",
      "subject_alt_name",
      "1.3.6.1.4.1.99999.1",
      "inhibit_any_policy",
      "ocsp_no_check",
    ]);
    expect(set.entries()[0].oid).toBe("2.5.29.19");
  });

  it("encodes pkijs objects and raw blocks to DER", () => {
    expect(Array.from(new Uint8Array(encodeExtensionValue(new asn1js.Null())))).toEqual([0x05, 0x00]);
    expect(
      Array.from(new Uint8Array(encodeExtensionValue(new BasicConstraints({ cA: true })))),
    ).toEqual([0x30, 0x03, 0x01, 0x01, 0xff]);
  });
});
