import { describe, it, expect } from "vitest";

import { determineCriticality } from "./criticality-policy";

const endEntity = { subjectIsEmpty: false, ca: false };

describe("determineCriticality", () => {
  it("marks subject_alt_name critical only for an empty subject", () => {
    expect(determineCriticality("subject_alt_name", endEntity)).toBe(false);
    expect(determineCriticality("subject_alt_name", { subjectIsEmpty: true, ca: false })).toBe(true);
  });

  it("marks basic_constraints critical only for CA requests", () => {
    expect(determineCriticality("basic_constraints", endEntity)).toBe(false);
    expect(determineCriticality("basic_constraints", { subjectIsEmpty: false, ca: true })).toBe(true);
    expect(determineCriticality("basic_constraints", { subjectIsEmpty: false, ca: null })).toBe(false);
  });

  it.each([
    "key_usage",
    "name_constraints",
    "policy_mappings",
    "policy_constraints",
    "inhibit_any_policy",
  ])("marks %s critical", (name) => {
    expect(determineCriticality(name, endEntity)).toBe(true);
  });

  it.each([
    "subject_directory_attributes",
    "issuer_alt_name",
    "certificate_policies",
    "extended_key_usage",
    "subject_information_access",
    "tls_feature",
    "ocsp_no_check",
  ])("marks %s non-critical", (name) => {
    expect(determineCriticality(name, endEntity)).toBe(false);
  });

  it("treats unlisted identities as non-critical", () => {
    expect(determineCriticality("authority_information_access", endEntity)).toBe(false);
    expect(determineCriticality("1.2.3.4.5", endEntity)).toBe(false);
    expect(determineCriticality("toString", endEntity)).toBe(false);
  });
});
