/**
 * Criticality of requested extensions, from the SHOULD/MUST wording of
 * RFC 5280 and RFC 6960. Kept as a literal table so it can be audited on its own.
 */

export type CriticalityRule = boolean | "when-subject-empty" | "when-ca";

export const CRITICALITY_TABLE: Readonly<Record<string, CriticalityRule>> = {
  subject_alt_name: "when-subject-empty",
  basic_constraints: "when-ca",
  subject_directory_attributes: false,
  key_usage: true,
  issuer_alt_name: false,
  name_constraints: true,
  // EV certificates in the wild mark this non-critical for non-CA certs
  certificate_policies: false,
  policy_mappings: true,
  policy_constraints: true,
  extended_key_usage: false,
  inhibit_any_policy: true,
  subject_information_access: false,
  tls_feature: false,
  ocsp_no_check: false,
};

export interface CriticalityContext {
  subjectIsEmpty: boolean;
  ca: boolean | null;
}

/** Unlisted identities are non-critical */
export function determineCriticality(name: string, context: CriticalityContext): boolean {
  const rule = Object.hasOwn(CRITICALITY_TABLE, name) ? CRITICALITY_TABLE[name] : false;

  switch (rule) {
    case "when-subject-empty":
      return context.subjectIsEmpty;
    case "when-ca":
      return context.ca === true;
    default:
      return rule;
  }
}
