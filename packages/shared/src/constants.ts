/**
 * Closed sets of names accepted across the CSR service
 */

export const HASH_ALGORITHMS = ["sha1", "sha256", "sha384", "sha512"] as const;

export const SIGNING_ALGORITHMS = [
  "RSASSA_PSS_SHA_256",
  "RSASSA_PSS_SHA_384",
  "RSASSA_PSS_SHA_512",
  "RSASSA_PKCS1_V1_5_SHA_256",
  "RSASSA_PKCS1_V1_5_SHA_384",
  "RSASSA_PKCS1_V1_5_SHA_512",
  "ECDSA_SHA_256",
  "ECDSA_SHA_384",
  "ECDSA_SHA_512",
] as const;

export const DEFAULT_HASH_ALGORITHM = "sha256";
export const DEFAULT_SIGNING_ALGORITHM = "RSASSA_PSS_SHA_256";

/** Bit positions follow the order of the KeyUsage BIT STRING in RFC 5280 */
export const KEY_USAGE_NAMES = [
  "digital_signature",
  "non_repudiation",
  "key_encipherment",
  "data_encipherment",
  "key_agreement",
  "key_cert_sign",
  "crl_sign",
  "encipher_only",
  "decipher_only",
] as const;

export const EXTENDED_KEY_USAGE_NAMES = [
  "server_auth",
  "client_auth",
  "code_signing",
  "email_protection",
  "ipsec_end_system",
  "ipsec_tunnel",
  "ipsec_user",
  "time_stamping",
  "ocsp_signing",
  "any_extended_key_usage",
] as const;

export const KEY_SPECS = [
  "RSA_2048",
  "RSA_3072",
  "RSA_4096",
  "ECC_NIST_P256",
  "ECC_NIST_P384",
  "ECC_NIST_P521",
] as const;

export const REMOTE_KEY_USAGES = ["SIGN_VERIFY", "ENCRYPT_DECRYPT"] as const;

export const CSR_PEM_LABEL = "CERTIFICATE REQUEST";
