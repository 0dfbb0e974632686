import { X509Certificate, SubjectAlternativeNameExtension } from "@peculiar/x509";

/**
 * Certificate subject information used for display
 */
export interface CertificateSubject {
  commonName?: string;
  organization?: string;
}

/**
 * Certificate validity check result
 */
export interface CertificateValidityResult {
  isValid: boolean;
  reason?: string;
}

/**
 * Format a certificate string as a proper PEM certificate
 * @param certBase64 Base64-encoded certificate
 * @returns Formatted PEM certificate
 */
export function formatPEM(certBase64?: string): string {
  if (!certBase64) return "";

  // Remove any whitespace from the base64 string
  const cleanBase64 = certBase64.replace(/\s+/g, "");

  const lines = cleanBase64.match(/.{1,64}/g) || [];
  return `-----BEGIN CERTIFICATE-----\n${lines.join("\n")}\n-----END CERTIFICATE-----`;
}

/**
 * Parse a certificate from PEM text or bare base64.
 * Persisted records keep PEM on one line with literal "\n" escapes; those are
 * unescaped first.
 */
export function parseCertificatePEM(certData: string): X509Certificate {
  let pem = certData.replace(/\\n/g, "\n").trim();

  if (!pem.includes("-----BEGIN CERTIFICATE-----")) {
    pem = formatPEM(pem);
  }

  try {
    return new X509Certificate(pem);
  } catch (error) {
    throw new Error(
      "Failed to parse certificate: " + (error instanceof Error ? error.message : String(error)),
    );
  }
}

/**
 * Extract the subject fields used for display
 */
export function extractSubject(cert: X509Certificate): CertificateSubject {
  const subjectName = cert.subjectName;
  return {
    commonName: subjectName.getField("CN")[0],
    organization: subjectName.getField("O")[0],
  };
}

/**
 * Extract the issuer's common name
 */
export function extractIssuerCommonName(cert: X509Certificate): string {
  return cert.issuerName.getField("CN")[0] ?? "";
}

/**
 * Display name for a CA: subject CN, else the first O, else ""
 */
export function getCertificateDisplayName(cert: X509Certificate): string {
  const { commonName, organization } = extractSubject(cert);
  if (commonName) {
    return commonName;
  }
  return organization || "";
}

/**
 * DNS names from the subjectAltName extension
 */
export function getDnsNames(cert: X509Certificate): string[] {
  const san = cert.getExtension(SubjectAlternativeNameExtension);
  if (!san) {
    return [];
  }
  return san.names.items.filter((name) => name.type === "dns").map((name) => name.value);
}

/**
 * Check if a certificate is valid at a specific time
 * @param cert The certificate
 * @param checkTime The time to check validity against (defaults to current time)
 */
export function checkCertificateValidity(
  cert: X509Certificate,
  checkTime: Date = new Date(),
): CertificateValidityResult {
  if (checkTime < cert.notBefore) {
    return {
      isValid: false,
      reason: `Certificate not yet valid. Valid from ${cert.notBefore.toISOString()}`,
    };
  }

  if (checkTime > cert.notAfter) {
    return {
      isValid: false,
      reason: `Certificate expired. Valid until ${cert.notAfter.toISOString()}`,
    };
  }

  return { isValid: true };
}
