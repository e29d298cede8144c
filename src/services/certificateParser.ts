import { X509Certificate } from "crypto";
import { CertificateRecord, isManagedCertificate, ParseOutcome, ParseResult } from "../types/certificate.js";
import { extractLeafPem } from "../util/certificateHelpers.js";

/**
 * Extracts the "not valid after" instant of a certificate record.
 *
 * Managed certificates are renewed by the platform, so their material is never
 * inspected and the result is always {@link ParseOutcome.NotApplicable}.
 */
export function parseCertificateRecord(record: CertificateRecord): ParseResult {
  if (isManagedCertificate(record)) {
    return { ok: false, outcome: ParseOutcome.NotApplicable };
  }

  if (!record.rawMaterial || record.rawMaterial.trim() === "") {
    return { ok: false, outcome: ParseOutcome.Missing };
  }

  const leafPem = extractLeafPem(record.rawMaterial);
  if (!leafPem) {
    return { ok: false, outcome: ParseOutcome.Unparseable, reason: "No PEM encoded certificate found" };
  }

  try {
    const x509 = new X509Certificate(leafPem);
    const expiresAt = new Date(x509.validTo);

    if (Number.isNaN(expiresAt.getTime())) {
      return { ok: false, outcome: ParseOutcome.Unparseable, reason: `Invalid expiry date: ${x509.validTo}` };
    }

    return { ok: true, expiresAt };
  } catch (error) {
    return {
      ok: false,
      outcome: ParseOutcome.Unparseable,
      reason: `Error parsing certificate: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}
