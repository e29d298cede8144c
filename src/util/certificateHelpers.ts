import { GLOBAL_SCOPE, PEM_CERTIFICATE_PATTERN } from "../constant.js";
import { CertificateRef } from "../types/certificate.js";

export interface CertificateLocation {
  project: string;
  /**
   * "global" or a region name
   */
  scope: string;
  name: string;
}

const CERTIFICATE_REF_PATTERN = /\/projects\/([^/]+)\/(?:global|regions\/([^/]+))\/sslCertificates\/([^/?#]+)\/?$/;

/**
 * Last path segment of a certificate self link, or the reference itself if it has no slashes
 */
export function certificateNameFromRef(ref: CertificateRef): string {
  const segments = ref
    .split("/")
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);

  return segments.length > 0 ? segments[segments.length - 1] : ref;
}

/**
 * Split a certificate self link into project, scope and name
 * Returns undefined if the reference does not point at an SSL certificate resource
 */
export function parseCertificateRef(ref: CertificateRef): CertificateLocation | undefined {
  const match = CERTIFICATE_REF_PATTERN.exec(ref.trim());
  if (!match) {
    return undefined;
  }

  const [, project, region, name] = match;
  return {
    project,
    scope: region ?? GLOBAL_SCOPE,
    name,
  };
}

/**
 * First CERTIFICATE block of a PEM bundle; a chain lists the leaf first
 */
export function extractLeafPem(rawMaterial: string): string | undefined {
  const match = PEM_CERTIFICATE_PATTERN.exec(rawMaterial);
  return match ? match[0] : undefined;
}
