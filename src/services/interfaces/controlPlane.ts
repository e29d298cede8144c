import { CertificateRecord, CertificateRef, FrontEnd } from "../../types/certificate.js";

/**
 * Read-only view of the cloud control plane.
 *
 * Both calls reject with an AuthError, PermissionError or TransientError;
 * fetchCertificate additionally with a NotFoundError when the resource vanished
 * between listing and fetch.
 *
 * A signal passed to fetchCertificate replaces the client's own request timeout.
 */
export interface ControlPlaneClient {
  listFrontEnds(projectId: string): Promise<FrontEnd[]>;
  fetchCertificate(ref: CertificateRef, signal?: AbortSignal): Promise<CertificateRecord>;
}
