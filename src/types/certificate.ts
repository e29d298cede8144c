/**
 * Opaque handle the control plane uses for a certificate resource (its self link)
 */
export type CertificateRef = string;

export interface FrontEnd {
  name: string;
  /**
   * "global" or the region the front end lives in
   */
  scope: string;
  certificateReferences: CertificateRef[];
}

export interface ManagedCertificate {
  kind: "managed";
  name: string;
  rawMaterial?: string;
}

export interface SelfManagedCertificate {
  kind: "self-managed";
  name: string;
  /**
   * PEM encoded certificate body, possibly followed by its chain
   */
  rawMaterial?: string;
}

export type CertificateRecord = ManagedCertificate | SelfManagedCertificate;

export function isManagedCertificate(record: CertificateRecord): record is ManagedCertificate {
  return record.kind === "managed";
}

export enum ParseOutcome {
  NotApplicable = "not-applicable",
  Missing = "missing",
  Unparseable = "unparseable",
}

export type ParseResult = { ok: true; expiresAt: Date } | { ok: false; outcome: ParseOutcome; reason?: string };

export enum Severity {
  Ok = "OK",
  Warning = "WARNING",
  ExpiringSoon = "EXPIRING_SOON",
  Error = "ERROR",
  NotApplicable = "NOT_APPLICABLE",
}

export interface WorkItem {
  frontEnd: FrontEnd;
  certificateRef: CertificateRef;
}

export interface Finding {
  readonly frontEndName: string;
  readonly certificateName: string;
  /**
   * Unknown when the certificate could not be fetched
   */
  readonly isManaged?: boolean;
  readonly expiresAt?: Date;
  readonly severity: Severity;
  readonly detail?: string;
}

export interface ScanReport {
  projectId: string;
  scannedAt: Date;
  frontEndCount: number;
  findings: Finding[];
}
