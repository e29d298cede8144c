import { ABSENT_VALUE } from "../constant.js";
import { Finding, ScanReport, Severity } from "../types/certificate.js";
import { daysRemaining } from "./expiryClassifier.js";

export type SeveritySummary = Record<Severity, number>;

export function summarizeFindings(findings: readonly Finding[]): SeveritySummary {
  const summary: SeveritySummary = {
    [Severity.Ok]: 0,
    [Severity.Warning]: 0,
    [Severity.ExpiringSoon]: 0,
    [Severity.Error]: 0,
    [Severity.NotApplicable]: 0,
  };

  for (const finding of findings) {
    summary[finding.severity]++;
  }
  return summary;
}

function formatManaged(isManaged: boolean | undefined): string {
  return isManaged === undefined ? "unknown" : String(isManaged);
}

export function renderFindingLine(finding: Finding, now: Date): string {
  const parts = [
    finding.severity,
    `Front end: ${finding.frontEndName}`,
    `Certificate: ${finding.certificateName}`,
    `Managed: ${formatManaged(finding.isManaged)}`,
    `Expiry: ${finding.expiresAt ? finding.expiresAt.toISOString() : ABSENT_VALUE}`,
  ];

  if (finding.expiresAt) {
    parts.push(`Days left: ${daysRemaining(finding.expiresAt, now).toFixed(1)}`);
  }
  if (finding.severity === Severity.Error && finding.detail) {
    parts.push(`Detail: ${finding.detail}`);
  }

  return parts.join(" | ");
}

export function renderTextReport(report: ScanReport): string {
  const lines = [`TLS certificate expiry report for project ${report.projectId} (${report.scannedAt.toISOString()})`];

  if (report.frontEndCount === 0) {
    lines.push("No target HTTPS proxies found.");
  } else {
    lines.push(...report.findings.map((finding) => renderFindingLine(finding, report.scannedAt)));
  }

  const summary = summarizeFindings(report.findings);
  lines.push(
    `Summary: ${report.frontEndCount} front ends, ${report.findings.length} certificate links | ` +
      Object.entries(summary)
        .map(([severity, count]) => `${severity}: ${count}`)
        .join(", "),
  );

  return lines.join("\n") + "\n";
}

export function renderJsonReport(report: ScanReport): string {
  return (
    JSON.stringify(
      {
        projectId: report.projectId,
        scannedAt: report.scannedAt.toISOString(),
        frontEndCount: report.frontEndCount,
        summary: summarizeFindings(report.findings),
        findings: report.findings.map((finding) => ({
          frontEndName: finding.frontEndName,
          certificateName: finding.certificateName,
          isManaged: finding.isManaged ?? null,
          expiresAt: finding.expiresAt?.toISOString() ?? null,
          severity: finding.severity,
          ...(finding.detail ? { detail: finding.detail } : {}),
        })),
      },
      null,
      2,
    ) + "\n"
  );
}
