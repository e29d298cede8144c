import { Finding, ScanReport, Severity } from "../../types/certificate.js";
import { renderFindingLine, renderJsonReport, renderTextReport, summarizeFindings } from "../reportRenderer.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");

const FINDINGS: Finding[] = [
  {
    frontEndName: "web",
    certificateName: "shop",
    isManaged: false,
    expiresAt: new Date("2026-03-06T12:00:00.000Z"),
    severity: Severity.ExpiringSoon,
  },
  { frontEndName: "web", certificateName: "managed", isManaged: true, severity: Severity.NotApplicable },
  { frontEndName: "api", certificateName: "gone", severity: Severity.Error, detail: "Resource not found: gone" },
];

const REPORT: ScanReport = { projectId: "shop-prod", scannedAt: NOW, frontEndCount: 2, findings: FINDINGS };

describe("reportRenderer", () => {
  describe("summarizeFindings", () => {
    it("should count every severity", () => {
      expect(summarizeFindings(FINDINGS)).toEqual({
        OK: 0,
        WARNING: 0,
        EXPIRING_SOON: 1,
        ERROR: 1,
        NOT_APPLICABLE: 1,
      });
    });
  });

  describe("renderFindingLine", () => {
    it("should render negative days for expired certificates", () => {
      const line = renderFindingLine(
        {
          frontEndName: "web",
          certificateName: "old",
          isManaged: false,
          expiresAt: new Date("2026-02-28T00:00:00.000Z"),
          severity: Severity.ExpiringSoon,
        },
        NOW,
      );

      expect(line).toBe(
        "EXPIRING_SOON | Front end: web | Certificate: old | Managed: false | Expiry: 2026-02-28T00:00:00.000Z | Days left: -1.5",
      );
    });

    it("should omit the detail of non-error findings", () => {
      const line = renderFindingLine(
        { frontEndName: "web", certificateName: "managed", isManaged: true, severity: Severity.NotApplicable },
        NOW,
      );
      expect(line).toBe("NOT_APPLICABLE | Front end: web | Certificate: managed | Managed: true | Expiry: -");
    });
  });

  describe("renderTextReport", () => {
    it("should render one line per finding and a summary", () => {
      expect(renderTextReport(REPORT)).toBe(
        [
          "TLS certificate expiry report for project shop-prod (2026-03-01T12:00:00.000Z)",
          "EXPIRING_SOON | Front end: web | Certificate: shop | Managed: false | Expiry: 2026-03-06T12:00:00.000Z | Days left: 5.0",
          "NOT_APPLICABLE | Front end: web | Certificate: managed | Managed: true | Expiry: -",
          "ERROR | Front end: api | Certificate: gone | Managed: unknown | Expiry: - | Detail: Resource not found: gone",
          "Summary: 2 front ends, 3 certificate links | OK: 0, WARNING: 0, EXPIRING_SOON: 1, ERROR: 1, NOT_APPLICABLE: 1",
          "",
        ].join("\n"),
      );
    });

    it("should say so when there are no front ends", () => {
      expect(renderTextReport({ projectId: "shop-prod", scannedAt: NOW, frontEndCount: 0, findings: [] })).toBe(
        [
          "TLS certificate expiry report for project shop-prod (2026-03-01T12:00:00.000Z)",
          "No target HTTPS proxies found.",
          "Summary: 0 front ends, 0 certificate links | OK: 0, WARNING: 0, EXPIRING_SOON: 0, ERROR: 0, NOT_APPLICABLE: 0",
          "",
        ].join("\n"),
      );
    });
  });

  describe("renderJsonReport", () => {
    it("should render ISO dates and null for unknown values", () => {
      const parsed = JSON.parse(renderJsonReport(REPORT));

      expect(parsed.projectId).toBe("shop-prod");
      expect(parsed.scannedAt).toBe("2026-03-01T12:00:00.000Z");
      expect(parsed.summary.ERROR).toBe(1);
      expect(parsed.findings).toEqual([
        {
          frontEndName: "web",
          certificateName: "shop",
          isManaged: false,
          expiresAt: "2026-03-06T12:00:00.000Z",
          severity: "EXPIRING_SOON",
        },
        {
          frontEndName: "web",
          certificateName: "managed",
          isManaged: true,
          expiresAt: null,
          severity: "NOT_APPLICABLE",
        },
        {
          frontEndName: "api",
          certificateName: "gone",
          isManaged: null,
          expiresAt: null,
          severity: "ERROR",
          detail: "Resource not found: gone",
        },
      ]);
    });

    it("should end with a newline", () => {
      expect(renderJsonReport(REPORT).endsWith("}\n")).toBe(true);
    });
  });
});
