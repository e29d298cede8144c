import { ScanAbortedError } from "./model/error/ScanAbortedError.js";
import { ScanOptions } from "./model/scan.js";
import { ComputeControlPlane } from "./services/computeControlPlane.js";
import { createAccessTokenProvider } from "./services/credentials.js";
import { ControlPlaneClient } from "./services/interfaces/controlPlane.js";
import { runScanPipeline } from "./services/scanPipeline.js";
import { FrontEnd, ScanReport } from "./types/certificate.js";
import { log } from "./util/logger.js";

export function createControlPlaneClient(options: ScanOptions): ControlPlaneClient {
  return new ComputeControlPlane({
    credentials: createAccessTokenProvider({ accessToken: options.accessToken }),
    apiUrl: options.apiUrl,
    regions: options.regions,
    timeoutMs: options.timeoutMs,
  });
}

/**
 * Lists the project's front ends and classifies every linked certificate.
 * Only a failed listing aborts the scan; per-certificate failures end up as ERROR findings.
 */
export async function runCertificateScan(
  options: Pick<ScanOptions, "projectId" | "concurrency" | "timeoutMs" | "retries">,
  client: ControlPlaneClient,
  now: Date = new Date(),
): Promise<ScanReport> {
  log.info(`Scanning HTTPS load balancers in project: ${options.projectId}`);

  let frontEnds: FrontEnd[];
  try {
    frontEnds = await client.listFrontEnds(options.projectId);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ScanAbortedError(
      `Failed to list front ends of project ${options.projectId}: ${cause.message}`,
      options.projectId,
      cause,
    );
  }

  if (frontEnds.length === 0) {
    log.warn("No target HTTPS proxies found.");
  }

  const findings = await runScanPipeline(frontEnds, (ref, signal) => client.fetchCertificate(ref, signal), now, {
    concurrency: options.concurrency,
    timeoutMs: options.timeoutMs,
    retries: options.retries,
  });

  return {
    projectId: options.projectId,
    scannedAt: now,
    frontEndCount: frontEnds.length,
    findings,
  };
}
