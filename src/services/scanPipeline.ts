import pLimit from "p-limit";
import { SCAN_DEFAULTS } from "../constant.js";
import { TransientError } from "../model/error/ControlPlaneErrors.js";
import { TrackerError } from "../model/error/TrackerError.js";
import {
  CertificateRecord,
  CertificateRef,
  Finding,
  FrontEnd,
  isManagedCertificate,
  Severity,
  WorkItem,
} from "../types/certificate.js";
import { certificateNameFromRef } from "../util/certificateHelpers.js";
import { log } from "../util/logger.js";
import { parseCertificateRecord } from "./certificateParser.js";
import { classifyExpiry } from "./expiryClassifier.js";
import { resolveFrontEnds } from "./frontEndResolver.js";

/**
 * The signal aborts when the attempt times out
 */
export type FetchCertificate = (ref: CertificateRef, signal: AbortSignal) => Promise<CertificateRecord>;

export interface ScanPipelineOptions {
  /**
   * Maximum number of certificates fetched at the same time
   */
  concurrency?: number;
  /**
   * Upper bound for a single fetch attempt
   */
  timeoutMs?: number;
  /**
   * Additional attempts after a transient failure
   */
  retries?: number;
  /**
   * Delay before the first retry, doubled for every further one
   */
  backoffMs?: number;
}

/**
 * Produces one finding per (front end, certificate reference) pair, in resolver order.
 * A failure to fetch one certificate becomes an ERROR finding and never stops the others.
 */
export async function runScanPipeline(
  frontEnds: readonly FrontEnd[],
  fetchCertificate: FetchCertificate,
  now: Date,
  options: ScanPipelineOptions = {},
): Promise<Finding[]> {
  const concurrency = options.concurrency ?? SCAN_DEFAULTS.CONCURRENCY;
  const workItems = resolveFrontEnds(frontEnds);

  log.info(`Scanning ${workItems.length} certificate links on ${frontEnds.length} front ends`);

  const limit = pLimit(concurrency);

  // Promise.all keeps input order regardless of completion order
  return Promise.all(workItems.map((item) => limit(() => scanWorkItem(item, fetchCertificate, now, options))));
}

async function scanWorkItem(
  item: WorkItem,
  fetchCertificate: FetchCertificate,
  now: Date,
  options: ScanPipelineOptions,
): Promise<Finding> {
  const frontEndName = item.frontEnd.name;

  let record: CertificateRecord;
  try {
    record = await fetchWithRetry(item.certificateRef, fetchCertificate, options);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`Failed to fetch certificate ${item.certificateRef} for front end ${frontEndName}: ${message}`);

    return Object.freeze({
      frontEndName,
      certificateName: certificateNameFromRef(item.certificateRef),
      severity: Severity.Error,
      detail: message,
    });
  }

  const result = parseCertificateRecord(record);
  const severity = classifyExpiry(result, now);

  log.debug(`Front end ${frontEndName} certificate ${record.name}: ${severity}`);

  return Object.freeze({
    frontEndName,
    certificateName: record.name,
    isManaged: isManagedCertificate(record),
    expiresAt: result.ok ? result.expiresAt : undefined,
    severity,
    detail: result.ok ? undefined : result.reason,
  });
}

async function fetchWithRetry(
  ref: CertificateRef,
  fetchCertificate: FetchCertificate,
  options: ScanPipelineOptions,
): Promise<CertificateRecord> {
  const retries = options.retries ?? SCAN_DEFAULTS.RETRIES;
  const backoffMs = options.backoffMs ?? SCAN_DEFAULTS.BACKOFF_MS;
  const timeoutMs = options.timeoutMs ?? SCAN_DEFAULTS.TIMEOUT_MS;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fetchWithTimeout(ref, fetchCertificate, timeoutMs);
    } catch (error) {
      const retryable = error instanceof TrackerError && error.retryable;
      if (!retryable || attempt >= retries) {
        throw error;
      }

      const delay = Math.pow(2, attempt) * backoffMs;
      log.debug(`Retrying ${ref} in ${delay}ms (attempt ${attempt + 2} of ${retries + 1})`);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}

async function fetchWithTimeout(
  ref: CertificateRef,
  fetchCertificate: FetchCertificate,
  timeoutMs: number,
): Promise<CertificateRecord> {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      const error = new TransientError(`Request timed out after ${timeoutMs}ms`, ref);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fetchCertificate(ref, controller.signal), timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
