import { EXPIRY_THRESHOLDS, MS_PER_DAY } from "../constant.js";
import { ParseOutcome, ParseResult, Severity } from "../types/certificate.js";

/**
 * Fractional days between now and the expiry, negative once expired
 */
export function daysRemaining(expiresAt: Date, now: Date): number {
  return (expiresAt.getTime() - now.getTime()) / MS_PER_DAY;
}

export function classifyExpiry(result: ParseResult, now: Date): Severity {
  if (!result.ok) {
    return result.outcome === ParseOutcome.NotApplicable ? Severity.NotApplicable : Severity.Error;
  }

  const remainingMs = result.expiresAt.getTime() - now.getTime();

  // Already expired certificates land in the first band as well
  if (remainingMs < EXPIRY_THRESHOLDS.EXPIRING_SOON_DAYS * MS_PER_DAY) {
    return Severity.ExpiringSoon;
  }

  if (remainingMs < EXPIRY_THRESHOLDS.WARNING_DAYS * MS_PER_DAY) {
    return Severity.Warning;
  }

  return Severity.Ok;
}
