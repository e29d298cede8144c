import { FrontEnd, WorkItem } from "../types/certificate.js";

/**
 * Flattens front ends into one work item per linked certificate.
 * Order follows the listing and each front end's reference order; a certificate
 * referenced twice yields two items.
 */
export function resolveFrontEnds(frontEnds: readonly FrontEnd[]): WorkItem[] {
  return frontEnds.flatMap((frontEnd) =>
    frontEnd.certificateReferences.map((certificateRef) => ({ frontEnd, certificateRef })),
  );
}
