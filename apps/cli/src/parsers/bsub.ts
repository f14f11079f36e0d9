import type { BsubReceipt } from "@ftsub/shared";

const SUBMITTED_RE =
  /Job <(\d+)> is submitted to (?:default )?queue <([^>]+)>/;

/**
 * Parse the acknowledgement bsub prints on success.
 *
 * Expected output:
 *   Job <482913> is submitted to queue <gpu2>.
 *
 * Without -q LSF says "default queue" instead; both forms are accepted.
 * Returns null when the line is absent (rejected job, or bsub failed).
 */
export function parseBsubOutput(output: string): BsubReceipt | null {
  for (const line of output.split("\n")) {
    const match = line.match(SUBMITTED_RE);
    if (match?.[1] && match[2]) {
      return { jobId: match[1], queue: match[2] };
    }
  }
  return null;
}
