/**
 * Request ID generation using ULID
 *
 * ULID is used for request_id because it is time-sortable, which keeps
 * gatekeeper log lines in arrival order when grepped by id.
 */

import { ulid } from 'ulid';

export const REQUEST_ID_HEADER = 'x-request-id';

/** Longest inbound request id that is reused as-is */
const MAX_REQUEST_ID_LENGTH = 128;

/** Visible ASCII only, so the id is safe to echo and to log */
const REQUEST_ID_PATTERN = /^[\x21-\x7e]+$/;

/**
 * Generate a new request ID
 * @returns ULID string (26 characters)
 */
export function generateRequestId(): string {
  return ulid();
}

/**
 * Reuse a caller-supplied id when it is well formed, otherwise generate one
 */
export function resolveRequestId(inbound: string | string[] | undefined): string {
  const candidate = Array.isArray(inbound) ? inbound[0] : inbound;
  if (
    candidate !== undefined &&
    candidate.length <= MAX_REQUEST_ID_LENGTH &&
    REQUEST_ID_PATTERN.test(candidate)
  ) {
    return candidate;
  }
  return generateRequestId();
}
