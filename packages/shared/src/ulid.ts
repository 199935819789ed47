/**
 * Identifier helpers.
 *
 * Device ids and recording uuids are RFC 4122 v4 UUIDs (they travel to
 * devices and end up in file names). Request ids and observer client ids are
 * ULIDs: time-sortable, which keeps correlation logs in order.
 */

import { randomUUID } from "node:crypto";
import { ulid, decodeTime } from "ulidx";

const ULID_REGEX = /^[0-9A-HJKMNP-TV-Z]{26}$/;
const UUID_REGEX =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

/** Generate a new ULID */
export function generateId(): string {
  return ulid();
}

/** Generate a new device id or recording uuid */
export function generateUuid(): string {
  return randomUUID();
}

export function isValidUlid(id: string): boolean {
  return ULID_REGEX.test(id);
}

export function isValidUuid(id: string): boolean {
  return UUID_REGEX.test(id);
}

/**
 * Extract the embedded timestamp from a ULID.
 * Throws if the ULID is malformed (use isValidUlid first to check).
 */
export function extractTimestamp(id: string): Date {
  return new Date(decodeTime(id));
}
