/**
 * Time zone normalization for date_histogram configurations.
 * @module time/zone
 */

import { IANAZone } from 'luxon';

/**
 * Region ids whose rules are a constant zero offset.
 */
const UTC_ZONE_IDS: ReadonlySet<string> = new Set([
  'Z',
  'UTC',
  'GMT',
  'UT',
  'UCT',
  'GMT0',
  'Universal',
  'Zulu',
  'Greenwich',
  'Etc/UTC',
  'Etc/GMT',
  'Etc/UCT',
  'Etc/Universal',
  'Etc/Zulu',
  'Etc/Greenwich',
  'Etc/GMT0',
  'Etc/GMT+0',
  'Etc/GMT-0',
]);

/**
 * Optional UTC/GMT/UT prefix, then a signed offset: +h, +hh, +hh:mm, +hhmm,
 * +hh:mm:ss or +hhmmss.
 */
const OFFSET_PATTERN = /^(?:UTC|GMT|UT)?([+-])(\d{1,2})(?::?(\d{2}))?(?::?(\d{2}))?$/;

const MAX_OFFSET_SECONDS = 18 * 3600;

/**
 * Returns the zone's fixed offset in seconds, or undefined when the zone is
 * a region whose offset is not fixed at zero or is not an offset at all.
 */
export function fixedOffsetSeconds(zone: string): number | undefined {
  const trimmed = zone.trim();
  if (UTC_ZONE_IDS.has(trimmed)) {
    return 0;
  }

  const match = OFFSET_PATTERN.exec(trimmed);
  if (!match) {
    return undefined;
  }

  const [, sign, hours, minutes, seconds] = match;
  const total =
    Number(hours) * 3600 + Number(minutes ?? '0') * 60 + Number(seconds ?? '0');
  if (total > MAX_OFFSET_SECONDS) {
    return undefined;
  }
  return sign === '-' ? -total : total;
}

/**
 * Whether the zone normalizes to UTC.
 */
export function isUtcTimeZone(zone: string): boolean {
  return fixedOffsetSeconds(zone) === 0;
}

/**
 * Whether the zone is an offset or a region id in the IANA database.
 */
export function isKnownTimeZone(zone: string): boolean {
  return fixedOffsetSeconds(zone) !== undefined || IANAZone.isValidZone(zone.trim());
}
