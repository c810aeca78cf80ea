import { ValidationError } from "../utils/errors.js";
import { wallTimeToEpoch } from "./event-shape.js";

const RRULE_PREFIX = /^RRULE:/i;
const RDATE_PREFIX = /^RDATE[:;]/i;
const BOUND_PART = /^(COUNT|UNTIL)=/i;
const TZID_PARAM = /^TZID=(.+)$/i;
const RDATE_VALUE = /^(\d{4})(\d{2})(\d{2})(?:T(\d{2})(\d{2})(\d{2})(Z)?)?$/i;
const DAY_MS = 24 * 60 * 60 * 1000;

/** True when the rules generate occurrences (an RRULE or RDATE line). */
export function hasRecurrenceRule(rules: readonly string[] | null | undefined): boolean {
  return (rules ?? []).some((rule) => RRULE_PREFIX.test(rule) || RDATE_PREFIX.test(rule));
}

/** RFC 5545 UTC date-time in basic format, e.g. 20260310T085959Z. */
export function formatUntil(instant: Date): string {
  return instant
    .toISOString()
    .replace(/\.\d{3}Z$/, "Z")
    .replace(/[-:]/g, "");
}

/**
 * Last instant covered by one RDATE value: the start of a date-time or period,
 * the end of the day for a date. Floating values are read in `timeZone`, or UTC.
 */
function rdateReach(value: string, timeZone: string | undefined): number {
  const match = RDATE_VALUE.exec(value.split("/")[0] ?? "");
  if (!match) {
    throw new ValidationError(`Unrecognised RDATE value "${value}"`);
  }
  const [, y, mo, d, h, mi, s, utc] = match;
  const wall = Date.UTC(
    Number(y),
    Number(mo) - 1,
    Number(d),
    Number(h ?? 0),
    Number(mi ?? 0),
    Number(s ?? 0),
  );
  const dateOnly = h === undefined;
  const at = (ms: number) => (utc || !timeZone ? ms : wallTimeToEpoch(ms, timeZone));
  return dateOnly ? at(wall + DAY_MS) - 1 : at(wall);
}

/** The RDATE line with values reaching `cutoffMs` or later removed; null when none remain. */
function trimRdate(rule: string, cutoffMs: number, timeZone: string | undefined): string | null {
  const colon = rule.indexOf(":");
  if (colon < 0) {
    throw new ValidationError(`Malformed RDATE line "${rule}"`);
  }
  const head = rule.slice(0, colon);
  const tzid = head
    .split(";")
    .slice(1)
    .map((param) => TZID_PARAM.exec(param)?.[1])
    .find((zone) => zone !== undefined);
  const zone = tzid ?? timeZone;

  const kept = rule
    .slice(colon + 1)
    .split(",")
    .filter((value) => value.length > 0 && rdateReach(value, zone) < cutoffMs);
  return kept.length > 0 ? `${head}:${kept.join(",")}` : null;
}

/**
 * Bounds the rules so that no occurrence at or after `cutoff` remains.
 *
 * COUNT and UNTIL are mutually exclusive in RFC 5545; both are dropped and
 * replaced by UNTIL one second before the cutoff (UNTIL is inclusive).
 * RDATE values at or after the cutoff are removed, and with them any line
 * left empty. EXRULE and EXDATE lines pass through unchanged.
 *
 * `timeZone` is the series' zone, used for RDATE values without TZID or Z.
 */
export function terminateBefore(
  rules: readonly string[],
  cutoff: Date | string,
  timeZone?: string,
): string[] {
  const cutoffMs = typeof cutoff === "string" ? Date.parse(cutoff) : cutoff.getTime();
  if (Number.isNaN(cutoffMs)) {
    throw new ValidationError(`Invalid cutoff "${String(cutoff)}"`);
  }
  // Occurrences are whole seconds; round a fractional cutoff up before stepping back.
  const untilMs = Math.ceil(cutoffMs / 1000) * 1000 - 1000;
  const until = formatUntil(new Date(untilMs));

  const bounded: string[] = [];
  for (const rule of rules) {
    if (RDATE_PREFIX.test(rule)) {
      const trimmed = trimRdate(rule, cutoffMs, timeZone);
      if (trimmed !== null) bounded.push(trimmed);
      continue;
    }
    if (!RRULE_PREFIX.test(rule)) {
      bounded.push(rule);
      continue;
    }
    const parts = rule
      .slice("RRULE:".length)
      .split(";")
      .filter((part) => part.length > 0 && !BOUND_PART.test(part));
    parts.push(`UNTIL=${until}`);
    bounded.push(`RRULE:${parts.join(";")}`);
  }
  return bounded;
}
