import { readFileSync } from 'node:fs';

import { z } from 'zod';

import { byteLength } from './comparative.js';

const EMAIL_BLACKLIST = new Set(['localhost', 'localhost.com', 'example.com']);
const emailSchema = z.string().email();

const PHONE_PATTERN = /^0\d{9}$/;
const GH_CARD_PATTERN = /^GHA-\d{9}-\d$/;
const GH_GPS_PATTERN = /^[A-Z]{2}-\d{1,4}-\d{4}$/;

const callingCodesSchema = z.object({
  callingCodes: z.array(z.string().regex(/^\d{1,3}$/)).min(1),
});

const { callingCodes } = callingCodesSchema.parse(
  JSON.parse(readFileSync(new URL('./calling-codes.json', import.meta.url), 'utf8'))
);
const PHONE_WITH_CODE_PATTERN = new RegExp(`^\\+(${callingCodes.join('|')})[0-9]{1,14}$`);

/**
 * `Display Name <local@domain>` yields the bracketed address; anything else
 * is taken as a bare address.
 */
function addrSpec(value: string): string {
  const trimmed = value.trim();
  const open = trimmed.lastIndexOf('<');
  if (trimmed.endsWith('>') && open !== -1) {
    return trimmed.slice(open + 1, -1);
  }
  return trimmed;
}

export function isNotEmail(value: string): boolean {
  const length = byteLength(value);
  if (length < 6 || length > 254) {
    return true;
  }

  const at = value.lastIndexOf('@');
  if (at <= 0 || at > value.length - 3) {
    return true;
  }

  if (EMAIL_BLACKLIST.has(value.slice(at + 1))) {
    return true;
  }

  if (byteLength(value.slice(0, at)) > 64) {
    return true;
  }

  return !emailSchema.safeParse(addrSpec(value)).success;
}

/** Local number: `0` followed by nine digits */
export function isNotPhone(value: string): boolean {
  return !PHONE_PATTERN.test(value);
}

/** `+`, a known calling code, then 1 to 14 digits */
export function isNotPhoneWithCode(value: string): boolean {
  return !PHONE_WITH_CODE_PATTERN.test(value);
}

/**
 * Usernames are an email address, an international phone number, or a
 * local phone number, picked by the first distinguishing character.
 */
export function isNotUsername(value: string): boolean {
  if (value.includes('@')) {
    return isNotEmail(value);
  }
  if (value.startsWith('+')) {
    return isNotPhoneWithCode(value);
  }
  return isNotPhone(value);
}

export function isNotGhCard(value: string): boolean {
  return !GH_CARD_PATTERN.test(value);
}

export function isNotGhGps(value: string): boolean {
  return !GH_GPS_PATTERN.test(value);
}

export const DATE_LAYOUTS = ['rfc3339', 'datetime', 'dateonly', 'timeonly'] as const;
export type DateLayout = (typeof DATE_LAYOUTS)[number];

export function isDateLayout(name: string): name is DateLayout {
  return (DATE_LAYOUTS as readonly string[]).includes(name);
}

// Layout shape is checked here; zod then checks the calendar date and clock time.
const RFC3339_LAYOUT = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2})(?:\.\d+)?(?:Z|[+-](\d{2}:\d{2}))$/;
const DATETIME_LAYOUT = /^(\d{4}-\d{2}-\d{2}) (\d{2}:\d{2}:\d{2})$/;
const DATE_LAYOUT = /^\d{4}-\d{2}-\d{2}$/;
const TIME_LAYOUT = /^\d{2}:\d{2}:\d{2}$/;

const calendarDateSchema = z.string().date();
const clockTimeSchema = z.string().time({ precision: 0 });

function isCalendarDate(value: string | undefined): boolean {
  return value !== undefined && DATE_LAYOUT.test(value) && calendarDateSchema.safeParse(value).success;
}

function isClockTime(value: string | undefined): boolean {
  return value !== undefined && TIME_LAYOUT.test(value) && clockTimeSchema.safeParse(value).success;
}

/**
 * Layouts:
 * - rfc3339  `2006-01-02T15:04:05Z`, fraction optional, `Z` or `±hh:mm`
 * - datetime `2006-01-02 15:04:05`
 * - dateonly `2006-01-02`
 * - timeonly `15:04:05`
 *
 * Dates must exist on the calendar (no Feb 30).
 */
export function isNotDatetime(value: string, layout: DateLayout): boolean {
  switch (layout) {
    case 'rfc3339': {
      const [, date, time, offset] = RFC3339_LAYOUT.exec(value) ?? [];
      if (!isCalendarDate(date) || !isClockTime(time)) return true;
      return offset !== undefined && !isClockTime(`${offset}:00`);
    }
    case 'datetime': {
      const [, date, time] = DATETIME_LAYOUT.exec(value) ?? [];
      return !isCalendarDate(date) || !isClockTime(time);
    }
    case 'dateonly':
      return !isCalendarDate(value);
    case 'timeonly':
      return !isClockTime(value);
  }
}
