import { parsePhoneNumberFromString, getCountries, type CountryCode } from 'libphonenumber-js/max';
import * as chrono from 'chrono-node';

export interface NormalizedPhone {
  raw: string;
  e164: string;
  region: string;
}

function toCountry(region: string | undefined): CountryCode | undefined {
  if (!region) return undefined;
  const upper = region.trim().toUpperCase();
  return getCountries().find((c) => c === upper);
}

/**
 * Parse a free-text phone number, using `defaultRegion` when it carries no
 * country code. Unparseable or structurally invalid numbers yield null.
 */
export function normalizePhone(raw: string, defaultRegion?: string): NormalizedPhone | null {
  const trimmed = (raw ?? '').trim();
  if (!trimmed) return null;

  const parsed = parsePhoneNumberFromString(trimmed, toCountry(defaultRegion));
  if (!parsed || !parsed.isValid()) return null;

  return {
    raw: trimmed,
    e164: parsed.number,
    region: parsed.country ?? '',
  };
}

/**
 * Parse ISO, RFC and casual human date/time text. Never throws.
 */
export function parseDateTime(text: string): Date | null {
  const value = (text ?? '').trim();
  if (!value) return null;
  try {
    const date = chrono.parseDate(value);
    return date && !Number.isNaN(date.getTime()) ? date : null;
  } catch {
    return null;
  }
}

/**
 * Calendar date (`YYYY-MM-DD`) exactly as written, without timezone shifts.
 */
export function parseDate(text: string): string | null {
  const value = (text ?? '').trim();
  if (!value) return null;
  try {
    const [first] = chrono.parse(value);
    if (!first) return null;
    const year = first.start.get('year');
    const month = first.start.get('month');
    const day = first.start.get('day');
    if (year === null || month === null || day === null) return null;
    return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
  } catch {
    return null;
  }
}

export interface EventWhen {
  date: string | null;
  datetime: string | null;
}

/**
 * Date plus, when the text states a time of day, the full timestamp (ISO).
 */
export function parseEventWhen(text: string): EventWhen {
  const value = (text ?? '').trim();
  if (!value) return { date: null, datetime: null };
  try {
    const [first] = chrono.parse(value);
    if (!first) return { date: null, datetime: null };
    const date = parseDate(value);
    const datetime = first.start.isCertain('hour') ? first.start.date().toISOString() : null;
    return { date, datetime };
  } catch {
    return { date: null, datetime: null };
  }
}
