import type { Prospect } from '../prospects/prospectDb.js';
import { parseRawPayload } from '../prospects/prospectDb.js';
import { isPlainObject } from '../shared/utils.js';
import type { CrmPayload } from './crmClient.js';

function isBlank(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

function describe(prospect: Prospect): string {
  const lines: string[] = [];
  if (prospect.event_name) lines.push(`Event: ${prospect.event_name}`);
  if (prospect.event_date) lines.push(`Event Date: ${prospect.event_date}`);
  if (prospect.event_datetime) lines.push(`Event DateTime: ${prospect.event_datetime}`);
  if (prospect.source_name) lines.push(`Source: ${prospect.source_name}`);
  if (prospect.source_url) lines.push(`Source URL: ${prospect.source_url}`);
  if (prospect.notes) lines.push(prospect.notes);
  return lines.join('\n');
}

/**
 * Map a record onto the CRM lead payload. Operator defaults fill only keys
 * that are missing or empty; the record's own `raw_payload.crm` object is
 * overlaid last, so its extras win over both.
 */
export function buildCrmPayload(
  prospect: Prospect,
  defaults: Readonly<Record<string, unknown>> = {},
): CrmPayload {
  const payload: CrmPayload = {
    name: prospect.full_name || 'Unknown',
    email: prospect.email ?? '',
    phonenumber: prospect.phone_e164 || prospect.phone_raw,
    company: prospect.company,
    description: describe(prospect),
  };
  if (prospect.website) payload['website'] = prospect.website;

  for (const [key, value] of Object.entries(defaults)) {
    if (isBlank(value)) continue;
    if (isBlank(payload[key])) payload[key] = value;
  }

  const extra = parseRawPayload(prospect)['crm'];
  if (isPlainObject(extra)) {
    Object.assign(payload, extra);
  }

  return payload;
}

/**
 * Whether the record carries anything worth exporting.
 */
export function hasMeaningfulFields(prospect: Prospect): boolean {
  return [prospect.email ?? '', prospect.phone_e164, prospect.phone_raw, prospect.full_name, prospect.company, prospect.website]
    .some((value) => value.trim() !== '');
}

function idOf(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

/**
 * Dig the CRM-assigned id out of a create/update response. Modules differ:
 * `id`, `lead_id`, or either nested under `data` / `result`.
 */
export function extractExternalId(response: unknown): string {
  if (!isPlainObject(response)) return '';
  for (const key of ['id', 'lead_id'] as const) {
    const found = idOf(response[key]);
    if (found) return found;
  }
  for (const key of ['data', 'result'] as const) {
    const nested = response[key];
    if (isPlainObject(nested)) {
      const found = idOf(nested['id']) || idOf(nested['lead_id']);
      if (found) return found;
    } else {
      const found = idOf(nested);
      if (found) return found;
    }
  }
  return '';
}
