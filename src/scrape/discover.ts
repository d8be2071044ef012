import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';
import { parseFieldSpec, parseTargetConfig } from './targetConfig.js';
import type { RenderMode } from './targetDb.js';

const PlatformSchema = z.object({
  domains: z.array(z.string()),
  render_mode: z.enum(['static', 'browser']).default('static'),
  run_every_minutes: z.number().int().positive().optional(),
  config: z.record(z.unknown()),
  /** Field selectors for a record's own detail page, same syntax as `config.fields`. */
  detail: z.record(z.string().trim().min(1)).default({}),
});

const PlatformTableSchema = z.record(PlatformSchema);

export type PlatformPreset = z.infer<typeof PlatformSchema>;
export type PlatformTable = Record<string, PlatformPreset>;

const GENERIC = 'generic';
const DEFAULT_INTERVAL_MINUTES = 120;

let cachedPlatforms: PlatformTable | null = null;

export function defaultPlatformsFile(): string {
  return path.join(getPackageRoot(), 'src', 'scrape', 'platforms.json');
}

/**
 * Selector presets for known event platforms, keyed by platform id. The
 * `generic` entry is the fallback for unknown sites.
 */
export function loadPlatforms(file: string = defaultPlatformsFile()): PlatformTable {
  if (cachedPlatforms && file === defaultPlatformsFile()) return cachedPlatforms;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Cannot read platform config ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = PlatformTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid platform config table', { errors: parsed.error.flatten().fieldErrors });
  }
  for (const [id, preset] of Object.entries(parsed.data)) {
    parseTargetConfig(preset.config);
    for (const [field, selector] of Object.entries(preset.detail)) parseFieldSpec(field, selector);
    logger.trace({ platform: id }, 'Platform preset loaded');
  }

  if (file === defaultPlatformsFile()) cachedPlatforms = parsed.data;
  return parsed.data;
}

function hostOf(url: string): string | null {
  try {
    return new URL(url).hostname.toLowerCase().replace(/^www\./, '');
  } catch {
    return null;
  }
}

/**
 * Platform id whose domain list covers the URL's host (subdomains included),
 * or null.
 */
export function detectPlatform(url: string, platforms: PlatformTable = loadPlatforms()): string | null {
  const host = hostOf(url);
  if (!host) return null;
  for (const [id, preset] of Object.entries(platforms)) {
    if (preset.domains.some((domain) => host === domain || host.endsWith(`.${domain}`))) {
      return id;
    }
  }
  return null;
}

export interface TargetSuggestion {
  platform: string | null;
  name: string;
  start_url: string;
  render_mode: RenderMode;
  run_every_minutes: number;
  config: Record<string, unknown>;
}

function defaultName(url: string): string {
  const host = hostOf(url) ?? '';
  const first = host.split('.')[0] ?? '';
  const label = first ? first.charAt(0).toUpperCase() + first.slice(1) : 'Discovered';
  return `Auto-${label}`;
}

/**
 * Build a ready-to-add target for a URL: the matching platform's preset
 * layered over the generic one.
 */
export function suggestTargetConfig(
  url: string,
  name?: string,
  platforms: PlatformTable = loadPlatforms(),
): TargetSuggestion {
  const generic = platforms[GENERIC];
  if (!generic) throw new ConfigError(`Platform config table has no "${GENERIC}" entry`);

  const platform = detectPlatform(url, platforms);
  const preset = platform ? platforms[platform] : undefined;

  if (preset) {
    logger.info({ platform, url }, 'Applied platform preset');
  } else {
    logger.info({ url }, 'No known platform detected, using generic preset');
  }

  return {
    platform,
    name: name ?? defaultName(url),
    start_url: url,
    render_mode: preset?.render_mode ?? generic.render_mode,
    run_every_minutes: preset?.run_every_minutes ?? generic.run_every_minutes ?? DEFAULT_INTERVAL_MINUTES,
    config: { ...generic.config, ...preset?.config },
  };
}
