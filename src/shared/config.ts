import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getLeadlineDir, isPlainObject } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().default(3895),
      host: z.string().default('127.0.0.1'),
      trigger_secret: z.string().default(''),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.leadline/leadline.db'),
    })
    .default({}),

  scrape: z
    .object({
      user_agent: z.string().default('Mozilla/5.0 (compatible; leadline/0.1)'),
      default_region: z.string().length(2).optional(),
      default_timeout_seconds: z.number().int().positive().default(30),
      browser_timeout_factor: z.number().positive().default(2),
    })
    .default({}),

  enrich: z
    .object({
      delay_seconds: z.number().nonnegative().default(2),
      batch_limit: z.number().int().positive().default(50),
    })
    .default({}),

  dedup: z
    .object({
      match_by_content_hash: z.boolean().default(true),
      content_hash_scope: z.enum(['global', 'source']).default('global'),
    })
    .default({}),

  crm: z
    .object({
      enabled: z.boolean().default(false),
      base_url: z.string().default(''),
      token: z.string().default(''),
      timeout_ms: z.number().int().positive().default(20000),
      defaults: z.record(z.unknown()).default({}),
      max_retries: z.number().int().nonnegative().default(8),
      sweep_limit: z.number().int().positive().default(100),
    })
    .default({}),

  schedule: z
    .object({
      targets_cron: z.string().default('* * * * *'),
      sync_sweep_cron: z.string().default('*/5 * * * *'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Readonly<Config> | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (isPlainObject(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return Object.freeze(value);
}

function parseBool(value: string): boolean {
  return ['1', 'true', 't', 'yes', 'y', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Apply LEADLINE_* environment overrides onto a raw (unvalidated) config
 * object. Only process start reads the environment; the result is passed on.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const out = { ...rawConfig };

  const crmBaseUrl = env['LEADLINE_CRM_BASE_URL'];
  const crmToken = env['LEADLINE_CRM_TOKEN'];
  const crmEnabled = env['LEADLINE_CRM_ENABLED'];
  if (crmBaseUrl || crmToken || crmEnabled) {
    const crm: Record<string, unknown> = isPlainObject(out['crm']) ? { ...out['crm'] } : {};
    if (crmBaseUrl) crm['base_url'] = crmBaseUrl;
    if (crmToken) crm['token'] = crmToken;
    if (crmEnabled) crm['enabled'] = parseBool(crmEnabled);
    out['crm'] = crm;
  }

  const triggerSecret = env['LEADLINE_TRIGGER_SECRET'];
  if (triggerSecret) {
    const server: Record<string, unknown> = isPlainObject(out['server']) ? { ...out['server'] } : {};
    server['trigger_secret'] = triggerSecret;
    out['server'] = server;
  }

  return out;
}

export function parseConfig(rawConfig: Record<string, unknown>): Readonly<Config> {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return deepFreeze(parsed.data);
}

export async function loadConfig(force = false): Promise<Readonly<Config>> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('leadline', {
    searchPlaces: [
      'leadline.config.yaml',
      'leadline.config.yml',
      '.leadlinerc.yaml',
      '.leadlinerc.yml',
    ],
  });

  const envConfigPath = process.env['LEADLINE_CONFIG'];
  const defaultConfigPath = path.join(getLeadlineDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = result && isPlainObject(result.config) ? result.config : {};
  } else {
    const found = await explorer.search();
    if (found && isPlainObject(found.config)) {
      rawConfig = found.config;
    } else if (fs.existsSync(defaultConfigPath)) {
      const result = await explorer.load(defaultConfigPath);
      rawConfig = result && isPlainObject(result.config) ? result.config : {};
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  cachedConfig = parseConfig(applyEnvOverrides(rawConfig));
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

/**
 * The CRM integration is usable only when switched on and pointed at a server.
 */
export function crmReadiness(crm: Config['crm']): 'disabled' | 'not_configured' | 'ready' {
  if (!crm.enabled) return 'disabled';
  if (!crm.base_url.trim() || !crm.token.trim()) return 'not_configured';
  return 'ready';
}
