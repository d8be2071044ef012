import { describe, it, expect, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  ConfigSchema,
  applyEnvOverrides,
  crmReadiness,
  generateDefaultConfig,
  generateDefaultConfigYaml,
  loadConfig,
  parseConfig,
  resetConfigCache,
} from '../config.js';
import { ConfigError } from '../errors.js';

describe('ConfigSchema', () => {
  it('produces valid defaults from empty object', () => {
    const result = ConfigSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.server.port).toBe(3895);
      expect(result.data.server.trigger_secret).toBe('');
      expect(result.data.db.path).toBe('~/.leadline/leadline.db');
      expect(result.data.crm.enabled).toBe(false);
      expect(result.data.crm.max_retries).toBe(8);
      expect(result.data.dedup.match_by_content_hash).toBe(true);
      expect(result.data.dedup.content_hash_scope).toBe('global');
      expect(result.data.enrich).toEqual({ delay_seconds: 2, batch_limit: 50 });
    }
  });

  it('accepts valid overrides', () => {
    const result = ConfigSchema.safeParse({
      server: { port: 8080 },
      crm: { enabled: true, defaults: { status: 2 } },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.server.port).toBe(8080);
      expect(result.data.crm.defaults).toEqual({ status: 2 });
      // defaults still apply for other fields
      expect(result.data.server.host).toBe('127.0.0.1');
      expect(result.data.crm.timeout_ms).toBe(20000);
    }
  });

  it('rejects invalid types', () => {
    expect(ConfigSchema.safeParse({ server: { port: 'not-a-number' } }).success).toBe(false);
    expect(ConfigSchema.safeParse({ dedup: { content_hash_scope: 'page' } }).success).toBe(false);
    expect(ConfigSchema.safeParse({ scrape: { default_region: 'USA' } }).success).toBe(false);
  });
});

describe('parseConfig', () => {
  it('returns a deeply frozen config', () => {
    const config = parseConfig({ crm: { defaults: { source: 4 } } });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.crm)).toBe(true);
    expect(Object.isFrozen(config.crm.defaults)).toBe(true);
  });

  it('throws ConfigError on invalid input', () => {
    expect(() => parseConfig({ crm: { max_retries: -1 } })).toThrow(ConfigError);
  });
});

describe('applyEnvOverrides', () => {
  it('overlays CRM settings and the trigger secret', () => {
    const raw = applyEnvOverrides(
      { crm: { timeout_ms: 5000 } },
      {
        LEADLINE_CRM_BASE_URL: 'https://crm.example.test',
        LEADLINE_CRM_TOKEN: 'test-token',
        LEADLINE_CRM_ENABLED: 'yes',
        LEADLINE_TRIGGER_SECRET: 'test-secret',
      },
    );
    const config = parseConfig(raw);
    expect(config.crm.base_url).toBe('https://crm.example.test');
    expect(config.crm.token).toBe('test-token');
    expect(config.crm.enabled).toBe(true);
    expect(config.crm.timeout_ms).toBe(5000);
    expect(config.server.trigger_secret).toBe('test-secret');
  });

  it('leaves the raw config alone when no variables are set', () => {
    const raw = { server: { port: 1 } };
    expect(applyEnvOverrides(raw, {})).toEqual(raw);
  });

  it('parses falsy enable flags', () => {
    const raw = applyEnvOverrides({ crm: { enabled: true } }, { LEADLINE_CRM_ENABLED: 'off' });
    expect(parseConfig(raw).crm.enabled).toBe(false);
  });
});

describe('crmReadiness', () => {
  const crm = generateDefaultConfig().crm;

  it('is disabled when switched off', () => {
    expect(crmReadiness({ ...crm, base_url: 'https://crm.example.test', token: 't' })).toBe('disabled');
  });

  it('is not_configured without base URL or token', () => {
    expect(crmReadiness({ ...crm, enabled: true, token: 'test-token' })).toBe('not_configured');
    expect(crmReadiness({ ...crm, enabled: true, base_url: 'https://crm.example.test' })).toBe('not_configured');
  });

  it('is ready when enabled and configured', () => {
    expect(crmReadiness({ ...crm, enabled: true, base_url: 'https://crm.example.test', token: 'test-token' })).toBe(
      'ready',
    );
  });
});

describe('generateDefaultConfigYaml', () => {
  it('returns a YAML string', () => {
    const yaml = generateDefaultConfigYaml();
    expect(yaml).toContain('server:');
    expect(yaml).toContain('port: 3895');
    expect(yaml).toContain('crm:');
  });
});

describe('loadConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetConfigCache();
  });

  it('reads the file named by LEADLINE_CONFIG and applies env overrides', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'leadline-config-'));
    const file = path.join(dir, 'config.yaml');
    fs.writeFileSync(file, 'server:\n  port: 4100\ncrm:\n  base_url: https://crm.example.test\n');
    vi.stubEnv('LEADLINE_CONFIG', file);
    vi.stubEnv('LEADLINE_CRM_TOKEN', 'test-token');

    try {
      const config = await loadConfig(true);
      expect(config.server.port).toBe(4100);
      expect(config.crm.base_url).toBe('https://crm.example.test');
      expect(config.crm.token).toBe('test-token');
      expect(await loadConfig()).toBe(config);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('raises ConfigError for a missing LEADLINE_CONFIG file', async () => {
    vi.stubEnv('LEADLINE_CONFIG', path.join(os.tmpdir(), 'leadline-missing', 'config.yaml'));
    await expect(loadConfig(true)).rejects.toThrow(ConfigError);
  });
});
