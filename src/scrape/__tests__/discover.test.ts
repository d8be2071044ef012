import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { detectPlatform, loadPlatforms, suggestTargetConfig, type PlatformTable } from '../discover.js';
import { parseTargetConfig } from '../targetConfig.js';
import { ConfigError } from '../../shared/errors.js';

describe('detectPlatform', () => {
  it('matches known hosts and their subdomains', () => {
    expect(detectPlatform('https://www.eventbrite.com/d/online/events/')).toBe('eventbrite');
    expect(detectPlatform('https://www.eventbrite.co.uk/d/london/events/')).toBe('eventbrite');
    expect(detectPlatform('https://m.facebook.com/events/')).toBe('facebook');
    expect(detectPlatform('https://WWW.MEETUP.COM/find/')).toBe('meetup');
  });

  it('does not match lookalike hosts or bad URLs', () => {
    expect(detectPlatform('https://notfacebook.com/events')).toBeNull();
    expect(detectPlatform('https://fairs.example.test/')).toBeNull();
    expect(detectPlatform('not a url')).toBeNull();
  });
});

describe('suggestTargetConfig', () => {
  it('layers the platform preset over the generic one', () => {
    const suggestion = suggestTargetConfig('https://www.meetup.com/find/?keywords=fair');

    expect(suggestion.platform).toBe('meetup');
    expect(suggestion.name).toBe('Auto-Meetup');
    expect(suggestion.render_mode).toBe('browser');
    expect(suggestion.run_every_minutes).toBe(120);
    expect(suggestion.config['max_pages']).toBe(3);
    expect(suggestion.config['timeout_seconds']).toBe(45);
    expect(suggestion.config['wait_until']).toBe('networkidle');
    expect(() => parseTargetConfig(suggestion.config)).not.toThrow();
  });

  it('falls back to the generic preset for unknown sites', () => {
    const suggestion = suggestTargetConfig('https://fairs.example.test/calendar', 'County Fairs');
    const generic = loadPlatforms()['generic'];

    expect(suggestion).toEqual({
      platform: null,
      name: 'County Fairs',
      start_url: 'https://fairs.example.test/calendar',
      render_mode: 'static',
      run_every_minutes: 120,
      config: generic?.config,
    });
  });

  it('names unknown sites after the first host label', () => {
    expect(suggestTargetConfig('https://www.fairs.example.test/').name).toBe('Auto-Fairs');
  });

  it('requires a generic entry', () => {
    const table: PlatformTable = {
      only: {
        domains: ['only.example.test'],
        render_mode: 'static',
        config: { item_selector: '.x', fields: { a: 'b' } },
        detail: {},
      },
    };
    expect(() => suggestTargetConfig('https://only.example.test/', undefined, table)).toThrow(ConfigError);
  });
});

describe('loadPlatforms', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'leadline-platforms-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('validates every preset config', () => {
    expect(Object.keys(loadPlatforms())).toContain('ticketmaster');
  });

  it('rejects presets with broken selector configs', () => {
    const file = path.join(dir, 'platforms.json');
    fs.writeFileSync(file, JSON.stringify({ generic: { domains: [], config: { fields: {} } } }));
    expect(() => loadPlatforms(file)).toThrow(ConfigError);
  });

  it('rejects presets with broken detail selectors', () => {
    const file = path.join(dir, 'platforms.json');
    const config = { item_selector: '.x', fields: { a: 'b' } };
    fs.writeFileSync(file, JSON.stringify({ generic: { domains: [], config, detail: { company: '' } } }));
    expect(() => loadPlatforms(file)).toThrow(ConfigError);
  });

  it('rejects unreadable files', () => {
    expect(() => loadPlatforms(path.join(dir, 'missing.json'))).toThrow(/Cannot read platform config/);
  });
});
