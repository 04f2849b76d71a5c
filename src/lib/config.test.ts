import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfigFromEnv, resolveConfig } from './config.ts';
import { ConfigError } from './errors.ts';

describe('resolveConfig', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveConfig()).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.continuationLookahead).toBe(2);
  });

  it('replaces the overridden entries', () => {
    const config = resolveConfig({ metadataMarkers: ['LEGEND'] });
    expect(config.metadataMarkers).toEqual(['LEGEND']);
    expect(config.headerLabel).toBe('DOOR TYPE');
  });

  it('rejects invalid overrides', () => {
    expect(() => resolveConfig({ continuationLookahead: -1 })).toThrow(ConfigError);
    expect(() => resolveConfig({ headerLabel: '' })).toThrow('Invalid extraction config');
  });
});

describe('loadConfigFromEnv', () => {
  it('uses the defaults for an empty environment', () => {
    expect(loadConfigFromEnv({})).toEqual(DEFAULT_CONFIG);
  });

  it('appends extra markers, uppercased', () => {
    const config = loadConfigFromEnv({ DOOR_SCHEDULE_EXTRA_MARKERS: ' legend , ,key plan' });
    expect(config.metadataMarkers).toEqual([...DEFAULT_CONFIG.metadataMarkers, 'LEGEND', 'KEY PLAN']);
  });

  it('reads the continuation lookahead', () => {
    expect(loadConfigFromEnv({ DOOR_SCHEDULE_LOOKAHEAD: '3' }).continuationLookahead).toBe(3);
    expect(loadConfigFromEnv({ DOOR_SCHEDULE_LOOKAHEAD: '0' }).continuationLookahead).toBe(0);
  });

  it('rejects a lookahead that is not a whole number', () => {
    expect(() => loadConfigFromEnv({ DOOR_SCHEDULE_LOOKAHEAD: 'two' })).toThrow(
      'DOOR_SCHEDULE_LOOKAHEAD must be a non-negative integer, got "two"',
    );
    expect(() => loadConfigFromEnv({ DOOR_SCHEDULE_LOOKAHEAD: '1.5' })).toThrow(ConfigError);
  });
});
