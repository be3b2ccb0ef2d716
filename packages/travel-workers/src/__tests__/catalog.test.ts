import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { ConfigError } from '@itinera/agent-contracts';
import { DEFAULT_CATALOG_PATH, DestinationCatalog, getDefaultCatalog } from '../catalog.js';

describe('DestinationCatalog', () => {
  const catalog = getDefaultCatalog();

  it('finds cities case-insensitively, ignoring surrounding spaces', () => {
    expect(catalog.find(' LISBON ')?.country).toBe('Portugal');
    expect(catalog.find('port vesper')?.countryCode).toBe('CL');
    expect(catalog.find('Atlantis')).toBeUndefined();
  });

  it('lists every city', () => {
    expect(catalog.cities()).toEqual(['Lisbon', 'Kyoto', 'Reykjavik', 'Cancun', 'Paris', 'Port Vesper']);
  });

  it('exposes cabin multipliers and exchange rates', () => {
    expect(catalog.cabinMultiplier('economy')).toBe(1);
    expect(catalog.cabinMultiplier('business')).toBe(3.4);
    expect(catalog.usdRate('eur')).toBe(0.92);
    expect(catalog.usdRate('ZZZ')).toBeUndefined();
  });

  it('describes advisory levels', () => {
    expect(catalog.advisoryDescription(1)).toBe('Exercise Normal Precautions');
    expect(catalog.advisoryDescription(4)).toBe('Do Not Travel');
    expect(catalog.advisoryDescription(9)).toBe('Unknown');
  });

  it('returns the same shared instance', () => {
    expect(getDefaultCatalog()).toBe(catalog);
  });

  it('rejects malformed data with a ConfigError', () => {
    expect(() => DestinationCatalog.fromData({ destinations: {} })).toThrow(ConfigError);
  });

  it('rejects a destination with the wrong number of monthly temperatures', () => {
    const raw: unknown = JSON.parse(readFileSync(DEFAULT_CATALOG_PATH, 'utf-8'));
    const broken: unknown = JSON.parse(JSON.stringify(raw).replace('"avgHighC":[15,16,19', '"avgHighC":[16,19'));
    expect(() => DestinationCatalog.fromData(broken)).toThrow('Invalid destination catalog');
  });

  it('reports a missing file as a ConfigError', () => {
    expect(() => DestinationCatalog.load('/nonexistent/destinations.json')).toThrow(
      'INVALID_CONFIG: Cannot read destination catalog at /nonexistent/destinations.json',
    );
  });
});
