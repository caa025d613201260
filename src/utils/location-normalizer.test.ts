import { describe, it, expect } from 'vitest';
import { isRemoteLocation, normalizeLocation, titleCase } from './location-normalizer.js';

describe('normalizeLocation', () => {
  it('maps aliases', () => {
    expect(normalizeLocation('SF')).toBe('San Francisco');
    expect(normalizeLocation('nyc')).toBe('New York');
    expect(normalizeLocation('WFH')).toBe('Remote');
  });

  it('expands state abbreviations after a city', () => {
    expect(normalizeLocation('  austin,   tx ')).toBe('Austin, Texas');
    expect(normalizeLocation('portland, OR')).toBe('Portland, Oregon');
  });

  it('title-cases unknown regions', () => {
    expect(normalizeLocation('berlin, germany')).toBe('Berlin, Germany');
    expect(normalizeLocation('st. louis')).toBe('St. Louis');
  });

  it('expands a bare state abbreviation', () => {
    expect(normalizeLocation('ca')).toBe('California');
  });

  it('returns null for empty input', () => {
    expect(normalizeLocation('')).toBeNull();
    expect(normalizeLocation('!!!')).toBeNull();
    expect(normalizeLocation(undefined)).toBeNull();
  });
});

describe('isRemoteLocation', () => {
  it('detects remote indicators', () => {
    expect(isRemoteLocation('Remote - US')).toBe(true);
    expect(isRemoteLocation('Work from home')).toBe(true);
    expect(isRemoteLocation('Austin, TX')).toBe(false);
    expect(isRemoteLocation(null)).toBe(false);
  });
});

describe('titleCase', () => {
  it('capitalizes each word', () => {
    expect(titleCase('SAN jose')).toBe('San Jose');
  });
});
