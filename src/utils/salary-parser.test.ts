import { describe, it, expect } from 'vitest';
import { annualizeSalary, parseSalary } from './salary-parser.js';

describe('parseSalary', () => {
  it.each([
    ['$120,000 - $150,000 per year', 120000, 150000, 'annual'],
    ['$75/hour', 75, null, 'hourly'],
    ['Up to $200K annually', null, 200000, 'annual'],
    ['Starting from $90,000', 90000, null, 'annual'],
    ['Competitive salary', null, null, null],
    ['$100K - $130K', 100000, 130000, 'annual'],
    ['From $85,000 to $110,000', 85000, 110000, 'annual'],
  ])('parses "%s"', (text, min, max, period) => {
    const parsed = parseSalary(text);
    expect(parsed.min).toBe(min);
    expect(parsed.max).toBe(max);
    expect(parsed.period).toBe(period);
  });

  it('returns defaults for empty input', () => {
    expect(parseSalary('')).toEqual({ min: null, max: null, currency: 'USD', period: null, rawText: '' });
    expect(parseSalary(null).min).toBeNull();
  });

  it('detects the currency from symbols and codes', () => {
    expect(parseSalary('€4,500 - €5,500 per month')).toMatchObject({
      min: 4500,
      max: 5500,
      currency: 'EUR',
      period: 'monthly',
    });
    expect(parseSalary('GBP 45,000').currency).toBe('GBP');
  });

  it('accepts en and em dashes in ranges', () => {
    expect(parseSalary('$90k – $110k')).toMatchObject({ min: 90000, max: 110000 });
    expect(parseSalary('$90k—$110k')).toMatchObject({ min: 90000, max: 110000 });
  });

  it('infers the period from the amounts when none is stated', () => {
    expect(parseSalary('$25 - $35').period).toBe('hourly');
    expect(parseSalary('$5,000').period).toBe('monthly');
    expect(parseSalary('$95,000').period).toBe('annual');
  });

  it('keeps the raw text', () => {
    expect(parseSalary('$75/hour').rawText).toBe('$75/hour');
  });
});

describe('annualizeSalary', () => {
  it('scales each period to a year', () => {
    expect(annualizeSalary(50, 'hourly')).toBe(104000);
    expect(annualizeSalary(2000, 'weekly')).toBe(104000);
    expect(annualizeSalary(8000, 'monthly')).toBe(96000);
    expect(annualizeSalary(120000, 'annual')).toBe(120000);
  });

  it('treats a missing period as annual', () => {
    expect(annualizeSalary(99999.6, null)).toBe(100000);
  });
});
