import type { SalaryPeriod } from '../core/types.js';

export interface ParsedSalary {
  min: number | null;
  max: number | null;
  currency: string;
  period: SalaryPeriod | null;
  rawText: string;
}

const CURRENCY_MARKERS: Array<[RegExp, string]> = [
  [/\$/, 'USD'],
  [/€/, 'EUR'],
  [/£/, 'GBP'],
  [/¥/, 'JPY'],
  [/\busd\b/, 'USD'],
  [/\beur\b/, 'EUR'],
  [/\bgbp\b/, 'GBP'],
  [/\bjpy\b/, 'JPY'],
];

const PERIOD_MARKERS: Array<[RegExp, SalaryPeriod]> = [
  [/\b(?:hours?|hrs?|hourly)\b/, 'hourly'],
  [/\b(?:years?|annual|annually|annum|yearly)\b/, 'annual'],
  [/\b(?:months?|monthly)\b/, 'monthly'],
  [/\b(?:weeks?|weekly)\b/, 'weekly'],
];

// "120,000" / "75.50" / "200k"
const AMOUNT = String.raw`[$€£¥]?\s*(\d+(?:,\d{3})*(?:\.\d+)?)(k)?\b`;

const RANGE_PATTERNS = [
  new RegExp(`${AMOUNT}\\s*[-–—]\\s*${AMOUNT}`),
  new RegExp(`${AMOUNT}\\s+to\\s+${AMOUNT}`),
];
const UP_TO_PATTERN = new RegExp(`\\bup\\s+to\\s+${AMOUNT}`);
const FROM_PATTERN = new RegExp(`\\b(?:from|starting)(?:\\s+(?:at|from))?\\s+${AMOUNT}`);
const SINGLE_PATTERN = new RegExp(AMOUNT);

const HOURS_PER_YEAR = 2080;

function toAmount(digits: string | undefined, suffix: string | undefined): number | null {
  if (digits === undefined) {
    return null;
  }
  const value = Number(digits.replace(/,/g, ''));
  if (!Number.isFinite(value)) {
    return null;
  }
  return suffix ? value * 1000 : value;
}

function inferPeriod(amounts: number[]): SalaryPeriod | null {
  if (amounts.length === 0) {
    return null;
  }
  const mean = amounts.reduce((sum, value) => sum + value, 0) / amounts.length;
  if (mean < 200) return 'hourly';
  if (mean < 10000) return 'monthly';
  return 'annual';
}

/**
 * Parse free-text salary ("$120K - $150K per year", "$75/hour", "Up to 200k").
 * Amounts are returned in the stated period; see annualizeSalary.
 */
export function parseSalary(rawText: string | null | undefined): ParsedSalary {
  const result: ParsedSalary = { min: null, max: null, currency: 'USD', period: null, rawText: rawText ?? '' };
  if (!rawText || !rawText.trim()) {
    return result;
  }

  const text = rawText
    .trim()
    .toLowerCase()
    .replace(/[^\w\s$€£¥,.\-–—]/g, ' ');

  result.currency = CURRENCY_MARKERS.find(([pattern]) => pattern.test(text))?.[1] ?? 'USD';
  const explicitPeriod = PERIOD_MARKERS.find(([pattern]) => pattern.test(text))?.[1] ?? null;

  let matched = false;
  for (const pattern of RANGE_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      result.min = toAmount(match[1], match[2]);
      result.max = toAmount(match[3], match[4]);
      matched = true;
      break;
    }
  }

  if (!matched) {
    const upTo = UP_TO_PATTERN.exec(text);
    const from = upTo ? null : FROM_PATTERN.exec(text);
    const single = upTo || from ? null : SINGLE_PATTERN.exec(text);
    if (upTo) {
      result.max = toAmount(upTo[1], upTo[2]);
    } else if (from) {
      result.min = toAmount(from[1], from[2]);
    } else if (single) {
      result.min = toAmount(single[1], single[2]);
    }
  }

  const amounts = [result.min, result.max].filter((value): value is number => value !== null);
  result.period = explicitPeriod ?? inferPeriod(amounts);
  return result;
}

/**
 * Convert an amount to a yearly figure, rounded to whole units
 */
export function annualizeSalary(amount: number, period: SalaryPeriod | null): number {
  switch (period) {
    case 'hourly':
      return Math.round(amount * HOURS_PER_YEAR);
    case 'weekly':
      return Math.round(amount * 52);
    case 'monthly':
      return Math.round(amount * 12);
    default:
      return Math.round(amount);
  }
}
