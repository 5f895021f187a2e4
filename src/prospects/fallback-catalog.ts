import { z } from 'zod';
import catalogData from './data/fallback-catalog.json';
import type { CompanyRecord } from './company-record';

export type CountryCode = 'US' | 'JP' | 'UK' | 'CA';
export type IndustryBucket = 'ai' | 'gaming' | 'vr' | 'tech';

const CompanyRecordSchema = z.object({
  name: z.string(),
  website: z.string(),
  country: z.string(),
  industry: z.string(),
  contact_name: z.string(),
  contact_title: z.string(),
  contact_email: z.string(),
  description: z.string(),
});

const CatalogSchema = z.record(
  z.string(),
  z.record(z.string(), z.array(CompanyRecordSchema)),
);

const catalog = CatalogSchema.parse(catalogData);

// First match wins, so the order of both tables is significant.
const COUNTRY_KEYWORDS: ReadonlyArray<[CountryCode, string[]]> = [
  ['US', ['us', 'usa', 'united states', 'america']],
  ['JP', ['jp', 'japan', 'japanese']],
  ['UK', ['uk', 'britain', 'british']],
  ['CA', ['ca', 'canada', 'canadian']],
];

const INDUSTRY_KEYWORDS: ReadonlyArray<[IndustryBucket, string[]]> = [
  ['ai', ['ai', 'artificial intelligence', 'machine learning', 'ml']],
  ['gaming', ['gaming', 'game', 'entertainment']],
  ['vr', ['vr', 'ar', 'xr', 'virtual reality', 'augmented reality']],
  ['tech', ['startup', 'tech', 'technology']],
];

function firstMatch<T>(
  text: string,
  table: ReadonlyArray<[T, string[]]>,
  fallback: T,
): T {
  const lower = text.toLowerCase();
  for (const [value, keywords] of table) {
    if (keywords.some((keyword) => lower.includes(keyword))) {
      return value;
    }
  }
  return fallback;
}

/** Plain substring matching: "us" also matches inside words such as "business". */
export function detectCountry(icp: string): CountryCode {
  return firstMatch(icp, COUNTRY_KEYWORDS, 'US');
}

export function detectIndustryBucket(icp: string): IndustryBucket {
  return firstMatch(icp, INDUSTRY_KEYWORDS, 'tech');
}

function resolveBucket(
  country: CountryCode,
  bucket: IndustryBucket,
): readonly CompanyRecord[] {
  const entries = catalog[country]?.[bucket];
  if (entries) {
    return entries;
  }
  if (bucket !== 'tech') {
    return resolveBucket(country, 'tech');
  }
  return catalog.US.ai;
}

/**
 * Static companies for an ICP, used when generation is unavailable or its
 * output cannot be recovered. Returns at most `count` records and never pads
 * a short bucket.
 */
export function getFallbackCompanies(
  icp: string,
  count: number,
): CompanyRecord[] {
  const records = resolveBucket(detectCountry(icp), detectIndustryBucket(icp));
  return records.slice(0, Math.max(0, count)).map((record) => ({ ...record }));
}
