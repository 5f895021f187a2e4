import {
  COMPANY_FIELDS,
  CompanyField,
  CompanyRecord,
  isValidCompanyRecord,
  toCompanyRecord,
} from './company-record';

/** Anything shorter cannot hold one complete company object. */
export const MIN_RESPONSE_LENGTH = 50;

const CONTAINER_KEYS = ['companies', 'results', 'data', 'items'] as const;

const NAME_KEY = /\\?"name\\?"\s*:/g;

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the content of the first fenced block (```json preferred, then a
 * bare ```), or the text unchanged when there is no fence.
 */
export function unwrapMarkdown(text: string): string {
  for (const fence of ['```json', '```']) {
    const open = text.indexOf(fence);
    if (open === -1) continue;

    const start = open + fence.length;
    const close = text.indexOf('```', start);
    return close === -1 ? text.slice(start) : text.slice(start, close);
  }
  return text;
}

/** Slices from the first `{` to the last `}`, dropping prose around the object. */
export function trimToJsonObject(text: string): string {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return text;
  }
  return text.slice(start, end + 1);
}

/** Drops trailing commas before `}`/`]` and un-escapes over-escaped quotes. */
export function repairJson(text: string): string {
  return text.replace(/,(\s*[}\]])/g, '$1').replace(/\\"/g, '"');
}

function pickEntries(data: unknown): JsonObject[] {
  if (isJsonObject(data)) {
    for (const key of CONTAINER_KEYS) {
      const list = data[key];
      if (!Array.isArray(list)) continue;
      const entries = list.filter(isJsonObject);
      if (entries.length > 0) return entries;
    }
    return [];
  }

  if (Array.isArray(data)) {
    return data.filter(isJsonObject);
  }

  return [];
}

/**
 * Parses `text` as JSON and maps the first non-empty container
 * (`companies`, `results`, `data`, `items`, or a bare array) to valid records.
 * Unparseable input yields an empty list.
 */
export function parseStrict(text: string): CompanyRecord[] {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return [];
  }

  return pickEntries(data).map(toCompanyRecord).filter(isValidCompanyRecord);
}

function fieldPattern(field: CompanyField): RegExp {
  // "field": "value" where either quote may be backslash-escaped.
  return new RegExp(
    `\\\\?"${field}\\\\?"\\s*:\\s*\\\\?"((?:[^"\\\\]|\\\\[^"])*)\\\\?"`,
  );
}

const FIELD_PATTERNS: ReadonlyArray<[CompanyField, RegExp]> = COMPANY_FIELDS.map(
  (field) => [field, fieldPattern(field)],
);

function splitFragments(text: string): string[] {
  const starts: number[] = [];
  let floor = 0;

  for (const match of text.matchAll(NAME_KEY)) {
    const keyIndex = match.index ?? 0;
    // Widen back to the enclosing `{` so fields listed before "name" stay in the fragment.
    const brace = text.lastIndexOf('{', keyIndex);
    const start = brace >= floor ? brace : keyIndex;
    starts.push(start);
    floor = keyIndex + match[0].length;
  }

  return starts.map((start, i) => text.slice(start, starts[i + 1]));
}

/**
 * Last-resort scrape: cuts the text into fragments at each `"name"` key and
 * looks up each field independently. A fragment without a name is skipped;
 * partial records that miss the required contact fields are dropped.
 */
export function extractManually(text: string): CompanyRecord[] {
  const records: CompanyRecord[] = [];

  for (const fragment of splitFragments(text)) {
    const found: Partial<Record<CompanyField, string>> = {};
    for (const [field, pattern] of FIELD_PATTERNS) {
      const match = pattern.exec(fragment);
      if (match) found[field] = match[1];
    }
    if (found.name === undefined) continue;

    const record = toCompanyRecord(found);
    if (isValidCompanyRecord(record)) {
      records.push(record);
    }
  }

  return records;
}

/**
 * Recovers company records from a model's free-text answer, degrading from
 * strict JSON parsing to a field scrape. Never throws; an empty list means
 * the caller should fall back to the static catalog.
 */
export function recoverCompanies(raw: string): CompanyRecord[] {
  if (!raw || raw.trim().length < MIN_RESPONSE_LENGTH) {
    return [];
  }

  const unwrapped = unwrapMarkdown(raw).trim();

  // Boundary trimming would cut a top-level array down to its first object.
  if (unwrapped.startsWith('[')) {
    const fromArray = parseStrict(repairJson(unwrapped));
    if (fromArray.length > 0) return fromArray;
  }

  const strict = parseStrict(repairJson(trimToJsonObject(unwrapped)));
  if (strict.length > 0) {
    return strict;
  }

  return extractManually(raw);
}
