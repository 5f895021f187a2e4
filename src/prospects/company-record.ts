export const COMPANY_FIELDS = [
  'name',
  'website',
  'country',
  'industry',
  'contact_name',
  'contact_title',
  'contact_email',
  'description',
] as const;

export type CompanyField = (typeof COMPANY_FIELDS)[number];

/** One prospect company and its primary contact. */
export type CompanyRecord = Readonly<Record<CompanyField, string>>;

/**
 * Builds a record from an untyped entry. Missing or non-string fields become
 * empty strings; everything is trimmed.
 */
export function toCompanyRecord(
  entry: Readonly<Record<string, unknown>>,
): CompanyRecord {
  const field = (key: CompanyField): string => {
    const value = entry[key];
    return typeof value === 'string' ? value.trim() : '';
  };

  return {
    name: field('name'),
    website: field('website'),
    country: field('country'),
    industry: field('industry'),
    contact_name: field('contact_name'),
    contact_title: field('contact_title'),
    contact_email: field('contact_email'),
    description: field('description'),
  };
}

/** A record is usable only with a company name, contact name and contact email. */
export function isValidCompanyRecord(record: CompanyRecord): boolean {
  return (
    record.name.trim() !== '' &&
    record.contact_name.trim() !== '' &&
    record.contact_email.trim() !== ''
  );
}
