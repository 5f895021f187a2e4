import { Injectable, Logger } from '@nestjs/common';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { parseCsvTable, toCsv } from '../common/csv/csv';
import { isFileNotFound } from '../common/fs/is-file-not-found';
import type { CompanyRecord } from './company-record';
import {
  InvalidProspectsFileError,
  ProspectsFileNotFoundError,
} from './prospect.errors';

export const PROSPECT_COLUMNS = [
  'name',
  'title',
  'company',
  'website',
  'email',
  'country',
  'industry',
  'description',
] as const;

export type ProspectColumn = (typeof PROSPECT_COLUMNS)[number];

/** Export row: the contact fills `name`/`title`, the company name goes to `company`. */
export type ProspectRow = Record<ProspectColumn, string>;

export function toProspectRow(record: CompanyRecord): ProspectRow {
  return {
    name: record.contact_name,
    title: record.contact_title,
    company: record.name,
    website: record.website,
    email: record.contact_email,
    country: record.country,
    industry: record.industry,
    description: record.description,
  };
}

export function rowsToCsv(rows: readonly ProspectRow[]): string {
  return toCsv(PROSPECT_COLUMNS, rows);
}

export function prospectsToCsv(records: readonly CompanyRecord[]): string {
  return rowsToCsv(records.map(toProspectRow));
}

/** Headers a prospects file must carry; `industry` and `description` are optional. */
export const REQUIRED_PROSPECT_COLUMNS = [
  'name',
  'title',
  'company',
  'website',
  'email',
  'country',
] as const satisfies readonly ProspectColumn[];

const HeaderSchema = z.array(z.string()).superRefine((header, ctx) => {
  for (const column of REQUIRED_PROSPECT_COLUMNS) {
    if (!header.includes(column)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: column });
    }
  }
});

const ProspectRowSchema = z.object({
  name: z.string(),
  title: z.string(),
  company: z.string(),
  website: z.string(),
  email: z.string(),
  country: z.string(),
  industry: z.string().default(''),
  description: z.string().default(''),
});

function isSendable(row: ProspectRow): boolean {
  return (
    row.name.trim() !== '' &&
    row.company.trim() !== '' &&
    row.email.trim() !== ''
  );
}

/**
 * Reads an exported prospects file. Rows without a name, company or email
 * are skipped.
 *
 * @throws InvalidProspectsFileError when a required header is missing
 */
export function parseProspectsCsv(text: string): ProspectRow[] {
  const { header, rows } = parseCsvTable(text);

  const headerCheck = HeaderSchema.safeParse(header);
  if (!headerCheck.success) {
    throw new InvalidProspectsFileError(
      headerCheck.error.issues.map((issue) => issue.message),
    );
  }

  return rows.map((raw) => ProspectRowSchema.parse(raw)).filter(isSendable);
}

@Injectable()
export class ProspectExportService {
  private readonly logger = new Logger(ProspectExportService.name);

  async save(records: readonly CompanyRecord[], path: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, prospectsToCsv(records), 'utf-8');
    this.logger.log(`Saved ${records.length} prospects to ${path}`);
  }

  /**
   * @throws ProspectsFileNotFoundError when nothing was exported to `path`
   * @throws InvalidProspectsFileError when the file lacks required headers
   */
  async load(path: string): Promise<ProspectRow[]> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error: unknown) {
      if (isFileNotFound(error)) {
        throw new ProspectsFileNotFoundError(path);
      }
      throw error;
    }
    return parseProspectsCsv(text);
  }
}
