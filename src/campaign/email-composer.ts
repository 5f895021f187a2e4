import type { ProspectRow } from '../prospects/prospect-export';
import { IndustryProfile, describeIndustry } from './industry-profile';
import { renderTemplate } from './template-renderer';

export interface EmailContext extends IndustryProfile {
  first_name: string;
  company: string;
  scheduling_link: string;
  sender_name: string;
}

export interface EmailContent {
  subject: string;
  body: string;
  cc?: string;
}

const DEFAULT_FIRST_NAME = 'Team';
const DEFAULT_COMPANY = 'your company';

function firstWord(value: string): string {
  return value.trim().split(/\s+/)[0] ?? '';
}

/**
 * Builds the template variables for one prospect row. Industry keywords pick
 * the pitch phrasing; a row description, when present, replaces the generic
 * description of the company's work.
 */
export function buildEmailContext(
  row: ProspectRow,
  schedulingLink: string,
  senderName: string,
): EmailContext {
  const profile = describeIndustry(row.industry);
  return {
    ...profile,
    first_name: firstWord(row.name) || DEFAULT_FIRST_NAME,
    company: row.company.trim() || DEFAULT_COMPANY,
    company_work: row.description.trim() || profile.company_work,
    scheduling_link: schedulingLink,
    sender_name: senderName,
  };
}

/**
 * Renders the template; its first line is the subject, the rest the body.
 * A one-line rendering serves as both.
 */
export function composeEmail(
  context: EmailContext,
  template: string,
  cc?: string,
): EmailContent {
  const rendered = renderTemplate(template, { ...context }).trim();
  const lines = rendered.split(/\r?\n/);

  const subject = lines[0].trim();
  const body =
    lines.length > 1 ? lines.slice(1).join('\n').replace(/^(\s*\n)+/, '') : rendered;

  return {
    subject: subject || `Quick intro: ${context.company}`,
    body,
    ...(cc ? { cc } : {}),
  };
}
