import { z } from 'zod';
import profileData from './data/industry-profiles.json';

const RuleTableSchema = z.object({
  rules: z.array(
    z.object({ keywords: z.array(z.string()).min(1), value: z.string() }),
  ),
  default: z.string(),
});

const ProfileTablesSchema = z.object({
  company_work: RuleTableSchema,
  company_impression: RuleTableSchema,
  industry_type: RuleTableSchema,
  market_opportunity: RuleTableSchema,
  relevant_connections: RuleTableSchema,
  connection_1: RuleTableSchema,
  connection_2: RuleTableSchema,
  connection_3: RuleTableSchema,
  connection_4: RuleTableSchema,
});

type RuleTable = z.infer<typeof RuleTableSchema>;
type ProfileTables = z.infer<typeof ProfileTablesSchema>;

/** Industry-dependent phrasing for the outreach template. */
export type IndustryProfile = Record<keyof ProfileTables, string>;

const tables = ProfileTablesSchema.parse(profileData);

// First rule with a keyword contained in the industry wins.
function lookup(table: RuleTable, industry: string): string {
  const rule = table.rules.find((r) =>
    r.keywords.some((keyword) => industry.includes(keyword)),
  );
  return rule ? rule.value : table.default;
}

/**
 * Picks each phrase by plain substring match on the lowercased industry, so
 * "ar" also matches inside words such as "hardware".
 */
export function describeIndustry(industry: string): IndustryProfile {
  const lower = industry.toLowerCase();
  return {
    company_work: lookup(tables.company_work, lower),
    company_impression: lookup(tables.company_impression, lower),
    industry_type: lookup(tables.industry_type, lower),
    market_opportunity: lookup(tables.market_opportunity, lower),
    relevant_connections: lookup(tables.relevant_connections, lower),
    connection_1: lookup(tables.connection_1, lower),
    connection_2: lookup(tables.connection_2, lower),
    connection_3: lookup(tables.connection_3, lower),
    connection_4: lookup(tables.connection_4, lower),
  };
}
