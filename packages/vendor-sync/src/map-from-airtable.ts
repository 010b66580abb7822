/**
 * Map Airtable record fields to software_vendors / groups rows.
 * Decoding is forgiving: a missing or wrongly typed field falls back to its
 * empty value ('' / false / 0 / []) instead of failing the record.
 */
import { z } from 'zod';

const str = z.string().catch('');
const bool = z.boolean().catch(false);
const num = z.number().finite().catch(0);
const int = num.transform((n) => Math.trunc(n));
const strings = z.array(z.string()).catch([]);

const vendorFieldsSchema = z.object({
  name: str,
  status: str,
  description: str,
  website: str,
  has_okta_integration: bool,
  used_purely_for_api: bool,
  pay_as_you_go: bool,
  pay_as_you_go_pricing_description: str,
  software_licenses: bool,
  cost_per_user_per_month: num,
  users: int,
  flat_cost_per_month: num,
  total_cost_per_month: num,
  groups: strings,
});

/** Vendor as decoded from Airtable, before it has a local row. */
export type NewVendor = z.infer<typeof vendorFieldsSchema>;

/** Column order used for inserts and updates. */
export const VENDOR_COLUMNS = [
  'name',
  'status',
  'description',
  'website',
  'has_okta_integration',
  'used_purely_for_api',
  'pay_as_you_go',
  'pay_as_you_go_pricing_description',
  'software_licenses',
  'cost_per_user_per_month',
  'users',
  'flat_cost_per_month',
  'total_cost_per_month',
  'groups',
] as const satisfies readonly (keyof NewVendor)[];

const groupFieldsSchema = z.object({
  name: str,
  members: strings,
});

export type NewGroup = z.infer<typeof groupFieldsSchema>;

export function mapFieldsToVendor(fields: Record<string, unknown>): NewVendor {
  return vendorFieldsSchema.parse(fields);
}

export function mapFieldsToGroup(fields: Record<string, unknown>): NewGroup {
  return groupFieldsSchema.parse(fields);
}
