/**
 * Identity reports
 * @module report
 */

import { z } from 'zod';
import { CreateHashSettings, FormatIssues } from './config.js';
import { CreateDomainError } from './error.js';
import type { IdentityConfig, IdentityReport } from './types.js';

const HashSettingsSchema = z.object({
  trackDescriptions: z.boolean(),
  trackFieldOrder: z.boolean(),
  trackTypeOrder: z.boolean(),
  trackedFilepathParts: z.number().int().nonnegative(),
  trackValidationMode: z.boolean(),
});

const IdentityReportSchema = z.object({
  fullname: z.string().min(1),
  createdAt: z.string().datetime(),
  hash: z.string(),
  hashSettings: HashSettingsSchema,
});

/**
 * Build a report for a freshly computed hash
 */
export function CreateIdentityReport(
  fullname: string,
  hash: string,
  config: Readonly<IdentityConfig>,
  createdAtMs: number,
): IdentityReport {
  return {
    fullname,
    createdAt: new Date(createdAtMs).toISOString(),
    hash,
    hashSettings: CreateHashSettings(config),
  };
}

/**
 * Parse a stored report, e.g. one read back from a database column
 *
 * @param value - Decoded JSON value
 * @returns Typed report
 * @throws IdentityError with code `REPORT_INVALID`
 *
 * @example
 * ```typescript
 * const report = ParseReport(JSON.parse(row.schema_identity));
 * if (report.hash !== Identity.Hash(User)) {
 *   // written by a different schema
 * }
 * ```
 */
export function ParseReport(value: unknown): IdentityReport {
  const parsed = IdentityReportSchema.safeParse(value);
  if (!parsed.success) {
    const issues = FormatIssues(parsed.error);
    throw CreateDomainError('report', 'REPORT_INVALID', `Invalid identity report: ${issues.join('; ')}`, {
      reason: 'The value does not have the shape of an identity report',
      details: { issues },
    });
  }

  return parsed.data;
}
