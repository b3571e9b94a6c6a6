/**
 * Coach Record Validation
 *
 * Schema checks on researched coach data. Errors mark a record as invalid;
 * warnings flag gaps (missing sources) that lower confidence in the data.
 * Neither stops a record from being cross-referenced.
 */

import { z } from 'zod';
import { RESEARCH_STATUSES, type ValidationResult } from '../types/index.js';

const REQUIRED_FIELDS = [
  'name',
  'current_position',
  'current_school',
  'career_history',
  'research_status',
] as const;

const CAREER_ENTRY_FIELDS = ['school', 'position', 'years'] as const;

// "2020-2022" or "2024-present"
const YEAR_PATTERN = /^\d{4}-(present|\d{4})$/i;

const recordSchema = z.record(z.string(), z.unknown());

export function isValidYearFormat(years: string): boolean {
  return YEAR_PATTERN.test(years);
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && !value.trim());
}

function validateCareerEntry(
  entry: Record<string, unknown>,
  index: number
): { errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  for (const field of CAREER_ENTRY_FIELDS) {
    if (isBlank(entry[field])) {
      errors.push(`Career entry ${index}: missing required field '${field}'`);
    }
  }

  const years = entry.years;
  if (typeof years === 'string' && years && !isValidYearFormat(years)) {
    errors.push(
      `Career entry ${index}: invalid year format '${years}' (expected YYYY-YYYY or YYYY-present)`
    );
  }

  if (isBlank(entry.source_url)) {
    warnings.push(`Career entry ${index}: missing source_url (data will be marked UNVERIFIED)`);
  }

  return { errors, warnings };
}

/**
 * Validate a coach record of unknown shape.
 */
export function validateCoachData(data: unknown): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const parsed = recordSchema.safeParse(data);
  if (!parsed.success) {
    return { valid: false, errors: ['Coach data must be an object'], warnings };
  }
  const record = parsed.data;

  for (const field of REQUIRED_FIELDS) {
    if (!(field in record)) {
      errors.push(`Missing required field: '${field}'`);
    } else if (field !== 'career_history' && isBlank(record[field])) {
      errors.push(`Required field '${field}' is empty`);
    }
  }

  const status = record.research_status;
  if (typeof status === 'string' && status && !RESEARCH_STATUSES.some(s => s === status)) {
    errors.push(`Invalid research_status: '${status}' (valid: ${RESEARCH_STATUSES.join(', ')})`);
  }

  const history = record.career_history;
  if (history !== undefined) {
    if (!Array.isArray(history)) {
      errors.push('career_history must be a list');
    } else {
      history.forEach((entry: unknown, index: number) => {
        const entryRecord = recordSchema.safeParse(entry);
        if (!entryRecord.success || Array.isArray(entry)) {
          errors.push(`Career entry ${index}: must be an object`);
          return;
        }
        const result = validateCareerEntry(entryRecord.data, index);
        errors.push(...result.errors);
        warnings.push(...result.warnings);
      });
    }
  }

  if (status === 'FOUND' && (!Array.isArray(history) || history.length === 0)) {
    warnings.push('research_status is FOUND but career_history is empty');
  }

  return { valid: errors.length === 0, errors, warnings };
}
