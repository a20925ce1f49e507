/**
 * Shared Option Parsers
 *
 * Commander argument parsers for options several commands take.
 *
 * @module cli/commands/options
 */

import { InvalidArgumentError } from 'commander';
import { ProfileSchema, type Profile } from '../../schemas/common.js';
import { isValidStageNumber, type StageNumber } from '../../pipeline/types.js';

export type OutputFormat = 'text' | 'json';

/**
 * Parse a stage number ("3" or "03").
 *
 * @throws InvalidArgumentError outside 0-4
 */
export function parseStageNumber(value: string): StageNumber {
  const parsed = /^\d{1,2}$/.test(value) ? Number(value) : Number.NaN;
  if (!isValidStageNumber(parsed)) {
    throw new InvalidArgumentError('Stage must be a number from 0 to 4.');
  }
  return parsed;
}

export function parseProfile(value: string): Profile {
  const result = ProfileSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Profile must be one of: ${ProfileSchema.options.join(', ')}.`);
  }
  return result.data;
}

export function parseFormat(value: string): OutputFormat {
  if (value !== 'text' && value !== 'json') {
    throw new InvalidArgumentError('Format must be text or json.');
  }
  return value;
}
