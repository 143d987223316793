/**
 * Argument parsing helpers shared by CLI commands
 */

import { InvalidArgumentError } from 'commander';

/** Parse a non-negative integer option */
export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/** Collect repeated `--field key=value` options into a map */
export function collectFieldAssignment(value: string, previous: Record<string, string>): Record<string, string> {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${value}".`);
  }
  return { ...previous, [value.slice(0, separator).trim()]: value.slice(separator + 1) };
}
