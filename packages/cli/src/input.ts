import { readFileSync } from 'node:fs';
import { JsonObjectSchema, type JsonObject } from '@supabase-mcp/shared-types';
import { CliError } from './errors.js';

export function parseInput(raw: string, source: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new CliError('VALIDATION_ERROR', `${source} is not valid JSON`, 1);
  }
  const input = JsonObjectSchema.safeParse(parsed);
  if (!input.success) {
    throw new CliError('VALIDATION_ERROR', `${source} must be a JSON object`, 1);
  }
  return input.data;
}

export function readInputFile(path: string) {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CliError('VALIDATION_ERROR', `Unable to read --input-file ${path}`, 1, { reason });
  }
}

export function parseLimit(value: string) {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new CliError('VALIDATION_ERROR', '--limit must be a positive integer', 1, { value });
  }
  return limit;
}
