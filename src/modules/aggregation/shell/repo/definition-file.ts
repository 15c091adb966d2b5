/**
 * Reads aggregation definitions from YAML or JSON files.
 */

import fs from 'node:fs/promises';

import { err, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { describeCause, type ValidationError } from '@/common/types/errors.js';

import { parseAggregationDefinition } from '../../core/definition.js';

import type { AggregationDefinition } from '../../core/schemas/definition.js';

export type DefinitionFileError =
  | { type: 'NotFound'; message: string; path: string }
  | { type: 'ReadError'; message: string; path: string }
  | { type: 'ParseError'; message: string; path: string }
  | ValidationError;

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

/**
 * Loads and validates a definition file. JSON is read through the YAML parser,
 * which accepts it unchanged.
 */
export const readAggregationDefinition = async (
  filePath: string
): Promise<Result<AggregationDefinition, DefinitionFileError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `Aggregation definition not found at ${filePath}`,
        path: filePath,
      });
    }
    return err({
      type: 'ReadError',
      message: `Failed to read aggregation definition at ${filePath}: ${describeCause(error)}`,
      path: filePath,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse aggregation definition at ${filePath}: ${describeCause(error)}`,
      path: filePath,
    });
  }

  return parseAggregationDefinition(parsed);
};
