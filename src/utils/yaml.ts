/**
 * YAML parsing and serialization utilities.
 */
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { ConfigError, ErrorCodes, getErrorMessage } from './errors.js';

/**
 * Parse YAML content. The result is untyped; validate it with a schema.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new ConfigError(
      ErrorCodes.CONFIG_PARSE_ERROR,
      `Failed to parse YAML: ${getErrorMessage(error)}`,
      { error: getErrorMessage(error) }
    );
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodTypeAny>(
  content: string,
  schema: T
): z.infer<T> {
  const parsed = parseYaml(content);
  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.CONFIG_INVALID,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Stringify an object to YAML.
 */
export function stringifyYaml(data: unknown): string {
  return stringify(data, {
    indent: 2,
    lineWidth: 100,
  });
}

/**
 * Format Zod errors into a readable string.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
