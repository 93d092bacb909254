/**
 * Friendly Errors
 *
 * YAML parsing + Zod validation with human-readable errors, for every
 * user-facing file we read (docker-compose.yml, .composeapp.yaml).
 *
 * @example
 * ```ts
 * const result = safeParseYaml(content, EngineConfigSchema, ".composeapp.yaml");
 * if (!result.success) {
 *   throw new ConfigError(result.error.message, result.error.details);
 * }
 * const config = result.data;
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodType, ZodTypeDef, ZodError } from "zod";

export type ParseErrorType = "yaml" | "validation";

export interface FriendlyError {
  type: ParseErrorType;
  message: string;
  details?: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

function formatYamlError(error: YAMLParseError): string {
  // First line only: "Map keys must be unique at line 4, column 3"
  return error.message.split("\n")[0] ?? error.message;
}

/**
 * Parse YAML without validating it. Duplicate keys are a syntax error,
 * so two services can never share a name.
 */
export function safeParseYamlDocument(content: string, filepath?: string): ParseResult<unknown> {
  const fileContext = filepath ? ` in ${filepath}` : "";

  try {
    return { success: true, data: parseYaml(content, { uniqueKeys: true }) };
  } catch (err) {
    if (err instanceof YAMLParseError) {
      return {
        success: false,
        error: {
          type: "yaml",
          message: `Invalid YAML syntax${fileContext}`,
          details: [formatYamlError(err)],
        },
      };
    }
    return {
      success: false,
      error: {
        type: "yaml",
        message: `Failed to parse YAML${fileContext}`,
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }
}

/**
 * Parse YAML content and validate against a Zod schema.
 *
 * @param filepath - Optional file path for error context
 */
export function safeParseYaml<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filepath?: string
): ParseResult<Output> {
  const parsed = safeParseYamlDocument(content, filepath);
  if (!parsed.success) {
    return parsed;
  }

  // An empty file parses to null; treat it as an empty mapping
  const result = schema.safeParse(parsed.data ?? {});
  if (!result.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message: `Invalid configuration${filepath ? ` in ${filepath}` : ""}`,
        details: formatZodIssues(result.error),
      },
    };
  }

  return { success: true, data: result.data };
}
