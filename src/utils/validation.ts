import { z } from 'zod';
import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';

/**
 * Renders zod issues as `path: message` pairs.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join(', ');
}

/**
 * Validates tool arguments against a Zod schema and converts validation
 * errors to MCP errors.
 *
 * @param args - The arguments to validate (from MCP tool request)
 * @param schema - The Zod schema to validate against
 * @returns The validated and typed arguments
 * @throws McpError with InvalidParams error code if validation fails
 *
 * @example
 * ```typescript
 * const coordinate = validateArgs(request.params.arguments, reverseGeocodeSchema);
 * ```
 */
export function validateArgs<T>(args: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    throw new McpError(ErrorCode.InvalidParams, `Invalid parameters: ${formatIssues(result.error)}`);
  }
  return result.data;
}
