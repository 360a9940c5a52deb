import { ZodError } from 'zod';
import { ConstructionError, StructuralValidationError } from '@asset-graph/core';

export type ToolResponse = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

export function textResponse(text: string): ToolResponse {
  return { content: [{ type: 'text' as const, text }] };
}

export function wrapResponse(data: unknown): ToolResponse {
  return textResponse(JSON.stringify(data, null, 2));
}

export function isValidationError(err: unknown): err is ZodError | ConstructionError | StructuralValidationError {
  return err instanceof ZodError || err instanceof ConstructionError || err instanceof StructuralValidationError;
}

function describeError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}

/** Errors become tool results; nothing is thrown back to the transport. */
export function errorResponse(err: unknown): ToolResponse {
  if (isValidationError(err)) {
    return { content: [{ type: 'text' as const, text: `Validation Error: ${describeError(err)}` }], isError: true };
  }
  console.error('[graph-mcp] tool failed:', describeError(err));
  return { content: [{ type: 'text' as const, text: `Error: ${describeError(err)}` }], isError: true };
}
