// Error helpers shared by the pipeline stages

export function errorName(error: unknown): string {
  if (error instanceof Error) return error.name || 'Error';
  return 'UnknownError';
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// PARSER_EXCEPTION_TYPEERROR style flag suffix
export function flagSuffix(error: unknown): string {
  return errorName(error).toUpperCase().replace(/[^A-Z0-9]+/g, '_');
}
