/**
 * Error raised when a library function receives malformed arguments:
 * length mismatches, invalid permutations, summaries that do not return a
 * single value, or label sets with no numeric level.
 *
 * It signals a programmer error and is thrown, never returned. Layers that
 * accept user data (orchestration, MCP) turn it into an error result.
 */
export class ArgumentError extends Error {
  override readonly name = "ArgumentError";
}

export function isArgumentError(cause: unknown): cause is ArgumentError {
  return cause instanceof ArgumentError;
}
