import { PatrolError, errorMessage } from "@shared/errors.js";

/**
 * Print a command failure and exit non-zero
 */
export function exitWithError(error: unknown): never {
  const code = error instanceof PatrolError ? ` (${error.code})` : "";
  console.error(`Error${code}:`, errorMessage(error));
  process.exit(1);
}
