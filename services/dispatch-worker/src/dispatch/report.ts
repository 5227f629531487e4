import type { ErrorPhase } from '../errors';
import { errorMessage } from '../errors';

/**
 * Print a fatal error for the scheduler's log capture: a readable line,
 * then the same failure as one JSON object.
 */
export function logErrorToStderr(phase: ErrorPhase, error: unknown): void {
  const message = errorMessage(error);
  console.error(`ERROR [${phase}]: ${message}`);
  console.error(JSON.stringify({ level: 'error', phase, error: message }));
}
