import { CleanupError, errorMessage } from '../errors.js';
import { warn } from '../dx/warnings.js';

export type CleanupStep = {
  /** Imperative description, used in error messages: "restore the working directory" */
  label: string;
  run(): Promise<void>;
};

/**
 * Runs `body`, then every cleanup step in order, whatever happened before.
 *
 * - Each step runs even when `body` or an earlier step failed.
 * - An error from `body` always wins; cleanup errors are then only warned.
 * - When `body` succeeded, the first cleanup error is thrown as a CleanupError.
 */
export async function withCleanup<T>(body: () => Promise<T>, steps: readonly CleanupStep[]): Promise<T> {
  let outcome: { ok: true; value: T } | { ok: false; error: unknown };
  try {
    outcome = { ok: true, value: await body() };
  } catch (error) {
    outcome = { ok: false, error };
  }

  let cleanupError: CleanupError | undefined;
  for (const step of steps) {
    try {
      await step.run();
    } catch (err) {
      if (outcome.ok && !cleanupError) {
        cleanupError = new CleanupError(`Failed to ${step.label}: ${errorMessage(err)}`, { cause: err });
      } else {
        warn({ code: 'CLEANUP_FAILED', message: `failed to ${step.label}: ${errorMessage(err)}` });
      }
    }
  }

  if (!outcome.ok) throw outcome.error;
  if (cleanupError) throw cleanupError;
  return outcome.value;
}
