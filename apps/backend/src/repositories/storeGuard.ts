import { StoreUnavailableError } from "../domain/errors";

/**
 * Run a driver call, re-throwing any failure as StoreUnavailableError.
 */
export function guardStore<T>(operation: string, run: () => T): T {
  try {
    return run();
  } catch (error) {
    throw new StoreUnavailableError(operation, error);
  }
}
