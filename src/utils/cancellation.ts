import { CancelledError } from '../domain/errors';

export function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new CancelledError(operation);
  }
}
