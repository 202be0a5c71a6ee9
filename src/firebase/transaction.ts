import * as admin from 'firebase-admin';
import { Mutation, UpdateResult } from '../types/repositories';

interface TransactionOutcome {
  changed: boolean;
  failure?: unknown;
}

/**
 * Realtime Database read-modify-write. The update callback may run several
 * times (the first call often sees a stale null), so it only records what the
 * final run decided. Errors thrown by `mutate` abort the transaction and are
 * rethrown to the caller.
 */
export async function transact<T>(
  ref: admin.database.Reference,
  decode: (raw: unknown) => T | null,
  encode: (value: T) => object,
  mutate: Mutation<T>
): Promise<UpdateResult<T> | null> {
  const outcome: TransactionOutcome = { changed: false };

  const result = await ref.transaction(
    (raw: unknown) => {
      outcome.changed = false;
      delete outcome.failure;
      if (raw === null) {
        // unknown locally; the server retries with the real value if it exists
        return null;
      }
      const current = decode(raw);
      if (current === null) {
        return undefined;
      }
      try {
        const next = mutate(current);
        if (next === undefined) {
          return undefined;
        }
        outcome.changed = true;
        return encode(next);
      } catch (error) {
        outcome.failure = error;
        return undefined;
      }
    },
    undefined,
    false
  );

  if ('failure' in outcome) {
    throw outcome.failure;
  }
  if (!result.snapshot.exists()) {
    return null;
  }
  const value = decode(result.snapshot.val());
  if (value === null) {
    return null;
  }
  return { value, changed: result.committed && outcome.changed };
}
