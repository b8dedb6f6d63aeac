export type SaveFailureReason = 'version_conflict' | 'duplicate';

/**
 * Outcome of a version-checked write. Adapters never throw for a stale
 * version or a unique-key clash; callers turn the failure into a domain error.
 */
export type SaveResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: SaveFailureReason };

export const saved = <T>(value: T): SaveResult<T> => ({ ok: true, value });

export const conflict = <T>(reason: SaveFailureReason = 'version_conflict'): SaveResult<T> => ({
  ok: false,
  reason,
});
