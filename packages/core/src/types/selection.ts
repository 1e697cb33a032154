/**
 * Interactive outcomes
 *
 * Every prompt-driven step can be backed out of with "q". A cancelled
 * step is a distinct outcome, never an empty list.
 */

export type Selection<T> =
  | { readonly kind: 'selected'; readonly value: T }
  | { readonly kind: 'cancelled' };

export function selected<T>(value: T): Selection<T> {
  return { kind: 'selected', value };
}

export const CANCELLED: Selection<never> = Object.freeze({ kind: 'cancelled' });

export function cancelled<T>(): Selection<T> {
  return CANCELLED;
}

export function isCancelled<T>(selection: Selection<T>): selection is { readonly kind: 'cancelled' } {
  return selection.kind === 'cancelled';
}

/**
 * True for the "q" back-out answer accepted by every prompt
 */
export function isBackAnswer(answer: string): boolean {
  return answer.trim().toLowerCase() === 'q';
}
