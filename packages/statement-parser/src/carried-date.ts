/**
 * Single-slot memory of the last date seen in a document. A line without a
 * date of its own takes the carried one; a new date replaces it.
 */
export type CarriedDate =
  | { kind: 'none' }
  | { kind: 'carried'; raw: string };

export const NO_CARRIED_DATE: CarriedDate = { kind: 'none' };

export function carryDate(state: CarriedDate, detected: string | null): CarriedDate {
  return detected === null ? state : { kind: 'carried', raw: detected };
}

export function carriedDateOf(state: CarriedDate): string | null {
  return state.kind === 'carried' ? state.raw : null;
}
