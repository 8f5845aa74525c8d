import { describe, it, expect } from 'vitest';
import { NO_CARRIED_DATE, carryDate, carriedDateOf } from '@stmt-ingest/statement-parser';

describe('carried date', () => {
  it('should start empty', () => {
    expect(carriedDateOf(NO_CARRIED_DATE)).toBeNull();
  });

  it('should remember a detected date', () => {
    const state = carryDate(NO_CARRIED_DATE, '01/03/2024');
    expect(carriedDateOf(state)).toBe('01/03/2024');
  });

  it('should keep the previous date when none is detected', () => {
    const state = carryDate(carryDate(NO_CARRIED_DATE, '01/03/2024'), null);
    expect(carriedDateOf(state)).toBe('01/03/2024');
  });

  it('should replace the date when a new one is detected', () => {
    const state = carryDate(carryDate(NO_CARRIED_DATE, '01/03/2024'), '05/03/2024');
    expect(carriedDateOf(state)).toBe('05/03/2024');
  });
});
