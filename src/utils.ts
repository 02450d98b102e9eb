import { ArityMismatchError } from './errors';

export const clamp = (v: number, min: number, max: number) => Math.min(max, Math.max(min, v));

export const lerp = (a: number, b: number, t: number) => a + (b - a) * t;

/**
 * Zgłasza błąd, jeśli `values` nie ma dokładnie `expected` elementów.
 * @param values Sekwencja do sprawdzenia
 * @param expected Liczba komponentów typu docelowego
 * @param kind Nazwa typu, trafia do komunikatu błędu
 */
export function assertArity(values: readonly number[], expected: number, kind?: string): void {
  if (values.length !== expected) {
    throw new ArityMismatchError(expected, values.length, kind);
  }
}
