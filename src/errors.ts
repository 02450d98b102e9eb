/**
 * Błędy biblioteki
 * Wszystkie błędy są zgłaszane synchronicznie w miejscu wystąpienia; nic nie jest ponawiane.
 */

import { ColorSpace } from './types';

export class InterpolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InterpolationError';
  }
}

/**
 * Sekwencja liczb ma inną długość niż wektor typu docelowego.
 */
export class ArityMismatchError extends InterpolationError {
  readonly expected: number;
  readonly actual: number;
  readonly kind?: string;

  constructor(expected: number, actual: number, kind?: string) {
    super(
      `Arity mismatch${kind ? ` for ${kind}` : ''}: expected ${expected} components, got ${actual}`
    );
    this.name = 'ArityMismatchError';
    this.expected = expected;
    this.actual = actual;
    this.kind = kind;
  }
}

/**
 * Kolor nie ma reprezentacji RGBA, grayscale ani HSB.
 */
export class UnsupportedColorSpaceError extends InterpolationError {
  readonly space: ColorSpace;

  constructor(space: ColorSpace) {
    super(`unsupported color, cannot interpolate (color space: ${space})`);
    this.name = 'UnsupportedColorSpaceError';
    this.space = space;
  }
}
