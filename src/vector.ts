import { InterpolationError } from './errors';
import { Interpolatable } from './types';

/**
 * Odtwarza wartość typu z sekwencji liczb o właściwej długości.
 */
export type Reconstructor<T extends Interpolatable = Interpolatable> = (values: readonly number[]) => T;

/**
 * Wektor liczbowy z zapamiętaną funkcją odtwarzającą wartość.
 *
 * Wektor nie wie, jaki typ go utworzył; wie to tylko związana funkcja
 * odtwarzająca. Silnik mieszania zapisuje `values` (lub woła `mutateValues`)
 * i odczytuje wynik przez `toInterpolatable()`. Każda trwająca interpolacja
 * powinna mieć własną instancję.
 */
export class NumericVector<T extends Interpolatable = Interpolatable> {
  values: number[];
  private readonly reconstruct: Reconstructor<T>;

  /** Kopiuje inny wektor; wartości kopii są niezależne, funkcja odtwarzająca wspólna. */
  constructor(other: NumericVector<T>);
  /** Wiąże funkcję odtwarzającą z sekwencją liczb. */
  constructor(values: readonly number[], reconstruct: Reconstructor<T>);
  constructor(source: NumericVector<T> | readonly number[], reconstruct?: Reconstructor<T>) {
    if (source instanceof NumericVector) {
      this.values = [...source.values];
      this.reconstruct = source.reconstruct;
      return;
    }
    if (!reconstruct) {
      throw new InterpolationError('NumericVector requires a reconstruct function');
    }
    this.values = [...source];
    this.reconstruct = reconstruct;
  }

  get length(): number {
    return this.values.length;
  }

  /**
   * Zastępuje bieżące wartości. Długość nie jest tu sprawdzana; kolejne
   * `toInterpolatable()` zawiedzie, jeśli nie pasuje już do typu.
   * @param values Nowe wartości
   */
  mutateValues(values: readonly number[]): void {
    this.values = [...values];
  }

  /**
   * Buduje nową wartość z bieżących wartości. Nic nie jest buforowane.
   * @returns Świeża wartość typu źródłowego
   * @throws ArityMismatchError gdy wartości nie pasują już do typu
   */
  toInterpolatable(): T {
    return this.reconstruct(this.values);
  }

  clone(): NumericVector<T> {
    return new NumericVector(this);
  }
}
