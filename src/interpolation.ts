/**
 * Mieszanie wektorów i sesje interpolacji
 *
 * Brak tu zegara: sterownik animacji ustawia `progress` na `Interpolation`
 * (albo woła `interpolate`) raz na klatkę.
 */

import { ArityMismatchError } from './errors';
import { vectorize } from './registry';
import { InterpolatableKind, InterpolatableValueMap, ProgressCurve } from './types';
import { clamp, lerp } from './utils';
import { NumericVector } from './vector';

export const linear: ProgressCurve = (progress) => progress;

/**
 * Miesza wektory element po elemencie: `from[i] + (to[i] - from[i]) * progress`.
 * Postęp nie jest przycinany, więc wartości spoza [0, 1] ekstrapolują.
 * @param from Wektor początkowy
 * @param to Wektor końcowy
 * @param progress Postęp
 * @returns Nowy wektor
 * @throws ArityMismatchError gdy sekwencje mają różne długości
 */
export function blendVectors(
  from: readonly number[],
  to: readonly number[],
  progress: number
): number[] {
  if (from.length !== to.length) {
    throw new ArityMismatchError(from.length, to.length);
  }
  return from.map((start, i) => lerp(start, to[i], progress));
}

// --- Konfiguracja ---

export interface InterpolationOptions<T> {
  /** Krzywa nakładana na postęp przed mieszaniem. */
  curve: ProgressCurve;
  /** Przycina postęp do [0, 1], zanim trafi do krzywej. */
  clampProgress: boolean;
  /** Dostaje każdą odtworzoną wartość. */
  onUpdate?: (value: T) => void;
}

export const DEFAULT_INTERPOLATION_OPTIONS: Readonly<Pick<InterpolationOptions<unknown>, 'curve' | 'clampProgress'>> = Object.freeze({
  curve: linear,
  clampProgress: false
});

/**
 * Interpolacja jednej wartości między dwoma stanami.
 *
 * Trzyma jeden `NumericVector` jako bieżącą wartość i nadpisuje go w miejscu
 * przy każdej zmianie postępu. Wynik jest dekodowany tak, jak zakodowano
 * wartość początkową; dla kolorów o różnych poziomach na końcach daje to
 * błędny (ale skończony) kolor.
 */
export class Interpolation<K extends InterpolatableKind> {
  readonly kind: K;
  readonly from: InterpolatableValueMap[K];
  readonly to: InterpolatableValueMap[K];

  private readonly options: InterpolationOptions<InterpolatableValueMap[K]>;
  private readonly fromVector: NumericVector<InterpolatableValueMap[K]>;
  private readonly toVector: NumericVector<InterpolatableValueMap[K]>;
  private readonly current: NumericVector<InterpolatableValueMap[K]>;
  private currentProgress: number = 0;
  private currentValue: InterpolatableValueMap[K];

  /**
   * @param kind Typ wartości
   * @param from Wartość początkowa
   * @param to Wartość końcowa
   * @param options Opcje nałożone na `DEFAULT_INTERPOLATION_OPTIONS`
   * @throws UnsupportedColorSpaceError gdy koloru na końcu nie da się zwektoryzować
   */
  constructor(
    kind: K,
    from: InterpolatableValueMap[K],
    to: InterpolatableValueMap[K],
    options: Partial<InterpolationOptions<InterpolatableValueMap[K]>> = {}
  ) {
    this.kind = kind;
    this.from = from;
    this.to = to;
    this.options = { ...DEFAULT_INTERPOLATION_OPTIONS, ...options };
    this.fromVector = vectorize(kind, from);
    this.toVector = vectorize(kind, to);
    this.current = this.fromVector.clone();
    this.currentValue = this.current.toInterpolatable();
  }

  get progress(): number {
    return this.currentProgress;
  }

  set progress(progress: number) {
    this.currentProgress = this.options.clampProgress ? clamp(progress, 0, 1) : progress;
    const curved = this.options.curve(this.currentProgress);
    this.current.mutateValues(blendVectors(this.fromVector.values, this.toVector.values, curved));
    this.currentValue = this.current.toInterpolatable();
    this.options.onUpdate?.(this.currentValue);
  }

  /** Wartość odtworzona dla bieżącego postępu. */
  get value(): InterpolatableValueMap[K] {
    return this.currentValue;
  }

  /** Bieżący wektor; kopia, więc wywołujący nie naruszy sesji. */
  get vector(): NumericVector<InterpolatableValueMap[K]> {
    return this.current.clone();
  }

  reset(): void {
    this.progress = 0;
  }

  /** Nowa sesja od `to` z powrotem do `from`, z tymi samymi opcjami. */
  reversed(): Interpolation<K> {
    return new Interpolation(this.kind, this.to, this.from, this.options);
  }
}

/**
 * Jednorazowa interpolacja bez sesji.
 * @param kind Typ wartości
 * @param from Wartość początkowa
 * @param to Wartość końcowa
 * @param progress Postęp, zwykle w [0, 1]
 * @param curve Opcjonalna krzywa postępu
 */
export function interpolate<K extends InterpolatableKind>(
  kind: K,
  from: InterpolatableValueMap[K],
  to: InterpolatableValueMap[K],
  progress: number,
  curve: ProgressCurve = linear
): InterpolatableValueMap[K] {
  const start = vectorize(kind, from);
  const end = vectorize(kind, to);
  start.mutateValues(blendVectors(start.values, end.values, curve(progress)));
  return start.toInterpolatable();
}
