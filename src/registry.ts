/**
 * Rejestr typów interpolowalnych
 *
 * Jeden deskryptor na każdy obsługiwany typ: stała liczba komponentów oraz
 * para koduj/dekoduj. Zbiór jest zamknięty: nowy typ trzeba dodać do
 * `InterpolatableValueMap` i do `interpolatableTypes` poniżej.
 */

import { COLOR_COMPONENTS, colorFromVector, encodeColor } from './color';
import {
  AffineTransform,
  Color,
  EdgeInsets,
  InterpolatableKind,
  InterpolatableValueMap,
  Point,
  Rect,
  Size,
  TRANSFORM3D_FIELDS,
  Transform3D
} from './types';
import { assertArity } from './utils';
import { NumericVector } from './vector';

export interface InterpolatableType<K extends InterpolatableKind> {
  readonly kind: K;
  /** Długość każdego wektora, który ten typ tworzy lub przyjmuje. */
  readonly components: number;
  vectorize(value: InterpolatableValueMap[K]): NumericVector<InterpolatableValueMap[K]>;
  /**
   * Odtwarza wartość z sekwencji liczb.
   * @param values Sekwencja o długości `components`
   * @throws ArityMismatchError gdy `values.length !== components`
   */
  interpolatedFrom(values: readonly number[]): InterpolatableValueMap[K];
}

export type InterpolatableTypeRegistry = {
  readonly [K in InterpolatableKind]: InterpolatableType<K>;
};

/** Wartość razem ze swoim typem. */
export interface Tagged<K extends InterpolatableKind> {
  readonly kind: K;
  readonly value: InterpolatableValueMap[K];
}

function defineType<K extends InterpolatableKind>(
  kind: K,
  components: number,
  encode: (value: InterpolatableValueMap[K]) => number[],
  decode: (values: readonly number[]) => InterpolatableValueMap[K]
): InterpolatableType<K> {
  const interpolatedFrom = (values: readonly number[]): InterpolatableValueMap[K] => {
    assertArity(values, components, kind);
    return decode(values);
  };
  return {
    kind,
    components,
    interpolatedFrom,
    vectorize: (value) => new NumericVector<InterpolatableValueMap[K]>(encode(value), interpolatedFrom)
  };
}

function warnOnPrecisionLoss(kind: InterpolatableKind, value: number): void {
  if (Math.abs(value) > Number.MAX_SAFE_INTEGER) {
    console.warn(`${kind} ${value} is outside the safe integer range; interpolated values may lose precision`);
  }
}

function truncate(value: number): number {
  const truncated = Math.trunc(value);
  // -0 -> 0
  return truncated === 0 ? 0 : truncated;
}

// --- Deskryptory ---

const transform3DType = defineType<'transform3D'>(
  'transform3D',
  16,
  (t) => TRANSFORM3D_FIELDS.map((field) => t[field]),
  (v): Transform3D => ({
    m11: v[0], m12: v[1], m13: v[2], m14: v[3],
    m21: v[4], m22: v[5], m23: v[6], m24: v[7],
    m31: v[8], m32: v[9], m33: v[10], m34: v[11],
    m41: v[12], m42: v[13], m43: v[14], m44: v[15]
  })
);

const affineTransformType = defineType<'affineTransform'>(
  'affineTransform',
  6,
  (t) => [t.a, t.b, t.c, t.d, t.tx, t.ty],
  (v): AffineTransform => ({ a: v[0], b: v[1], c: v[2], d: v[3], tx: v[4], ty: v[5] })
);

const floatType = defineType<'float'>('float', 1, (value) => [value], (v) => v[0]);

const pointType = defineType<'point'>(
  'point',
  2,
  (p) => [p.x, p.y],
  (v): Point => ({ x: v[0], y: v[1] })
);

const rectType = defineType<'rect'>(
  'rect',
  4,
  (r) => [r.origin.x, r.origin.y, r.size.width, r.size.height],
  (v): Rect => ({ origin: { x: v[0], y: v[1] }, size: { width: v[2], height: v[3] } })
);

const sizeType = defineType<'size'>(
  'size',
  2,
  (s) => [s.width, s.height],
  (v): Size => ({ width: v[0], height: v[1] })
);

const doubleType = defineType<'double'>('double', 1, (value) => [value], (v) => v[0]);

/** Wartość niecałkowita jest obcinana przy kodowaniu; odtwarzanie obcina w stronę zera. */
const integerType = defineType<'integer'>(
  'integer',
  1,
  (value) => {
    warnOnPrecisionLoss('integer', value);
    return [truncate(value)];
  },
  (v) => truncate(v[0])
);

const boxedNumberType = defineType<'boxedNumber'>(
  'boxedNumber',
  1,
  (value) => {
    const primitive = value.valueOf();
    if (Number.isInteger(primitive)) {
      warnOnPrecisionLoss('boxedNumber', primitive);
    }
    return [primitive];
  },
  (v) => new Number(v[0])
);

/**
 * Wektor z `vectorize` dekoduje poziomem, którym go zakodowano;
 * bezstanowe `interpolatedFrom` zawsze dekoduje jako RGBA.
 */
const colorType: InterpolatableType<'color'> = {
  kind: 'color',
  components: COLOR_COMPONENTS,
  vectorize(value) {
    const { tier, values } = encodeColor(value);
    return new NumericVector<Color>(values, (v) => colorFromVector(v, tier));
  },
  interpolatedFrom(values) {
    return colorFromVector(values, 'rgba');
  }
};

const edgeInsetsType = defineType<'edgeInsets'>(
  'edgeInsets',
  4,
  (i) => [i.top, i.left, i.bottom, i.right],
  (v): EdgeInsets => ({ top: v[0], left: v[1], bottom: v[2], right: v[3] })
);

export const interpolatableTypes: InterpolatableTypeRegistry = Object.freeze({
  transform3D: transform3DType,
  affineTransform: affineTransformType,
  float: floatType,
  point: pointType,
  rect: rectType,
  size: sizeType,
  double: doubleType,
  integer: integerType,
  boxedNumber: boxedNumberType,
  color: colorType,
  edgeInsets: edgeInsetsType
});

export const INTERPOLATABLE_KINDS: readonly InterpolatableKind[] = Object.freeze([
  'transform3D',
  'affineTransform',
  'float',
  'point',
  'rect',
  'size',
  'double',
  'integer',
  'boxedNumber',
  'color',
  'edgeInsets'
]);

// --- API ---

export function componentsOf(kind: InterpolatableKind): number {
  return interpolatableTypes[kind].components;
}

/**
 * Wektoryzuje wartość danego typu
 * @param kind Typ wartości
 * @param value Wartość do zamiany na wektor
 * @returns Wektor z funkcją odtwarzającą wartość tego samego typu
 * @throws UnsupportedColorSpaceError dla kolorów bez kanałów liczbowych
 */
export function vectorize<K extends InterpolatableKind>(
  kind: K,
  value: InterpolatableValueMap[K]
): NumericVector<InterpolatableValueMap[K]> {
  const type: InterpolatableType<K> = interpolatableTypes[kind];
  return type.vectorize(value);
}

/**
 * Wektoryzuje wartość niesioną razem ze swoim typem
 * @param tagged Para typ/wartość
 */
export function vectorizeTagged<K extends InterpolatableKind>(
  tagged: Tagged<K>
): NumericVector<InterpolatableValueMap[K]> {
  return vectorize(tagged.kind, tagged.value);
}

/**
 * Odtwarza wartość danego typu z sekwencji liczb
 * @param kind Typ wartości
 * @param values Sekwencja do odtworzenia
 * @returns Nowa wartość typu `kind`
 * @throws ArityMismatchError gdy `values` nie ma dokładnie `componentsOf(kind)` elementów
 */
export function interpolatedFrom<K extends InterpolatableKind>(
  kind: K,
  values: readonly number[]
): InterpolatableValueMap[K] {
  const type: InterpolatableType<K> = interpolatableTypes[kind];
  return type.interpolatedFrom(values);
}

// --- Rozpoznawanie typu ---

const COLOR_SPACES: readonly string[] = ['rgb', 'cmyk', 'gray', 'hsb', 'pattern'];

function hasNumbers(value: object, keys: readonly string[]): boolean {
  return keys.every((key) => typeof Reflect.get(value, key) === 'number');
}

function isPointLike(value: unknown): boolean {
  return typeof value === 'object' && value !== null && hasNumbers(value, ['x', 'y']);
}

function isSizeLike(value: unknown): boolean {
  return typeof value === 'object' && value !== null && hasNumbers(value, ['width', 'height']);
}

/**
 * Zgaduje typ na podstawie kształtu wartości. Zwykłe liczby są zgłaszane
 * jako `double`; gdy ma to znaczenie, podaj `integer` lub `float` jawnie.
 * @param value Dowolna wartość
 * @returns Typ albo null, gdy kształt nie pasuje do żadnego
 */
export function kindOf(value: unknown): InterpolatableKind | null {
  if (typeof value === 'number') {
    return 'double';
  }
  if (value instanceof Number) {
    return 'boxedNumber';
  }
  if (typeof value !== 'object' || value === null) {
    return null;
  }

  const space = Reflect.get(value, 'space');
  if (typeof space === 'string' && COLOR_SPACES.includes(space)) {
    return 'color';
  }
  if (hasNumbers(value, TRANSFORM3D_FIELDS)) {
    return 'transform3D';
  }
  if (hasNumbers(value, ['a', 'b', 'c', 'd', 'tx', 'ty'])) {
    return 'affineTransform';
  }
  if (hasNumbers(value, ['top', 'left', 'bottom', 'right'])) {
    return 'edgeInsets';
  }
  if (isPointLike(Reflect.get(value, 'origin')) && isSizeLike(Reflect.get(value, 'size'))) {
    return 'rect';
  }
  if (isPointLike(value)) {
    return 'point';
  }
  if (isSizeLike(value)) {
    return 'size';
  }
  return null;
}
