/**
 * Typy wartości, które potrafią przejść przez wektor liczbowy.
 * Każdy typ to zwykły rekord tylko do odczytu; jego układ liczbowy jest w registry.ts.
 */

// --- Geometria ---

export interface Point {
  readonly x: number;
  readonly y: number;
}

export interface Size {
  readonly width: number;
  readonly height: number;
}

export interface Rect {
  readonly origin: Point;
  readonly size: Size;
}

export interface EdgeInsets {
  readonly top: number;
  readonly left: number;
  readonly bottom: number;
  readonly right: number;
}

// --- Transformacje ---

/**
 * Transformacja afiniczna 2D w postaci wektora wierszowego:
 * `[x' y' 1] = [x y 1] * [[a b 0] [c d 0] [tx ty 1]]`
 */
export interface AffineTransform {
  readonly a: number;
  readonly b: number;
  readonly c: number;
  readonly d: number;
  readonly tx: number;
  readonly ty: number;
}

/** Jednorodna transformacja 4x4, wierszami, przesunięcie w czwartym wierszu. */
export interface Transform3D {
  readonly m11: number; readonly m12: number; readonly m13: number; readonly m14: number;
  readonly m21: number; readonly m22: number; readonly m23: number; readonly m24: number;
  readonly m31: number; readonly m32: number; readonly m33: number; readonly m34: number;
  readonly m41: number; readonly m42: number; readonly m43: number; readonly m44: number;
}

/** Układ wektora `Transform3D`, wiersz po wierszu. */
export const TRANSFORM3D_FIELDS = [
  'm11', 'm12', 'm13', 'm14',
  'm21', 'm22', 'm23', 'm24',
  'm31', 'm32', 'm33', 'm34',
  'm41', 'm42', 'm43', 'm44'
] as const satisfies readonly (keyof Transform3D)[];

// --- Kolory ---

export type ColorSpace = 'rgb' | 'cmyk' | 'gray' | 'hsb' | 'pattern';

export interface RgbColor {
  readonly space: 'rgb';
  readonly red: number;
  readonly green: number;
  readonly blue: number;
  readonly alpha: number;
}

export interface CmykColor {
  readonly space: 'cmyk';
  readonly cyan: number;
  readonly magenta: number;
  readonly yellow: number;
  readonly black: number;
  readonly alpha: number;
}

export interface GrayColor {
  readonly space: 'gray';
  readonly white: number;
  readonly alpha: number;
}

export interface HsbColor {
  readonly space: 'hsb';
  readonly hue: number;
  readonly saturation: number;
  readonly brightness: number;
  readonly alpha: number;
}

/** Nazwany wzorzec lub wypełnienie obrazem; brak kanałów liczbowych. */
export interface PatternColor {
  readonly space: 'pattern';
  readonly name: string;
}

export type Color = RgbColor | CmykColor | GrayColor | HsbColor | PatternColor;

/**
 * Poziom, którym kolor został zwektoryzowany.
 * rgba: [r, g, b, a]; grayscale: [white, alpha, 0, 0]; hsba: [h, s, b, a]
 */
export type ColorTier = 'rgba' | 'grayscale' | 'hsba';

// --- Zamknięty zbiór typów ---

/**
 * Typ wartości stojący za każdym rodzajem. `float`, `double` i `integer`
 * dzielą liczbę JavaScript, więc rodzaj musi podróżować razem z wartością.
 */
export interface InterpolatableValueMap {
  transform3D: Transform3D;
  affineTransform: AffineTransform;
  float: number;
  point: Point;
  rect: Rect;
  size: Size;
  double: number;
  integer: number;
  boxedNumber: Number;
  color: Color;
  edgeInsets: EdgeInsets;
}

export type InterpolatableKind = keyof InterpolatableValueMap;

export type Interpolatable = InterpolatableValueMap[InterpolatableKind];

/** Odwzorowuje ułamek postępu na inny (easing). */
export type ProgressCurve = (progress: number) => number;
