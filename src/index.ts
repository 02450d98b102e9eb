/**
 * Publiczne API biblioteki
 * Ten plik eksportuje wszystkie publiczne elementy biblioteki
 */

import { Interpolation, blendVectors, interpolate } from './interpolation';
import { interpolatedFrom, kindOf, vectorize } from './registry';

// Eksport typów i interfejsów
export type {
  // Geometria
  Point,
  Size,
  Rect,
  EdgeInsets,

  // Transformacje
  AffineTransform,
  Transform3D,

  // Kolory
  Color,
  ColorSpace,
  ColorTier,
  RgbColor,
  CmykColor,
  GrayColor,
  HsbColor,
  PatternColor,

  // Zbiór typów
  Interpolatable,
  InterpolatableKind,
  InterpolatableValueMap,
  ProgressCurve
} from './types';

export { TRANSFORM3D_FIELDS } from './types';

// Wektor liczbowy
export { NumericVector } from './vector';
export type { Reconstructor } from './vector';

// Rejestr typów
export {
  INTERPOLATABLE_KINDS,
  componentsOf,
  interpolatableTypes,
  interpolatedFrom,
  kindOf,
  vectorize,
  vectorizeTagged
} from './registry';
export type { InterpolatableType, InterpolatableTypeRegistry, Tagged } from './registry';

// Kolory
export {
  COLOR_COMPONENTS,
  cmyka,
  cmykToRgb,
  colorFromVector,
  colorTierOf,
  encodeColor,
  gray,
  hsba,
  hsbToRgb,
  pattern,
  rgba,
  rgbToHsb,
  toRgb
} from './color';
export type { EncodedColor } from './color';

// Transformacje
export {
  affineToTransform3D,
  applyAffineToPoint,
  concat3D,
  concatAffine,
  identityAffine,
  identityTransform3D,
  invert3D,
  invertAffine,
  isAffine3D,
  isIdentity3D,
  rotation3D,
  rotationAffine,
  scale3D,
  scaleAffine,
  transform3DToAffine,
  translation3D,
  translationAffine
} from './transforms';

// Interpolacja
export {
  DEFAULT_INTERPOLATION_OPTIONS,
  Interpolation,
  blendVectors,
  interpolate,
  linear
} from './interpolation';
export type { InterpolationOptions } from './interpolation';

// Błędy i narzędzia
export { ArityMismatchError, InterpolationError, UnsupportedColorSpaceError } from './errors';
export { clamp, lerp } from './utils';

// Eksport wersji biblioteki
export const VERSION = '0.1.0';

// Eksport domyślny - podstawowe funkcje
export default {
  vectorize,
  interpolatedFrom,
  kindOf,
  blendVectors,
  interpolate,
  Interpolation,
  VERSION
};
