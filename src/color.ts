/**
 * Model kolorów i wybór reprezentacji wektorowej
 *
 * Kolor jest kodowany pierwszą reprezentacją, którą obsługuje:
 *   1. RGBA       -> [red, green, blue, alpha]
 *   2. grayscale  -> [white, alpha, 0, 0]
 *   3. HSBA       -> [hue, saturation, brightness, alpha]
 * Dekodowanie wektora innym poziomem niż ten, którym go zakodowano, daje
 * błędny kolor, nigdy wyjątek. Wektory z `vectorize` pamiętają swój poziom.
 */

import { UnsupportedColorSpaceError } from './errors';
import {
  CmykColor,
  Color,
  ColorTier,
  GrayColor,
  HsbColor,
  PatternColor,
  RgbColor
} from './types';
import { assertArity } from './utils';

export const COLOR_COMPONENTS = 4;

// --- Konstruktory ---

export function rgba(red: number, green: number, blue: number, alpha: number = 1): RgbColor {
  return { space: 'rgb', red, green, blue, alpha };
}

export function gray(white: number, alpha: number = 1): GrayColor {
  return { space: 'gray', white, alpha };
}

export function hsba(hue: number, saturation: number, brightness: number, alpha: number = 1): HsbColor {
  return { space: 'hsb', hue, saturation, brightness, alpha };
}

export function cmyka(
  cyan: number,
  magenta: number,
  yellow: number,
  black: number,
  alpha: number = 1
): CmykColor {
  return { space: 'cmyk', cyan, magenta, yellow, black, alpha };
}

export function pattern(name: string): PatternColor {
  return { space: 'pattern', name };
}

// --- Konwersje ---

export function cmykToRgb(color: CmykColor): RgbColor {
  const k = 1 - color.black;
  return rgba((1 - color.cyan) * k, (1 - color.magenta) * k, (1 - color.yellow) * k, color.alpha);
}

/**
 * Konwertuje HSB; wszystkie kanały w [0, 1] (odcień jako ułamek pełnego obrotu).
 */
export function hsbToRgb(color: HsbColor): RgbColor {
  const { saturation: s, brightness: v, alpha } = color;
  if (s === 0) {
    return rgba(v, v, v, alpha);
  }
  const h = (((color.hue % 1) + 1) % 1) * 6;
  const sector = Math.floor(h);
  const f = h - sector;
  const p = v * (1 - s);
  const q = v * (1 - s * f);
  const t = v * (1 - s * (1 - f));
  switch (sector) {
    case 0: return rgba(v, t, p, alpha);
    case 1: return rgba(q, v, p, alpha);
    case 2: return rgba(p, v, t, alpha);
    case 3: return rgba(p, q, v, alpha);
    case 4: return rgba(t, p, v, alpha);
    default: return rgba(v, p, q, alpha);
  }
}

export function rgbToHsb(color: RgbColor): HsbColor {
  const { red: r, green: g, blue: b, alpha } = color;
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const delta = max - min;
  const saturation = max === 0 ? 0 : delta / max;
  let hue = 0;
  if (delta !== 0) {
    if (max === r) {
      hue = ((g - b) / delta) % 6;
    } else if (max === g) {
      hue = (b - r) / delta + 2;
    } else {
      hue = (r - g) / delta + 4;
    }
    hue /= 6;
    if (hue < 0) hue += 1;
  }
  return hsba(hue, saturation, max, alpha);
}

/**
 * Dowolny kolor z kanałami liczbowymi jako RGB.
 * @param color Kolor do konwersji
 * @returns Kolor w przestrzeni RGB
 * @throws UnsupportedColorSpaceError dla kolorów wzorca
 */
export function toRgb(color: Color): RgbColor {
  switch (color.space) {
    case 'rgb':
      return color;
    case 'cmyk':
      return cmykToRgb(color);
    case 'gray':
      return rgba(color.white, color.white, color.white, color.alpha);
    case 'hsb':
      return hsbToRgb(color);
    case 'pattern':
      throw new UnsupportedColorSpaceError(color.space);
  }
}

// --- Ekstrakcja kanałów (kolejne poziomy) ---

/** Kanały RGBA albo null, gdy kolor nie leży w przestrzeni zgodnej z RGB. */
export function extractRgba(color: Color): [number, number, number, number] | null {
  switch (color.space) {
    case 'rgb':
      return [color.red, color.green, color.blue, color.alpha];
    case 'cmyk': {
      const rgb = cmykToRgb(color);
      return [rgb.red, rgb.green, rgb.blue, rgb.alpha];
    }
    default:
      return null;
  }
}

export function extractGrayscale(color: Color): [number, number] | null {
  return color.space === 'gray' ? [color.white, color.alpha] : null;
}

export function extractHsba(color: Color): [number, number, number, number] | null {
  return color.space === 'hsb'
    ? [color.hue, color.saturation, color.brightness, color.alpha]
    : null;
}

export interface EncodedColor {
  tier: ColorTier;
  values: [number, number, number, number];
}

/**
 * Przechodzi łańcuch RGBA -> grayscale -> HSBA i zatrzymuje się na pierwszym trafieniu.
 * @param color Kolor do zakodowania
 * @returns Użyty poziom i cztery komponenty
 * @throws UnsupportedColorSpaceError gdy żaden poziom nie pasuje
 */
export function encodeColor(color: Color): EncodedColor {
  const rgbaChannels = extractRgba(color);
  if (rgbaChannels) {
    return { tier: 'rgba', values: rgbaChannels };
  }

  const grayscale = extractGrayscale(color);
  if (grayscale) {
    return { tier: 'grayscale', values: [grayscale[0], grayscale[1], 0, 0] };
  }

  const hsbaChannels = extractHsba(color);
  if (hsbaChannels) {
    return { tier: 'hsba', values: hsbaChannels };
  }

  throw new UnsupportedColorSpaceError(color.space);
}

export function colorTierOf(color: Color): ColorTier {
  return encodeColor(color).tier;
}

/**
 * Dekoduje cztery komponenty wskazanym poziomem. Grayscale pomija dwa sloty wypełnienia.
 * @param values Cztery komponenty
 * @param tier Poziom, którym wektor został zakodowany
 * @throws ArityMismatchError gdy wektor nie ma czterech komponentów
 */
export function colorFromVector(values: readonly number[], tier: ColorTier): Color {
  assertArity(values, COLOR_COMPONENTS, 'color');
  switch (tier) {
    case 'rgba':
      return rgba(values[0], values[1], values[2], values[3]);
    case 'grayscale':
      return gray(values[0], values[1]);
    case 'hsba':
      return hsba(values[0], values[1], values[2], values[3]);
  }
}
