/**
 * Algebra transformacji 2D i 3D
 * Konwencja wektora wierszowego: punkt przekształcany jest jako `p * M`,
 * przesunięcie leży w ostatnim wierszu, a `concat(a, b)` stosuje najpierw `a`, potem `b`.
 */

import { Matrix, inverse } from 'ml-matrix';
import { InterpolationError } from './errors';
import { AffineTransform, Point, TRANSFORM3D_FIELDS, Transform3D } from './types';

// --- Konwersje do/z macierzy ---

function transform3DToMatrix(t: Transform3D): Matrix {
  return new Matrix([
    [t.m11, t.m12, t.m13, t.m14],
    [t.m21, t.m22, t.m23, t.m24],
    [t.m31, t.m32, t.m33, t.m34],
    [t.m41, t.m42, t.m43, t.m44]
  ]);
}

function matrixToTransform3D(m: Matrix): Transform3D {
  return {
    m11: m.get(0, 0), m12: m.get(0, 1), m13: m.get(0, 2), m14: m.get(0, 3),
    m21: m.get(1, 0), m22: m.get(1, 1), m23: m.get(1, 2), m24: m.get(1, 3),
    m31: m.get(2, 0), m32: m.get(2, 1), m33: m.get(2, 2), m34: m.get(2, 3),
    m41: m.get(3, 0), m42: m.get(3, 1), m43: m.get(3, 2), m44: m.get(3, 3)
  };
}

function affineToMatrix(t: AffineTransform): Matrix {
  return new Matrix([
    [t.a, t.b, 0],
    [t.c, t.d, 0],
    [t.tx, t.ty, 1]
  ]);
}

function matrixToAffine(m: Matrix): AffineTransform {
  return {
    a: m.get(0, 0),
    b: m.get(0, 1),
    c: m.get(1, 0),
    d: m.get(1, 1),
    tx: m.get(2, 0),
    ty: m.get(2, 1)
  };
}

/**
 * Odwraca macierz; LU z ml-matrix odrzuca tylko dokładnie zerowy pivot,
 * więc macierze prawie osobliwe są wykrywane po nieskończonych elementach wyniku.
 * @throws InterpolationError gdy macierz jest osobliwa lub wynik nie jest skończony
 */
function invertMatrix(m: Matrix): Matrix {
  let result: Matrix;
  try {
    result = inverse(m);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InterpolationError(`Transform is not invertible: ${reason}`);
  }
  if (!result.to1DArray().every(Number.isFinite)) {
    throw new InterpolationError('Transform is not invertible: result has non-finite entries');
  }
  return result;
}

// --- Transformacje 3D ---

export function identityTransform3D(): Transform3D {
  return matrixToTransform3D(Matrix.eye(4, 4));
}

export function translation3D(tx: number, ty: number, tz: number): Transform3D {
  return { ...identityTransform3D(), m41: tx, m42: ty, m43: tz };
}

export function scale3D(sx: number, sy: number, sz: number): Transform3D {
  return { ...identityTransform3D(), m11: sx, m22: sy, m33: sz };
}

/**
 * Obrót o `angle` radianów wokół osi (x, y, z). Zerowa oś daje identyczność.
 * @param angle Kąt w radianach
 * @returns Transformacja obrotu
 */
export function rotation3D(angle: number, x: number, y: number, z: number): Transform3D {
  const length = Math.hypot(x, y, z);
  if (length === 0) {
    return identityTransform3D();
  }
  const [ux, uy, uz] = [x / length, y / length, z / length];
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  const t = 1 - c;
  return {
    m11: t * ux * ux + c, m12: t * ux * uy + s * uz, m13: t * ux * uz - s * uy, m14: 0,
    m21: t * ux * uy - s * uz, m22: t * uy * uy + c, m23: t * uy * uz + s * ux, m24: 0,
    m31: t * ux * uz + s * uy, m32: t * uy * uz - s * ux, m33: t * uz * uz + c, m34: 0,
    m41: 0, m42: 0, m43: 0, m44: 1
  };
}

export function concat3D(first: Transform3D, second: Transform3D): Transform3D {
  return matrixToTransform3D(transform3DToMatrix(first).mmul(transform3DToMatrix(second)));
}

/**
 * Odwraca transformację 3D
 * @throws InterpolationError dla transformacji osobliwych
 */
export function invert3D(t: Transform3D): Transform3D {
  return matrixToTransform3D(invertMatrix(transform3DToMatrix(t)));
}

export function isIdentity3D(t: Transform3D): boolean {
  const identity = identityTransform3D();
  return TRANSFORM3D_FIELDS.every((field) => t[field] === identity[field]);
}

// --- Transformacje afiniczne 2D ---

export function identityAffine(): AffineTransform {
  return { a: 1, b: 0, c: 0, d: 1, tx: 0, ty: 0 };
}

export function translationAffine(tx: number, ty: number): AffineTransform {
  return { a: 1, b: 0, c: 0, d: 1, tx, ty };
}

export function scaleAffine(sx: number, sy: number): AffineTransform {
  return { a: sx, b: 0, c: 0, d: sy, tx: 0, ty: 0 };
}

export function rotationAffine(angle: number): AffineTransform {
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  return { a: c, b: s, c: -s, d: c, tx: 0, ty: 0 };
}

export function concatAffine(first: AffineTransform, second: AffineTransform): AffineTransform {
  return matrixToAffine(affineToMatrix(first).mmul(affineToMatrix(second)));
}

/**
 * Odwraca transformację afiniczną
 * @throws InterpolationError dla transformacji osobliwych
 */
export function invertAffine(t: AffineTransform): AffineTransform {
  return matrixToAffine(invertMatrix(affineToMatrix(t)));
}

export function applyAffineToPoint(t: AffineTransform, p: Point): Point {
  return {
    x: t.a * p.x + t.c * p.y + t.tx,
    y: t.b * p.x + t.d * p.y + t.ty
  };
}

// --- Przejścia między 2D i 3D ---

export function affineToTransform3D(t: AffineTransform): Transform3D {
  return {
    ...identityTransform3D(),
    m11: t.a, m12: t.b,
    m21: t.c, m22: t.d,
    m41: t.tx, m42: t.ty
  };
}

/** Prawda, gdy transformacja 3D działa wyłącznie w płaszczyźnie xy. */
export function isAffine3D(t: Transform3D): boolean {
  return t.m13 === 0 && t.m14 === 0
    && t.m23 === 0 && t.m24 === 0
    && t.m31 === 0 && t.m32 === 0 && t.m33 === 1 && t.m34 === 0
    && t.m43 === 0 && t.m44 === 1;
}

/**
 * Spłaszcza transformację 3D do afinicznej 2D
 * @throws InterpolationError gdy transformacja ma składowe głębi lub perspektywy
 */
export function transform3DToAffine(t: Transform3D): AffineTransform {
  if (!isAffine3D(t)) {
    throw new InterpolationError('Transform3D is not affine-compatible');
  }
  return { a: t.m11, b: t.m12, c: t.m21, d: t.m22, tx: t.m41, ty: t.m42 };
}
