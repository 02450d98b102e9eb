import {
  InterpolationError,
  TRANSFORM3D_FIELDS,
  Transform3D,
  affineToTransform3D,
  applyAffineToPoint,
  concat3D,
  concatAffine,
  identityAffine,
  identityTransform3D,
  interpolate,
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
  translationAffine,
  vectorize
} from '../src';

function expectTransformClose(actual: Transform3D, expected: Transform3D): void {
  for (const field of TRANSFORM3D_FIELDS) {
    expect(actual[field]).toBeCloseTo(expected[field], 10);
  }
}

describe('3D transforms', () => {
  it('vectorizes identity row by row', () => {
    expect(vectorize('transform3D', identityTransform3D()).values).toEqual([
      1, 0, 0, 0,
      0, 1, 0, 0,
      0, 0, 1, 0,
      0, 0, 0, 1
    ]);
  });

  it('applies the first transform first when concatenating', () => {
    const result = concat3D(translation3D(1, 2, 3), scale3D(2, 2, 2));
    expectTransformClose(result, { ...scale3D(2, 2, 2), m41: 2, m42: 4, m43: 6 });
  });

  it('inverts a translation', () => {
    expectTransformClose(invert3D(translation3D(5, -3, 2)), translation3D(-5, 3, -2));
  });

  it('refuses to invert a singular transform', () => {
    expect(() => invert3D(scale3D(0, 1, 1))).toThrow(InterpolationError);
  });

  it('refuses an inverse with non-finite entries', () => {
    expect(() => invert3D(scale3D(1e-320, 1, 1))).toThrow(
      'Transform is not invertible: result has non-finite entries'
    );
    expect(() => invertAffine(scaleAffine(1e-320, 1))).toThrow(InterpolationError);
  });

  it('matches the affine rotation for rotations about z', () => {
    expectTransformClose(rotation3D(Math.PI / 2, 0, 0, 1), affineToTransform3D(rotationAffine(Math.PI / 2)));
  });

  it('returns identity for a zero axis', () => {
    expect(isIdentity3D(rotation3D(1, 0, 0, 0))).toBe(true);
    expect(isIdentity3D(identityTransform3D())).toBe(true);
    expect(isIdentity3D(translation3D(1, 0, 0))).toBe(false);
  });
});

describe('affine transforms', () => {
  it('translates then scales', () => {
    const transform = concatAffine(translationAffine(10, 0), scaleAffine(2, 3));
    expect(applyAffineToPoint(transform, { x: 1, y: 1 })).toEqual({ x: 22, y: 3 });
  });

  it('rotates a quarter turn', () => {
    const point = applyAffineToPoint(rotationAffine(Math.PI / 2), { x: 1, y: 0 });
    expect(point.x).toBeCloseTo(0, 10);
    expect(point.y).toBeCloseTo(1, 10);
  });

  it('inverts a scale', () => {
    const inverse = invertAffine(scaleAffine(2, 4));
    expect(inverse.a).toBeCloseTo(0.5, 10);
    expect(inverse.d).toBeCloseTo(0.25, 10);
    expect(inverse.tx).toBeCloseTo(0, 10);
  });

  it('refuses to invert a degenerate scale', () => {
    expect(() => invertAffine(scaleAffine(0, 1))).toThrow(InterpolationError);
  });

  it('round-trips through the 3D form', () => {
    const affine = { a: 1, b: 2, c: 3, d: 4, tx: 5, ty: 6 };
    const lifted = affineToTransform3D(affine);
    expect(isAffine3D(lifted)).toBe(true);
    expect(transform3DToAffine(lifted)).toEqual(affine);
  });

  it('refuses to flatten a transform with depth', () => {
    expect(() => transform3DToAffine(translation3D(0, 0, 5))).toThrow('Transform3D is not affine-compatible');
  });

  it('interpolates between identity and a translation', () => {
    expect(interpolate('affineTransform', identityAffine(), translationAffine(100, 50), 0.5)).toEqual({
      a: 1, b: 0, c: 0, d: 1, tx: 50, ty: 25
    });
  });
});
