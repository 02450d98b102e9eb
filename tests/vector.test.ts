import { ArityMismatchError, NumericVector, Point, interpolatedFrom, vectorize } from '../src';

describe('NumericVector', () => {
  it('copies values but shares the reconstructor', () => {
    const original = vectorize('point', { x: 1, y: 2 });
    const copy = new NumericVector(original);
    copy.values[0] = 9;

    expect(original.values).toEqual([1, 2]);
    expect(copy.toInterpolatable()).toEqual({ x: 9, y: 2 });
    expect(original.toInterpolatable()).toEqual({ x: 1, y: 2 });
  });

  it('clones independently', () => {
    const original = vectorize('size', { width: 4, height: 3 });
    const clone = original.clone();
    clone.mutateValues([8, 6]);

    expect(original.toInterpolatable()).toEqual({ width: 4, height: 3 });
    expect(clone.toInterpolatable()).toEqual({ width: 8, height: 6 });
  });

  it('does not alias the sequence it was built from', () => {
    const source = [1, 2];
    const vector = new NumericVector<Point>(source, (values) => interpolatedFrom('point', values));
    source[0] = 5;

    expect(vector.values).toEqual([1, 2]);
    expect(vector.length).toBe(2);
  });

  it('rebuilds a fresh value on every call', () => {
    const vector = vectorize('rect', { origin: { x: 0, y: 0 }, size: { width: 10, height: 10 } });
    vector.mutateValues([25, 25, 12.5, 12.5]);

    const first = vector.toInterpolatable();
    const second = vector.toInterpolatable();
    expect(first).toEqual({ origin: { x: 25, y: 25 }, size: { width: 12.5, height: 12.5 } });
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it('fails to rebuild after the length changes', () => {
    const vector = vectorize('edgeInsets', { top: 1, left: 1, bottom: 1, right: 1 });
    vector.mutateValues([1, 1]);

    expect(vector.length).toBe(2);
    expect(() => vector.toInterpolatable()).toThrow(ArityMismatchError);
  });

  it('accepts writes straight to values', () => {
    const vector = vectorize('float', 1);
    vector.values = [3.25];
    expect(vector.toInterpolatable()).toBe(3.25);
  });
});
