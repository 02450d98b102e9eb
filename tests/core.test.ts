import Interpolatables, { VERSION, Interpolation, Rect, clamp, lerp } from '../src';

describe('Interpolatable values core', () => {
  it('exposes the main functions on the default export', () => {
    expect(Interpolatables.VERSION).toBe(VERSION);
    expect(Interpolatables.Interpolation).toBe(Interpolation);
    expect(Interpolatables.vectorize('size', { width: 3, height: 4 }).values).toEqual([3, 4]);
    expect(Interpolatables.kindOf({ x: 1, y: 1 })).toBe('point');
  });

  it('drives a rect through frames the way an animation loop would', () => {
    const from: Rect = { origin: { x: 0, y: 0 }, size: { width: 10, height: 10 } };
    const to: Rect = { origin: { x: 100, y: 100 }, size: { width: 20, height: 20 } };
    const widths: number[] = [];
    const session = new Interpolation('rect', from, to, {
      onUpdate: (rect) => widths.push(rect.size.width)
    });

    for (const progress of [0, 0.25, 0.5, 0.75, 1]) {
      session.progress = progress;
    }

    expect(widths).toEqual([10, 12.5, 15, 17.5, 20]);
    expect(session.value).toEqual(to);
  });

  it('blends through the vector API', () => {
    const start = Interpolatables.vectorize('point', { x: 0, y: 0 });
    const end = Interpolatables.vectorize('point', { x: 8, y: -8 });
    start.mutateValues(Interpolatables.blendVectors(start.values, end.values, 0.25));
    expect(start.toInterpolatable()).toEqual({ x: 2, y: -2 });
  });
});

describe('utils', () => {
  it('clamps into a range', () => {
    expect(clamp(5, 0, 1)).toBe(1);
    expect(clamp(-5, 0, 1)).toBe(0);
    expect(clamp(0.5, 0, 1)).toBe(0.5);
  });

  it('interpolates two numbers', () => {
    expect(lerp(10, 30, 0.5)).toBe(20);
    expect(lerp(10, 30, 1.5)).toBe(40);
  });
});
