import { AffineMatrix } from '../matrix';

describe('AffineMatrix', () => {
  it('should rotate counter-clockwise for positive angles', () => {
    const rotated = AffineMatrix.apply(AffineMatrix.rotation(90), { x: 1, y: 0 });
    expect(rotated.x).toBeCloseTo(0, 12);
    expect(rotated.y).toBeCloseTo(1, 12);
  });

  it('should apply the right-hand matrix first when combining', () => {
    const scaleThenMove = AffineMatrix.combine(AffineMatrix.translation(10, 0), AffineMatrix.scale(2, 2));
    const moveThenScale = AffineMatrix.combine(AffineMatrix.scale(2, 2), AffineMatrix.translation(10, 0));

    expect(AffineMatrix.apply(scaleThenMove, { x: 1, y: 1 })).toEqual({ x: 12, y: 2 });
    expect(AffineMatrix.apply(moveThenScale, { x: 1, y: 1 })).toEqual({ x: 22, y: 2 });
  });

  it('should chain matrices in written order', () => {
    const chained = AffineMatrix.chain(
      AffineMatrix.translation(100, 200),
      AffineMatrix.scale(3, -3),
      AffineMatrix.translation(-1, -1)
    );

    expect(AffineMatrix.apply(chained, { x: 1, y: 1 })).toEqual({ x: 100, y: 200 });
    expect(AffineMatrix.apply(chained, { x: 2, y: 3 })).toEqual({ x: 103, y: 194 });
  });

  it('should invert a transform', () => {
    const transform = AffineMatrix.chain(
      AffineMatrix.translation(50, -20),
      AffineMatrix.rotation(30),
      AffineMatrix.scale(0.5, -0.5)
    );
    const inverse = AffineMatrix.invert(transform);
    expect(inverse).not.toBeNull();
    if (!inverse) return;

    const roundTrip = AffineMatrix.apply(inverse, AffineMatrix.apply(transform, { x: 7, y: 11 }));
    expect(roundTrip.x).toBeCloseTo(7, 9);
    expect(roundTrip.y).toBeCloseTo(11, 9);
  });

  it('should return null for a singular transform', () => {
    expect(AffineMatrix.invert(AffineMatrix.scale(0, 1))).toBeNull();
  });

  it('should report pixel size', () => {
    const size = AffineMatrix.pixelSize(AffineMatrix.combine(AffineMatrix.rotation(40), AffineMatrix.scale(0.25, -0.25)));
    expect(size.x).toBeCloseTo(0.25, 12);
    expect(size.y).toBeCloseTo(0.25, 12);
  });
});
