import type { AffineTransform } from '@/types/georef';

export interface Vector2 {
  x: number;
  y: number;
}

/**
 * 2D affine primitives over {@link AffineTransform}. Transforms act on
 * column vectors, so `combine(a, b)` applies `b` first, then `a`.
 */
export class AffineMatrix {
  static identity(): AffineTransform {
    return { a: 1, b: 0, c: 0, d: 0, e: 1, f: 0 };
  }

  static translation(x: number, y: number): AffineTransform {
    return { a: 1, b: 0, c: x, d: 0, e: 1, f: y };
  }

  static scale(x: number, y: number): AffineTransform {
    return { a: x, b: 0, c: 0, d: 0, e: y, f: 0 };
  }

  /**
   * Counter-clockwise rotation about the origin for positive angles
   */
  static rotation(angleInDegrees: number): AffineTransform {
    const angle = (angleInDegrees * Math.PI) / 180;
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    return { a: cos, b: -sin, c: 0, d: sin, e: cos, f: 0 };
  }

  static combine(m: AffineTransform, n: AffineTransform): AffineTransform {
    return {
      a: m.a * n.a + m.b * n.d,
      b: m.a * n.b + m.b * n.e,
      c: m.a * n.c + m.b * n.f + m.c,
      d: m.d * n.a + m.e * n.d,
      e: m.d * n.b + m.e * n.e,
      f: m.d * n.c + m.e * n.f + m.f
    };
  }

  /**
   * Compose left to right as written: `chain(T2, R, S, T1)` equals T2 · R · S · T1
   */
  static chain(...matrices: AffineTransform[]): AffineTransform {
    return matrices.reduce((acc, matrix) => AffineMatrix.combine(acc, matrix), AffineMatrix.identity());
  }

  static apply(matrix: AffineTransform, point: Vector2): Vector2 {
    return {
      x: matrix.a * point.x + matrix.b * point.y + matrix.c,
      y: matrix.d * point.x + matrix.e * point.y + matrix.f
    };
  }

  static determinant(matrix: AffineTransform): number {
    return matrix.a * matrix.e - matrix.b * matrix.d;
  }

  static invert(matrix: AffineTransform): AffineTransform | null {
    const det = AffineMatrix.determinant(matrix);
    if (!isFinite(det) || Math.abs(det) < 1e-15) {
      return null;
    }
    const a = matrix.e / det;
    const b = -matrix.b / det;
    const d = -matrix.d / det;
    const e = matrix.a / det;
    return {
      a,
      b,
      c: -(a * matrix.c + b * matrix.f),
      d,
      e,
      f: -(d * matrix.c + e * matrix.f)
    };
  }

  /**
   * Rotation of the x axis in degrees, counter-clockwise
   */
  static rotationAngle(matrix: AffineTransform): number {
    return (Math.atan2(matrix.d, matrix.a) * 180) / Math.PI;
  }

  static pixelSize(matrix: AffineTransform): { x: number; y: number } {
    return {
      x: Math.hypot(matrix.a, matrix.d),
      y: Math.hypot(matrix.b, matrix.e)
    };
  }
}
