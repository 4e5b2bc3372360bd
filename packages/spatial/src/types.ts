/**
 * Immutable value records. Every operation returns a new value; none of
 * these is ever mutated after construction.
 */

export interface Vector2<A> {
  readonly x: A;
  readonly y: A;
}

export interface Vector3<A> {
  readonly x: A;
  readonly y: A;
  readonly z: A;
}

export interface Vector4<A> {
  readonly x: A;
  readonly y: A;
  readonly z: A;
  readonly w: A;
}

/**
 * A rotation when `x² + y² + z² + w² = 1`. Constructors do not enforce
 * unit length; `normalize` restores it.
 */
export interface Quaternion<A> {
  readonly x: A;
  readonly y: A;
  readonly z: A;
  readonly w: A;
}

/**
 * 3x2 affine transform. The third column is implicitly (0, 0, 1).
 * Row-vector convention: `v' = v · M`, translation in row 3.
 */
export interface Matrix3x2<A> {
  readonly m11: A;
  readonly m12: A;
  readonly m21: A;
  readonly m22: A;
  readonly m31: A;
  readonly m32: A;
}

/**
 * 4x4 homogeneous transform. Row-vector convention: `v' = v · M`,
 * translation in row 4.
 */
export interface Matrix4x4<A> {
  readonly m11: A;
  readonly m12: A;
  readonly m13: A;
  readonly m14: A;
  readonly m21: A;
  readonly m22: A;
  readonly m23: A;
  readonly m24: A;
  readonly m31: A;
  readonly m32: A;
  readonly m33: A;
  readonly m34: A;
  readonly m41: A;
  readonly m42: A;
  readonly m43: A;
  readonly m44: A;
}

/**
 * The plane `normal · p + d = 0`.
 */
export interface Plane<A> {
  readonly normal: Vector3<A>;
  readonly d: A;
}

/**
 * Outcome of an inversion: on failure `result` is the identity.
 */
export interface InversionResult<M> {
  readonly success: boolean;
  readonly result: M;
}
