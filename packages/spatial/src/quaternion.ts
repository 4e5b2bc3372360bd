/**
 * Quaternion algebra over any Scalar.
 *
 * Composition law: `concatenate(a, b)` means "apply a, then b" and
 * multiplies as `b · a` (Hamilton product). `vector3.transform` rotates by
 * `q · v · q⁻¹`, so `transform(v, concatenate(a, b))` equals
 * `transform(transform(v, a), b)`.
 */

import { half, isNearlyEqual, isNearlyZero, two, type Scalar } from "@orbis/numeric";
import type { Matrix4x4, Quaternion, Vector3 } from "./types.js";

export interface AxisAngle<A> {
  readonly axis: Vector3<A>;
  readonly angle: A;
}

export interface QuaternionOps<A> {
  readonly identity: Quaternion<A>;
  readonly zero: Quaternion<A>;
  create(x: A, y: A, z: A, w: A): Quaternion<A>;
  of(x: number, y: number, z: number, w: number): Quaternion<A>;
  fromVector(v: Vector3<A>, w: A): Quaternion<A>;

  add(a: Quaternion<A>, b: Quaternion<A>): Quaternion<A>;
  sub(a: Quaternion<A>, b: Quaternion<A>): Quaternion<A>;
  negate(q: Quaternion<A>): Quaternion<A>;
  scale(q: Quaternion<A>, s: A): Quaternion<A>;
  /** Hamilton product `a · b`. */
  multiply(a: Quaternion<A>, b: Quaternion<A>): Quaternion<A>;
  /** Apply `a`, then `b`: `b · a`. */
  concatenate(a: Quaternion<A>, b: Quaternion<A>): Quaternion<A>;
  /** `a · b⁻¹` */
  divide(a: Quaternion<A>, b: Quaternion<A>): Quaternion<A>;

  dot(a: Quaternion<A>, b: Quaternion<A>): A;
  length(q: Quaternion<A>): A;
  lengthSquared(q: Quaternion<A>): A;
  normalize(q: Quaternion<A>): Quaternion<A>;
  conjugate(q: Quaternion<A>): Quaternion<A>;
  inverse(q: Quaternion<A>): Quaternion<A>;

  equals(a: Quaternion<A>, b: Quaternion<A>): boolean;
  isNearlyEqual(a: Quaternion<A>, b: Quaternion<A>): boolean;
  isIdentity(q: Quaternion<A>): boolean;

  lerp(a: Quaternion<A>, b: Quaternion<A>, t: A): Quaternion<A>;
  slerp(a: Quaternion<A>, b: Quaternion<A>, t: A): Quaternion<A>;

  createFromAxisAngle(axis: Vector3<A>, angle: A): Quaternion<A>;
  createFromYawPitchRoll(yaw: A, pitch: A, roll: A): Quaternion<A>;
  createFromRotationMatrix(m: Matrix4x4<A>): Quaternion<A>;
  toAxisAngle(q: Quaternion<A>): AxisAngle<A>;
}

// Below this distance from 1, sin(ω) is too small to divide by.
const SLERP_THRESHOLD = 1e-6;

export function quaternionOps<A>(S: Scalar<A>): QuaternionOps<A> {
  const zeroS = S.zero();
  const oneS = S.one();
  const halfS = half(S);
  const twoS = two(S);
  const slerpLimit = S.sub(oneS, S.fromNumber(SLERP_THRESHOLD));

  const create = (x: A, y: A, z: A, w: A): Quaternion<A> => ({ x, y, z, w });

  const identity = create(zeroS, zeroS, zeroS, oneS);
  const zero = create(zeroS, zeroS, zeroS, zeroS);

  const add = (a: Quaternion<A>, b: Quaternion<A>): Quaternion<A> =>
    create(S.add(a.x, b.x), S.add(a.y, b.y), S.add(a.z, b.z), S.add(a.w, b.w));

  const sub = (a: Quaternion<A>, b: Quaternion<A>): Quaternion<A> =>
    create(S.sub(a.x, b.x), S.sub(a.y, b.y), S.sub(a.z, b.z), S.sub(a.w, b.w));

  const negate = (q: Quaternion<A>): Quaternion<A> =>
    create(S.negate(q.x), S.negate(q.y), S.negate(q.z), S.negate(q.w));

  const scale = (q: Quaternion<A>, s: A): Quaternion<A> =>
    create(S.mul(q.x, s), S.mul(q.y, s), S.mul(q.z, s), S.mul(q.w, s));

  const multiply = (a: Quaternion<A>, b: Quaternion<A>): Quaternion<A> => {
    const cx = S.sub(S.mul(a.y, b.z), S.mul(a.z, b.y));
    const cy = S.sub(S.mul(a.z, b.x), S.mul(a.x, b.z));
    const cz = S.sub(S.mul(a.x, b.y), S.mul(a.y, b.x));
    const d = S.add(S.add(S.mul(a.x, b.x), S.mul(a.y, b.y)), S.mul(a.z, b.z));
    return create(
      S.add(S.add(S.mul(a.x, b.w), S.mul(b.x, a.w)), cx),
      S.add(S.add(S.mul(a.y, b.w), S.mul(b.y, a.w)), cy),
      S.add(S.add(S.mul(a.z, b.w), S.mul(b.z, a.w)), cz),
      S.sub(S.mul(a.w, b.w), d)
    );
  };

  const dot = (a: Quaternion<A>, b: Quaternion<A>): A =>
    S.add(
      S.add(S.mul(a.x, b.x), S.mul(a.y, b.y)),
      S.add(S.mul(a.z, b.z), S.mul(a.w, b.w))
    );

  const lengthSquared = (q: Quaternion<A>): A => dot(q, q);
  const length = (q: Quaternion<A>): A => S.sqrt(lengthSquared(q));

  const normalize = (q: Quaternion<A>): Quaternion<A> => {
    const inv = S.div(oneS, length(q));
    return scale(q, inv);
  };

  const conjugate = (q: Quaternion<A>): Quaternion<A> =>
    create(S.negate(q.x), S.negate(q.y), S.negate(q.z), q.w);

  const inverse = (q: Quaternion<A>): Quaternion<A> =>
    scale(conjugate(q), S.div(oneS, lengthSquared(q)));

  const equals = (a: Quaternion<A>, b: Quaternion<A>): boolean =>
    S.equals(a.x, b.x) && S.equals(a.y, b.y) && S.equals(a.z, b.z) && S.equals(a.w, b.w);

  const lerp = (a: Quaternion<A>, b: Quaternion<A>, t: A): Quaternion<A> => {
    const t1 = S.sub(oneS, t);
    const target = S.greaterThanOrEqual(dot(a, b), zeroS) ? b : negate(b);
    return normalize(add(scale(a, t1), scale(target, t)));
  };

  const slerp = (a: Quaternion<A>, b: Quaternion<A>, t: A): Quaternion<A> => {
    let cosOmega = dot(a, b);
    let flip = false;
    if (S.lessThan(cosOmega, zeroS)) {
      flip = true;
      cosOmega = S.negate(cosOmega);
    }

    let s1: A;
    let s2: A;
    if (S.greaterThan(cosOmega, slerpLimit)) {
      s1 = S.sub(oneS, t);
      s2 = flip ? S.negate(t) : t;
      return normalize(add(scale(a, s1), scale(b, s2)));
    }

    const omega = S.acos(cosOmega);
    const invSinOmega = S.div(oneS, S.sin(omega));
    s1 = S.mul(S.sin(S.mul(S.sub(oneS, t), omega)), invSinOmega);
    const tail = S.mul(S.sin(S.mul(t, omega)), invSinOmega);
    s2 = flip ? S.negate(tail) : tail;
    return add(scale(a, s1), scale(b, s2));
  };

  const createFromAxisAngle = (axis: Vector3<A>, angle: A): Quaternion<A> => {
    const halfAngle = S.mul(angle, halfS);
    const s = S.sin(halfAngle);
    return create(S.mul(axis.x, s), S.mul(axis.y, s), S.mul(axis.z, s), S.cos(halfAngle));
  };

  const createFromYawPitchRoll = (yaw: A, pitch: A, roll: A): Quaternion<A> => {
    const sr = S.sin(S.mul(roll, halfS));
    const cr = S.cos(S.mul(roll, halfS));
    const sp = S.sin(S.mul(pitch, halfS));
    const cp = S.cos(S.mul(pitch, halfS));
    const sy = S.sin(S.mul(yaw, halfS));
    const cy = S.cos(S.mul(yaw, halfS));

    const mul3 = (a: A, b: A, c: A): A => S.mul(S.mul(a, b), c);
    return create(
      S.add(mul3(cy, sp, cr), mul3(sy, cp, sr)),
      S.sub(mul3(sy, cp, cr), mul3(cy, sp, sr)),
      S.sub(mul3(cy, cp, sr), mul3(sy, sp, cr)),
      S.add(mul3(cy, cp, cr), mul3(sy, sp, sr))
    );
  };

  // Pivot on the largest of trace, m11, m22, m33 so the divisor stays large.
  const createFromRotationMatrix = (m: Matrix4x4<A>): Quaternion<A> => {
    const trace = S.add(S.add(m.m11, m.m22), m.m33);

    if (S.greaterThan(trace, zeroS)) {
      const s = S.sqrt(S.add(trace, oneS));
      const inv = S.div(halfS, s);
      return create(
        S.mul(S.sub(m.m23, m.m32), inv),
        S.mul(S.sub(m.m31, m.m13), inv),
        S.mul(S.sub(m.m12, m.m21), inv),
        S.mul(s, halfS)
      );
    }

    if (S.greaterThanOrEqual(m.m11, m.m22) && S.greaterThanOrEqual(m.m11, m.m33)) {
      const s = S.sqrt(S.sub(S.sub(S.add(oneS, m.m11), m.m22), m.m33));
      const inv = S.div(halfS, s);
      return create(
        S.mul(s, halfS),
        S.mul(S.add(m.m12, m.m21), inv),
        S.mul(S.add(m.m13, m.m31), inv),
        S.mul(S.sub(m.m23, m.m32), inv)
      );
    }

    if (S.greaterThan(m.m22, m.m33)) {
      const s = S.sqrt(S.sub(S.sub(S.add(oneS, m.m22), m.m11), m.m33));
      const inv = S.div(halfS, s);
      return create(
        S.mul(S.add(m.m21, m.m12), inv),
        S.mul(s, halfS),
        S.mul(S.add(m.m32, m.m23), inv),
        S.mul(S.sub(m.m31, m.m13), inv)
      );
    }

    const s = S.sqrt(S.sub(S.sub(S.add(oneS, m.m33), m.m11), m.m22));
    const inv = S.div(halfS, s);
    return create(
      S.mul(S.add(m.m31, m.m13), inv),
      S.mul(S.add(m.m32, m.m23), inv),
      S.mul(s, halfS),
      S.mul(S.sub(m.m12, m.m21), inv)
    );
  };

  const toAxisAngle = (q: Quaternion<A>): AxisAngle<A> => {
    const sinHalf = S.sqrt(S.add(S.add(S.mul(q.x, q.x), S.mul(q.y, q.y)), S.mul(q.z, q.z)));
    const angle = S.mul(twoS, S.atan2(sinHalf, q.w));
    if (isNearlyZero(S, sinHalf)) {
      return { axis: { x: oneS, y: zeroS, z: zeroS }, angle: zeroS };
    }
    return {
      axis: { x: S.div(q.x, sinHalf), y: S.div(q.y, sinHalf), z: S.div(q.z, sinHalf) },
      angle,
    };
  };

  return {
    identity,
    zero,
    create,
    of: (x, y, z, w) => create(S.fromNumber(x), S.fromNumber(y), S.fromNumber(z), S.fromNumber(w)),
    fromVector: (v, w) => create(v.x, v.y, v.z, w),
    add,
    sub,
    negate,
    scale,
    multiply,
    concatenate: (a, b) => multiply(b, a),
    divide: (a, b) => multiply(a, inverse(b)),
    dot,
    length,
    lengthSquared,
    normalize,
    conjugate,
    inverse,
    equals,
    isNearlyEqual: (a, b) =>
      isNearlyEqual(S, a.x, b.x) &&
      isNearlyEqual(S, a.y, b.y) &&
      isNearlyEqual(S, a.z, b.z) &&
      isNearlyEqual(S, a.w, b.w),
    isIdentity: (q) => equals(q, identity),
    lerp,
    slerp,
    createFromAxisAngle,
    createFromYawPitchRoll,
    createFromRotationMatrix,
    toAxisAngle,
  };
}

