/**
 * 3-D vector algebra over any Scalar.
 */

import { createLogger, InvalidArgumentError } from "@orbis/core";
import { isNearlyEqual, isNearlyZero, two, type Scalar } from "@orbis/numeric";
import type { QuaternionOps } from "./quaternion.js";
import type { Matrix4x4, Quaternion, Vector3 } from "./types.js";

const log = createLogger("vector3");

export interface Vector3Ops<A> {
  readonly zero: Vector3<A>;
  readonly one: Vector3<A>;
  readonly unitX: Vector3<A>;
  readonly unitY: Vector3<A>;
  readonly unitZ: Vector3<A>;

  create(x: A, y: A, z: A): Vector3<A>;
  of(x: number, y: number, z: number): Vector3<A>;
  /** Reads three components starting at `start`. */
  fromArray(values: readonly A[], start?: number): Vector3<A>;
  /** Writes the components into `target` starting at `start`. */
  copyTo(v: Vector3<A>, target: A[], start?: number): void;
  toArray(v: Vector3<A>): [A, A, A];

  add(a: Vector3<A>, b: Vector3<A>): Vector3<A>;
  sub(a: Vector3<A>, b: Vector3<A>): Vector3<A>;
  /** Component-wise product. */
  mul(a: Vector3<A>, b: Vector3<A>): Vector3<A>;
  /** Component-wise quotient. */
  divide(a: Vector3<A>, b: Vector3<A>): Vector3<A>;
  scale(v: Vector3<A>, s: A): Vector3<A>;
  divideScalar(v: Vector3<A>, s: A): Vector3<A>;
  negate(v: Vector3<A>): Vector3<A>;

  dot(a: Vector3<A>, b: Vector3<A>): A;
  /** Right-handed cross product. */
  cross(a: Vector3<A>, b: Vector3<A>): Vector3<A>;
  length(v: Vector3<A>): A;
  lengthSquared(v: Vector3<A>): A;
  distance(a: Vector3<A>, b: Vector3<A>): A;
  distanceSquared(a: Vector3<A>, b: Vector3<A>): A;
  /**
   * Unit vector in the direction of `v`. A zero vector has no direction:
   * the result is NaN for IEEE scalars; check `isZero` first when it
   * matters.
   */
  normalize(v: Vector3<A>): Vector3<A>;
  lerp(a: Vector3<A>, b: Vector3<A>, t: A): Vector3<A>;
  /** `v - 2·(v·n)·n` for a unit normal `n`. */
  reflect(v: Vector3<A>, normal: Vector3<A>): Vector3<A>;
  min(a: Vector3<A>, b: Vector3<A>): Vector3<A>;
  max(a: Vector3<A>, b: Vector3<A>): Vector3<A>;
  clamp(v: Vector3<A>, lo: Vector3<A>, hi: Vector3<A>): Vector3<A>;
  abs(v: Vector3<A>): Vector3<A>;
  squareRoot(v: Vector3<A>): Vector3<A>;

  equals(a: Vector3<A>, b: Vector3<A>): boolean;
  isNearlyEqual(a: Vector3<A>, b: Vector3<A>): boolean;
  isZero(v: Vector3<A>): boolean;
  isNearlyZero(v: Vector3<A>): boolean;
  /** Unsigned angle between the vectors, in radians. */
  angle(a: Vector3<A>, b: Vector3<A>): A;
  /**
   * Whether `a × b` vanishes: nearly (default) or exactly.
   */
  areParallel(a: Vector3<A>, b: Vector3<A>, allowSmallError?: boolean): boolean;

  /** Rotate by `q · v · q⁻¹`. */
  transform(v: Vector3<A>, q: Quaternion<A>): Vector3<A>;
  /** Row vector times matrix, including translation. */
  transformMatrix(v: Vector3<A>, m: Matrix4x4<A>): Vector3<A>;
  /** Row vector times the upper 3x3 of the matrix. */
  transformNormal(v: Vector3<A>, m: Matrix4x4<A>): Vector3<A>;
  /** Shortest rotation taking the direction of `a` onto that of `b`. */
  rotationTo(a: Vector3<A>, b: Vector3<A>): Quaternion<A>;
}

export function vector3Ops<A>(S: Scalar<A>, Q: QuaternionOps<A>): Vector3Ops<A> {
  const zeroS = S.zero();
  const oneS = S.one();
  const twoS = two(S);

  const create = (x: A, y: A, z: A): Vector3<A> => ({ x, y, z });

  const zero = create(zeroS, zeroS, zeroS);
  const unitX = create(oneS, zeroS, zeroS);
  const unitY = create(zeroS, oneS, zeroS);

  const map = (v: Vector3<A>, f: (a: A) => A): Vector3<A> => create(f(v.x), f(v.y), f(v.z));
  const zip = (a: Vector3<A>, b: Vector3<A>, f: (p: A, q: A) => A): Vector3<A> =>
    create(f(a.x, b.x), f(a.y, b.y), f(a.z, b.z));

  const add = (a: Vector3<A>, b: Vector3<A>) => zip(a, b, S.add);
  const sub = (a: Vector3<A>, b: Vector3<A>) => zip(a, b, S.sub);
  const scale = (v: Vector3<A>, s: A) => map(v, (c) => S.mul(c, s));

  const dot = (a: Vector3<A>, b: Vector3<A>): A =>
    S.add(S.add(S.mul(a.x, b.x), S.mul(a.y, b.y)), S.mul(a.z, b.z));

  const cross = (a: Vector3<A>, b: Vector3<A>): Vector3<A> =>
    create(
      S.sub(S.mul(a.y, b.z), S.mul(a.z, b.y)),
      S.sub(S.mul(a.z, b.x), S.mul(a.x, b.z)),
      S.sub(S.mul(a.x, b.y), S.mul(a.y, b.x))
    );

  const lengthSquared = (v: Vector3<A>): A => dot(v, v);
  const length = (v: Vector3<A>): A => S.sqrt(lengthSquared(v));

  const normalize = (v: Vector3<A>): Vector3<A> => {
    const len = length(v);
    if (S.equals(len, zeroS)) {
      log.debug("normalize of a zero-length vector has no direction");
    }
    return map(v, (c) => S.div(c, len));
  };

  const equals = (a: Vector3<A>, b: Vector3<A>): boolean =>
    S.equals(a.x, b.x) && S.equals(a.y, b.y) && S.equals(a.z, b.z);

  const isZero = (v: Vector3<A>): boolean => equals(v, zero);

  const isNearlyZeroV = (v: Vector3<A>): boolean =>
    isNearlyZero(S, v.x) && isNearlyZero(S, v.y) && isNearlyZero(S, v.z);

  // Relative tolerance: |a×b| ≤ ε·|a|·|b|.
  const areParallel = (a: Vector3<A>, b: Vector3<A>, allowSmallError = true): boolean => {
    const c = cross(a, b);
    if (!allowSmallError) return isZero(c);
    const bound = S.mul(S.mul(S.epsilon, S.epsilon), S.mul(lengthSquared(a), lengthSquared(b)));
    return S.lessThanOrEqual(lengthSquared(c), bound);
  };

  // Doubled-component expansion of q·v·q⁻¹.
  const transform = (v: Vector3<A>, q: Quaternion<A>): Vector3<A> => {
    const x2 = S.add(q.x, q.x);
    const y2 = S.add(q.y, q.y);
    const z2 = S.add(q.z, q.z);

    const wx2 = S.mul(q.w, x2);
    const wy2 = S.mul(q.w, y2);
    const wz2 = S.mul(q.w, z2);
    const xx2 = S.mul(q.x, x2);
    const xy2 = S.mul(q.x, y2);
    const xz2 = S.mul(q.x, z2);
    const yy2 = S.mul(q.y, y2);
    const yz2 = S.mul(q.y, z2);
    const zz2 = S.mul(q.z, z2);

    const row = (a: A, b: A, c: A): A =>
      S.add(S.add(S.mul(v.x, a), S.mul(v.y, b)), S.mul(v.z, c));

    return create(
      row(S.sub(S.sub(oneS, yy2), zz2), S.sub(xy2, wz2), S.add(xz2, wy2)),
      row(S.add(xy2, wz2), S.sub(S.sub(oneS, xx2), zz2), S.sub(yz2, wx2)),
      row(S.sub(xz2, wy2), S.add(yz2, wx2), S.sub(S.sub(oneS, xx2), yy2))
    );
  };

  const transformNormal = (v: Vector3<A>, m: Matrix4x4<A>): Vector3<A> =>
    create(
      S.add(S.add(S.mul(v.x, m.m11), S.mul(v.y, m.m21)), S.mul(v.z, m.m31)),
      S.add(S.add(S.mul(v.x, m.m12), S.mul(v.y, m.m22)), S.mul(v.z, m.m32)),
      S.add(S.add(S.mul(v.x, m.m13), S.mul(v.y, m.m23)), S.mul(v.z, m.m33))
    );

  const rotationTo = (a: Vector3<A>, b: Vector3<A>): Quaternion<A> => {
    if (areParallel(a, b)) {
      if (S.greaterThanOrEqual(dot(a, b), zeroS)) {
        return Q.identity;
      }
      // Anti-parallel: a × b vanishes, so turn through a helper axis.
      log.debug("rotationTo: anti-parallel inputs, composing through a helper axis");
      const helper = areParallel(a, unitX) ? unitY : unitX;
      return Q.normalize(Q.concatenate(rotationTo(a, helper), rotationTo(helper, b)));
    }

    const w = S.add(S.sqrt(S.mul(lengthSquared(a), lengthSquared(b))), dot(a, b));
    return Q.normalize(Q.fromVector(cross(a, b), w));
  };

  return {
    zero,
    one: create(oneS, oneS, oneS),
    unitX,
    unitY,
    unitZ: create(zeroS, zeroS, oneS),

    create,
    of: (x, y, z) => create(S.fromNumber(x), S.fromNumber(y), S.fromNumber(z)),
    fromArray: (values, start = 0) => {
      if (start < 0 || values.length - start < 3) {
        throw new InvalidArgumentError("values", "needs three elements from the start index");
      }
      return create(values[start], values[start + 1], values[start + 2]);
    },
    copyTo: (v, target, start = 0) => {
      if (start < 0 || target.length - start < 3) {
        throw new InvalidArgumentError("target", "needs room for three elements from the start index");
      }
      target[start] = v.x;
      target[start + 1] = v.y;
      target[start + 2] = v.z;
    },
    toArray: (v) => [v.x, v.y, v.z],

    add,
    sub,
    mul: (a, b) => zip(a, b, S.mul),
    divide: (a, b) => zip(a, b, S.div),
    scale,
    divideScalar: (v, s) => map(v, (c) => S.div(c, s)),
    negate: (v) => map(v, S.negate),

    dot,
    cross,
    length,
    lengthSquared,
    distance: (a, b) => length(sub(a, b)),
    distanceSquared: (a, b) => lengthSquared(sub(a, b)),
    normalize,
    lerp: (a, b, t) => add(a, scale(sub(b, a), t)),
    reflect: (v, normal) => sub(v, scale(normal, S.mul(twoS, dot(v, normal)))),
    min: (a, b) => zip(a, b, S.min),
    max: (a, b) => zip(a, b, S.max),
    clamp: (v, lo, hi) => zip(zip(v, lo, S.max), hi, S.min),
    abs: (v) => map(v, S.abs),
    squareRoot: (v) => map(v, S.sqrt),

    equals,
    isNearlyEqual: (a, b) =>
      isNearlyEqual(S, a.x, b.x) && isNearlyEqual(S, a.y, b.y) && isNearlyEqual(S, a.z, b.z),
    isZero,
    isNearlyZero: isNearlyZeroV,
    angle: (a, b) => S.atan2(length(cross(a, b)), dot(a, b)),
    areParallel,

    transform,
    transformMatrix: (v, m) => {
      const n = transformNormal(v, m);
      return create(S.add(n.x, m.m41), S.add(n.y, m.m42), S.add(n.z, m.m43));
    },
    transformNormal,
    rotationTo,
  };
}
