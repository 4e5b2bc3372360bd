/**
 * 4-D vector algebra over any Scalar. Mostly homogeneous coordinates and
 * plane coefficients.
 */

import { InvalidArgumentError } from "@orbis/core";
import { isNearlyEqual, isNearlyZero, type Scalar } from "@orbis/numeric";
import type { Matrix4x4, Quaternion, Vector3, Vector4 } from "./types.js";

export interface Vector4Ops<A> {
  readonly zero: Vector4<A>;
  readonly one: Vector4<A>;
  readonly unitX: Vector4<A>;
  readonly unitY: Vector4<A>;
  readonly unitZ: Vector4<A>;
  readonly unitW: Vector4<A>;

  create(x: A, y: A, z: A, w: A): Vector4<A>;
  of(x: number, y: number, z: number, w: number): Vector4<A>;
  fromVector3(v: Vector3<A>, w: A): Vector4<A>;
  fromArray(values: readonly A[], start?: number): Vector4<A>;
  copyTo(v: Vector4<A>, target: A[], start?: number): void;
  toArray(v: Vector4<A>): [A, A, A, A];

  add(a: Vector4<A>, b: Vector4<A>): Vector4<A>;
  sub(a: Vector4<A>, b: Vector4<A>): Vector4<A>;
  mul(a: Vector4<A>, b: Vector4<A>): Vector4<A>;
  divide(a: Vector4<A>, b: Vector4<A>): Vector4<A>;
  scale(v: Vector4<A>, s: A): Vector4<A>;
  divideScalar(v: Vector4<A>, s: A): Vector4<A>;
  negate(v: Vector4<A>): Vector4<A>;

  dot(a: Vector4<A>, b: Vector4<A>): A;
  length(v: Vector4<A>): A;
  lengthSquared(v: Vector4<A>): A;
  distance(a: Vector4<A>, b: Vector4<A>): A;
  distanceSquared(a: Vector4<A>, b: Vector4<A>): A;
  normalize(v: Vector4<A>): Vector4<A>;
  lerp(a: Vector4<A>, b: Vector4<A>, t: A): Vector4<A>;
  min(a: Vector4<A>, b: Vector4<A>): Vector4<A>;
  max(a: Vector4<A>, b: Vector4<A>): Vector4<A>;
  clamp(v: Vector4<A>, lo: Vector4<A>, hi: Vector4<A>): Vector4<A>;
  abs(v: Vector4<A>): Vector4<A>;
  squareRoot(v: Vector4<A>): Vector4<A>;

  equals(a: Vector4<A>, b: Vector4<A>): boolean;
  isNearlyEqual(a: Vector4<A>, b: Vector4<A>): boolean;
  isZero(v: Vector4<A>): boolean;
  isNearlyZero(v: Vector4<A>): boolean;

  /** Row vector times matrix. */
  transform(v: Vector4<A>, m: Matrix4x4<A>): Vector4<A>;
  /** Rotates the xyz part; w is kept. */
  transformQuaternion(v: Vector4<A>, q: Quaternion<A>): Vector4<A>;
}

export function vector4Ops<A>(S: Scalar<A>): Vector4Ops<A> {
  const zeroS = S.zero();
  const oneS = S.one();

  const create = (x: A, y: A, z: A, w: A): Vector4<A> => ({ x, y, z, w });
  const zero = create(zeroS, zeroS, zeroS, zeroS);

  const map = (v: Vector4<A>, f: (a: A) => A): Vector4<A> =>
    create(f(v.x), f(v.y), f(v.z), f(v.w));
  const zip = (a: Vector4<A>, b: Vector4<A>, f: (p: A, q: A) => A): Vector4<A> =>
    create(f(a.x, b.x), f(a.y, b.y), f(a.z, b.z), f(a.w, b.w));
  const all = (v: Vector4<A>, p: (a: A) => boolean): boolean =>
    p(v.x) && p(v.y) && p(v.z) && p(v.w);

  const add = (a: Vector4<A>, b: Vector4<A>) => zip(a, b, S.add);
  const sub = (a: Vector4<A>, b: Vector4<A>) => zip(a, b, S.sub);
  const scale = (v: Vector4<A>, s: A) => map(v, (c) => S.mul(c, s));

  const dot = (a: Vector4<A>, b: Vector4<A>): A =>
    S.add(S.add(S.mul(a.x, b.x), S.mul(a.y, b.y)), S.add(S.mul(a.z, b.z), S.mul(a.w, b.w)));
  const lengthSquared = (v: Vector4<A>): A => dot(v, v);
  const length = (v: Vector4<A>): A => S.sqrt(lengthSquared(v));

  const equals = (a: Vector4<A>, b: Vector4<A>): boolean =>
    S.equals(a.x, b.x) && S.equals(a.y, b.y) && S.equals(a.z, b.z) && S.equals(a.w, b.w);

  const column = (v: Vector4<A>, c1: A, c2: A, c3: A, c4: A): A =>
    S.add(S.add(S.mul(v.x, c1), S.mul(v.y, c2)), S.add(S.mul(v.z, c3), S.mul(v.w, c4)));

  return {
    zero,
    one: create(oneS, oneS, oneS, oneS),
    unitX: create(oneS, zeroS, zeroS, zeroS),
    unitY: create(zeroS, oneS, zeroS, zeroS),
    unitZ: create(zeroS, zeroS, oneS, zeroS),
    unitW: create(zeroS, zeroS, zeroS, oneS),

    create,
    of: (x, y, z, w) => create(S.fromNumber(x), S.fromNumber(y), S.fromNumber(z), S.fromNumber(w)),
    fromVector3: (v, w) => create(v.x, v.y, v.z, w),
    fromArray: (values, start = 0) => {
      if (start < 0 || values.length - start < 4) {
        throw new InvalidArgumentError("values", "needs four elements from the start index");
      }
      return create(values[start], values[start + 1], values[start + 2], values[start + 3]);
    },
    copyTo: (v, target, start = 0) => {
      if (start < 0 || target.length - start < 4) {
        throw new InvalidArgumentError("target", "needs room for four elements from the start index");
      }
      target[start] = v.x;
      target[start + 1] = v.y;
      target[start + 2] = v.z;
      target[start + 3] = v.w;
    },
    toArray: (v) => [v.x, v.y, v.z, v.w],

    add,
    sub,
    mul: (a, b) => zip(a, b, S.mul),
    divide: (a, b) => zip(a, b, S.div),
    scale,
    divideScalar: (v, s) => map(v, (c) => S.div(c, s)),
    negate: (v) => map(v, S.negate),

    dot,
    length,
    lengthSquared,
    distance: (a, b) => length(sub(a, b)),
    distanceSquared: (a, b) => lengthSquared(sub(a, b)),
    normalize: (v) => {
      const len = length(v);
      return map(v, (c) => S.div(c, len));
    },
    lerp: (a, b, t) => add(a, scale(sub(b, a), t)),
    min: (a, b) => zip(a, b, S.min),
    max: (a, b) => zip(a, b, S.max),
    clamp: (v, lo, hi) => zip(zip(v, lo, S.max), hi, S.min),
    abs: (v) => map(v, S.abs),
    squareRoot: (v) => map(v, S.sqrt),

    equals,
    isNearlyEqual: (a, b) =>
      isNearlyEqual(S, a.x, b.x) &&
      isNearlyEqual(S, a.y, b.y) &&
      isNearlyEqual(S, a.z, b.z) &&
      isNearlyEqual(S, a.w, b.w),
    isZero: (v) => equals(v, zero),
    isNearlyZero: (v) => all(v, (c) => isNearlyZero(S, c)),

    transform: (v, m) =>
      create(
        column(v, m.m11, m.m21, m.m31, m.m41),
        column(v, m.m12, m.m22, m.m32, m.m42),
        column(v, m.m13, m.m23, m.m33, m.m43),
        column(v, m.m14, m.m24, m.m34, m.m44)
      ),
    transformQuaternion: (v, q) => {
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
        row(S.sub(xz2, wy2), S.add(yz2, wx2), S.sub(S.sub(oneS, xx2), yy2)),
        v.w
      );
    },
  };
}
