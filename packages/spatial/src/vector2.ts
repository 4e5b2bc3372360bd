/**
 * 2-D vector algebra over any Scalar.
 */

import { InvalidArgumentError } from "@orbis/core";
import { isNearlyEqual, isNearlyZero, two, type Scalar } from "@orbis/numeric";
import type { Matrix3x2, Matrix4x4, Quaternion, Vector2 } from "./types.js";

export interface Vector2Ops<A> {
  readonly zero: Vector2<A>;
  readonly one: Vector2<A>;
  readonly unitX: Vector2<A>;
  readonly unitY: Vector2<A>;

  create(x: A, y: A): Vector2<A>;
  of(x: number, y: number): Vector2<A>;
  fromArray(values: readonly A[], start?: number): Vector2<A>;
  copyTo(v: Vector2<A>, target: A[], start?: number): void;
  toArray(v: Vector2<A>): [A, A];

  add(a: Vector2<A>, b: Vector2<A>): Vector2<A>;
  sub(a: Vector2<A>, b: Vector2<A>): Vector2<A>;
  mul(a: Vector2<A>, b: Vector2<A>): Vector2<A>;
  divide(a: Vector2<A>, b: Vector2<A>): Vector2<A>;
  scale(v: Vector2<A>, s: A): Vector2<A>;
  divideScalar(v: Vector2<A>, s: A): Vector2<A>;
  negate(v: Vector2<A>): Vector2<A>;

  dot(a: Vector2<A>, b: Vector2<A>): A;
  /** z-component of the 3-D cross product: `a.x·b.y - a.y·b.x`. */
  cross(a: Vector2<A>, b: Vector2<A>): A;
  length(v: Vector2<A>): A;
  lengthSquared(v: Vector2<A>): A;
  distance(a: Vector2<A>, b: Vector2<A>): A;
  distanceSquared(a: Vector2<A>, b: Vector2<A>): A;
  normalize(v: Vector2<A>): Vector2<A>;
  lerp(a: Vector2<A>, b: Vector2<A>, t: A): Vector2<A>;
  reflect(v: Vector2<A>, normal: Vector2<A>): Vector2<A>;
  min(a: Vector2<A>, b: Vector2<A>): Vector2<A>;
  max(a: Vector2<A>, b: Vector2<A>): Vector2<A>;
  clamp(v: Vector2<A>, lo: Vector2<A>, hi: Vector2<A>): Vector2<A>;
  abs(v: Vector2<A>): Vector2<A>;
  squareRoot(v: Vector2<A>): Vector2<A>;

  equals(a: Vector2<A>, b: Vector2<A>): boolean;
  isNearlyEqual(a: Vector2<A>, b: Vector2<A>): boolean;
  isZero(v: Vector2<A>): boolean;
  isNearlyZero(v: Vector2<A>): boolean;
  angle(a: Vector2<A>, b: Vector2<A>): A;
  areParallel(a: Vector2<A>, b: Vector2<A>, allowSmallError?: boolean): boolean;

  /** Counter-clockwise rotation by `radians`. */
  rotate(v: Vector2<A>, radians: A): Vector2<A>;
  transform(v: Vector2<A>, m: Matrix3x2<A>): Vector2<A>;
  transformNormal(v: Vector2<A>, m: Matrix3x2<A>): Vector2<A>;
  /** Rotate `(x, y, 0)` by `q` and drop z. */
  transformQuaternion(v: Vector2<A>, q: Quaternion<A>): Vector2<A>;
  transformMatrix4x4(v: Vector2<A>, m: Matrix4x4<A>): Vector2<A>;
}

export function vector2Ops<A>(S: Scalar<A>): Vector2Ops<A> {
  const zeroS = S.zero();
  const oneS = S.one();
  const twoS = two(S);

  const create = (x: A, y: A): Vector2<A> => ({ x, y });
  const zero = create(zeroS, zeroS);

  const map = (v: Vector2<A>, f: (a: A) => A): Vector2<A> => create(f(v.x), f(v.y));
  const zip = (a: Vector2<A>, b: Vector2<A>, f: (p: A, q: A) => A): Vector2<A> =>
    create(f(a.x, b.x), f(a.y, b.y));

  const add = (a: Vector2<A>, b: Vector2<A>) => zip(a, b, S.add);
  const sub = (a: Vector2<A>, b: Vector2<A>) => zip(a, b, S.sub);
  const scale = (v: Vector2<A>, s: A) => map(v, (c) => S.mul(c, s));

  const dot = (a: Vector2<A>, b: Vector2<A>): A => S.add(S.mul(a.x, b.x), S.mul(a.y, b.y));
  const cross = (a: Vector2<A>, b: Vector2<A>): A => S.sub(S.mul(a.x, b.y), S.mul(a.y, b.x));
  const lengthSquared = (v: Vector2<A>): A => dot(v, v);
  const length = (v: Vector2<A>): A => S.sqrt(lengthSquared(v));

  const equals = (a: Vector2<A>, b: Vector2<A>): boolean =>
    S.equals(a.x, b.x) && S.equals(a.y, b.y);

  const transformNormal = (v: Vector2<A>, m: Matrix3x2<A>): Vector2<A> =>
    create(
      S.add(S.mul(v.x, m.m11), S.mul(v.y, m.m21)),
      S.add(S.mul(v.x, m.m12), S.mul(v.y, m.m22))
    );

  return {
    zero,
    one: create(oneS, oneS),
    unitX: create(oneS, zeroS),
    unitY: create(zeroS, oneS),

    create,
    of: (x, y) => create(S.fromNumber(x), S.fromNumber(y)),
    fromArray: (values, start = 0) => {
      if (start < 0 || values.length - start < 2) {
        throw new InvalidArgumentError("values", "needs two elements from the start index");
      }
      return create(values[start], values[start + 1]);
    },
    copyTo: (v, target, start = 0) => {
      if (start < 0 || target.length - start < 2) {
        throw new InvalidArgumentError("target", "needs room for two elements from the start index");
      }
      target[start] = v.x;
      target[start + 1] = v.y;
    },
    toArray: (v) => [v.x, v.y],

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
    normalize: (v) => {
      const len = length(v);
      return map(v, (c) => S.div(c, len));
    },
    lerp: (a, b, t) => add(a, scale(sub(b, a), t)),
    reflect: (v, normal) => sub(v, scale(normal, S.mul(twoS, dot(v, normal)))),
    min: (a, b) => zip(a, b, S.min),
    max: (a, b) => zip(a, b, S.max),
    clamp: (v, lo, hi) => zip(zip(v, lo, S.max), hi, S.min),
    abs: (v) => map(v, S.abs),
    squareRoot: (v) => map(v, S.sqrt),

    equals,
    isNearlyEqual: (a, b) => isNearlyEqual(S, a.x, b.x) && isNearlyEqual(S, a.y, b.y),
    isZero: (v) => equals(v, zero),
    isNearlyZero: (v) => isNearlyZero(S, v.x) && isNearlyZero(S, v.y),
    angle: (a, b) => S.atan2(S.abs(cross(a, b)), dot(a, b)),
    areParallel: (a, b, allowSmallError = true) => {
      const c = cross(a, b);
      return allowSmallError ? isNearlyZero(S, c) : S.equals(c, zeroS);
    },

    rotate: (v, radians) => {
      const c = S.cos(radians);
      const s = S.sin(radians);
      return create(
        S.sub(S.mul(v.x, c), S.mul(v.y, s)),
        S.add(S.mul(v.x, s), S.mul(v.y, c))
      );
    },
    transform: (v, m) => {
      const n = transformNormal(v, m);
      return create(S.add(n.x, m.m31), S.add(n.y, m.m32));
    },
    transformNormal,
    transformQuaternion: (v, q) => {
      const x2 = S.add(q.x, q.x);
      const y2 = S.add(q.y, q.y);
      const z2 = S.add(q.z, q.z);
      const wz2 = S.mul(q.w, z2);
      const xx2 = S.mul(q.x, x2);
      const xy2 = S.mul(q.x, y2);
      const yy2 = S.mul(q.y, y2);
      const zz2 = S.mul(q.z, z2);
      return create(
        S.add(S.mul(v.x, S.sub(S.sub(oneS, yy2), zz2)), S.mul(v.y, S.sub(xy2, wz2))),
        S.add(S.mul(v.x, S.add(xy2, wz2)), S.mul(v.y, S.sub(S.sub(oneS, xx2), zz2)))
      );
    },
    transformMatrix4x4: (v, m) =>
      create(
        S.add(S.add(S.mul(v.x, m.m11), S.mul(v.y, m.m21)), m.m41),
        S.add(S.add(S.mul(v.x, m.m12), S.mul(v.y, m.m22)), m.m42)
      ),
  };
}
