/**
 * 3x2 affine transforms for 2-D work.
 */

import { createLogger } from "@orbis/core";
import { isNearlyEqual, isNearlyZero, type Scalar } from "@orbis/numeric";
import type { InversionResult, Matrix3x2, Vector2 } from "./types.js";

const log = createLogger("matrix3x2");

type Entry = keyof Matrix3x2<unknown>;

export interface Matrix3x2Ops<A> {
  readonly identity: Matrix3x2<A>;
  create(m11: A, m12: A, m21: A, m22: A, m31: A, m32: A): Matrix3x2<A>;
  of(m11: number, m12: number, m21: number, m22: number, m31: number, m32: number): Matrix3x2<A>;

  /** Counter-clockwise rotation, optionally about `center`. */
  createRotation(radians: A, center?: Vector2<A>): Matrix3x2<A>;
  createScale(x: A, y: A, center?: Vector2<A>): Matrix3x2<A>;
  createScaleUniform(s: A, center?: Vector2<A>): Matrix3x2<A>;
  createSkew(radiansX: A, radiansY: A, center?: Vector2<A>): Matrix3x2<A>;
  createTranslation(x: A, y: A): Matrix3x2<A>;

  translation(m: Matrix3x2<A>): Vector2<A>;
  isIdentity(m: Matrix3x2<A>): boolean;
  getDeterminant(m: Matrix3x2<A>): A;
  /**
   * Inverse transform. A determinant that is nearly zero yields
   * `{ success: false, result: identity }`.
   */
  invert(m: Matrix3x2<A>): InversionResult<Matrix3x2<A>>;

  add(a: Matrix3x2<A>, b: Matrix3x2<A>): Matrix3x2<A>;
  sub(a: Matrix3x2<A>, b: Matrix3x2<A>): Matrix3x2<A>;
  /** `a` first, then `b`. */
  multiply(a: Matrix3x2<A>, b: Matrix3x2<A>): Matrix3x2<A>;
  scale(m: Matrix3x2<A>, s: A): Matrix3x2<A>;
  negate(m: Matrix3x2<A>): Matrix3x2<A>;
  lerp(a: Matrix3x2<A>, b: Matrix3x2<A>, t: A): Matrix3x2<A>;
  equals(a: Matrix3x2<A>, b: Matrix3x2<A>): boolean;
  isNearlyEqual(a: Matrix3x2<A>, b: Matrix3x2<A>): boolean;
}

export function matrix3x2Ops<A>(S: Scalar<A>): Matrix3x2Ops<A> {
  const zeroS = S.zero();
  const oneS = S.one();

  const create = (m11: A, m12: A, m21: A, m22: A, m31: A, m32: A): Matrix3x2<A> => ({
    m11,
    m12,
    m21,
    m22,
    m31,
    m32,
  });

  const build = (f: (key: Entry) => A): Matrix3x2<A> =>
    create(f("m11"), f("m12"), f("m21"), f("m22"), f("m31"), f("m32"));

  const every = (f: (key: Entry) => boolean): boolean =>
    f("m11") && f("m12") && f("m21") && f("m22") && f("m31") && f("m32");

  const identity = create(oneS, zeroS, zeroS, oneS, zeroS, zeroS);

  // Offset that keeps `center` fixed under the linear part.
  const pivot = (m: Matrix3x2<A>, center: Vector2<A> | undefined): Matrix3x2<A> => {
    if (center === undefined) return m;
    const x = S.sub(center.x, S.add(S.mul(center.x, m.m11), S.mul(center.y, m.m21)));
    const y = S.sub(center.y, S.add(S.mul(center.x, m.m12), S.mul(center.y, m.m22)));
    return create(m.m11, m.m12, m.m21, m.m22, x, y);
  };

  const createScale = (x: A, y: A, center?: Vector2<A>): Matrix3x2<A> =>
    pivot(create(x, zeroS, zeroS, y, zeroS, zeroS), center);

  const getDeterminant = (m: Matrix3x2<A>): A => S.sub(S.mul(m.m11, m.m22), S.mul(m.m21, m.m12));

  const equals = (a: Matrix3x2<A>, b: Matrix3x2<A>): boolean =>
    every((k) => S.equals(a[k], b[k]));

  return {
    identity,
    create,
    of: (m11, m12, m21, m22, m31, m32) =>
      create(
        S.fromNumber(m11),
        S.fromNumber(m12),
        S.fromNumber(m21),
        S.fromNumber(m22),
        S.fromNumber(m31),
        S.fromNumber(m32)
      ),

    createRotation: (radians, center) => {
      const c = S.cos(radians);
      const s = S.sin(radians);
      return pivot(create(c, s, S.negate(s), c, zeroS, zeroS), center);
    },
    createScale,
    createScaleUniform: (s, center) => createScale(s, s, center),
    createSkew: (radiansX, radiansY, center) =>
      pivot(create(oneS, S.tan(radiansY), S.tan(radiansX), oneS, zeroS, zeroS), center),
    createTranslation: (x, y) => create(oneS, zeroS, zeroS, oneS, x, y),

    translation: (m) => ({ x: m.m31, y: m.m32 }),
    isIdentity: (m) => equals(m, identity),
    getDeterminant,
    invert: (m) => {
      const det = getDeterminant(m);
      if (isNearlyZero(S, det)) {
        log.debug(`invert: singular matrix (determinant ${S.format(det)})`);
        return { success: false, result: identity };
      }
      const inv = S.div(oneS, det);
      return {
        success: true,
        result: create(
          S.mul(m.m22, inv),
          S.negate(S.mul(m.m12, inv)),
          S.negate(S.mul(m.m21, inv)),
          S.mul(m.m11, inv),
          S.mul(S.sub(S.mul(m.m21, m.m32), S.mul(m.m31, m.m22)), inv),
          S.mul(S.sub(S.mul(m.m31, m.m12), S.mul(m.m11, m.m32)), inv)
        ),
      };
    },

    add: (a, b) => build((k) => S.add(a[k], b[k])),
    sub: (a, b) => build((k) => S.sub(a[k], b[k])),
    multiply: (a, b) =>
      create(
        S.add(S.mul(a.m11, b.m11), S.mul(a.m12, b.m21)),
        S.add(S.mul(a.m11, b.m12), S.mul(a.m12, b.m22)),
        S.add(S.mul(a.m21, b.m11), S.mul(a.m22, b.m21)),
        S.add(S.mul(a.m21, b.m12), S.mul(a.m22, b.m22)),
        S.add(S.add(S.mul(a.m31, b.m11), S.mul(a.m32, b.m21)), b.m31),
        S.add(S.add(S.mul(a.m31, b.m12), S.mul(a.m32, b.m22)), b.m32)
      ),
    scale: (m, s) => build((k) => S.mul(m[k], s)),
    negate: (m) => build((k) => S.negate(m[k])),
    lerp: (a, b, t) => build((k) => S.add(a[k], S.mul(S.sub(b[k], a[k]), t))),
    equals,
    isNearlyEqual: (a, b) => every((k) => isNearlyEqual(S, a[k], b[k])),
  };
}
