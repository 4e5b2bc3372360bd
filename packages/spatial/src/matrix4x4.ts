/**
 * 4x4 homogeneous transforms.
 *
 * Row-vector convention throughout: `v' = v · M`, so `multiply(a, b)`
 * applies `a` first and translations live in row 4. Projections map view
 * space (camera looking down -Z) to a [0, 1] depth range.
 */

import { createLogger, InvalidArgumentError } from "@orbis/core";
import { isNearlyEqual, isNearlyZero, lit, two, type Scalar } from "@orbis/numeric";
import type { QuaternionOps } from "./quaternion.js";
import type { InversionResult, Matrix4x4, Plane, Quaternion, Vector3 } from "./types.js";
import type { Vector3Ops } from "./vector3.js";

const log = createLogger("matrix4x4");

type Entry = keyof Matrix4x4<unknown>;

export interface Decomposition<A> {
  readonly success: boolean;
  readonly scale: Vector3<A>;
  readonly rotation: Quaternion<A>;
  readonly translation: Vector3<A>;
}

export interface Matrix4x4Ops<A> {
  readonly identity: Matrix4x4<A>;
  create(
    m11: A, m12: A, m13: A, m14: A,
    m21: A, m22: A, m23: A, m24: A,
    m31: A, m32: A, m33: A, m34: A,
    m41: A, m42: A, m43: A, m44: A
  ): Matrix4x4<A>;
  /** Row-major from 16 numbers. */
  of(values: readonly number[]): Matrix4x4<A>;

  /** Rotates an object at `objectPosition` to face the camera. */
  createBillboard(
    objectPosition: Vector3<A>,
    cameraPosition: Vector3<A>,
    cameraUp: Vector3<A>,
    cameraForward: Vector3<A>
  ): Matrix4x4<A>;
  /** Billboard that only turns about `rotateAxis`. */
  createConstrainedBillboard(
    objectPosition: Vector3<A>,
    cameraPosition: Vector3<A>,
    rotateAxis: Vector3<A>,
    cameraForward: Vector3<A>,
    objectForward: Vector3<A>
  ): Matrix4x4<A>;

  createFromAxisAngle(axis: Vector3<A>, angle: A): Matrix4x4<A>;
  createFromQuaternion(q: Quaternion<A>): Matrix4x4<A>;
  createFromYawPitchRoll(yaw: A, pitch: A, roll: A): Matrix4x4<A>;
  createRotationX(radians: A, center?: Vector3<A>): Matrix4x4<A>;
  createRotationY(radians: A, center?: Vector3<A>): Matrix4x4<A>;
  createRotationZ(radians: A, center?: Vector3<A>): Matrix4x4<A>;

  /** View matrix for a camera at `cameraPosition` looking at `cameraTarget`. */
  createLookAt(cameraPosition: Vector3<A>, cameraTarget: Vector3<A>, cameraUp: Vector3<A>): Matrix4x4<A>;
  createOrthographic(width: A, height: A, zNear: A, zFar: A): Matrix4x4<A>;
  createOrthographicOffCenter(left: A, right: A, bottom: A, top: A, zNear: A, zFar: A): Matrix4x4<A>;
  createPerspective(width: A, height: A, nearPlane: A, farPlane: A): Matrix4x4<A>;
  createPerspectiveFieldOfView(fieldOfView: A, aspectRatio: A, nearPlane: A, farPlane: A): Matrix4x4<A>;
  createPerspectiveOffCenter(left: A, right: A, bottom: A, top: A, nearPlane: A, farPlane: A): Matrix4x4<A>;

  createScale(x: A, y: A, z: A, center?: Vector3<A>): Matrix4x4<A>;
  createScaleUniform(s: A, center?: Vector3<A>): Matrix4x4<A>;
  createTranslation(position: Vector3<A>): Matrix4x4<A>;
  /** Mirror through `plane`. */
  createReflection(plane: Plane<A>): Matrix4x4<A>;
  /** Flattens geometry onto `plane` as cast by a directional light. */
  createShadow(lightDirection: Vector3<A>, plane: Plane<A>): Matrix4x4<A>;
  /** Object-to-world for an object at `position` facing `forward`. */
  createWorld(position: Vector3<A>, forward: Vector3<A>, up: Vector3<A>): Matrix4x4<A>;

  getDeterminant(m: Matrix4x4<A>): A;
  isIdentity(m: Matrix4x4<A>): boolean;
  translation(m: Matrix4x4<A>): Vector3<A>;
  invert(m: Matrix4x4<A>): InversionResult<Matrix4x4<A>>;
  /** Split an affine transform into scale, rotation and translation. */
  decompose(m: Matrix4x4<A>): Decomposition<A>;

  transpose(m: Matrix4x4<A>): Matrix4x4<A>;
  /** `m` followed by the rotation `q`. */
  transform(m: Matrix4x4<A>, q: Quaternion<A>): Matrix4x4<A>;
  lerp(a: Matrix4x4<A>, b: Matrix4x4<A>, t: A): Matrix4x4<A>;
  add(a: Matrix4x4<A>, b: Matrix4x4<A>): Matrix4x4<A>;
  sub(a: Matrix4x4<A>, b: Matrix4x4<A>): Matrix4x4<A>;
  multiply(a: Matrix4x4<A>, b: Matrix4x4<A>): Matrix4x4<A>;
  scale(m: Matrix4x4<A>, s: A): Matrix4x4<A>;
  negate(m: Matrix4x4<A>): Matrix4x4<A>;
  equals(a: Matrix4x4<A>, b: Matrix4x4<A>): boolean;
  isNearlyEqual(a: Matrix4x4<A>, b: Matrix4x4<A>): boolean;
}

// Squared distance below which a billboard falls back to the camera's
// forward vector.
const BILLBOARD_EPSILON = 1e-4;
// 1 - cos(0.1°), approximated as 0.1° in radians.
const BILLBOARD_MIN_ANGLE = 1 - 0.1 * (Math.PI / 180);

export function matrix4x4Ops<A>(
  S: Scalar<A>,
  V: Vector3Ops<A>,
  Q: QuaternionOps<A>
): Matrix4x4Ops<A> {
  const zeroS = S.zero();
  const oneS = S.one();
  const twoS = two(S);
  const piS = S.pi();

  const create = (
    m11: A, m12: A, m13: A, m14: A,
    m21: A, m22: A, m23: A, m24: A,
    m31: A, m32: A, m33: A, m34: A,
    m41: A, m42: A, m43: A, m44: A
  ): Matrix4x4<A> => ({
    m11, m12, m13, m14,
    m21, m22, m23, m24,
    m31, m32, m33, m34,
    m41, m42, m43, m44,
  });

  const build = (f: (key: Entry) => A): Matrix4x4<A> =>
    create(
      f("m11"), f("m12"), f("m13"), f("m14"),
      f("m21"), f("m22"), f("m23"), f("m24"),
      f("m31"), f("m32"), f("m33"), f("m34"),
      f("m41"), f("m42"), f("m43"), f("m44")
    );

  const ENTRIES: readonly Entry[] = [
    "m11", "m12", "m13", "m14",
    "m21", "m22", "m23", "m24",
    "m31", "m32", "m33", "m34",
    "m41", "m42", "m43", "m44",
  ];

  const identity = create(
    oneS, zeroS, zeroS, zeroS,
    zeroS, oneS, zeroS, zeroS,
    zeroS, zeroS, oneS, zeroS,
    zeroS, zeroS, zeroS, oneS
  );

  // Three basis rows plus a translation row.
  const fromRows = (x: Vector3<A>, y: Vector3<A>, z: Vector3<A>, t: Vector3<A>): Matrix4x4<A> =>
    create(
      x.x, x.y, x.z, zeroS,
      y.x, y.y, y.z, zeroS,
      z.x, z.y, z.z, zeroS,
      t.x, t.y, t.z, oneS
    );

  // Set the translation row so that `center` is a fixed point.
  const pivot = (m: Matrix4x4<A>, center: Vector3<A> | undefined): Matrix4x4<A> => {
    if (center === undefined) return m;
    const moved = V.transformNormal(center, m);
    const t = V.sub(center, moved);
    return { ...m, m41: t.x, m42: t.y, m43: t.z };
  };

  const multiply = (a: Matrix4x4<A>, b: Matrix4x4<A>): Matrix4x4<A> => {
    const cell = (a1: A, a2: A, a3: A, a4: A, b1: A, b2: A, b3: A, b4: A): A =>
      S.add(S.add(S.mul(a1, b1), S.mul(a2, b2)), S.add(S.mul(a3, b3), S.mul(a4, b4)));
    const row = (a1: A, a2: A, a3: A, a4: A): [A, A, A, A] => [
      cell(a1, a2, a3, a4, b.m11, b.m21, b.m31, b.m41),
      cell(a1, a2, a3, a4, b.m12, b.m22, b.m32, b.m42),
      cell(a1, a2, a3, a4, b.m13, b.m23, b.m33, b.m43),
      cell(a1, a2, a3, a4, b.m14, b.m24, b.m34, b.m44),
    ];
    return create(
      ...row(a.m11, a.m12, a.m13, a.m14),
      ...row(a.m21, a.m22, a.m23, a.m24),
      ...row(a.m31, a.m32, a.m33, a.m34),
      ...row(a.m41, a.m42, a.m43, a.m44)
    );
  };

  const equals = (a: Matrix4x4<A>, b: Matrix4x4<A>): boolean =>
    ENTRIES.every((k) => S.equals(a[k], b[k]));

  const createFromQuaternion = (q: Quaternion<A>): Matrix4x4<A> => {
    const xx = S.mul(q.x, q.x);
    const yy = S.mul(q.y, q.y);
    const zz = S.mul(q.z, q.z);
    const xy = S.mul(q.x, q.y);
    const wz = S.mul(q.z, q.w);
    const xz = S.mul(q.z, q.x);
    const wy = S.mul(q.y, q.w);
    const yz = S.mul(q.y, q.z);
    const wx = S.mul(q.x, q.w);
    const twice = (a: A): A => S.mul(twoS, a);
    const oneMinusTwice = (a: A, b: A): A => S.sub(oneS, twice(S.add(a, b)));

    return create(
      oneMinusTwice(yy, zz), twice(S.add(xy, wz)), twice(S.sub(xz, wy)), zeroS,
      twice(S.sub(xy, wz)), oneMinusTwice(zz, xx), twice(S.add(yz, wx)), zeroS,
      twice(S.add(xz, wy)), twice(S.sub(yz, wx)), oneMinusTwice(yy, xx), zeroS,
      zeroS, zeroS, zeroS, oneS
    );
  };

  const createScale = (x: A, y: A, z: A, center?: Vector3<A>): Matrix4x4<A> =>
    pivot(
      create(
        x, zeroS, zeroS, zeroS,
        zeroS, y, zeroS, zeroS,
        zeroS, zeroS, z, zeroS,
        zeroS, zeroS, zeroS, oneS
      ),
      center
    );

  const normalizePlane = (p: Plane<A>): Plane<A> => {
    const inv = S.div(oneS, V.length(p.normal));
    return { normal: V.scale(p.normal, inv), d: S.mul(p.d, inv) };
  };

  const requirePositive = (name: string, value: A): void => {
    if (!S.greaterThan(value, zeroS)) {
      throw new InvalidArgumentError(name, `must be positive, got ${S.format(value)}`);
    }
  };

  const checkDepthRange = (nearPlane: A, farPlane: A): void => {
    requirePositive("nearPlane", nearPlane);
    requirePositive("farPlane", farPlane);
    if (S.greaterThanOrEqual(nearPlane, farPlane)) {
      throw new InvalidArgumentError("nearPlane", "must be less than farPlane");
    }
  };

  // m33 of a perspective projection; an infinite far plane gives -1.
  const negFarRange = (nearPlane: A, farPlane: A): A =>
    S.isFinite(farPlane) ? S.div(farPlane, S.sub(nearPlane, farPlane)) : S.negate(oneS);

  const perspective = (m11: A, m22: A, m31: A, m32: A, nearPlane: A, farPlane: A): Matrix4x4<A> => {
    const range = negFarRange(nearPlane, farPlane);
    return create(
      m11, zeroS, zeroS, zeroS,
      zeroS, m22, zeroS, zeroS,
      m31, m32, range, S.negate(oneS),
      zeroS, zeroS, S.mul(nearPlane, range), zeroS
    );
  };

  const orthographic = (m11: A, m22: A, m41: A, m42: A, zNear: A, zFar: A): Matrix4x4<A> => {
    const range = S.div(oneS, S.sub(zNear, zFar));
    return create(
      m11, zeroS, zeroS, zeroS,
      zeroS, m22, zeroS, zeroS,
      zeroS, zeroS, range, zeroS,
      m41, m42, S.mul(zNear, range), oneS
    );
  };

  // Cofactor expansion along the first row, sharing 2x2 minors.
  const getDeterminant = (m: Matrix4x4<A>): A => {
    const { m11: a, m12: b, m13: c, m14: d } = m;
    const { m21: e, m22: f, m23: g, m24: h } = m;
    const { m31: i, m32: j, m33: k, m34: l } = m;
    const { m41: mm, m42: n, m43: o, m44: p } = m;
    const minor = (w: A, x: A, y: A, z: A): A => S.sub(S.mul(w, x), S.mul(y, z));

    const kpLo = minor(k, p, l, o);
    const jpLn = minor(j, p, l, n);
    const joKn = minor(j, o, k, n);
    const ipLm = minor(i, p, l, mm);
    const ioKm = minor(i, o, k, mm);
    const inJm = minor(i, n, j, mm);
    const term = (s: A, x1: A, m1: A, x2: A, m2: A, x3: A, m3: A): A =>
      S.mul(s, S.add(S.sub(S.mul(x1, m1), S.mul(x2, m2)), S.mul(x3, m3)));

    return S.sub(
      S.add(
        S.sub(term(a, f, kpLo, g, jpLn, h, joKn), term(b, e, kpLo, g, ipLm, h, ioKm)),
        term(c, e, jpLn, f, ipLm, h, inJm)
      ),
      term(d, e, joKn, f, ioKm, g, inJm)
    );
  };

  const invert = (m: Matrix4x4<A>): InversionResult<Matrix4x4<A>> => {
    const { m11: a, m12: b, m13: c, m14: d } = m;
    const { m21: e, m22: f, m23: g, m24: h } = m;
    const { m31: i, m32: j, m33: k, m34: l } = m;
    const { m41: mm, m42: n, m43: o, m44: p } = m;
    const minor = (w: A, x: A, y: A, z: A): A => S.sub(S.mul(w, x), S.mul(y, z));
    // x1·m1 - x2·m2 + x3·m3
    const expand = (x1: A, m1: A, x2: A, m2: A, x3: A, m3: A): A =>
      S.add(S.sub(S.mul(x1, m1), S.mul(x2, m2)), S.mul(x3, m3));

    const kpLo = minor(k, p, l, o);
    const jpLn = minor(j, p, l, n);
    const joKn = minor(j, o, k, n);
    const ipLm = minor(i, p, l, mm);
    const ioKm = minor(i, o, k, mm);
    const inJm = minor(i, n, j, mm);

    const a11 = expand(f, kpLo, g, jpLn, h, joKn);
    const a12 = S.negate(expand(e, kpLo, g, ipLm, h, ioKm));
    const a13 = expand(e, jpLn, f, ipLm, h, inJm);
    const a14 = S.negate(expand(e, joKn, f, ioKm, g, inJm));

    const det = S.add(S.add(S.mul(a, a11), S.mul(b, a12)), S.add(S.mul(c, a13), S.mul(d, a14)));
    if (isNearlyZero(S, det)) {
      log.debug(`invert: singular matrix (determinant ${S.format(det)})`);
      return { success: false, result: identity };
    }
    const inv = S.div(oneS, det);
    const pos = (x: A): A => S.mul(x, inv);
    const neg = (x: A): A => S.negate(S.mul(x, inv));

    const gpHo = minor(g, p, h, o);
    const fpHn = minor(f, p, h, n);
    const foGn = minor(f, o, g, n);
    const epHm = minor(e, p, h, mm);
    const eoGm = minor(e, o, g, mm);
    const enFm = minor(e, n, f, mm);

    const glHk = minor(g, l, h, k);
    const flHj = minor(f, l, h, j);
    const fkGj = minor(f, k, g, j);
    const elHi = minor(e, l, h, i);
    const ekGi = minor(e, k, g, i);
    const ejFi = minor(e, j, f, i);

    return {
      success: true,
      result: create(
        pos(a11),
        neg(expand(b, kpLo, c, jpLn, d, joKn)),
        pos(expand(b, gpHo, c, fpHn, d, foGn)),
        neg(expand(b, glHk, c, flHj, d, fkGj)),

        pos(a12),
        pos(expand(a, kpLo, c, ipLm, d, ioKm)),
        neg(expand(a, gpHo, c, epHm, d, eoGm)),
        pos(expand(a, glHk, c, elHi, d, ekGi)),

        pos(a13),
        neg(expand(a, jpLn, b, ipLm, d, inJm)),
        pos(expand(a, fpHn, b, epHm, d, enFm)),
        neg(expand(a, flHj, b, elHi, d, ejFi)),

        pos(a14),
        pos(expand(a, joKn, b, ioKm, c, inJm)),
        neg(expand(a, foGn, b, eoGm, c, enFm)),
        pos(expand(a, fkGj, b, ekGi, c, ejFi))
      ),
    };
  };

  const decompose = (m: Matrix4x4<A>): Decomposition<A> => {
    const translation = V.create(m.m41, m.m42, m.m43);
    let rowX = V.create(m.m11, m.m12, m.m13);
    const rowY = V.create(m.m21, m.m22, m.m23);
    const rowZ = V.create(m.m31, m.m32, m.m33);

    let sx = V.length(rowX);
    const sy = V.length(rowY);
    const sz = V.length(rowZ);
    // A reflection shows up as a negative determinant; fold it into x.
    if (S.lessThan(V.dot(V.cross(rowX, rowY), rowZ), zeroS)) {
      sx = S.negate(sx);
    }
    const scale = V.create(sx, sy, sz);

    if (isNearlyZero(S, sx) || isNearlyZero(S, sy) || isNearlyZero(S, sz)) {
      log.debug("decompose: degenerate scale");
      return { success: false, scale, rotation: Q.identity, translation };
    }

    rowX = V.divideScalar(rowX, sx);
    const rotation = Q.normalize(
      Q.createFromRotationMatrix(
        fromRows(rowX, V.divideScalar(rowY, sy), V.divideScalar(rowZ, sz), V.zero)
      )
    );
    return { success: true, scale, rotation, translation };
  };

  return {
    identity,
    create,
    of: (values) => {
      if (values.length !== 16) {
        throw new InvalidArgumentError("values", `expected 16 entries, got ${values.length}`);
      }
      const [a, b, c, d, e, f, g, h, i, j, k, l, mm, n, o, p] = values.map(S.fromNumber);
      return create(a, b, c, d, e, f, g, h, i, j, k, l, mm, n, o, p);
    },

    createBillboard: (objectPosition, cameraPosition, cameraUp, cameraForward) => {
      const offset = V.sub(objectPosition, cameraPosition);
      const normSq = V.lengthSquared(offset);
      const zAxis = S.lessThan(normSq, lit(S, BILLBOARD_EPSILON))
        ? V.negate(cameraForward)
        : V.divideScalar(offset, S.sqrt(normSq));
      const xAxis = V.normalize(V.cross(cameraUp, zAxis));
      const yAxis = V.cross(zAxis, xAxis);
      return fromRows(xAxis, yAxis, zAxis, objectPosition);
    },

    createConstrainedBillboard: (objectPosition, cameraPosition, rotateAxis, cameraForward, objectForward) => {
      const minAngle = lit(S, BILLBOARD_MIN_ANGLE);
      const offset = V.sub(objectPosition, cameraPosition);
      const normSq = V.lengthSquared(offset);
      const faceDir = S.lessThan(normSq, lit(S, BILLBOARD_EPSILON))
        ? V.negate(cameraForward)
        : V.divideScalar(offset, S.sqrt(normSq));

      const yAxis = rotateAxis;
      let xAxis: Vector3<A>;
      let zAxis: Vector3<A>;

      if (S.greaterThan(S.abs(V.dot(rotateAxis, faceDir)), minAngle)) {
        // Facing almost along the axis: use the object's forward instead.
        zAxis = objectForward;
        if (S.greaterThan(S.abs(V.dot(rotateAxis, zAxis)), minAngle)) {
          zAxis = S.greaterThan(S.abs(rotateAxis.z), minAngle) ? V.unitX : V.negate(V.unitZ);
        }
        xAxis = V.normalize(V.cross(rotateAxis, zAxis));
        zAxis = V.normalize(V.cross(xAxis, rotateAxis));
      } else {
        xAxis = V.normalize(V.cross(rotateAxis, faceDir));
        zAxis = V.normalize(V.cross(xAxis, yAxis));
      }
      return fromRows(xAxis, yAxis, zAxis, objectPosition);
    },

    createFromAxisAngle: (axis, angle) => {
      const { x, y, z } = axis;
      const sa = S.sin(angle);
      const ca = S.cos(angle);
      const xx = S.mul(x, x);
      const yy = S.mul(y, y);
      const zz = S.mul(z, z);
      const xy = S.mul(x, y);
      const xz = S.mul(x, z);
      const yz = S.mul(y, z);
      const diag = (sq: A): A => S.add(sq, S.mul(ca, S.sub(oneS, sq)));
      const off = (p: A): A => S.sub(p, S.mul(ca, p));

      return create(
        diag(xx), S.add(off(xy), S.mul(sa, z)), S.sub(off(xz), S.mul(sa, y)), zeroS,
        S.sub(off(xy), S.mul(sa, z)), diag(yy), S.add(off(yz), S.mul(sa, x)), zeroS,
        S.add(off(xz), S.mul(sa, y)), S.sub(off(yz), S.mul(sa, x)), diag(zz), zeroS,
        zeroS, zeroS, zeroS, oneS
      );
    },
    createFromQuaternion,
    createFromYawPitchRoll: (yaw, pitch, roll) =>
      createFromQuaternion(Q.createFromYawPitchRoll(yaw, pitch, roll)),

    createRotationX: (radians, center) => {
      const c = S.cos(radians);
      const s = S.sin(radians);
      return pivot(
        create(
          oneS, zeroS, zeroS, zeroS,
          zeroS, c, s, zeroS,
          zeroS, S.negate(s), c, zeroS,
          zeroS, zeroS, zeroS, oneS
        ),
        center
      );
    },
    createRotationY: (radians, center) => {
      const c = S.cos(radians);
      const s = S.sin(radians);
      return pivot(
        create(
          c, zeroS, S.negate(s), zeroS,
          zeroS, oneS, zeroS, zeroS,
          s, zeroS, c, zeroS,
          zeroS, zeroS, zeroS, oneS
        ),
        center
      );
    },
    createRotationZ: (radians, center) => {
      const c = S.cos(radians);
      const s = S.sin(radians);
      return pivot(
        create(
          c, s, zeroS, zeroS,
          S.negate(s), c, zeroS, zeroS,
          zeroS, zeroS, oneS, zeroS,
          zeroS, zeroS, zeroS, oneS
        ),
        center
      );
    },

    createLookAt: (cameraPosition, cameraTarget, cameraUp) => {
      const zAxis = V.normalize(V.sub(cameraPosition, cameraTarget));
      const xAxis = V.normalize(V.cross(cameraUp, zAxis));
      const yAxis = V.cross(zAxis, xAxis);
      return create(
        xAxis.x, yAxis.x, zAxis.x, zeroS,
        xAxis.y, yAxis.y, zAxis.y, zeroS,
        xAxis.z, yAxis.z, zAxis.z, zeroS,
        S.negate(V.dot(xAxis, cameraPosition)),
        S.negate(V.dot(yAxis, cameraPosition)),
        S.negate(V.dot(zAxis, cameraPosition)),
        oneS
      );
    },

    createOrthographic: (width, height, zNear, zFar) =>
      orthographic(S.div(twoS, width), S.div(twoS, height), zeroS, zeroS, zNear, zFar),
    createOrthographicOffCenter: (left, right, bottom, top, zNear, zFar) =>
      orthographic(
        S.div(twoS, S.sub(right, left)),
        S.div(twoS, S.sub(top, bottom)),
        S.div(S.add(left, right), S.sub(left, right)),
        S.div(S.add(top, bottom), S.sub(bottom, top)),
        zNear,
        zFar
      ),

    createPerspective: (width, height, nearPlane, farPlane) => {
      checkDepthRange(nearPlane, farPlane);
      const twoNear = S.mul(twoS, nearPlane);
      return perspective(S.div(twoNear, width), S.div(twoNear, height), zeroS, zeroS, nearPlane, farPlane);
    },
    createPerspectiveFieldOfView: (fieldOfView, aspectRatio, nearPlane, farPlane) => {
      if (!S.greaterThan(fieldOfView, zeroS) || !S.lessThan(fieldOfView, piS)) {
        throw new InvalidArgumentError("fieldOfView", "must lie strictly between 0 and π");
      }
      checkDepthRange(nearPlane, farPlane);
      const yScale = S.div(oneS, S.tan(S.div(fieldOfView, twoS)));
      const xScale = S.div(yScale, aspectRatio);
      return perspective(xScale, yScale, zeroS, zeroS, nearPlane, farPlane);
    },
    createPerspectiveOffCenter: (left, right, bottom, top, nearPlane, farPlane) => {
      checkDepthRange(nearPlane, farPlane);
      const twoNear = S.mul(twoS, nearPlane);
      const width = S.sub(right, left);
      const height = S.sub(top, bottom);
      return perspective(
        S.div(twoNear, width),
        S.div(twoNear, height),
        S.div(S.add(left, right), width),
        S.div(S.add(top, bottom), height),
        nearPlane,
        farPlane
      );
    },

    createScale,
    createScaleUniform: (s, center) => createScale(s, s, s, center),
    createTranslation: (position) => fromRows(V.unitX, V.unitY, V.unitZ, position),

    createReflection: (plane) => {
      const p = normalizePlane(plane);
      const { x: a, y: b, z: c } = p.normal;
      const fa = S.mul(S.negate(twoS), a);
      const fb = S.mul(S.negate(twoS), b);
      const fc = S.mul(S.negate(twoS), c);
      return create(
        S.add(S.mul(fa, a), oneS), S.mul(fb, a), S.mul(fc, a), zeroS,
        S.mul(fa, b), S.add(S.mul(fb, b), oneS), S.mul(fc, b), zeroS,
        S.mul(fa, c), S.mul(fb, c), S.add(S.mul(fc, c), oneS), zeroS,
        S.mul(fa, p.d), S.mul(fb, p.d), S.mul(fc, p.d), oneS
      );
    },

    createShadow: (lightDirection, plane) => {
      const p = normalizePlane(plane);
      const L = lightDirection;
      const dot = V.dot(p.normal, L);
      const a = S.negate(p.normal.x);
      const b = S.negate(p.normal.y);
      const c = S.negate(p.normal.z);
      const d = S.negate(p.d);
      return create(
        S.add(S.mul(a, L.x), dot), S.mul(a, L.y), S.mul(a, L.z), zeroS,
        S.mul(b, L.x), S.add(S.mul(b, L.y), dot), S.mul(b, L.z), zeroS,
        S.mul(c, L.x), S.mul(c, L.y), S.add(S.mul(c, L.z), dot), zeroS,
        S.mul(d, L.x), S.mul(d, L.y), S.mul(d, L.z), dot
      );
    },

    createWorld: (position, forward, up) => {
      const zAxis = V.normalize(V.negate(forward));
      const xAxis = V.normalize(V.cross(up, zAxis));
      const yAxis = V.cross(zAxis, xAxis);
      return fromRows(xAxis, yAxis, zAxis, position);
    },

    getDeterminant,
    isIdentity: (m) => equals(m, identity),
    translation: (m) => V.create(m.m41, m.m42, m.m43),
    invert,
    decompose,

    transpose: (m) =>
      create(
        m.m11, m.m21, m.m31, m.m41,
        m.m12, m.m22, m.m32, m.m42,
        m.m13, m.m23, m.m33, m.m43,
        m.m14, m.m24, m.m34, m.m44
      ),
    transform: (m, q) => multiply(m, createFromQuaternion(q)),
    lerp: (a, b, t) => build((k) => S.add(a[k], S.mul(S.sub(b[k], a[k]), t))),
    add: (a, b) => build((k) => S.add(a[k], b[k])),
    sub: (a, b) => build((k) => S.sub(a[k], b[k])),
    multiply,
    scale: (m, s) => build((k) => S.mul(m[k], s)),
    negate: (m) => build((k) => S.negate(m[k])),
    equals,
    isNearlyEqual: (a, b) => ENTRIES.every((k) => isNearlyEqual(S, a[k], b[k])),
  };
}
