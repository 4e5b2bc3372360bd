/**
 * Low-level geometry shared by the shape constructors, containment tests
 * and the intersection dispatcher: local frames, segment distances and
 * axis-aligned box queries.
 */

import { clamp, half, isZero, square, type Scalar } from "@orbis/numeric";
import type { Quaternion, SpatialAlgebra, Vector3 } from "@orbis/spatial";

/** Closest points between two segments. */
export interface SegmentPair<A> {
  readonly onFirst: Vector3<A>;
  readonly onSecond: Vector3<A>;
  readonly distanceSquared: A;
}

export interface Primitives<A> {
  /** Unit direction of `v`; `unitY` for the zero vector. */
  direction(v: Vector3<A>): Vector3<A>;
  /** Unit vector perpendicular to `dir` closest to +Y, or zero when `dir` is vertical. */
  perpendicularUp(dir: Vector3<A>): Vector3<A>;
  /** Two unit vectors completing `dir` to a right-handed orthonormal basis. */
  basis(dir: Vector3<A>): { readonly right: Vector3<A>; readonly up: Vector3<A> };

  toLocal(point: Vector3<A>, position: Vector3<A>, rotation: Quaternion<A>): Vector3<A>;
  fromLocal(local: Vector3<A>, position: Vector3<A>, rotation: Quaternion<A>): Vector3<A>;

  /** Parameter in [0, 1] of the point on `start → end` closest to `point`. */
  segmentParameter(start: Vector3<A>, end: Vector3<A>, point: Vector3<A>): A;
  closestOnSegment(start: Vector3<A>, end: Vector3<A>, point: Vector3<A>): Vector3<A>;
  pointSegmentDistanceSquared(start: Vector3<A>, end: Vector3<A>, point: Vector3<A>): A;
  closestBetweenSegments(
    p1: Vector3<A>,
    q1: Vector3<A>,
    p2: Vector3<A>,
    q2: Vector3<A>
  ): SegmentPair<A>;

  /** Squared distance from a local-frame point to the box `[-h, h]`. */
  boxDistanceSquared(local: Vector3<A>, halfExtents: Vector3<A>): A;
  /** Separating-axis test of a local-frame segment against the box `[-h, h]`. */
  segmentOverlapsBox(
    start: Vector3<A>,
    end: Vector3<A>,
    halfExtents: Vector3<A>
  ): boolean;
  /** Point of the ellipsoid with the given semi-axes farthest along `dir`. */
  ellipsoidSupport(
    semiAxes: Vector3<A>,
    position: Vector3<A>,
    rotation: Quaternion<A>,
    dir: Vector3<A>
  ): Vector3<A>;
  /** Squared distance from `(px, py)` to the planar segment `(ax, ay) → (bx, by)`. */
  planarSegmentDistanceSquared(
    px: A,
    py: A,
    ax: A,
    ay: A,
    bx: A,
    by: A
  ): A;
}

export function primitivesFor<A>(algebra: SpatialAlgebra<A>): Primitives<A> {
  const S: Scalar<A> = algebra.scalar;
  const { vector3: V, quaternion: Q } = algebra;
  const zeroS = S.zero();
  const oneS = S.one();

  const direction = (v: Vector3<A>): Vector3<A> => {
    const len = V.length(v);
    return isZero(S, len) ? V.unitY : V.divideScalar(v, len);
  };

  const perpendicularUp = (dir: Vector3<A>): Vector3<A> => {
    const projected = V.sub(V.unitY, V.scale(dir, V.dot(V.unitY, dir)));
    return V.isNearlyZero(projected) ? V.zero : V.normalize(projected);
  };

  const basis = (dir: Vector3<A>) => {
    const c = V.cross(dir, V.unitY);
    const right = V.isNearlyZero(c) ? V.unitX : V.normalize(c);
    return { right, up: V.cross(right, dir) };
  };

  const toLocal = (point: Vector3<A>, position: Vector3<A>, rotation: Quaternion<A>) =>
    V.transform(V.sub(point, position), Q.inverse(rotation));

  const fromLocal = (local: Vector3<A>, position: Vector3<A>, rotation: Quaternion<A>) =>
    V.add(position, V.transform(local, rotation));

  const segmentParameter = (start: Vector3<A>, end: Vector3<A>, point: Vector3<A>): A => {
    const d = V.sub(end, start);
    const dd = V.dot(d, d);
    if (isZero(S, dd)) return zeroS;
    return clamp(S, S.div(V.dot(V.sub(point, start), d), dd), zeroS, oneS);
  };

  const closestOnSegment = (start: Vector3<A>, end: Vector3<A>, point: Vector3<A>) =>
    V.add(start, V.scale(V.sub(end, start), segmentParameter(start, end, point)));

  // Ericson, Real-Time Collision Detection §5.1.9.
  const closestBetweenSegments = (
    p1: Vector3<A>,
    q1: Vector3<A>,
    p2: Vector3<A>,
    q2: Vector3<A>
  ): SegmentPair<A> => {
    const d1 = V.sub(q1, p1);
    const d2 = V.sub(q2, p2);
    const r = V.sub(p1, p2);
    const a = V.dot(d1, d1);
    const e = V.dot(d2, d2);
    const f = V.dot(d2, r);

    let s = zeroS;
    let t = zeroS;
    // Both segments degenerate to points: s = t = 0.
    if (isZero(S, a)) {
      if (!isZero(S, e)) t = clamp(S, S.div(f, e), zeroS, oneS);
    } else {
      const c = V.dot(d1, r);
      if (isZero(S, e)) {
        s = clamp(S, S.div(S.negate(c), a), zeroS, oneS);
      } else {
        const b = V.dot(d1, d2);
        const denom = S.sub(S.mul(a, e), S.mul(b, b));
        s = isZero(S, denom)
          ? zeroS
          : clamp(S, S.div(S.sub(S.mul(b, f), S.mul(c, e)), denom), zeroS, oneS);
        t = S.div(S.add(S.mul(b, s), f), e);
        if (S.lessThan(t, zeroS)) {
          t = zeroS;
          s = clamp(S, S.div(S.negate(c), a), zeroS, oneS);
        } else if (S.greaterThan(t, oneS)) {
          t = oneS;
          s = clamp(S, S.div(S.sub(b, c), a), zeroS, oneS);
        }
      }
    }

    const onFirst = V.add(p1, V.scale(d1, s));
    const onSecond = V.add(p2, V.scale(d2, t));
    return { onFirst, onSecond, distanceSquared: V.distanceSquared(onFirst, onSecond) };
  };

  const outside = (c: A, h: A): A => S.max(S.sub(S.abs(c), h), zeroS);

  const boxDistanceSquared = (local: Vector3<A>, h: Vector3<A>): A =>
    S.add(
      S.add(square(S, outside(local.x, h.x)), square(S, outside(local.y, h.y))),
      square(S, outside(local.z, h.z))
    );

  // Ericson §5.3.3, with epsilon padding the cross-axis terms.
  const segmentOverlapsBox = (start: Vector3<A>, end: Vector3<A>, h: Vector3<A>): boolean => {
    const m = V.scale(V.add(start, end), half(S));
    const d = V.sub(end, m);
    const adx = S.abs(d.x);
    const ady = S.abs(d.y);
    const adz = S.abs(d.z);

    if (S.greaterThan(S.abs(m.x), S.add(h.x, adx))) return false;
    if (S.greaterThan(S.abs(m.y), S.add(h.y, ady))) return false;
    if (S.greaterThan(S.abs(m.z), S.add(h.z, adz))) return false;

    const ex = S.add(adx, S.epsilon);
    const ey = S.add(ady, S.epsilon);
    const ez = S.add(adz, S.epsilon);
    const crossBound = (c1: A, a1: A, c2: A, a2: A) => S.add(S.mul(c1, a1), S.mul(c2, a2));

    if (
      S.greaterThan(
        S.abs(S.sub(S.mul(m.y, d.z), S.mul(m.z, d.y))),
        crossBound(h.y, ez, h.z, ey)
      )
    ) {
      return false;
    }
    if (
      S.greaterThan(
        S.abs(S.sub(S.mul(m.z, d.x), S.mul(m.x, d.z))),
        crossBound(h.x, ez, h.z, ex)
      )
    ) {
      return false;
    }
    return !S.greaterThan(
      S.abs(S.sub(S.mul(m.x, d.y), S.mul(m.y, d.x))),
      crossBound(h.x, ey, h.y, ex)
    );
  };

  const ellipsoidSupport = (
    semiAxes: Vector3<A>,
    position: Vector3<A>,
    rotation: Quaternion<A>,
    dir: Vector3<A>
  ): Vector3<A> => {
    const local = V.transform(dir, Q.inverse(rotation));
    const stretched = V.mul(V.mul(semiAxes, semiAxes), local);
    const norm = S.sqrt(V.dot(stretched, local));
    if (isZero(S, norm)) return position;
    return fromLocal(V.divideScalar(stretched, norm), position, rotation);
  };

  const planarSegmentDistanceSquared = (px: A, py: A, ax: A, ay: A, bx: A, by: A): A => {
    const dx = S.sub(bx, ax);
    const dy = S.sub(by, ay);
    const dd = S.add(S.mul(dx, dx), S.mul(dy, dy));
    const t = isZero(S, dd)
      ? zeroS
      : clamp(
          S,
          S.div(S.add(S.mul(S.sub(px, ax), dx), S.mul(S.sub(py, ay), dy)), dd),
          zeroS,
          oneS
        );
    const cx = S.sub(px, S.add(ax, S.mul(dx, t)));
    const cy = S.sub(py, S.add(ay, S.mul(dy, t)));
    return S.add(S.mul(cx, cx), S.mul(cy, cy));
  };

  return {
    direction,
    perpendicularUp,
    basis,
    toLocal,
    fromLocal,
    segmentParameter,
    closestOnSegment,
    pointSegmentDistanceSquared: (start, end, point) =>
      V.distanceSquared(point, closestOnSegment(start, end, point)),
    closestBetweenSegments,
    boxDistanceSquared,
    segmentOverlapsBox,
    ellipsoidSupport,
    planarSegmentDistanceSquared,
  };
}
