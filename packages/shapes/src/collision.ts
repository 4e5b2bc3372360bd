/**
 * Swept collision. A moving shape is modelled as the capsule its bounding
 * sphere traces along the path. This over-approximates movers that are not
 * spheres: a thin shape may report contact its real cross-section would
 * miss.
 *
 * Point, line, sphere, capsule and cuboid targets get the exact first
 * contact of that swept sphere. Every other target stands in as its own
 * containing sphere.
 */

import { half, isZero, square, type Scalar } from "@orbis/numeric";
import type { SpatialAlgebra, Vector3 } from "@orbis/spatial";
import type { ShapeConstructors } from "./constructors.js";
import type { Primitives } from "./primitives.js";
import { ShapeType, type Capsule, type Cuboid, type Shape } from "./types.js";

export interface SweptCollision<A> {
  /** The capsule swept by `mover`'s bounding sphere along `path`. */
  sweep(mover: Shape<A>, path: Vector3<A>): Capsule<A>;
  /** Where `mover`'s center is when it first touches `other`, or `null`. */
  getCollisionPoint(mover: Shape<A>, path: Vector3<A>, other: Shape<A>): Vector3<A> | null;
  /** How far `mover` travels along `path` before touching `other`, or `null`. */
  getCollisionDistance(mover: Shape<A>, path: Vector3<A>, other: Shape<A>): A | null;
}

type Edge<A> = readonly [Vector3<A>, Vector3<A>];

export function sweptCollision<A>(
  algebra: SpatialAlgebra<A>,
  prims: Primitives<A>,
  make: ShapeConstructors<A>,
  intersects: (a: Shape<A>, b: Shape<A>) => boolean
): SweptCollision<A> {
  const S: Scalar<A> = algebra.scalar;
  const { vector3: V, quaternion: Q } = algebra;
  const zeroS = S.zero();
  const oneS = S.one();
  const halfS = half(S);

  const sweep = (mover: Shape<A>, path: Vector3<A>): Capsule<A> =>
    make.capsule(path, mover.containingRadius, V.add(mover.position, V.scale(path, halfS)));

  const earliest = (a: A | null, b: A | null): A | null =>
    a === null ? b : b === null ? a : S.min(a, b);

  // Each entry function returns the smallest t ≥ 0 with start + t·d inside
  // the region, or null. Times are in units of `d` and not capped at 1.

  const sphereEntry = (start: Vector3<A>, d: Vector3<A>, center: Vector3<A>, reach: A): A | null => {
    const offset = V.sub(start, center);
    const c = S.sub(V.lengthSquared(offset), square(S, reach));
    if (S.lessThanOrEqual(c, zeroS)) return zeroS;

    const a = V.lengthSquared(d);
    if (isZero(S, a)) return null;
    const b = V.dot(d, offset);
    const discriminant = S.sub(square(S, b), S.mul(a, c));
    if (S.lessThan(discriminant, zeroS)) return null;

    const t = S.div(S.sub(S.negate(b), S.sqrt(discriminant)), a);
    return S.lessThan(t, zeroS) ? null : t;
  };

  // Union of the end spheres and the side of the cylinder between them.
  const capsuleEntry = (
    start: Vector3<A>,
    d: Vector3<A>,
    p: Vector3<A>,
    q: Vector3<A>,
    reach: A
  ): A | null => {
    if (S.lessThanOrEqual(prims.pointSegmentDistanceSquared(p, q, start), square(S, reach))) {
      return zeroS;
    }
    let best = earliest(sphereEntry(start, d, p, reach), sphereEntry(start, d, q, reach));

    const m = V.sub(q, p);
    const mm = V.lengthSquared(m);
    if (isZero(S, mm)) return best;

    const n = V.sub(start, p);
    const across = (v: Vector3<A>) => V.sub(v, V.scale(m, S.div(V.dot(v, m), mm)));
    const dAcross = across(d);
    const nAcross = across(n);
    const a = V.lengthSquared(dAcross);
    if (isZero(S, a)) return best;

    const b = V.dot(dAcross, nAcross);
    const c = S.sub(V.lengthSquared(nAcross), square(S, reach));
    const discriminant = S.sub(square(S, b), S.mul(a, c));
    if (S.lessThan(discriminant, zeroS)) return best;

    const t = S.div(S.sub(S.negate(b), S.sqrt(discriminant)), a);
    const along = S.div(V.dot(V.add(n, V.scale(d, t)), m), mm);
    if (
      S.greaterThanOrEqual(t, zeroS) &&
      S.greaterThanOrEqual(along, zeroS) &&
      S.lessThanOrEqual(along, oneS)
    ) {
      best = earliest(best, t);
    }
    return best;
  };

  // Slab test against the axis-aligned box [-h, h].
  const boxEntry = (start: Vector3<A>, d: Vector3<A>, h: Vector3<A>): A | null => {
    let enter = zeroS;
    let exit: A | null = null;
    for (const axis of ["x", "y", "z"] as const) {
      const s = start[axis];
      const dc = d[axis];
      const hc = h[axis];
      if (isZero(S, dc)) {
        if (S.greaterThan(S.abs(s), hc)) return null;
        continue;
      }
      const t1 = S.div(S.sub(S.negate(hc), s), dc);
      const t2 = S.div(S.sub(hc, s), dc);
      enter = S.max(enter, S.min(t1, t2));
      exit = exit === null ? S.max(t1, t2) : S.min(exit, S.max(t1, t2));
      if (S.greaterThan(enter, exit)) return null;
    }
    return enter;
  };

  const boxEdges = (h: Vector3<A>): Edge<A>[] => {
    const minus = S.negate(oneS);
    const signs: readonly (readonly [A, A])[] = [
      [oneS, oneS],
      [oneS, minus],
      [minus, oneS],
      [minus, minus],
    ];
    return signs.flatMap(([u, w]): Edge<A>[] => [
      [V.create(S.negate(h.x), S.mul(h.y, u), S.mul(h.z, w)), V.create(h.x, S.mul(h.y, u), S.mul(h.z, w))],
      [V.create(S.mul(h.x, u), S.negate(h.y), S.mul(h.z, w)), V.create(S.mul(h.x, u), h.y, S.mul(h.z, w))],
      [V.create(S.mul(h.x, u), S.mul(h.y, w), S.negate(h.z)), V.create(S.mul(h.x, u), S.mul(h.y, w), h.z)],
    ]);
  };

  // The box rounded by `reach` is the union of the box grown along each axis
  // and a capsule on each of its twelve edges.
  const cuboidEntry = (start: Vector3<A>, d: Vector3<A>, box: Cuboid<A>, reach: A): A | null => {
    const s = prims.toLocal(start, box.position, box.rotation);
    const dl = V.transform(d, Q.inverse(box.rotation));
    const h = V.scale(V.create(box.axisX, box.axisY, box.axisZ), halfS);
    if (S.lessThanOrEqual(prims.boxDistanceSquared(s, h), square(S, reach))) return zeroS;

    let best: A | null = null;
    const grown = [
      V.create(reach, zeroS, zeroS),
      V.create(zeroS, reach, zeroS),
      V.create(zeroS, zeroS, reach),
    ];
    for (const g of grown) best = earliest(best, boxEntry(s, dl, V.add(h, g)));
    for (const [p, q] of boxEdges(h)) best = earliest(best, capsuleEntry(s, dl, p, q, reach));
    return best;
  };

  const entryTime = (mover: Shape<A>, path: Vector3<A>, other: Shape<A>): A | null => {
    const start = mover.position;
    const r = mover.containingRadius;
    switch (other.shapeType) {
      case ShapeType.SinglePoint:
        return sphereEntry(start, path, other.position, r);
      case ShapeType.Line:
        return capsuleEntry(start, path, other.start, other.end, r);
      case ShapeType.Sphere:
        return sphereEntry(start, path, other.position, S.add(r, other.radius));
      case ShapeType.Capsule:
        return capsuleEntry(start, path, other.start, other.end, S.add(r, other.radius));
      case ShapeType.Cuboid:
        return cuboidEntry(start, path, other, r);
      default:
        if (!intersects(sweep(mover, path), other)) return null;
        return sphereEntry(start, path, other.position, S.add(r, other.containingRadius));
    }
  };

  const contactTime = (mover: Shape<A>, path: Vector3<A>, other: Shape<A>): A | null => {
    const t = entryTime(mover, path, other);
    return t === null || S.greaterThan(t, oneS) ? null : t;
  };

  return {
    sweep,
    getCollisionPoint: (mover, path, other) => {
      const t = contactTime(mover, path, other);
      return t === null ? null : V.add(mover.position, V.scale(path, t));
    },
    getCollisionDistance: (mover, path, other) => {
      const t = contactTime(mover, path, other);
      return t === null ? null : S.mul(t, V.length(path));
    },
  };
}
