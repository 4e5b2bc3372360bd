/**
 * Pairwise overlap of shapes.
 *
 * Kinds are ranked; a call whose first argument outranks the second is
 * routed to the reverse call, so each unordered pair has exactly one
 * handler and the test is symmetric by construction. Pairs without a
 * closed form fall through to GJK over support mappings.
 */

import { half, isNearlyZero, isZero, square, type Scalar } from "@orbis/numeric";
import type { SpatialAlgebra, Vector3 } from "@orbis/spatial";
import type { ShapeConstructors } from "./constructors.js";
import type { ShapeQueries } from "./containment.js";
import type { OverlapTest } from "./gjk.js";
import type { Primitives } from "./primitives.js";
import type { SupportFunction } from "./support.js";
import {
  ShapeType,
  type Capsule,
  type Cone,
  type Cuboid,
  type Cylinder,
  type Ellipsoid,
  type HollowSphere,
  type Line,
  type Shape,
  type ShapeKind,
  type Sphere,
  type Torus,
} from "./types.js";

/** Dispatch order; lower ranks handle pairs with higher ranks. */
export const SHAPE_RANK: Readonly<Record<ShapeKind, number>> = {
  [ShapeType.SinglePoint]: 0,
  [ShapeType.Line]: 1,
  [ShapeType.Sphere]: 2,
  [ShapeType.HollowSphere]: 3,
  [ShapeType.Capsule]: 4,
  [ShapeType.Cylinder]: 5,
  [ShapeType.Cone]: 6,
  [ShapeType.Cuboid]: 7,
  [ShapeType.Ellipsoid]: 8,
  [ShapeType.Frustum]: 9,
  [ShapeType.Torus]: 10,
};

export interface IntersectionDeps<A> {
  readonly algebra: SpatialAlgebra<A>;
  readonly prims: Primitives<A>;
  readonly make: ShapeConstructors<A>;
  readonly queries: ShapeQueries<A>;
  readonly support: (shape: Shape<A>) => SupportFunction<A>;
  readonly overlap: OverlapTest<A>;
}

const GOLDEN_SECTION_STEPS = 96;

export function intersectionFor<A>(
  deps: IntersectionDeps<A>
): (a: Shape<A>, b: Shape<A>) => boolean {
  const { algebra, prims, make, queries, support, overlap } = deps;
  const S: Scalar<A> = algebra.scalar;
  const { vector3: V } = algebra;
  const zeroS = S.zero();
  const oneS = S.one();
  const halfS = half(S);
  const atMost = (value: A, limit: A) => S.lessThanOrEqual(value, limit);

  const convex = (a: Shape<A>, b: Shape<A>): boolean =>
    overlap(support(a), support(b), V.sub(b.position, a.position));

  const boxExtents = (box: Cuboid<A>) =>
    V.scale(V.create(box.axisX, box.axisY, box.axisZ), halfS);

  // Greatest distance from `center` to any point of `shape`, or an upper
  // bound for the curved kinds.
  const farthestFrom = (shape: Shape<A>, center: Vector3<A>): A => {
    switch (shape.shapeType) {
      case ShapeType.SinglePoint:
        return V.distance(shape.position, center);
      case ShapeType.Line:
        return S.max(V.distance(shape.start, center), V.distance(shape.end, center));
      case ShapeType.Capsule:
        return S.add(
          S.max(V.distance(shape.start, center), V.distance(shape.end, center)),
          shape.radius
        );
      case ShapeType.Cuboid:
      case ShapeType.Frustum: {
        let far = zeroS;
        for (const corner of shape.corners) far = S.max(far, V.distance(corner, center));
        return far;
      }
      default:
        return S.add(V.distance(shape.position, center), shape.containingRadius);
    }
  };

  // The shell overlaps `other` unless `other` sits wholly inside the cavity.
  const hollow = (shell: HollowSphere<A>, other: Shape<A>): boolean =>
    intersects(make.sphere(shell.outerRadius, shell.position), other) &&
    !S.lessThan(farthestFrom(other, shell.position), shell.innerRadius);

  const sphereLine = (sphere: Sphere<A>, line: Line<A>): boolean => {
    if (isZero(S, line.length)) return queries.isPointWithin(sphere, line.position);
    const diff = V.sub(line.position, sphere.position);
    const dir = V.divideScalar(line.path, line.length);
    const a0 = S.sub(V.dot(diff, diff), square(S, sphere.radius));
    const a1 = V.dot(dir, diff);
    const discriminant = S.sub(square(S, a1), a0);
    if (S.lessThan(discriminant, zeroS)) return false;

    const root = S.sqrt(discriminant);
    const extent = S.mul(line.length, halfS);
    const near = S.sub(S.negate(a1), root);
    const far = S.add(S.negate(a1), root);
    return atMost(near, extent) && atMost(S.negate(extent), far);
  };

  const segmentsWithin = (
    a: { readonly start: Vector3<A>; readonly end: Vector3<A> },
    b: { readonly start: Vector3<A>; readonly end: Vector3<A> },
    reach: A
  ): boolean =>
    atMost(
      prims.closestBetweenSegments(a.start, a.end, b.start, b.end).distanceSquared,
      square(S, reach)
    );

  const lineCuboid = (line: Line<A>, box: Cuboid<A>): boolean =>
    prims.segmentOverlapsBox(
      prims.toLocal(line.start, box.position, box.rotation),
      prims.toLocal(line.end, box.position, box.rotation),
      boxExtents(box)
    );

  const lineEllipsoid = (line: Line<A>, ellipsoid: Ellipsoid<A>): boolean => {
    const semiAxes = V.create(ellipsoid.axisX, ellipsoid.axisY, ellipsoid.axisZ);
    if (isZero(S, S.mul(S.mul(semiAxes.x, semiAxes.y), semiAxes.z))) {
      return convex(line, ellipsoid);
    }
    // Scale into the space where the ellipsoid is the unit sphere.
    const toUnit = (p: Vector3<A>) =>
      V.divide(prims.toLocal(p, ellipsoid.position, ellipsoid.rotation), semiAxes);
    return atMost(prims.pointSegmentDistanceSquared(toUnit(line.start), toUnit(line.end), V.zero), oneS);
  };

  const sphereCylinder = (sphere: Sphere<A>, cylinder: Cylinder<A>): boolean => {
    const rel = V.sub(sphere.position, cylinder.position);
    const along = V.dot(rel, prims.direction(cylinder.axis));
    const radial = S.sqrt(S.max(S.sub(V.lengthSquared(rel), square(S, along)), zeroS));
    const axial = S.max(S.sub(S.abs(along), S.mul(cylinder.length, halfS)), zeroS);
    const outward = S.max(S.sub(radial, cylinder.radius), zeroS);
    return atMost(S.add(square(S, axial), square(S, outward)), square(S, sphere.radius));
  };

  // In the (axial, radial) half plane the cone is the triangle apex (0, 0),
  // rim (L, r), base center (L, 0).
  const sphereCone = (sphere: Sphere<A>, cone: Cone<A>): boolean => {
    if (queries.isPointWithin(cone, sphere.position)) return true;
    const rel = V.sub(sphere.position, cone.start);
    const along = V.dot(rel, prims.direction(cone.axis));
    const radial = S.sqrt(S.max(S.sub(V.lengthSquared(rel), square(S, along)), zeroS));
    const slant = prims.planarSegmentDistanceSquared(
      along,
      radial,
      zeroS,
      zeroS,
      cone.length,
      cone.radius
    );
    const base = prims.planarSegmentDistanceSquared(
      along,
      radial,
      cone.length,
      zeroS,
      cone.length,
      cone.radius
    );
    return atMost(S.min(slant, base), square(S, sphere.radius));
  };

  const sphereCuboid = (sphere: Sphere<A>, box: Cuboid<A>): boolean =>
    atMost(
      prims.boxDistanceSquared(prims.toLocal(sphere.position, box.position, box.rotation), boxExtents(box)),
      square(S, sphere.radius)
    );

  const sphereTorus = (sphere: Sphere<A>, torus: Torus<A>): boolean => {
    const local = prims.toLocal(sphere.position, torus.position, torus.rotation);
    const ring = S.sub(S.sqrt(S.add(square(S, local.x), square(S, local.z))), torus.majorRadius);
    return atMost(
      S.add(square(S, ring), square(S, local.y)),
      square(S, S.add(torus.minorRadius, sphere.radius))
    );
  };

  // Distance from the capsule's segment to the box is convex along the
  // segment, so a golden-section search finds its minimum.
  const capsuleCuboid = (capsule: Capsule<A>, box: Cuboid<A>): boolean => {
    const start = prims.toLocal(capsule.start, box.position, box.rotation);
    const end = prims.toLocal(capsule.end, box.position, box.rotation);
    const extents = boxExtents(box);
    if (prims.segmentOverlapsBox(start, end, extents)) return true;

    const distanceAt = (t: A) => prims.boxDistanceSquared(V.lerp(start, end, t), extents);
    const ratio = S.div(S.sub(S.sqrt(S.fromNumber(5)), oneS), S.fromNumber(2));
    let lo = zeroS;
    let hi = oneS;
    for (let i = 0; i < GOLDEN_SECTION_STEPS; i++) {
      const step = S.mul(S.sub(hi, lo), ratio);
      const left = S.sub(hi, step);
      const right = S.add(lo, step);
      if (S.lessThan(distanceAt(left), distanceAt(right))) hi = right;
      else lo = left;
    }
    const best = S.min(
      distanceAt(S.mul(S.add(lo, hi), halfS)),
      S.min(distanceAt(zeroS), distanceAt(oneS))
    );
    return atMost(best, square(S, capsule.radius));
  };

  const cuboidCuboid = (a: Cuboid<A>, b: Cuboid<A>): boolean => {
    const axesOf = (box: Cuboid<A>) => [
      V.transform(V.unitX, box.rotation),
      V.transform(V.unitY, box.rotation),
      V.transform(V.unitZ, box.rotation),
    ];
    const ua = axesOf(a);
    const ub = axesOf(b);
    const ea = V.toArray(boxExtents(a));
    const eb = V.toArray(boxExtents(b));
    const offset = V.sub(b.position, a.position);
    const t = ua.map((u) => V.dot(offset, u));
    const r = ua.map((u) => ub.map((w) => V.dot(u, w)));
    const absR = r.map((row) => row.map((c) => S.add(S.abs(c), S.epsilon)));
    const separated = (distance: A, ra: A, rb: A) => S.greaterThan(S.abs(distance), S.add(ra, rb));

    // Ericson §4.4.1: three face axes of each box, then nine edge crossings.
    for (let i = 0; i < 3; i++) {
      const rb = S.add(
        S.add(S.mul(eb[0], absR[i][0]), S.mul(eb[1], absR[i][1])),
        S.mul(eb[2], absR[i][2])
      );
      if (separated(t[i], ea[i], rb)) return false;
    }
    for (let j = 0; j < 3; j++) {
      const ra = S.add(
        S.add(S.mul(ea[0], absR[0][j]), S.mul(ea[1], absR[1][j])),
        S.mul(ea[2], absR[2][j])
      );
      const projected = S.add(
        S.add(S.mul(t[0], r[0][j]), S.mul(t[1], r[1][j])),
        S.mul(t[2], r[2][j])
      );
      if (separated(projected, ra, eb[j])) return false;
    }
    for (let i = 0; i < 3; i++) {
      const i1 = (i + 1) % 3;
      const i2 = (i + 2) % 3;
      for (let j = 0; j < 3; j++) {
        const j1 = (j + 1) % 3;
        const j2 = (j + 2) % 3;
        const ra = S.add(S.mul(ea[i1], absR[i2][j]), S.mul(ea[i2], absR[i1][j]));
        const rb = S.add(S.mul(eb[j1], absR[i][j2]), S.mul(eb[j2], absR[i][j1]));
        const distance = S.sub(S.mul(t[i2], r[i1][j]), S.mul(t[i1], r[i2][j]));
        if (separated(distance, ra, rb)) return false;
      }
    }
    return true;
  };

  const lineWith = (line: Line<A>, other: Shape<A>): boolean => {
    switch (other.shapeType) {
      case ShapeType.Line:
        return isNearlyZero(S, queries.lineDistance(line, other));
      case ShapeType.Sphere:
        return sphereLine(other, line);
      case ShapeType.HollowSphere:
        return hollow(other, line);
      case ShapeType.Capsule:
        return segmentsWithin(line, other, other.radius);
      case ShapeType.Cuboid:
        return lineCuboid(line, other);
      case ShapeType.Ellipsoid:
        return lineEllipsoid(line, other);
      default:
        return convex(line, other);
    }
  };

  const sphereWith = (sphere: Sphere<A>, other: Shape<A>): boolean => {
    switch (other.shapeType) {
      case ShapeType.Sphere:
        return atMost(
          V.distanceSquared(sphere.position, other.position),
          square(S, S.add(sphere.radius, other.radius))
        );
      case ShapeType.HollowSphere:
        return hollow(other, sphere);
      case ShapeType.Capsule:
        return atMost(
          prims.pointSegmentDistanceSquared(other.start, other.end, sphere.position),
          square(S, S.add(sphere.radius, other.radius))
        );
      case ShapeType.Cylinder:
        return sphereCylinder(sphere, other);
      case ShapeType.Cone:
        return sphereCone(sphere, other);
      case ShapeType.Cuboid:
        return sphereCuboid(sphere, other);
      case ShapeType.Torus:
        return sphereTorus(sphere, other);
      default:
        return convex(sphere, other);
    }
  };

  const capsuleWith = (capsule: Capsule<A>, other: Shape<A>): boolean => {
    switch (other.shapeType) {
      case ShapeType.Capsule:
        return segmentsWithin(capsule, other, S.add(capsule.radius, other.radius));
      case ShapeType.Cuboid:
        return capsuleCuboid(capsule, other);
      default:
        return convex(capsule, other);
    }
  };

  const boundsOverlap = (a: Shape<A>, b: Shape<A>): boolean =>
    atMost(
      V.distanceSquared(a.position, b.position),
      square(S, S.add(a.containingRadius, b.containingRadius))
    );

  function intersects(a: Shape<A>, b: Shape<A>): boolean {
    if (SHAPE_RANK[a.shapeType] > SHAPE_RANK[b.shapeType]) return intersects(b, a);
    if (!boundsOverlap(a, b)) return false;

    switch (a.shapeType) {
      case ShapeType.SinglePoint:
        return b.shapeType === ShapeType.SinglePoint
          ? V.equals(a.position, b.position)
          : queries.isPointWithin(b, a.position);
      case ShapeType.Line:
        return lineWith(a, b);
      case ShapeType.Sphere:
        return sphereWith(a, b);
      case ShapeType.HollowSphere:
        return hollow(a, b);
      case ShapeType.Capsule:
        return capsuleWith(a, b);
      case ShapeType.Cuboid:
        return b.shapeType === ShapeType.Cuboid ? cuboidCuboid(a, b) : convex(a, b);
      default:
        return convex(a, b);
    }
  }

  return intersects;
}
