/**
 * Point membership and the segment queries built on it. Every test is
 * inclusive of the boundary.
 */

import { clamp, half, isNearlyZero, isZero, square, type Scalar } from "@orbis/numeric";
import type { SpatialAlgebra, Vector3 } from "@orbis/spatial";
import type { Primitives } from "./primitives.js";
import { ShapeType, type ClosestPoint, type Cone, type Line, type Shape } from "./types.js";

export interface ShapeQueries<A> {
  isPointWithin(shape: Shape<A>, point: Vector3<A>): boolean;
  closestPointOnLine(line: Line<A>, point: Vector3<A>): ClosestPoint<A>;
  /** Shortest distance between two segments. */
  lineDistance(line: Line<A>, other: Line<A>): A;
  /** Radius of the cone's cross-section at the point's projection onto its axis. */
  coneRadiusAt(cone: Cone<A>, point: Vector3<A>): A;
}

export function shapeQueries<A>(
  algebra: SpatialAlgebra<A>,
  prims: Primitives<A>
): ShapeQueries<A> {
  const S: Scalar<A> = algebra.scalar;
  const V = algebra.vector3;
  const zeroS = S.zero();
  const within = (value: A, limit: A) => S.lessThanOrEqual(value, limit);

  // Squared distance of `rel` from an axis onto which it projects to `along`.
  const radialSquared = (rel: Vector3<A>, along: A): A =>
    S.max(S.sub(V.lengthSquared(rel), square(S, along)), zeroS);

  const coneRadiusAt = (cone: Cone<A>, point: Vector3<A>): A => {
    if (isZero(S, cone.length)) return cone.radius;
    const along = V.dot(V.sub(point, cone.start), prims.direction(cone.axis));
    const t = clamp(S, S.div(along, cone.length), zeroS, S.one());
    return S.mul(cone.radius, t);
  };

  const isPointWithin = (shape: Shape<A>, point: Vector3<A>): boolean => {
    switch (shape.shapeType) {
      case ShapeType.SinglePoint:
        return V.equals(shape.position, point);

      case ShapeType.Line:
        return isNearlyZero(
          S,
          S.sqrt(prims.pointSegmentDistanceSquared(shape.start, shape.end, point))
        );

      case ShapeType.Sphere:
        return within(V.distanceSquared(point, shape.position), square(S, shape.radius));

      case ShapeType.HollowSphere: {
        const d2 = V.distanceSquared(point, shape.position);
        return within(square(S, shape.innerRadius), d2) && within(d2, square(S, shape.outerRadius));
      }

      case ShapeType.Capsule:
        return within(
          prims.pointSegmentDistanceSquared(shape.start, shape.end, point),
          square(S, shape.radius)
        );

      case ShapeType.Cylinder: {
        const rel = V.sub(point, shape.position);
        const along = V.dot(rel, prims.direction(shape.axis));
        return (
          within(S.abs(along), S.mul(shape.length, half(S))) &&
          within(radialSquared(rel, along), square(S, shape.radius))
        );
      }

      case ShapeType.Cone: {
        const rel = V.sub(point, shape.start);
        const along = V.dot(rel, prims.direction(shape.axis));
        if (S.lessThan(along, zeroS) || S.greaterThan(along, shape.length)) return false;
        return within(radialSquared(rel, along), square(S, coneRadiusAt(shape, point)));
      }

      case ShapeType.Cuboid: {
        const local = prims.toLocal(point, shape.position, shape.rotation);
        const halfExtents = V.scale(V.create(shape.axisX, shape.axisY, shape.axisZ), half(S));
        return within(prims.boxDistanceSquared(local, halfExtents), zeroS);
      }

      case ShapeType.Ellipsoid: {
        const local = prims.toLocal(point, shape.position, shape.rotation);
        let sum = zeroS;
        for (const [c, semi] of [
          [local.x, shape.axisX],
          [local.y, shape.axisY],
          [local.z, shape.axisZ],
        ] satisfies [A, A][]) {
          // A zero semi-axis flattens the ellipsoid onto that plane.
          if (isZero(S, semi)) {
            if (!isZero(S, c)) return false;
          } else {
            sum = S.add(sum, square(S, S.div(c, semi)));
          }
        }
        return within(sum, S.one());
      }

      case ShapeType.Frustum: {
        const local = prims.toLocal(point, shape.position, shape.rotation);
        const forward = prims.direction(shape.axis);
        const { right, up } = prims.basis(forward);
        const fromEye = S.add(
          V.dot(local, forward),
          S.mul(S.add(shape.nearPlaneDistance, shape.farPlaneDistance), half(S))
        );
        if (
          S.lessThan(fromEye, shape.nearPlaneDistance) ||
          S.greaterThan(fromEye, shape.farPlaneDistance)
        ) {
          return false;
        }
        const halfHeight = S.mul(S.tan(S.mul(shape.fieldOfViewAngle, half(S))), fromEye);
        return (
          within(S.abs(V.dot(local, up)), halfHeight) &&
          within(S.abs(V.dot(local, right)), S.mul(shape.aspectRatio, halfHeight))
        );
      }

      case ShapeType.Torus: {
        const local = prims.toLocal(point, shape.position, shape.rotation);
        const ring = S.sub(
          S.sqrt(S.add(square(S, local.x), square(S, local.z))),
          shape.majorRadius
        );
        return within(S.add(square(S, ring), square(S, local.y)), square(S, shape.minorRadius));
      }
    }
  };

  return {
    isPointWithin,
    closestPointOnLine: (line, point) => {
      const closestPoint = prims.closestOnSegment(line.start, line.end, point);
      return { distance: V.distance(point, closestPoint), closestPoint };
    },
    lineDistance: (line, other) =>
      S.sqrt(
        prims.closestBetweenSegments(line.start, line.end, other.start, other.end)
          .distanceSquared
      ),
    coneRadiusAt,
  };
}
