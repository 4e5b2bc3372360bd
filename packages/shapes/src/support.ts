/**
 * Support mappings: for a direction `d`, the point of a shape farthest
 * along `d`. Swept kinds (capsule, sphere) are a core support plus a
 * convex radius. The torus is represented by its bounding cylinder.
 */

import { isZero, type Scalar } from "@orbis/numeric";
import type { SpatialAlgebra, Vector3 } from "@orbis/spatial";
import type { Primitives } from "./primitives.js";
import { ShapeType, type Shape } from "./types.js";

export type SupportFunction<A> = (direction: Vector3<A>) => Vector3<A>;

export function supportFor<A>(
  algebra: SpatialAlgebra<A>,
  prims: Primitives<A>
): (shape: Shape<A>) => SupportFunction<A> {
  const S: Scalar<A> = algebra.scalar;
  const V = algebra.vector3;

  const unitOrZero = (v: Vector3<A>): Vector3<A> => {
    const len = V.length(v);
    return isZero(S, len) ? V.zero : V.divideScalar(v, len);
  };

  const pointSupport =
    (p: Vector3<A>): SupportFunction<A> =>
    () =>
      p;

  const segmentSupport =
    (start: Vector3<A>, end: Vector3<A>): SupportFunction<A> =>
    (d) =>
      S.greaterThan(V.dot(end, d), V.dot(start, d)) ? end : start;

  const addRadius =
    (core: SupportFunction<A>, radius: A): SupportFunction<A> =>
    (d) =>
      V.add(core(d), V.scale(unitOrZero(d), radius));

  // Disc of `radius` about `center` perpendicular to unit `axis`.
  const discSupport =
    (center: Vector3<A>, axis: Vector3<A>, radius: A): SupportFunction<A> =>
    (d) =>
      V.add(center, V.scale(unitOrZero(V.sub(d, V.scale(axis, V.dot(d, axis)))), radius));

  const cylinderSupport = (
    start: Vector3<A>,
    end: Vector3<A>,
    axis: Vector3<A>,
    radius: A
  ): SupportFunction<A> => {
    const top = discSupport(end, axis, radius);
    const bottom = discSupport(start, axis, radius);
    return (d) => (S.greaterThanOrEqual(V.dot(d, axis), S.zero()) ? top(d) : bottom(d));
  };

  const hullSupport =
    (points: readonly Vector3<A>[]): SupportFunction<A> =>
    (d) => {
      let best = points[0];
      let bestDot = V.dot(best, d);
      for (const p of points.slice(1)) {
        const dp = V.dot(p, d);
        if (S.greaterThan(dp, bestDot)) {
          best = p;
          bestDot = dp;
        }
      }
      return best;
    };

  return (shape) => {
    switch (shape.shapeType) {
      case ShapeType.SinglePoint:
        return pointSupport(shape.position);
      case ShapeType.Line:
        return segmentSupport(shape.start, shape.end);
      case ShapeType.Sphere:
        return addRadius(pointSupport(shape.position), shape.radius);
      case ShapeType.HollowSphere:
        return addRadius(pointSupport(shape.position), shape.outerRadius);
      case ShapeType.Capsule:
        return addRadius(segmentSupport(shape.start, shape.end), shape.radius);
      case ShapeType.Cylinder:
        return cylinderSupport(shape.start, shape.end, prims.direction(shape.axis), shape.radius);
      case ShapeType.Cone: {
        const apex = shape.start;
        const rim = discSupport(shape.end, prims.direction(shape.axis), shape.radius);
        return (d) => {
          const base = rim(d);
          return S.greaterThan(V.dot(base, d), V.dot(apex, d)) ? base : apex;
        };
      }
      case ShapeType.Cuboid:
      case ShapeType.Frustum:
        return hullSupport(shape.corners);
      case ShapeType.Ellipsoid: {
        const semiAxes = V.create(shape.axisX, shape.axisY, shape.axisZ);
        return (d) => prims.ellipsoidSupport(semiAxes, shape.position, shape.rotation, d);
      }
      case ShapeType.Torus: {
        const axis = V.transform(V.unitY, shape.rotation);
        const halfAxis = V.scale(axis, shape.minorRadius);
        return cylinderSupport(
          V.sub(shape.position, halfAxis),
          V.add(shape.position, halfAxis),
          axis,
          S.add(shape.majorRadius, shape.minorRadius)
        );
      }
    }
  };
}
