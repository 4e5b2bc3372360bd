/**
 * Shape constructors. Each one stores its parameters and computes every
 * derived field once; the resulting records are never mutated.
 *
 * Omitted arguments give a zero-size shape at the origin.
 */

import { InvalidArgumentError } from "@orbis/core";
import { half, square, two, type Scalar } from "@orbis/numeric";
import type { Plane, Quaternion, SpatialAlgebra, Vector3 } from "@orbis/spatial";
import type { Primitives } from "./primitives.js";
import {
  ShapeType,
  type Capsule,
  type Cone,
  type Cuboid,
  type Cylinder,
  type Ellipsoid,
  type Frustum,
  type HollowSphere,
  type Line,
  type Sphere,
  type SinglePoint,
  type Torus,
} from "./types.js";

export interface ShapeConstructors<A> {
  singlePoint(position?: Vector3<A>): SinglePoint<A>;
  /** A segment along `path` centered on `position`. */
  line(path?: Vector3<A>, position?: Vector3<A>): Line<A>;
  lineFromPoints(start: Vector3<A>, end: Vector3<A>): Line<A>;
  sphere(radius?: A, position?: Vector3<A>): Sphere<A>;
  hollowSphere(innerRadius?: A, outerRadius?: A, position?: Vector3<A>): HollowSphere<A>;
  capsule(axis?: Vector3<A>, radius?: A, position?: Vector3<A>): Capsule<A>;
  cuboid(
    axisX?: A,
    axisY?: A,
    axisZ?: A,
    position?: Vector3<A>,
    rotation?: Quaternion<A>
  ): Cuboid<A>;
  cylinder(axis?: Vector3<A>, radius?: A, position?: Vector3<A>): Cylinder<A>;
  cone(axis?: Vector3<A>, radius?: A, position?: Vector3<A>): Cone<A>;
  /**
   * A cone with its apex at `apex`, opening along `orientation` with the
   * full aperture `angle` (radians).
   */
  coneFromAngle(apex: Vector3<A>, orientation: Vector3<A>, length: A, angle: A): Cone<A>;
  ellipsoid(
    axisX?: A,
    axisY?: A,
    axisZ?: A,
    position?: Vector3<A>,
    rotation?: Quaternion<A>
  ): Ellipsoid<A>;
  frustum(
    aspectRatio?: A,
    axis?: Vector3<A>,
    fieldOfViewAngle?: A,
    nearPlaneDistance?: A,
    position?: Vector3<A>,
    rotation?: Quaternion<A>
  ): Frustum<A>;
  /** @throws InvalidArgumentError when `majorRadius < minorRadius` */
  torus(
    majorRadius?: A,
    minorRadius?: A,
    position?: Vector3<A>,
    rotation?: Quaternion<A>
  ): Torus<A>;
}

export function shapeConstructors<A>(
  algebra: SpatialAlgebra<A>,
  prims: Primitives<A>
): ShapeConstructors<A> {
  const S: Scalar<A> = algebra.scalar;
  const { vector3: V, quaternion: Q, plane: P } = algebra;
  const zeroS = S.zero();
  const twoS = two(S);
  const halfS = half(S);
  const fourThirdsPi = S.div(S.mul(S.fromNumber(4), S.pi()), S.fromNumber(3));
  const cube = (a: A): A => S.mul(S.mul(a, a), a);
  const min3 = (a: A, b: A, c: A): A => S.min(a, S.min(b, c));

  const byHeight = (points: readonly Vector3<A>[]) => {
    let highest = points[0];
    let lowest = points[0];
    for (const p of points.slice(1)) {
      if (S.greaterThan(p.y, highest.y)) highest = p;
      if (S.lessThan(p.y, lowest.y)) lowest = p;
    }
    return { highestPoint: highest, lowestPoint: lowest };
  };

  const endpoints = (axis: Vector3<A>, position: Vector3<A>) => {
    const halfAxis = V.scale(axis, halfS);
    return { start: V.sub(position, halfAxis), end: V.add(position, halfAxis) };
  };

  const singlePoint = (position: Vector3<A> = V.zero): SinglePoint<A> => ({
    shapeType: ShapeType.SinglePoint,
    position,
    rotation: Q.identity,
    containingRadius: zeroS,
    highestPoint: position,
    lowestPoint: position,
    smallestDimension: zeroS,
    volume: zeroS,
  });

  const line = (path: Vector3<A> = V.zero, position: Vector3<A> = V.zero): Line<A> => {
    const { start, end } = endpoints(path, position);
    const length = V.length(path);
    const up = S.greaterThanOrEqual(end.y, start.y);
    return {
      shapeType: ShapeType.Line,
      path,
      position,
      rotation: Q.identity,
      start,
      end,
      length,
      containingRadius: S.mul(length, halfS),
      highestPoint: up ? end : start,
      lowestPoint: up ? start : end,
      smallestDimension: zeroS,
      volume: zeroS,
    };
  };

  const sphere = (radius: A = zeroS, position: Vector3<A> = V.zero): Sphere<A> => {
    const lift = V.scale(V.unitY, radius);
    return {
      shapeType: ShapeType.Sphere,
      radius,
      position,
      rotation: Q.identity,
      containingRadius: radius,
      highestPoint: V.add(position, lift),
      lowestPoint: V.sub(position, lift),
      smallestDimension: S.mul(radius, twoS),
      volume: S.mul(fourThirdsPi, cube(radius)),
    };
  };

  const hollowSphere = (
    innerRadius: A = zeroS,
    outerRadius: A = zeroS,
    position: Vector3<A> = V.zero
  ): HollowSphere<A> => {
    if (S.greaterThan(innerRadius, outerRadius)) {
      throw new InvalidArgumentError("innerRadius", "must not exceed outerRadius");
    }
    const lift = V.scale(V.unitY, outerRadius);
    return {
      shapeType: ShapeType.HollowSphere,
      innerRadius,
      outerRadius,
      position,
      rotation: Q.identity,
      containingRadius: outerRadius,
      highestPoint: V.add(position, lift),
      lowestPoint: V.sub(position, lift),
      smallestDimension: S.sub(outerRadius, innerRadius),
      volume: S.mul(fourThirdsPi, S.sub(cube(outerRadius), cube(innerRadius))),
    };
  };

  const capsule = (
    axis: Vector3<A> = V.zero,
    radius: A = zeroS,
    position: Vector3<A> = V.zero
  ): Capsule<A> => {
    const { start, end } = endpoints(axis, position);
    const pathLength = V.length(axis);
    const diameter = S.mul(radius, twoS);
    const lift = V.scale(V.unitY, radius);
    const up = S.greaterThanOrEqual(end.y, start.y);
    const length = S.add(pathLength, diameter);
    return {
      shapeType: ShapeType.Capsule,
      axis,
      radius,
      position,
      rotation: Q.identity,
      start,
      end,
      length,
      containingRadius: S.add(S.mul(pathLength, halfS), radius),
      highestPoint: V.add(up ? end : start, lift),
      lowestPoint: V.sub(up ? start : end, lift),
      smallestDimension: S.min(length, diameter),
      volume: S.add(
        S.mul(S.mul(S.pi(), square(S, radius)), pathLength),
        S.mul(fourThirdsPi, cube(radius))
      ),
    };
  };

  const cylinder = (
    axis: Vector3<A> = V.zero,
    radius: A = zeroS,
    position: Vector3<A> = V.zero
  ): Cylinder<A> => {
    const { start, end } = endpoints(axis, position);
    const length = V.length(axis);
    const rim = V.scale(prims.perpendicularUp(prims.direction(axis)), radius);
    const up = S.greaterThanOrEqual(end.y, start.y);
    return {
      shapeType: ShapeType.Cylinder,
      axis,
      radius,
      position,
      rotation: Q.identity,
      start,
      end,
      length,
      containingRadius: S.sqrt(S.add(square(S, S.mul(length, halfS)), square(S, radius))),
      highestPoint: V.add(up ? end : start, rim),
      lowestPoint: V.sub(up ? start : end, rim),
      smallestDimension: S.min(length, S.mul(radius, twoS)),
      volume: S.mul(S.mul(S.pi(), square(S, radius)), length),
    };
  };

  const cone = (
    axis: Vector3<A> = V.zero,
    radius: A = zeroS,
    position: Vector3<A> = V.zero
  ): Cone<A> => {
    const { start, end } = endpoints(axis, position);
    const length = V.length(axis);
    const rim = V.scale(prims.perpendicularUp(prims.direction(axis)), radius);
    const rimTop = V.add(end, rim);
    const rimBottom = V.sub(end, rim);
    return {
      shapeType: ShapeType.Cone,
      axis,
      radius,
      position,
      rotation: Q.identity,
      start,
      end,
      length,
      containingRadius: S.sqrt(S.add(square(S, S.mul(length, halfS)), square(S, radius))),
      highestPoint: S.greaterThanOrEqual(rimTop.y, start.y) ? rimTop : start,
      lowestPoint: S.lessThan(rimBottom.y, start.y) ? rimBottom : start,
      smallestDimension: S.min(length, S.mul(radius, twoS)),
      volume: S.div(S.mul(S.mul(S.pi(), square(S, radius)), length), S.fromNumber(3)),
    };
  };

  const coneFromAngle = (
    apex: Vector3<A>,
    orientation: Vector3<A>,
    length: A,
    angle: A
  ): Cone<A> => {
    const axis = V.scale(prims.direction(orientation), length);
    return cone(
      axis,
      S.mul(S.tan(S.mul(angle, halfS)), length),
      V.add(apex, V.scale(axis, halfS))
    );
  };

  const cuboid = (
    axisX: A = zeroS,
    axisY: A = zeroS,
    axisZ: A = zeroS,
    position: Vector3<A> = V.zero,
    rotation: Quaternion<A> = Q.identity
  ): Cuboid<A> => {
    const hx = S.mul(axisX, halfS);
    const hy = S.mul(axisY, halfS);
    const hz = S.mul(axisZ, halfS);
    const corners: Vector3<A>[] = [];
    for (const z of [S.negate(hz), hz]) {
      for (const y of [S.negate(hy), hy]) {
        for (const x of [S.negate(hx), hx]) {
          corners.push(prims.fromLocal(V.create(x, y, z), position, rotation));
        }
      }
    }
    return {
      shapeType: ShapeType.Cuboid,
      axisX,
      axisY,
      axisZ,
      position,
      rotation,
      corners,
      containingRadius: S.mul(
        S.sqrt(S.add(S.add(square(S, axisX), square(S, axisY)), square(S, axisZ))),
        halfS
      ),
      ...byHeight(corners),
      smallestDimension: min3(axisX, axisY, axisZ),
      volume: S.mul(S.mul(axisX, axisY), axisZ),
    };
  };

  const ellipsoid = (
    axisX: A = zeroS,
    axisY: A = zeroS,
    axisZ: A = zeroS,
    position: Vector3<A> = V.zero,
    rotation: Quaternion<A> = Q.identity
  ): Ellipsoid<A> => {
    const semiAxes = V.create(axisX, axisY, axisZ);
    return {
      shapeType: ShapeType.Ellipsoid,
      axisX,
      axisY,
      axisZ,
      position,
      rotation,
      containingRadius: S.max(axisX, S.max(axisY, axisZ)),
      highestPoint: prims.ellipsoidSupport(semiAxes, position, rotation, V.unitY),
      lowestPoint: prims.ellipsoidSupport(semiAxes, position, rotation, V.negate(V.unitY)),
      smallestDimension: S.mul(min3(axisX, axisY, axisZ), twoS),
      volume: S.mul(S.mul(fourThirdsPi, S.mul(axisX, axisY)), axisZ),
    };
  };

  // Inward-facing plane through three corners; zero for a collapsed face.
  const facePlane = (
    a: Vector3<A>,
    b: Vector3<A>,
    c: Vector3<A>,
    inside: Vector3<A>
  ): Plane<A> => {
    const n = V.cross(V.sub(b, a), V.sub(c, a));
    if (V.isNearlyZero(n)) return P.create(V.zero, zeroS);
    const normal = V.normalize(n);
    const plane = P.create(normal, S.negate(V.dot(normal, a)));
    return S.lessThan(P.dotCoordinate(plane, inside), zeroS)
      ? P.create(V.negate(normal), S.negate(plane.d))
      : plane;
  };

  const frustum = (
    aspectRatio: A = zeroS,
    axis: Vector3<A> = V.zero,
    fieldOfViewAngle: A = zeroS,
    nearPlaneDistance: A = zeroS,
    position: Vector3<A> = V.zero,
    rotation: Quaternion<A> = Q.identity
  ): Frustum<A> => {
    const far = V.length(axis);
    const forward = prims.direction(axis);
    const { right, up } = prims.basis(forward);
    const tanHalf = S.tan(S.mul(fieldOfViewAngle, halfS));
    const middle = S.mul(S.add(nearPlaneDistance, far), halfS);

    const ring = (distance: A): Vector3<A>[] => {
      const center = V.scale(forward, S.sub(distance, middle));
      const halfHeight = S.mul(tanHalf, distance);
      const halfWidth = S.mul(aspectRatio, halfHeight);
      const corner = (sx: A, sy: A) =>
        prims.fromLocal(
          V.add(V.add(center, V.scale(right, sx)), V.scale(up, sy)),
          position,
          rotation
        );
      return [
        corner(S.negate(halfWidth), halfHeight),
        corner(halfWidth, halfHeight),
        corner(S.negate(halfWidth), S.negate(halfHeight)),
        corner(halfWidth, S.negate(halfHeight)),
      ];
    };

    const corners = [...ring(far), ...ring(nearPlaneDistance)];
    const [f0, f1, f2, f3, n0, n1, n2] = corners;
    const planes = [
      facePlane(f0, f1, f2, position),
      facePlane(n0, n1, n2, position),
      facePlane(f0, f1, n0, position),
      facePlane(f2, f3, n2, position),
      facePlane(f0, f2, n0, position),
      facePlane(f1, f3, n1, position),
    ];

    const nearHeight = S.mul(S.mul(tanHalf, nearPlaneDistance), twoS);
    let containingRadius = zeroS;
    for (const c of corners) {
      containingRadius = S.max(containingRadius, V.distance(c, position));
    }

    return {
      shapeType: ShapeType.Frustum,
      aspectRatio,
      axis,
      fieldOfViewAngle,
      nearPlaneDistance,
      farPlaneDistance: far,
      position,
      rotation,
      corners,
      planes,
      containingRadius,
      ...byHeight(corners),
      smallestDimension: S.min(S.mul(aspectRatio, nearHeight), nearHeight),
      volume: S.div(
        S.mul(
          S.mul(S.mul(S.fromNumber(4), aspectRatio), square(S, tanHalf)),
          S.sub(cube(far), cube(nearPlaneDistance))
        ),
        S.fromNumber(3)
      ),
    };
  };

  const torus = (
    majorRadius: A = zeroS,
    minorRadius: A = zeroS,
    position: Vector3<A> = V.zero,
    rotation: Quaternion<A> = Q.identity
  ): Torus<A> => {
    if (S.lessThan(majorRadius, minorRadius)) {
      throw new InvalidArgumentError("majorRadius", "cannot be smaller than minorRadius");
    }
    const normal = V.transform(V.unitY, rotation);
    const reach = V.add(
      V.scale(prims.perpendicularUp(normal), majorRadius),
      V.scale(V.unitY, minorRadius)
    );
    return {
      shapeType: ShapeType.Torus,
      majorRadius,
      minorRadius,
      position,
      rotation,
      containingRadius: S.add(majorRadius, minorRadius),
      highestPoint: V.add(position, reach),
      lowestPoint: V.sub(position, reach),
      smallestDimension: S.mul(minorRadius, twoS),
      volume: S.mul(
        S.mul(S.mul(twoS, square(S, S.pi())), majorRadius),
        square(S, minorRadius)
      ),
    };
  };

  return {
    singlePoint,
    line,
    lineFromPoints: (start, end) =>
      line(V.sub(end, start), V.scale(V.add(start, end), halfS)),
    sphere,
    hollowSphere,
    capsule,
    cuboid,
    cylinder,
    cone,
    coneFromAngle,
    ellipsoid,
    frustum,
    torus,
  };
}
