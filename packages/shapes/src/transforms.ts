/**
 * Scaling, repositioning and reorienting shapes. Every operation rebuilds
 * through a constructor, so derived fields always match the parameters.
 */

import { InvalidArgumentError } from "@orbis/core";
import { isNegative, type Scalar } from "@orbis/numeric";
import type { Quaternion, SpatialAlgebra, Vector3 } from "@orbis/spatial";
import type { ShapeConstructors } from "./constructors.js";
import { ShapeType, type Shape } from "./types.js";

export interface ShapeTransforms<A> {
  /** Multiply every linear dimension by `factor` (≥ 0). */
  scaleByDimension<T extends Shape<A>>(shape: T, factor: A): T;
  /** Multiply the volume by `factor` (≥ 0). Lines and points are returned unchanged. */
  scaleVolume<T extends Shape<A>>(shape: T, factor: A): T;
  getCopyAtPosition<T extends Shape<A>>(shape: T, position: Vector3<A>): T;
  /**
   * Kinds with a stored rotation take `rotation` as their new orientation
   * and keep their other parameters. Lines, capsules, cylinders and cones
   * rotate their axis instead; points and spheres come back unchanged.
   */
  getCloneWithRotation<T extends Shape<A>>(shape: T, rotation: Quaternion<A>): T;
  equals(a: Shape<A>, b: Shape<A>): boolean;
}

export function shapeTransforms<A>(
  algebra: SpatialAlgebra<A>,
  make: ShapeConstructors<A>
): ShapeTransforms<A> {
  const S: Scalar<A> = algebra.scalar;
  const { vector3: V, quaternion: Q } = algebra;

  const checkFactor = (factor: A): void => {
    if (S.isNaN(factor) || isNegative(S, factor)) {
      throw new InvalidArgumentError("factor", `must be >= 0, got ${S.format(factor)}`);
    }
  };

  // Rebuild a shape of the same kind; `T` is preserved because each case
  // constructs the kind it matched.
  function rebuild<T extends Shape<A>>(
    shape: T,
    f: {
      scalar: (a: A) => A;
      axis: (v: Vector3<A>) => Vector3<A>;
      position: Vector3<A>;
      rotation: (q: Quaternion<A>) => Quaternion<A>;
    }
  ): T;
  function rebuild(
    shape: Shape<A>,
    f: {
      scalar: (a: A) => A;
      axis: (v: Vector3<A>) => Vector3<A>;
      position: Vector3<A>;
      rotation: (q: Quaternion<A>) => Quaternion<A>;
    }
  ): Shape<A> {
    const { scalar: k, axis, position, rotation } = f;
    switch (shape.shapeType) {
      case ShapeType.SinglePoint:
        return make.singlePoint(position);
      case ShapeType.Line:
        return make.line(axis(shape.path), position);
      case ShapeType.Sphere:
        return make.sphere(k(shape.radius), position);
      case ShapeType.HollowSphere:
        return make.hollowSphere(k(shape.innerRadius), k(shape.outerRadius), position);
      case ShapeType.Capsule:
        return make.capsule(axis(shape.axis), k(shape.radius), position);
      case ShapeType.Cylinder:
        return make.cylinder(axis(shape.axis), k(shape.radius), position);
      case ShapeType.Cone:
        return make.cone(axis(shape.axis), k(shape.radius), position);
      case ShapeType.Cuboid:
        return make.cuboid(
          k(shape.axisX),
          k(shape.axisY),
          k(shape.axisZ),
          position,
          rotation(shape.rotation)
        );
      case ShapeType.Ellipsoid:
        return make.ellipsoid(
          k(shape.axisX),
          k(shape.axisY),
          k(shape.axisZ),
          position,
          rotation(shape.rotation)
        );
      case ShapeType.Frustum:
        return make.frustum(
          shape.aspectRatio,
          axis(shape.axis),
          shape.fieldOfViewAngle,
          k(shape.nearPlaneDistance),
          position,
          rotation(shape.rotation)
        );
      case ShapeType.Torus:
        return make.torus(
          k(shape.majorRadius),
          k(shape.minorRadius),
          position,
          rotation(shape.rotation)
        );
    }
  }

  const keepRotation = (q: Quaternion<A>) => q;

  function scaleByDimension<T extends Shape<A>>(shape: T, factor: A): T {
    checkFactor(factor);
    return rebuild(shape, {
      scalar: (a) => S.mul(a, factor),
      axis: (v) => V.scale(v, factor),
      position: shape.position,
      rotation: keepRotation,
    });
  }

  function scaleVolume<T extends Shape<A>>(shape: T, factor: A): T {
    checkFactor(factor);
    if (shape.shapeType === ShapeType.SinglePoint || shape.shapeType === ShapeType.Line) {
      return shape;
    }
    if (shape.shapeType === ShapeType.Capsule) {
      // Split between the cylindrical body and the caps.
      const fourthRoot = S.sqrt(S.sqrt(factor));
      return rebuild(shape, {
        scalar: (a) => S.mul(a, fourthRoot),
        axis: (v) => V.scale(v, S.sqrt(factor)),
        position: shape.position,
        rotation: keepRotation,
      });
    }
    return scaleByDimension(shape, S.cbrt(factor));
  }

  function getCopyAtPosition<T extends Shape<A>>(shape: T, position: Vector3<A>): T {
    return rebuild(shape, {
      scalar: (a) => a,
      axis: (v) => v,
      position,
      rotation: keepRotation,
    });
  }

  function getCloneWithRotation<T extends Shape<A>>(shape: T, rotation: Quaternion<A>): T {
    switch (shape.shapeType) {
      case ShapeType.SinglePoint:
      case ShapeType.Sphere:
      case ShapeType.HollowSphere:
        return shape;
      default:
        return rebuild(shape, {
          scalar: (a) => a,
          // A frustum's axis is in its local frame, which `rotation` already turns.
          axis:
            shape.shapeType === ShapeType.Frustum ? (v) => v : (v) => V.transform(v, rotation),
          position: shape.position,
          rotation: () => rotation,
        });
    }
  }

  type Axial = { readonly axis: Vector3<A>; readonly radius: A };
  type Boxed = {
    readonly axisX: A;
    readonly axisY: A;
    readonly axisZ: A;
    readonly rotation: Quaternion<A>;
  };

  const sameAxial = (a: Axial, b: Axial) => V.equals(a.axis, b.axis) && S.equals(a.radius, b.radius);
  const sameBox = (a: Boxed, b: Boxed) =>
    S.equals(a.axisX, b.axisX) &&
    S.equals(a.axisY, b.axisY) &&
    S.equals(a.axisZ, b.axisZ) &&
    Q.equals(a.rotation, b.rotation);

  const equals = (a: Shape<A>, b: Shape<A>): boolean => {
    if (!V.equals(a.position, b.position)) return false;
    switch (a.shapeType) {
      case ShapeType.SinglePoint:
        return b.shapeType === ShapeType.SinglePoint;
      case ShapeType.Line:
        return b.shapeType === ShapeType.Line && V.equals(a.path, b.path);
      case ShapeType.Sphere:
        return b.shapeType === ShapeType.Sphere && S.equals(a.radius, b.radius);
      case ShapeType.HollowSphere:
        return (
          b.shapeType === ShapeType.HollowSphere &&
          S.equals(a.innerRadius, b.innerRadius) &&
          S.equals(a.outerRadius, b.outerRadius)
        );
      case ShapeType.Capsule:
        return b.shapeType === ShapeType.Capsule && sameAxial(a, b);
      case ShapeType.Cylinder:
        return b.shapeType === ShapeType.Cylinder && sameAxial(a, b);
      case ShapeType.Cone:
        return b.shapeType === ShapeType.Cone && sameAxial(a, b);
      case ShapeType.Cuboid:
        return b.shapeType === ShapeType.Cuboid && sameBox(a, b);
      case ShapeType.Ellipsoid:
        return b.shapeType === ShapeType.Ellipsoid && sameBox(a, b);
      case ShapeType.Frustum:
        return (
          b.shapeType === ShapeType.Frustum &&
          S.equals(a.aspectRatio, b.aspectRatio) &&
          V.equals(a.axis, b.axis) &&
          S.equals(a.fieldOfViewAngle, b.fieldOfViewAngle) &&
          S.equals(a.nearPlaneDistance, b.nearPlaneDistance) &&
          Q.equals(a.rotation, b.rotation)
        );
      case ShapeType.Torus:
        return (
          b.shapeType === ShapeType.Torus &&
          S.equals(a.majorRadius, b.majorRadius) &&
          S.equals(a.minorRadius, b.minorRadius) &&
          Q.equals(a.rotation, b.rotation)
        );
    }
  };

  return { scaleByDimension, scaleVolume, getCopyAtPosition, getCloneWithRotation, equals };
}
