import type { Plane, Quaternion, Vector3 } from "@orbis/spatial";

/**
 * Integer tags naming each shape kind. The values are part of the
 * serialized form and never change.
 */
export const ShapeType = {
  None: 0,
  Capsule: 1,
  Cone: 2,
  Cuboid: 3,
  Cylinder: 4,
  Ellipsoid: 5,
  Frustum: 6,
  HollowSphere: 7,
  Line: 8,
  SinglePoint: 9,
  Sphere: 10,
  Torus: 11,
} as const;

export type ShapeType = (typeof ShapeType)[keyof typeof ShapeType];

/** Every tag that names a constructible shape. */
export type ShapeKind = Exclude<ShapeType, typeof ShapeType.None>;

/**
 * Fields every shape carries. All but `position` (and `rotation` where a
 * kind stores one) are derived once at construction.
 */
export interface ShapeBase<A> {
  readonly position: Vector3<A>;
  /** Identity for kinds that store no orientation. */
  readonly rotation: Quaternion<A>;
  /** Radius of a sphere about `position` enclosing the whole shape. */
  readonly containingRadius: A;
  readonly highestPoint: Vector3<A>;
  readonly lowestPoint: Vector3<A>;
  readonly smallestDimension: A;
  readonly volume: A;
}

/** Kinds defined by a segment through their center. */
export interface Segmented<A> {
  readonly start: Vector3<A>;
  readonly end: Vector3<A>;
  readonly length: A;
}

export interface SinglePoint<A> extends ShapeBase<A> {
  readonly shapeType: typeof ShapeType.SinglePoint;
}

export interface Line<A> extends ShapeBase<A>, Segmented<A> {
  readonly shapeType: typeof ShapeType.Line;
  readonly path: Vector3<A>;
}

export interface Sphere<A> extends ShapeBase<A> {
  readonly shapeType: typeof ShapeType.Sphere;
  readonly radius: A;
}

export interface HollowSphere<A> extends ShapeBase<A> {
  readonly shapeType: typeof ShapeType.HollowSphere;
  readonly innerRadius: A;
  readonly outerRadius: A;
}

/** `length` includes both hemispherical caps. */
export interface Capsule<A> extends ShapeBase<A>, Segmented<A> {
  readonly shapeType: typeof ShapeType.Capsule;
  readonly axis: Vector3<A>;
  readonly radius: A;
}

export interface Cylinder<A> extends ShapeBase<A>, Segmented<A> {
  readonly shapeType: typeof ShapeType.Cylinder;
  readonly axis: Vector3<A>;
  readonly radius: A;
}

/** Apex at `start`, base of `radius` centered at `end`. */
export interface Cone<A> extends ShapeBase<A>, Segmented<A> {
  readonly shapeType: typeof ShapeType.Cone;
  readonly axis: Vector3<A>;
  readonly radius: A;
}

/** `axisX/Y/Z` are full edge lengths. */
export interface Cuboid<A> extends ShapeBase<A> {
  readonly shapeType: typeof ShapeType.Cuboid;
  readonly axisX: A;
  readonly axisY: A;
  readonly axisZ: A;
  readonly corners: readonly Vector3<A>[];
}

/** `axisX/Y/Z` are semi-axes. */
export interface Ellipsoid<A> extends ShapeBase<A> {
  readonly shapeType: typeof ShapeType.Ellipsoid;
  readonly axisX: A;
  readonly axisY: A;
  readonly axisZ: A;
}

/**
 * A camera view volume. `axis` points from the eye and its length is the
 * far plane distance; `position` is the midpoint between the near and far
 * planes.
 */
export interface Frustum<A> extends ShapeBase<A> {
  readonly shapeType: typeof ShapeType.Frustum;
  readonly aspectRatio: A;
  readonly axis: Vector3<A>;
  readonly fieldOfViewAngle: A;
  readonly nearPlaneDistance: A;
  readonly farPlaneDistance: A;
  /** Far corners first, then near corners. */
  readonly corners: readonly Vector3<A>[];
  /** Normals face inward. */
  readonly planes: readonly Plane<A>[];
}

/** A ring in the local XZ plane. */
export interface Torus<A> extends ShapeBase<A> {
  readonly shapeType: typeof ShapeType.Torus;
  readonly majorRadius: A;
  readonly minorRadius: A;
}

export type Shape<A> =
  | SinglePoint<A>
  | Line<A>
  | Sphere<A>
  | HollowSphere<A>
  | Capsule<A>
  | Cylinder<A>
  | Cone<A>
  | Cuboid<A>
  | Ellipsoid<A>
  | Frustum<A>
  | Torus<A>;

/** Select the record type for a tag. */
export type ShapeOf<A, K extends ShapeKind> = Extract<Shape<A>, { readonly shapeType: K }>;

/** Result of projecting a point onto a line segment. */
export interface ClosestPoint<A> {
  readonly distance: A;
  readonly closestPoint: Vector3<A>;
}
