/**
 * @orbis/shapes
 *
 * Immutable shape records generic over the scalar representation, with
 * containment, scaling, pairwise intersection, swept collision and a
 * versioned JSON codec.
 *
 * @packageDocumentation
 */

export { ShapeType } from "./types.js";
export type {
  ShapeKind,
  ShapeBase,
  Segmented,
  SinglePoint,
  Line,
  Sphere,
  HollowSphere,
  Capsule,
  Cylinder,
  Cone,
  Cuboid,
  Ellipsoid,
  Frustum,
  Torus,
  Shape,
  ShapeOf,
  ClosestPoint,
} from "./types.js";

export { shapeOps, createShapeCodec } from "./shapes.js";
export type { ShapeOps } from "./shapes.js";

export { shapeConstructors } from "./constructors.js";
export type { ShapeConstructors } from "./constructors.js";
export { shapeQueries } from "./containment.js";
export type { ShapeQueries } from "./containment.js";
export { shapeTransforms } from "./transforms.js";
export type { ShapeTransforms } from "./transforms.js";
export { primitivesFor } from "./primitives.js";
export type { Primitives, SegmentPair } from "./primitives.js";
export { supportFor } from "./support.js";
export type { SupportFunction } from "./support.js";
export { gjkFor } from "./gjk.js";
export type { OverlapTest } from "./gjk.js";
export { intersectionFor, SHAPE_RANK } from "./intersection.js";
export type { IntersectionDeps } from "./intersection.js";
export { sweptCollision } from "./collision.js";
export type { SweptCollision } from "./collision.js";

export {
  shapeSchemas,
  createShapeCodecFor,
  isShapeKind,
  SHAPE_CODEC_VERSION,
} from "./codec.js";
export type {
  FieldType,
  FieldMeta,
  EncodedValue,
  EncodedShape,
  ShapeCodec,
} from "./codec.js";
