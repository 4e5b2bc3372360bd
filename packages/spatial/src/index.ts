/**
 * @orbis/spatial
 *
 * Vectors, quaternions, matrices and planes generic over the scalar
 * representation. Values are immutable records; operations live in ops
 * records built from a `Scalar<A>` dictionary.
 *
 * @packageDocumentation
 */

export type {
  Vector2,
  Vector3,
  Vector4,
  Quaternion,
  Matrix3x2,
  Matrix4x4,
  Plane,
  InversionResult,
} from "./types.js";

export { vector2Ops } from "./vector2.js";
export type { Vector2Ops } from "./vector2.js";
export { vector3Ops } from "./vector3.js";
export type { Vector3Ops } from "./vector3.js";
export { vector4Ops } from "./vector4.js";
export type { Vector4Ops } from "./vector4.js";
export { quaternionOps } from "./quaternion.js";
export type { QuaternionOps, AxisAngle } from "./quaternion.js";
export { matrix3x2Ops } from "./matrix3x2.js";
export type { Matrix3x2Ops } from "./matrix3x2.js";
export { matrix4x4Ops } from "./matrix4x4.js";
export type { Matrix4x4Ops, Decomposition } from "./matrix4x4.js";
export { planeOps } from "./plane.js";
export type { PlaneOps } from "./plane.js";
export { createAlgebra } from "./algebra.js";
export type { SpatialAlgebra } from "./algebra.js";

export {
  singleToDouble,
  doubleToDecimal,
  doubleToHuge,
  singleToDecimal,
  singleToHuge,
  decimalToHuge,
  tryDoubleToSingle,
  tryDecimalToDouble,
  tryHugeToDouble,
  tryHugeToDecimal,
  doubleToSingleOrThrow,
  decimalToDoubleOrThrow,
  hugeToDoubleOrThrow,
  hugeToDecimalOrThrow,
  unwrapConversion,
  mapVector2,
  mapVector3,
  mapVector4,
  mapQuaternion,
  mapMatrix3x2,
  mapMatrix4x4,
  tryMapVector2,
  tryMapVector3,
  tryMapVector4,
  tryMapQuaternion,
  tryMapMatrix3x2,
  tryMapMatrix4x4,
} from "./conversions.js";
export type { ConversionResult } from "./conversions.js";
