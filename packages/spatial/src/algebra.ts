/**
 * One-call wiring of every spatial ops record over a single scalar.
 *
 * @example
 * ```typescript
 * import { scalarDouble } from "@orbis/numeric";
 * import { createAlgebra } from "@orbis/spatial";
 *
 * const { vector3: V, quaternion: Q } = createAlgebra(scalarDouble);
 * const turn = V.rotationTo(V.unitX, V.unitY);
 * V.transform(V.unitX, turn); // ≈ (0, 1, 0)
 * ```
 */

import type { Scalar } from "@orbis/numeric";
import { matrix3x2Ops, type Matrix3x2Ops } from "./matrix3x2.js";
import { matrix4x4Ops, type Matrix4x4Ops } from "./matrix4x4.js";
import { planeOps, type PlaneOps } from "./plane.js";
import { quaternionOps, type QuaternionOps } from "./quaternion.js";
import { vector2Ops, type Vector2Ops } from "./vector2.js";
import { vector3Ops, type Vector3Ops } from "./vector3.js";
import { vector4Ops, type Vector4Ops } from "./vector4.js";

export interface SpatialAlgebra<A> {
  readonly scalar: Scalar<A>;
  readonly vector2: Vector2Ops<A>;
  readonly vector3: Vector3Ops<A>;
  readonly vector4: Vector4Ops<A>;
  readonly quaternion: QuaternionOps<A>;
  readonly matrix3x2: Matrix3x2Ops<A>;
  readonly matrix4x4: Matrix4x4Ops<A>;
  readonly plane: PlaneOps<A>;
}

export function createAlgebra<A>(scalar: Scalar<A>): SpatialAlgebra<A> {
  const quaternion = quaternionOps(scalar);
  const vector3 = vector3Ops(scalar, quaternion);
  const matrix4x4 = matrix4x4Ops(scalar, vector3, quaternion);
  return {
    scalar,
    vector2: vector2Ops(scalar),
    vector3,
    vector4: vector4Ops(scalar),
    quaternion,
    matrix3x2: matrix3x2Ops(scalar),
    matrix4x4,
    plane: planeOps(scalar, vector3, matrix4x4),
  };
}
