/**
 * Planes in Hessian form, `normal · p + d = 0`.
 */

import type { Scalar } from "@orbis/numeric";
import type { Matrix4x4Ops } from "./matrix4x4.js";
import type { Matrix4x4, Plane, Quaternion, Vector3, Vector4 } from "./types.js";
import type { Vector3Ops } from "./vector3.js";

export interface PlaneOps<A> {
  create(normal: Vector3<A>, d: A): Plane<A>;
  of(x: number, y: number, z: number, d: number): Plane<A>;
  fromVector4(v: Vector4<A>): Plane<A>;
  /** Plane through three points, normal following the right-hand rule a→b→c. */
  createFromVertices(a: Vector3<A>, b: Vector3<A>, c: Vector3<A>): Plane<A>;

  /** `n · v.xyz + d · v.w` */
  dot(plane: Plane<A>, v: Vector4<A>): A;
  /** Signed distance-like value `n · v + d`. */
  dotCoordinate(plane: Plane<A>, v: Vector3<A>): A;
  dotNormal(plane: Plane<A>, v: Vector3<A>): A;

  /** Rescale so the normal has unit length. */
  normalize(plane: Plane<A>): Plane<A>;
  /** Transform by `m`, via the inverse transpose. */
  transform(plane: Plane<A>, m: Matrix4x4<A>): Plane<A>;
  transformQuaternion(plane: Plane<A>, q: Quaternion<A>): Plane<A>;
  equals(a: Plane<A>, b: Plane<A>): boolean;
}

export function planeOps<A>(
  S: Scalar<A>,
  V: Vector3Ops<A>,
  M: Matrix4x4Ops<A>
): PlaneOps<A> {
  const create = (normal: Vector3<A>, d: A): Plane<A> => ({ normal, d });

  return {
    create,
    of: (x, y, z, d) => create(V.of(x, y, z), S.fromNumber(d)),
    fromVector4: (v) => create(V.create(v.x, v.y, v.z), v.w),
    createFromVertices: (a, b, c) => {
      const normal = V.normalize(V.cross(V.sub(b, a), V.sub(c, a)));
      return create(normal, S.negate(V.dot(normal, a)));
    },

    dot: (plane, v) =>
      S.add(V.dot(plane.normal, V.create(v.x, v.y, v.z)), S.mul(plane.d, v.w)),
    dotCoordinate: (plane, v) => S.add(V.dot(plane.normal, v), plane.d),
    dotNormal: (plane, v) => V.dot(plane.normal, v),

    normalize: (plane) => {
      const len = V.length(plane.normal);
      return create(V.divideScalar(plane.normal, len), S.div(plane.d, len));
    },
    transform: (plane, m) => {
      // A singular m leaves the plane untouched: invert falls back to identity.
      const t = M.invert(m).result;
      const { x, y, z } = plane.normal;
      const { d } = plane;
      const row = (c1: A, c2: A, c3: A, c4: A): A =>
        S.add(S.add(S.mul(x, c1), S.mul(y, c2)), S.add(S.mul(z, c3), S.mul(d, c4)));
      return create(
        V.create(row(t.m11, t.m12, t.m13, t.m14), row(t.m21, t.m22, t.m23, t.m24), row(t.m31, t.m32, t.m33, t.m34)),
        row(t.m41, t.m42, t.m43, t.m44)
      );
    },
    transformQuaternion: (plane, q) => create(V.transform(plane.normal, q), plane.d),
    equals: (a, b) => V.equals(a.normal, b.normal) && S.equals(a.d, b.d),
  };
}
