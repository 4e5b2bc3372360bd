/**
 * One-stop shape toolkit for a scalar representation.
 *
 * @example
 * ```typescript
 * import { scalarDouble } from "@orbis/numeric";
 * import { shapeOps } from "@orbis/shapes";
 *
 * const shapes = shapeOps(scalarDouble);
 * const a = shapes.sphere(5);
 * const b = shapes.sphere(3, shapes.algebra.vector3.create(7, 0, 0));
 * shapes.intersects(a, b); // true
 * ```
 */

import type { Scalar } from "@orbis/numeric";
import { createAlgebra, type SpatialAlgebra } from "@orbis/spatial";
import { createShapeCodecFor, type ShapeCodec } from "./codec.js";
import { sweptCollision, type SweptCollision } from "./collision.js";
import { shapeConstructors, type ShapeConstructors } from "./constructors.js";
import { shapeQueries, type ShapeQueries } from "./containment.js";
import { gjkFor } from "./gjk.js";
import { intersectionFor } from "./intersection.js";
import { primitivesFor } from "./primitives.js";
import { supportFor, type SupportFunction } from "./support.js";
import { shapeTransforms, type ShapeTransforms } from "./transforms.js";
import type { Shape } from "./types.js";

export interface ShapeOps<A>
  extends ShapeConstructors<A>,
    ShapeQueries<A>,
    ShapeTransforms<A>,
    SweptCollision<A> {
  readonly algebra: SpatialAlgebra<A>;
  readonly codec: ShapeCodec<A>;
  /** Overlap test, inclusive of touching. Symmetric in its arguments. */
  intersects(a: Shape<A>, b: Shape<A>): boolean;
  support(shape: Shape<A>): SupportFunction<A>;
}

export function shapeOps<A>(S: Scalar<A>): ShapeOps<A> {
  const algebra = createAlgebra(S);
  const prims = primitivesFor(algebra);
  const make = shapeConstructors(algebra, prims);
  const queries = shapeQueries(algebra, prims);
  const transforms = shapeTransforms(algebra, make);
  const support = supportFor(algebra, prims);
  const intersects = intersectionFor({
    algebra,
    prims,
    make,
    queries,
    support,
    overlap: gjkFor(algebra),
  });

  return {
    algebra,
    ...make,
    ...queries,
    ...transforms,
    ...sweptCollision(algebra, prims, make, intersects),
    codec: createShapeCodecFor(algebra, make),
    intersects,
    support,
  };
}

export function createShapeCodec<A>(S: Scalar<A>): ShapeCodec<A> {
  const algebra = createAlgebra(S);
  return createShapeCodecFor(algebra, shapeConstructors(algebra, primitivesFor(algebra)));
}
