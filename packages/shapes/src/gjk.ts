/**
 * Boolean GJK overlap test over two support mappings.
 *
 * The simplex is kept newest-first and evolves through the line, triangle
 * and tetrahedron cases until it either encloses the origin of the
 * Minkowski difference or a support point fails to pass it. Touching
 * shapes count as overlapping.
 */

import { config, createLogger } from "@orbis/core";
import type { Scalar } from "@orbis/numeric";
import type { SpatialAlgebra, Vector3 } from "@orbis/spatial";
import type { SupportFunction } from "./support.js";

const log = createLogger("shapes");

type Simplex<A> = readonly Vector3<A>[];

type Step<A> =
  | { readonly contains: true }
  | { readonly contains: false; readonly simplex: Simplex<A>; readonly direction: Vector3<A> };

export type OverlapTest<A> = (
  a: SupportFunction<A>,
  b: SupportFunction<A>,
  initialDirection: Vector3<A>
) => boolean;

export function gjkFor<A>(algebra: SpatialAlgebra<A>): OverlapTest<A> {
  const S: Scalar<A> = algebra.scalar;
  const V = algebra.vector3;
  const zeroS = S.zero();

  const sameDirection = (a: Vector3<A>, b: Vector3<A>) => S.greaterThan(V.dot(a, b), zeroS);
  const tripleCross = (a: Vector3<A>, b: Vector3<A>) => V.cross(V.cross(a, b), a);

  const line = ([a, b]: Simplex<A>): Step<A> => {
    const ab = V.sub(b, a);
    const ao = V.negate(a);
    if (sameDirection(ab, ao)) {
      return { contains: false, simplex: [a, b], direction: tripleCross(ab, ao) };
    }
    return { contains: false, simplex: [a], direction: ao };
  };

  const triangle = ([a, b, c]: Simplex<A>): Step<A> => {
    const ab = V.sub(b, a);
    const ac = V.sub(c, a);
    const ao = V.negate(a);
    const abc = V.cross(ab, ac);

    if (V.isZero(abc)) return line([a, b]);

    if (sameDirection(V.cross(abc, ac), ao)) {
      if (sameDirection(ac, ao)) {
        return { contains: false, simplex: [a, c], direction: tripleCross(ac, ao) };
      }
      return line([a, b]);
    }
    if (sameDirection(V.cross(ab, abc), ao)) return line([a, b]);

    const side = V.dot(abc, ao);
    if (S.greaterThan(side, zeroS)) {
      return { contains: false, simplex: [a, b, c], direction: abc };
    }
    if (S.lessThan(side, zeroS)) {
      return { contains: false, simplex: [a, c, b], direction: V.negate(abc) };
    }
    return { contains: true };
  };

  const tetrahedron = ([a, b, c, d]: Simplex<A>): Step<A> => {
    const ab = V.sub(b, a);
    const ac = V.sub(c, a);
    const ad = V.sub(d, a);
    const ao = V.negate(a);
    const abc = V.cross(ab, ac);

    if (S.equals(V.dot(ad, abc), zeroS)) return triangle([a, b, c]);

    if (sameDirection(abc, ao)) return triangle([a, b, c]);
    if (sameDirection(V.cross(ac, ad), ao)) return triangle([a, c, d]);
    if (sameDirection(V.cross(ad, ab), ao)) return triangle([a, d, b]);
    return { contains: true };
  };

  const next = (simplex: Simplex<A>): Step<A> => {
    switch (simplex.length) {
      case 2:
        return line(simplex);
      case 3:
        return triangle(simplex);
      default:
        return tetrahedron(simplex);
    }
  };

  return (a, b, initialDirection) => {
    const support = (d: Vector3<A>) => V.sub(a(d), b(V.negate(d)));
    const maxIterations = config.getAll().collision.maxIterations;

    let point = support(V.isNearlyZero(initialDirection) ? V.unitX : initialDirection);
    if (V.isNearlyZero(point)) return true;

    let simplex: Simplex<A> = [point];
    let direction = V.negate(point);

    for (let i = 0; i < maxIterations; i++) {
      point = support(direction);
      if (S.lessThan(V.dot(point, direction), zeroS)) return false;

      const step = next([point, ...simplex]);
      if (step.contains) return true;
      simplex = step.simplex;
      direction = step.direction;
      // The origin lies on the current simplex feature.
      if (V.isNearlyZero(direction)) return true;
    }

    log.debug(`convex overlap search stopped after ${maxIterations} iterations; treating as touching`);
    return true;
  };
}
