import { describe, expect, it } from "vitest";
import { scalarDouble } from "@orbis/numeric";
import { createAlgebra } from "../index.js";

const { plane: P, vector3: V, vector4: V4, matrix4x4: M, quaternion: Q } = createAlgebra(scalarDouble);

describe("planeOps", () => {
  it("builds a plane through three points", () => {
    const p = P.createFromVertices(V.zero, V.unitX, V.unitY);
    expect(V.equals(p.normal, V.unitZ)).toBe(true);
    expect(P.dotCoordinate(p, V.of(5, 5, 3))).toBe(3);
  });

  it("normalizes the coefficients together", () => {
    const p = P.normalize(P.of(0, 2, 0, 4));
    expect(p.normal).toEqual({ x: 0, y: 1, z: 0 });
    expect(p.d).toBe(2);
  });

  it("takes dot products with points and directions", () => {
    const p = P.of(1, 2, 3, 4);
    expect(P.dot(p, V4.of(1, 1, 1, 2))).toBe(14);
    expect(P.dotCoordinate(p, V.of(1, 1, 1))).toBe(10);
    expect(P.dotNormal(p, V.of(1, 1, 1))).toBe(6);
  });

  it("moves with a transform", () => {
    const moved = P.transform(P.of(0, 1, 0, 0), M.createTranslation(V.of(0, 5, 0)));
    expect(moved.normal.y).toBeCloseTo(1, 12);
    expect(moved.d).toBeCloseTo(-5, 12);
    expect(P.dotCoordinate(moved, V.of(7, 5, 9))).toBeCloseTo(0, 12);
  });

  it("turns its normal with a rotation", () => {
    const turned = P.transformQuaternion(P.of(1, 0, 0, 2), Q.createFromAxisAngle(V.unitZ, Math.PI / 2));
    expect(turned.normal.y).toBeCloseTo(1, 12);
    expect(turned.d).toBe(2);
  });
});
