import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "@orbis/core";
import { scalarDouble } from "@orbis/numeric";
import { createAlgebra, type Vector3 } from "../index.js";

const {
  matrix3x2: M2,
  matrix4x4: M,
  quaternion: Q,
  vector2: V2,
  vector3: V,
  vector4: V4,
} = createAlgebra(scalarDouble);

function expectVectorClose(actual: Vector3<number>, expected: Vector3<number>) {
  expect(actual.x).toBeCloseTo(expected.x, 12);
  expect(actual.y).toBeCloseTo(expected.y, 12);
  expect(actual.z).toBeCloseTo(expected.z, 12);
}

describe("matrix3x2Ops", () => {
  it("reports a singular matrix and returns the identity", () => {
    const { success, result } = M2.invert(M2.of(1, 2, 2, 4, 0, 0));
    expect(success).toBe(false);
    expect(M2.isIdentity(result)).toBe(true);
  });

  it("inverts an affine transform", () => {
    const m = M2.multiply(M2.createScale(2, 4), M2.createTranslation(1, 1));
    const { success, result } = M2.invert(m);
    expect(success).toBe(true);
    expect(M2.isIdentity(M2.multiply(m, result))).toBe(true);
    expect(M2.getDeterminant(m)).toBe(8);
  });

  it("applies the left operand first", () => {
    const scaleThenMove = M2.multiply(M2.createScaleUniform(2), M2.createTranslation(1, 0));
    const moveThenScale = M2.multiply(M2.createTranslation(1, 0), M2.createScaleUniform(2));
    expect(V2.transform(V2.unitX, scaleThenMove)).toEqual({ x: 3, y: 0 });
    expect(V2.transform(V2.unitX, moveThenScale)).toEqual({ x: 4, y: 0 });
  });

  it("rotates about a center point", () => {
    const r = V2.transform(V2.of(2, 1), M2.createRotation(Math.PI / 2, V2.of(1, 1)));
    expect(r.x).toBeCloseTo(1, 12);
    expect(r.y).toBeCloseTo(2, 12);
  });

  it("skews along x by the tangent of the angle", () => {
    const r = V2.transform(V2.of(0, 1), M2.createSkew(Math.PI / 4, 0));
    expect(r.x).toBeCloseTo(1, 12);
    expect(r.y).toBe(1);
  });
});

describe("matrix4x4Ops", () => {
  const q = Q.normalize(Q.of(0.1, 0.2, 0.3, 0.9));

  it("computes determinants", () => {
    expect(M.getDeterminant(M.createScale(2, 3, 4))).toBe(24);
    expect(M.getDeterminant(M.identity)).toBe(1);
  });

  it("inverts translations and rotations", () => {
    const m = M.multiply(M.createFromQuaternion(q), M.createTranslation(V.of(1, 2, 3)));
    const { success, result } = M.invert(m);
    expect(success).toBe(true);

    const p = V.of(-4, 5, 0.5);
    expectVectorClose(V.transformMatrix(V.transformMatrix(p, m), result), p);
  });

  it("falls back to the identity for a singular matrix", () => {
    const { success, result } = M.invert(M.createScale(1, 1, 0));
    expect(success).toBe(false);
    expect(M.isIdentity(result)).toBe(true);
  });

  it("agrees with quaternion rotation", () => {
    const v = V.of(1, -2, 0.5);
    expectVectorClose(V.transformMatrix(v, M.createFromQuaternion(q)), V.transform(v, q));
    expectVectorClose(
      V.transformMatrix(v, M.createFromAxisAngle(V.unitY, 0.6)),
      V.transform(v, Q.createFromAxisAngle(V.unitY, 0.6))
    );
    expect(M.equals(M.transform(M.identity, q), M.createFromQuaternion(q))).toBe(true);
  });

  it("rotates about the coordinate axes", () => {
    expectVectorClose(V.transformMatrix(V.unitX, M.createRotationZ(Math.PI / 2)), V.unitY);
    expectVectorClose(V.transformMatrix(V.unitY, M.createRotationX(Math.PI / 2)), V.unitZ);
    expectVectorClose(V.transformMatrix(V.unitZ, M.createRotationY(Math.PI / 2)), V.unitX);
    expectVectorClose(
      V.transformMatrix(V.of(2, 1, 0), M.createRotationZ(Math.PI / 2, V.of(1, 1, 0))),
      V.of(1, 2, 0)
    );
  });

  it("builds a view matrix", () => {
    const view = M.createLookAt(V.of(0, 0, 5), V.zero, V.unitY);
    expectVectorClose(V.transformMatrix(V.zero, view), V.of(0, 0, -5));
  });

  it("validates projection arguments", () => {
    expect(() => M.createPerspectiveFieldOfView(1, 1, 0, 10)).toThrow(InvalidArgumentError);
    expect(() => M.createPerspectiveFieldOfView(Math.PI, 1, 1, 10)).toThrow(InvalidArgumentError);
    expect(() => M.createPerspective(1, 1, 10, 1)).toThrow(InvalidArgumentError);

    const p = M.createPerspectiveFieldOfView(Math.PI / 2, 1, 1, 100);
    expect(p.m11).toBeCloseTo(1, 12);
    expect(p.m33).toBeCloseTo(-100 / 99, 12);
    expect(p.m34).toBe(-1);
    expect(p.m43).toBeCloseTo(-100 / 99, 12);
  });

  it("maps the orthographic box to clip space", () => {
    const o = M.createOrthographicOffCenter(0, 4, 0, 2, 1, 11);
    expect(V4.transform(V4.of(4, 2, -1, 1), o)).toEqual({ x: 1, y: 1, z: 0, w: 1 });
  });

  it("reflects through a plane", () => {
    const mirror = M.createReflection({ normal: V.unitY, d: 0 });
    expect(V.equals(V.transformMatrix(V.of(1, 2, 3), mirror), V.of(1, -2, 3))).toBe(true);
  });

  it("flattens points along a light direction", () => {
    const shadow = M.createShadow(V.of(0, -1, 0), { normal: V.unitY, d: 0 });
    expect(V4.equals(V4.transform(V4.of(2, 5, 3, 1), shadow), V4.of(-2, 0, -3, -1))).toBe(true);
  });

  it("decomposes scale, rotation and translation", () => {
    const m = M.multiply(
      M.multiply(M.createScale(2, 3, 4), M.createFromQuaternion(q)),
      M.createTranslation(V.of(7, 8, 9))
    );
    const parts = M.decompose(m);
    expect(parts.success).toBe(true);
    expectVectorClose(parts.scale, V.of(2, 3, 4));
    expectVectorClose(parts.translation, V.of(7, 8, 9));
    expect(Math.abs(Q.dot(parts.rotation, q))).toBeCloseTo(1, 12);
  });

  it("transposes as an involution", () => {
    const m = M.of([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16]);
    expect(M.transpose(m).m12).toBe(5);
    expect(M.equals(M.transpose(M.transpose(m)), m)).toBe(true);
    expect(() => M.of([1, 2, 3])).toThrow(InvalidArgumentError);
  });
});
