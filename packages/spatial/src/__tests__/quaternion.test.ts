import { describe, expect, it } from "vitest";
import { scalarDecimal, scalarDouble } from "@orbis/numeric";
import { createAlgebra, type Quaternion, type Vector3 } from "../index.js";

const { quaternion: Q, vector3: V, matrix4x4: M } = createAlgebra(scalarDouble);

function expectQuaternionClose(actual: Quaternion<number>, expected: Quaternion<number>) {
  expect(actual.x).toBeCloseTo(expected.x, 12);
  expect(actual.y).toBeCloseTo(expected.y, 12);
  expect(actual.z).toBeCloseTo(expected.z, 12);
  expect(actual.w).toBeCloseTo(expected.w, 12);
}

function expectVectorClose(actual: Vector3<number>, expected: Vector3<number>) {
  expect(actual.x).toBeCloseTo(expected.x, 12);
  expect(actual.y).toBeCloseTo(expected.y, 12);
  expect(actual.z).toBeCloseTo(expected.z, 12);
}

describe("quaternion algebra", () => {
  const quarterZ = Q.createFromAxisAngle(V.unitZ, Math.PI / 2);
  const quarterX = Q.createFromAxisAngle(V.unitX, Math.PI / 2);

  it("slerps between identities to the identity", () => {
    expect(Q.isNearlyEqual(Q.slerp(Q.identity, Q.identity, 0.3), Q.identity)).toBe(true);
  });

  it("keeps slerp results on the unit sphere", () => {
    const a = Q.createFromAxisAngle(V.unitZ, 0.5);
    const b = Q.createFromAxisAngle(V.unitY, 1.2);
    for (const t of [0, 0.25, 0.37, 0.8, 1]) {
      expect(Q.length(Q.slerp(a, b, t))).toBeCloseTo(1, 12);
    }
  });

  it("takes the shorter arc when the endpoints have opposite signs", () => {
    const q = Q.createFromAxisAngle(V.unitY, 0.8);
    expectQuaternionClose(Q.slerp(q, Q.negate(q), 0.5), q);
    expectQuaternionClose(Q.lerp(q, Q.negate(q), 0.5), q);
  });

  it("takes the shorter arc for any pair of rotations", () => {
    const a = Q.createFromAxisAngle(V.unitZ, 0.5);
    const b = Q.createFromAxisAngle(V.unitY, 1.2);
    const v = V.of(1, 2, 3);
    for (const t of [0.2, 0.5, 0.9]) {
      const direct = Q.slerp(a, b, t);
      const negated = Q.slerp(a, Q.negate(b), t);
      expectQuaternionClose(negated, direct);
      expectVectorClose(V.transform(v, negated), V.transform(v, direct));
    }
  });

  it("normalizes lerp results even for non-unit inputs", () => {
    const a = Q.of(0, 0, 0, 2);
    const b = Q.of(0, 3, 0, 0);
    const mid = Q.lerp(a, b, 0.5);
    expect(Q.length(mid)).toBeCloseTo(1, 12);
    expectQuaternionClose(mid, Q.normalize(Q.of(0, 1.5, 0, 1)));
    expect(Q.length(Q.lerp(Q.scale(a, 7), b, 0.3))).toBeCloseTo(1, 12);
  });

  it("concatenates as apply-first-then-second", () => {
    const both = Q.concatenate(quarterZ, quarterX);
    const stepwise = V.transform(V.transform(V.unitX, quarterZ), quarterX);
    expectVectorClose(stepwise, V.of(0, 0, 1));
    expectVectorClose(V.transform(V.unitX, both), stepwise);
  });

  it("rotates by q·v·q⁻¹", () => {
    const q = Q.normalize(Q.of(0.1, 0.2, 0.3, 0.9));
    const v = V.of(1, -2, 0.5);
    const product = Q.multiply(Q.multiply(q, Q.fromVector(v, 0)), Q.inverse(q));
    expectVectorClose(V.transform(v, q), V.create(product.x, product.y, product.z));
  });

  it("inverts to the identity", () => {
    const q = Q.createFromAxisAngle(V.normalize(V.of(1, 1, 0)), 0.7);
    expectQuaternionClose(Q.concatenate(q, Q.inverse(q)), Q.identity);
  });

  it("builds yaw as a turn about Y", () => {
    const s = Math.sin(Math.PI / 4);
    expectQuaternionClose(Q.createFromYawPitchRoll(Math.PI / 2, 0, 0), Q.of(0, s, 0, s));
  });

  it("round-trips through a rotation matrix", () => {
    const q = Q.normalize(Q.of(0.1, 0.2, 0.3, 0.9));
    expectQuaternionClose(Q.createFromRotationMatrix(M.createFromQuaternion(q)), q);

    const flipped = Q.normalize(Q.of(0.9, 0.3, 0.2, 0.1));
    expectQuaternionClose(Q.createFromRotationMatrix(M.createFromQuaternion(flipped)), flipped);
  });

  it("recovers half turns whose largest diagonal entry is M22 or M33", () => {
    const aboutY = Q.createFromAxisAngle(V.unitY, Math.PI);
    const fromY = Q.createFromRotationMatrix(M.createFromQuaternion(aboutY));
    expectQuaternionClose(fromY, aboutY);
    expectVectorClose(V.transform(V.unitX, fromY), V.of(-1, 0, 0));

    const aboutZ = Q.createFromAxisAngle(V.unitZ, Math.PI);
    const fromZ = Q.createFromRotationMatrix(M.createFromQuaternion(aboutZ));
    expectQuaternionClose(fromZ, aboutZ);
    expectVectorClose(V.transform(V.unitY, fromZ), V.of(0, -1, 0));
  });

  it("recovers axis and angle", () => {
    const { axis, angle } = Q.toAxisAngle(Q.createFromAxisAngle(V.unitY, 1));
    expectVectorClose(axis, V.unitY);
    expect(angle).toBeCloseTo(1, 12);

    const none = Q.toAxisAngle(Q.identity);
    expect(none.angle).toBe(0);
    expect(V.equals(none.axis, V.unitX)).toBe(true);
  });
});

describe("rotationTo", () => {
  it("returns the identity for parallel directions", () => {
    expect(Q.isIdentity(V.rotationTo(V.of(1, 2, 3), V.of(2, 4, 6)))).toBe(true);
  });

  it("turns one direction onto another", () => {
    const q = V.rotationTo(V.unitX, V.unitY);
    expectVectorClose(V.transform(V.unitX, q), V.unitY);
  });

  it("turns half way round for opposite directions", () => {
    const q = V.rotationTo(V.of(1, 0, 0), V.of(-1, 0, 0));
    expectQuaternionClose(q, Q.of(0, 0, 1, 0));
    expectVectorClose(V.transform(V.unitX, q), V.of(-1, 0, 0));
  });

  it("behaves the same over decimals", () => {
    const D = createAlgebra(scalarDecimal);
    const q = D.vector3.rotationTo(D.vector3.of(1, 0, 0), D.vector3.of(-1, 0, 0));
    expect(D.quaternion.isNearlyEqual(q, D.quaternion.of(0, 0, 1, 0))).toBe(true);
  });
});
