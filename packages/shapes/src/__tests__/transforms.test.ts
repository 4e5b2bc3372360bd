import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "@orbis/core";
import { scalarDouble } from "@orbis/numeric";
import { shapeOps } from "../index.js";

const shapes = shapeOps(scalarDouble);
const { vector3: V, quaternion: Q } = shapes.algebra;

describe("scaling", () => {
  it("scales every linear dimension", () => {
    const box = shapes.scaleByDimension(shapes.cuboid(1, 2, 3, V.of(4, 5, 6)), 2);
    expect([box.axisX, box.axisY, box.axisZ]).toEqual([2, 4, 6]);
    expect(box.volume).toBe(48);
    expect(V.equals(box.position, V.of(4, 5, 6))).toBe(true);
  });

  it("scales a sphere's volume through its radius", () => {
    expect(shapes.scaleVolume(shapes.sphere(2), 8).radius).toBe(4);
  });

  it("splits a capsule's volume factor between axis and radius", () => {
    const capsule = shapes.scaleVolume(shapes.capsule(V.of(0, 4, 0), 1), 16);
    expect(V.equals(capsule.axis, V.of(0, 16, 0))).toBe(true);
    expect(capsule.radius).toBe(2);
  });

  it("returns points and lines unchanged when scaling volume", () => {
    const line = shapes.line(V.of(1, 0, 0));
    expect(shapes.scaleVolume(line, 5)).toBe(line);
  });

  it("collapses to a degenerate shape at the same position for a zero factor", () => {
    const sphere = shapes.scaleByDimension(shapes.sphere(2, V.of(1, 1, 1)), 0);
    expect(sphere.radius).toBe(0);
    expect(V.equals(sphere.position, V.of(1, 1, 1))).toBe(true);
  });

  it("rejects negative and NaN factors", () => {
    expect(() => shapes.scaleByDimension(shapes.sphere(1), -1)).toThrow(InvalidArgumentError);
    expect(() => shapes.scaleVolume(shapes.sphere(1), Number.NaN)).toThrow(InvalidArgumentError);
  });
});

describe("repositioning", () => {
  it("moves a copy without touching its dimensions", () => {
    const cylinder = shapes.cylinder(V.of(0, 2, 0), 1);
    const moved = shapes.getCopyAtPosition(cylinder, V.of(3, 0, 0));
    expect(V.equals(moved.position, V.of(3, 0, 0))).toBe(true);
    expect(V.equals(moved.axis, cylinder.axis)).toBe(true);
    expect(V.equals(moved.end, V.of(3, 1, 0))).toBe(true);
  });

  it("keeps rotation-invariant kinds as they are", () => {
    const sphere = shapes.sphere(1);
    expect(shapes.getCloneWithRotation(sphere, Q.createFromAxisAngle(V.unitX, 1))).toBe(sphere);
  });

  it("rotates axis-defined kinds and replaces stored rotations", () => {
    const quarter = Q.createFromAxisAngle(V.unitZ, Math.PI / 2);
    const line = shapes.getCloneWithRotation(shapes.line(V.of(2, 0, 0)), quarter);
    expect(line.path.x).toBeCloseTo(0, 12);
    expect(line.path.y).toBeCloseTo(2, 12);

    const box = shapes.getCloneWithRotation(shapes.cuboid(1, 1, 1), quarter);
    expect(Q.equals(box.rotation, quarter)).toBe(true);
  });

  it("orients a frustum once, by its new rotation only", () => {
    const aboutY = Q.createFromAxisAngle(V.unitY, Math.PI / 2);
    const axis = V.of(0, 0, 10);
    const clone = shapes.getCloneWithRotation(shapes.frustum(1, axis, 1, 1), aboutY);
    const direct = shapes.frustum(1, axis, 1, 1, V.zero, aboutY);
    expect(V.equals(clone.axis, axis)).toBe(true);
    expect(shapes.equals(clone, direct)).toBe(true);
    expect(clone.corners).toEqual(direct.corners);
  });
});

describe("equals", () => {
  it("compares kind, position and stored parameters", () => {
    expect(shapes.equals(shapes.sphere(1), shapes.sphere(1))).toBe(true);
    expect(shapes.equals(shapes.sphere(1), shapes.sphere(2))).toBe(false);
    expect(shapes.equals(shapes.sphere(0), shapes.singlePoint())).toBe(false);
    expect(shapes.equals(shapes.cuboid(1, 2, 3), shapes.ellipsoid(1, 2, 3))).toBe(false);
    expect(shapes.equals(shapes.torus(2, 1), shapes.torus(2, 1, V.of(0, 1, 0)))).toBe(false);
  });
});
