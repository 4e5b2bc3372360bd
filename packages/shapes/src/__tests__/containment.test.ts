import { describe, expect, it } from "vitest";
import { scalarDouble } from "@orbis/numeric";
import { shapeOps } from "../index.js";

const shapes = shapeOps(scalarDouble);
const { vector3: V } = shapes.algebra;

describe("isPointWithin", () => {
  it("includes the boundary of spheres and boxes", () => {
    expect(shapes.isPointWithin(shapes.sphere(1), V.of(1, 0, 0))).toBe(true);
    expect(shapes.isPointWithin(shapes.sphere(1), V.of(1.01, 0, 0))).toBe(false);
    expect(shapes.isPointWithin(shapes.cuboid(2, 2, 2), V.of(1, 0, 0))).toBe(true);
    expect(shapes.isPointWithin(shapes.cuboid(2, 2, 2), V.of(1, 1.5, 0))).toBe(false);
  });

  it("matches only the exact position of a point", () => {
    const point = shapes.singlePoint(V.of(1, 2, 3));
    expect(shapes.isPointWithin(point, V.of(1, 2, 3))).toBe(true);
    expect(shapes.isPointWithin(point, V.of(1, 2, 3.5))).toBe(false);
  });

  it("tests lines by distance to the segment", () => {
    const line = shapes.line(V.of(2, 0, 0));
    expect(shapes.isPointWithin(line, V.of(0.5, 0, 0))).toBe(true);
    expect(shapes.isPointWithin(line, V.of(0.5, 0.1, 0))).toBe(false);
    expect(shapes.isPointWithin(line, V.of(1.5, 0, 0))).toBe(false);
  });

  it("excludes the cavity of a hollow sphere", () => {
    const shell = shapes.hollowSphere(1, 2);
    expect(shapes.isPointWithin(shell, V.of(1.5, 0, 0))).toBe(true);
    expect(shapes.isPointWithin(shell, V.zero)).toBe(false);
  });

  it("bounds cylinders along and across the axis", () => {
    const cylinder = shapes.cylinder(V.of(0, 4, 0), 1);
    expect(shapes.isPointWithin(cylinder, V.of(0, 2, 0))).toBe(true);
    expect(shapes.isPointWithin(cylinder, V.of(0, 2.5, 0))).toBe(false);
    expect(shapes.isPointWithin(cylinder, V.of(1.5, 0, 0))).toBe(false);
  });

  it("narrows cones toward the apex", () => {
    const cone = shapes.cone(V.of(0, 4, 0), 2);
    expect(shapes.coneRadiusAt(cone, V.zero)).toBe(1);
    expect(shapes.isPointWithin(cone, V.of(1, 0, 0))).toBe(true);
    expect(shapes.isPointWithin(cone, V.of(1.5, 0, 0))).toBe(false);
    expect(shapes.isPointWithin(cone, V.of(0, -2.5, 0))).toBe(false);
  });

  it("flattens ellipsoids with a zero semi-axis", () => {
    expect(shapes.isPointWithin(shapes.ellipsoid(2, 1, 1), V.of(2, 0, 0))).toBe(true);
    expect(shapes.isPointWithin(shapes.ellipsoid(2, 1, 1), V.of(2, 0.1, 0))).toBe(false);

    const disc = shapes.ellipsoid(2, 1, 0);
    expect(shapes.isPointWithin(disc, V.of(1, 0, 0))).toBe(true);
    expect(shapes.isPointWithin(disc, V.of(1, 0, 0.1))).toBe(false);
  });

  it("keeps the eye side of the near plane outside a frustum", () => {
    const frustum = shapes.frustum(1, V.of(0, 0, 10), Math.PI / 2, 1);
    expect(shapes.isPointWithin(frustum, V.zero)).toBe(true);
    expect(shapes.isPointWithin(frustum, V.of(5, 0, 0))).toBe(true);
    expect(shapes.isPointWithin(frustum, V.of(6, 0, 0))).toBe(false);
    expect(shapes.isPointWithin(frustum, V.of(0, 0, -5))).toBe(false);
  });

  it("leaves the hole of a torus empty", () => {
    const torus = shapes.torus(3, 1);
    expect(shapes.isPointWithin(torus, V.of(3, 0, 0))).toBe(true);
    expect(shapes.isPointWithin(torus, V.of(4, 0, 0))).toBe(true);
    expect(shapes.isPointWithin(torus, V.of(0, 0, 3))).toBe(true);
    expect(shapes.isPointWithin(torus, V.zero)).toBe(false);
  });
});

describe("line queries", () => {
  it("finds the closest point on a segment", () => {
    const line = shapes.line(V.of(4, 0, 0));
    const { distance, closestPoint } = shapes.closestPointOnLine(line, V.of(1, 3, 0));
    expect(distance).toBe(3);
    expect(V.equals(closestPoint, V.of(1, 0, 0))).toBe(true);

    const beyond = shapes.closestPointOnLine(line, V.of(5, 0, 0));
    expect(V.equals(beyond.closestPoint, V.of(2, 0, 0))).toBe(true);
  });

  it("measures the gap between segments", () => {
    const a = shapes.line(V.of(2, 0, 0));
    const b = shapes.line(V.of(0, 0, 2), V.of(0, 3, 0));
    expect(shapes.lineDistance(a, b)).toBe(3);
  });
});
