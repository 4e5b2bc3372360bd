import { describe, expect, it } from "vitest";
import { scalarDecimal, scalarDouble } from "@orbis/numeric";
import { shapeOps, type Shape } from "../index.js";

const shapes = shapeOps(scalarDouble);
const { vector3: V, quaternion: Q } = shapes.algebra;

describe("intersects", () => {
  it("compares sphere center distance with the radius sum", () => {
    const a = shapes.sphere(5);
    expect(shapes.intersects(a, shapes.sphere(3, V.of(7, 0, 0)))).toBe(true);
    expect(shapes.intersects(a, shapes.sphere(3, V.of(9, 0, 0)))).toBe(false);
    expect(shapes.intersects(a, shapes.sphere(3, V.of(8, 0, 0)))).toBe(true);
  });

  it("gives the same sphere answer for decimal scalars", () => {
    const D = shapeOps(scalarDecimal);
    const dv = D.algebra.vector3;
    const radius = (n: number) => scalarDecimal.fromNumber(n);
    expect(D.intersects(D.sphere(radius(5)), D.sphere(radius(3), dv.of(7, 0, 0)))).toBe(true);
    expect(D.intersects(D.sphere(radius(5)), D.sphere(radius(3), dv.of(9, 0, 0)))).toBe(false);
  });

  it("is symmetric across every pair of kinds", () => {
    const all: Shape<number>[] = [
      shapes.singlePoint(V.of(0.5, 0, 0)),
      shapes.line(V.of(4, 0, 0), V.of(0, 0.5, 0)),
      shapes.sphere(1, V.of(1, 1, 0)),
      shapes.hollowSphere(1, 2, V.of(-1, 0, 0)),
      shapes.capsule(V.of(0, 2, 0), 0.5, V.of(2, 0, 0)),
      shapes.cylinder(V.of(0, 0, 2), 1, V.of(0, 2, 0)),
      shapes.cone(V.of(2, 0, 0), 1, V.of(0, -2, 0)),
      shapes.cuboid(1, 2, 3, V.of(1, 0, 1), Q.createFromAxisAngle(V.unitY, 0.4)),
      shapes.ellipsoid(2, 1, 0.5, V.of(0, 0, -1)),
      shapes.frustum(1.5, V.of(0, 0, 6), 1, 0.5, V.of(3, 0, 0)),
      shapes.torus(2, 0.5, V.of(0, 3, 0), Q.createFromAxisAngle(V.unitX, 0.7)),
    ];
    for (const a of all) {
      for (const b of all) {
        expect(shapes.intersects(a, b)).toBe(shapes.intersects(b, a));
      }
    }
  });

  it("finds points inside other shapes", () => {
    expect(shapes.intersects(shapes.singlePoint(V.of(0.5, 0.5, 0.5)), shapes.cuboid(2, 2, 2))).toBe(true);
    expect(shapes.intersects(shapes.cuboid(2, 2, 2), shapes.singlePoint(V.of(1, 0, 0)))).toBe(true);
    expect(shapes.intersects(shapes.singlePoint(V.of(3, 0, 0)), shapes.torus(3, 1))).toBe(true);
    expect(shapes.intersects(shapes.singlePoint(V.zero), shapes.torus(3, 1))).toBe(false);
    expect(shapes.intersects(shapes.singlePoint(V.one), shapes.singlePoint(V.one))).toBe(true);
  });

  it("solves lines against spheres", () => {
    const unit = shapes.sphere(1);
    expect(shapes.intersects(shapes.line(V.of(20, 0, 0)), unit)).toBe(true);
    expect(shapes.intersects(shapes.line(V.of(20, 0, 0), V.of(0, 2, 0)), unit)).toBe(false);
    expect(shapes.intersects(unit, shapes.line(V.of(0.5, 0, 0)))).toBe(true);
    expect(
      shapes.intersects(shapes.lineFromPoints(V.of(2, 0, 0), V.of(3, 0, 0)), unit)
    ).toBe(false);
  });

  it("separates lines from boxes", () => {
    const box = shapes.cuboid(2, 2, 2);
    expect(shapes.intersects(shapes.line(V.of(10, 0, 0)), box)).toBe(true);
    expect(shapes.intersects(shapes.line(V.of(10, 0, 0), V.of(0, 2, 0)), box)).toBe(false);
  });

  it("separates boxes on their face axes", () => {
    const a = shapes.cuboid(2, 2, 2);
    expect(shapes.intersects(a, shapes.cuboid(2, 2, 2, V.of(1.5, 0, 0)))).toBe(true);
    expect(shapes.intersects(a, shapes.cuboid(2, 2, 2, V.of(3, 0, 0)))).toBe(false);

    const turned = Q.createFromAxisAngle(V.unitY, Math.PI / 4);
    expect(shapes.intersects(a, shapes.cuboid(2, 2, 2, V.of(2.3, 0, 0), turned))).toBe(true);
    expect(shapes.intersects(a, shapes.cuboid(2, 2, 2, V.of(2.5, 0, 0), turned))).toBe(false);
  });

  it("measures capsules by their segments", () => {
    const a = shapes.capsule(V.of(0, 4, 0), 1);
    expect(shapes.intersects(a, shapes.capsule(V.of(0, 4, 0), 1, V.of(1.5, 0, 0)))).toBe(true);
    expect(shapes.intersects(a, shapes.capsule(V.of(0, 4, 0), 1, V.of(2.5, 0, 0)))).toBe(false);
    expect(shapes.intersects(a, shapes.cuboid(2, 2, 2, V.of(1.5, 0, 0)))).toBe(true);
    expect(shapes.intersects(a, shapes.cuboid(2, 2, 2, V.of(2.5, 0, 0)))).toBe(false);
  });

  it("finds the closest point of cylinders and cones to a sphere", () => {
    const cylinder = shapes.cylinder(V.of(0, 4, 0), 1);
    expect(shapes.intersects(shapes.sphere(1, V.of(1.9, 0, 0)), cylinder)).toBe(true);
    expect(shapes.intersects(shapes.sphere(1, V.of(2.1, 0, 0)), cylinder)).toBe(false);

    const cone = shapes.cone(V.of(0, 4, 0), 2);
    expect(shapes.intersects(shapes.sphere(0.5, V.of(0, -2.4, 0)), cone)).toBe(true);
    expect(shapes.intersects(shapes.sphere(0.5, V.of(0, -3, 0)), cone)).toBe(false);
  });

  it("lets a sphere sit in the hole of a torus", () => {
    const torus = shapes.torus(3, 1);
    expect(shapes.intersects(shapes.sphere(0.5), torus)).toBe(false);
    expect(shapes.intersects(shapes.sphere(0.5, V.of(3, 0, 0)), torus)).toBe(true);
  });

  it("ignores shapes wholly inside a hollow sphere's cavity", () => {
    const shell = shapes.hollowSphere(4, 5);
    expect(shapes.intersects(shapes.sphere(1), shell)).toBe(false);
    expect(shapes.intersects(shapes.sphere(1, V.of(4.5, 0, 0)), shell)).toBe(true);
    expect(shapes.intersects(shell, shapes.cuboid(2, 2, 2))).toBe(false);
  });

  it("falls back to support mappings for other convex pairs", () => {
    const cylinder = shapes.cylinder(V.of(0, 2, 0), 1);
    expect(shapes.intersects(cylinder, shapes.cylinder(V.of(0, 2, 0), 1, V.of(1.5, 0, 0)))).toBe(true);
    expect(shapes.intersects(cylinder, shapes.cylinder(V.of(0, 2, 0), 1, V.of(2.5, 0, 0)))).toBe(false);

    const ellipsoid = shapes.ellipsoid(2, 1, 1);
    expect(shapes.intersects(ellipsoid, shapes.ellipsoid(2, 1, 1, V.of(0, 1.5, 0)))).toBe(true);
    expect(shapes.intersects(ellipsoid, shapes.ellipsoid(2, 1, 1, V.of(0, 2.5, 0)))).toBe(false);
  });
});
