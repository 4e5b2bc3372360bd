import { describe, expect, it } from "vitest";
import { scalarDouble } from "@orbis/numeric";
import { ShapeType, shapeOps } from "../index.js";

const shapes = shapeOps(scalarDouble);
const { vector3: V, quaternion: Q } = shapes.algebra;

describe("swept collision", () => {
  const mover = shapes.sphere(1);
  const path = V.of(10, 0, 0);

  it("sweeps the bounding sphere into a capsule", () => {
    const swept = shapes.sweep(mover, path);
    expect(swept.shapeType).toBe(ShapeType.Capsule);
    expect(V.equals(swept.position, V.of(5, 0, 0))).toBe(true);
    expect(swept.length).toBe(12);
  });

  it("stops a sphere where it first touches another sphere", () => {
    const target = shapes.sphere(1, V.of(5, 0, 0));
    const point = shapes.getCollisionPoint(mover, path, target);
    expect(point).not.toBeNull();
    expect(point?.x).toBeCloseTo(3, 12);
    expect(point?.y).toBe(0);
    expect(shapes.getCollisionDistance(mover, path, target)).toBeCloseTo(3, 12);
  });

  it("reports no contact off the path or behind the mover", () => {
    expect(shapes.getCollisionPoint(mover, path, shapes.sphere(1, V.of(5, 5, 0)))).toBeNull();
    expect(shapes.getCollisionPoint(mover, path, shapes.sphere(1, V.of(-5, 0, 0)))).toBeNull();
    expect(shapes.getCollisionDistance(mover, path, shapes.sphere(1, V.of(5, 5, 0)))).toBeNull();
  });

  it("reports contact at the start when already touching", () => {
    const target = shapes.sphere(1, V.of(1.5, 0, 0));
    const point = shapes.getCollisionPoint(mover, path, target);
    expect(point === null ? null : V.equals(point, V.zero)).toBe(true);
    expect(shapes.getCollisionDistance(mover, path, target)).toBe(0);
  });

  it("stops at a point target", () => {
    const point = shapes.singlePoint(V.of(5, 0.6, 0));
    expect(shapes.getCollisionDistance(mover, path, point)).toBeCloseTo(4.2, 12);
  });

  it("stops where the sphere first grazes a line crossing the path", () => {
    const line = shapes.line(V.of(0, 0, 100), V.of(5, 0, 40));
    expect(shapes.getCollisionDistance(mover, path, line)).toBeCloseTo(4, 12);
    expect(shapes.getCollisionDistance(mover, path, shapes.line(V.of(0, 0, 100), V.of(5, 3, 40)))).toBeNull();
  });

  it("stops at the side of a capsule", () => {
    const capsule = shapes.capsule(V.of(0, 4, 0), 0.5, V.of(6, 0, 0));
    const point = shapes.getCollisionPoint(mover, path, capsule);
    expect(point?.x).toBeCloseTo(4.5, 12);
    expect(shapes.getCollisionDistance(mover, path, capsule)).toBeCloseTo(4.5, 12);
  });

  it("stops at the near face of a cuboid", () => {
    const box = shapes.cuboid(2, 2, 2, V.of(5, 0, 0));
    expect(shapes.getCollisionDistance(mover, path, box)).toBeCloseTo(3, 12);
  });

  it("stops at the leading edge of a turned cuboid", () => {
    const turned = Q.createFromAxisAngle(V.unitZ, Math.PI / 4);
    const box = shapes.cuboid(2, 2, 2, V.of(5, 0, 0), turned);
    expect(shapes.getCollisionDistance(mover, path, box)).toBeCloseTo(4 - Math.SQRT2, 10);
    expect(shapes.getCollisionDistance(mover, path, shapes.cuboid(2, 2, 2, V.of(5, 4, 0)))).toBeNull();
  });

  it("uses the containing sphere of other targets", () => {
    const torus = shapes.torus(2, 0.5, V.of(6, 0, 0));
    expect(shapes.getCollisionDistance(mover, path, torus)).toBeCloseTo(2.5, 12);
  });

  it("never collides along an empty path unless already touching", () => {
    const target = shapes.sphere(1, V.of(5, 0, 0));
    expect(shapes.getCollisionPoint(mover, V.zero, target)).toBeNull();
  });
});
