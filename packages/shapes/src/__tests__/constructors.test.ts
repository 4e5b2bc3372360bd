import { describe, expect, it } from "vitest";
import { InvalidArgumentError } from "@orbis/core";
import { scalarDouble } from "@orbis/numeric";
import { ShapeType, shapeOps } from "../index.js";

const shapes = shapeOps(scalarDouble);
const { vector3: V } = shapes.algebra;

describe("shape constructors", () => {
  it("defaults to a zero-size shape at the origin", () => {
    const line = shapes.line();
    expect(line.shapeType).toBe(ShapeType.Line);
    expect(line.containingRadius).toBe(0);
    expect(V.equals(line.start, V.zero)).toBe(true);
    expect(shapes.sphere().volume).toBe(0);
    expect(shapes.torus().containingRadius).toBe(0);
  });

  it("derives sphere measurements", () => {
    const sphere = shapes.sphere(10, V.of(1, 2, 3));
    expect(sphere.volume).toBeCloseTo(4188.79, 2);
    expect(sphere.smallestDimension).toBe(20);
    expect(V.equals(sphere.highestPoint, V.of(1, 12, 3))).toBe(true);
    expect(V.equals(sphere.lowestPoint, V.of(1, -8, 3))).toBe(true);
  });

  it("centers segments on their position", () => {
    const line = shapes.lineFromPoints(V.of(0, 0, 0), V.of(4, 2, 0));
    expect(V.equals(line.position, V.of(2, 1, 0))).toBe(true);
    expect(V.equals(line.end, V.of(4, 2, 0))).toBe(true);
    expect(V.equals(line.highestPoint, V.of(4, 2, 0))).toBe(true);
    expect(line.length).toBeCloseTo(Math.sqrt(20), 12);
  });

  it("counts the caps in a capsule's length and volume", () => {
    const capsule = shapes.capsule(V.of(0, 4, 0), 1);
    expect(capsule.length).toBe(6);
    expect(capsule.containingRadius).toBe(3);
    expect(capsule.smallestDimension).toBe(2);
    expect(V.equals(capsule.highestPoint, V.of(0, 3, 0))).toBe(true);
    expect(capsule.volume).toBeCloseTo((16 * Math.PI) / 3, 12);
  });

  it("lifts a lying cylinder's highest point by its radius", () => {
    const cylinder = shapes.cylinder(V.of(0, 0, 4), 3);
    expect(cylinder.containingRadius).toBeCloseTo(Math.sqrt(13), 12);
    expect(V.equals(cylinder.highestPoint, V.of(0, 3, 2))).toBe(true);
    expect(V.equals(cylinder.lowestPoint, V.of(0, -3, -2))).toBe(true);
    expect(cylinder.volume).toBeCloseTo(36 * Math.PI, 12);
  });

  it("places a cone's apex at its start", () => {
    const cone = shapes.coneFromAngle(V.zero, V.unitY, 2, Math.PI / 2);
    expect(V.equals(cone.start, V.zero)).toBe(true);
    expect(V.equals(cone.position, V.of(0, 1, 0))).toBe(true);
    expect(cone.radius).toBeCloseTo(2, 12);
    expect(cone.volume).toBeCloseTo((8 * Math.PI) / 3, 12);
  });

  it("stores cuboid edges as full lengths", () => {
    const box = shapes.cuboid(2, 4, 6);
    expect(box.volume).toBe(48);
    expect(box.smallestDimension).toBe(2);
    expect(box.corners).toHaveLength(8);
    expect(box.highestPoint.y).toBe(2);
    expect(box.containingRadius).toBeCloseTo(Math.sqrt(56) / 2, 12);
  });

  it("stores ellipsoid semi-axes", () => {
    const ellipsoid = shapes.ellipsoid(1, 2, 3);
    expect(ellipsoid.containingRadius).toBe(3);
    expect(ellipsoid.smallestDimension).toBe(2);
    expect(ellipsoid.volume).toBeCloseTo(8 * Math.PI, 12);
    expect(ellipsoid.highestPoint.y).toBeCloseTo(2, 12);
  });

  it("derives frustum corners and volume", () => {
    const frustum = shapes.frustum(1, V.of(0, 0, 10), Math.PI / 2, 1);
    expect(frustum.farPlaneDistance).toBe(10);
    expect(frustum.corners).toHaveLength(8);
    expect(frustum.planes).toHaveLength(6);
    expect(frustum.volume).toBeCloseTo(1332, 9);
  });

  it("rejects a torus whose major radius is below its minor radius", () => {
    expect(() => shapes.torus(1, 2)).toThrow(InvalidArgumentError);
    const torus = shapes.torus(3, 1);
    expect(torus.containingRadius).toBe(4);
    expect(torus.smallestDimension).toBe(2);
    expect(V.equals(torus.highestPoint, V.of(0, 1, 0))).toBe(true);
  });

  it("rejects a hollow sphere whose cavity exceeds its shell", () => {
    expect(() => shapes.hollowSphere(3, 2)).toThrow(InvalidArgumentError);
    expect(shapes.hollowSphere(1, 2).smallestDimension).toBe(1);
  });
});
