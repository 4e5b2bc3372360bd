import { describe, expect, it } from "vitest";
import { DecodeError } from "@orbis/core";
import { bigDecimal, huge, scalarDecimal, scalarDouble, scalarHuge } from "@orbis/numeric";
import { ShapeType, createShapeCodec, shapeOps, shapeSchemas, type Shape } from "../index.js";

const shapes = shapeOps(scalarDouble);
const { vector3: V, quaternion: Q } = shapes.algebra;
const codec = createShapeCodec(scalarDouble);

describe("shape codec", () => {
  it("writes a versioned payload with scalars as strings", () => {
    expect(codec.encode(shapes.sphere(1.5, V.of(1, 2, 3)))).toEqual({
      __v: 1,
      shapeType: ShapeType.Sphere,
      radius: "1.5",
      position: { x: "1", y: "2", z: "3" },
    });
  });

  it("writes fields in canonical order", () => {
    const frustum = shapes.frustum(1.5, V.of(0, 0, 6), 1, 0.5);
    expect(Object.keys(codec.encode(frustum))).toEqual([
      "__v",
      "shapeType",
      ...shapeSchemas[ShapeType.Frustum].map((f) => f.name),
    ]);
  });

  it("round-trips every kind, including zero-size shapes", () => {
    const tilt = Q.createFromAxisAngle(V.of(0, 1, 0), 0.3);
    const samples: Shape<number>[] = [
      shapes.singlePoint(V.of(1, -2, 3)),
      shapes.line(V.of(0.1, 0.2, 0.3), V.of(4, 5, 6)),
      shapes.sphere(2.5),
      shapes.hollowSphere(1, 3, V.of(0, 1, 0)),
      shapes.capsule(V.of(0, 3, 0), 0.75),
      shapes.cylinder(V.of(1, 1, 0), 2),
      shapes.cone(V.of(0, 0, 4), 1),
      shapes.cuboid(1, 2, 3, V.of(-1, 0, 0), tilt),
      shapes.ellipsoid(3, 2, 1, V.zero, tilt),
      shapes.frustum(1.5, V.of(0, 0, 10), 1.2, 0.5, V.of(1, 2, 3), tilt),
      shapes.torus(2, 0.5, V.of(0, 0, 1), tilt),
      shapes.sphere(),
      shapes.frustum(),
      shapes.torus(),
    ];
    for (const shape of samples) {
      const decoded = codec.decodeFromString(codec.encodeToString(shape));
      expect(decoded.shapeType).toBe(shape.shapeType);
      expect(shapes.equals(decoded, shape)).toBe(true);
    }
  });

  it("keeps every digit of decimal scalars", () => {
    const D = shapeOps(scalarDecimal);
    const sphere = D.sphere(bigDecimal("1.000000000000000000000000000001"));
    const encoded = D.codec.encode(sphere);
    expect(encoded.radius).toBe("1.000000000000000000000000000001");
    expect(D.equals(D.codec.decode(encoded), sphere)).toBe(true);
  });

  it("keeps exponents beyond double range", () => {
    const H = shapeOps(scalarHuge);
    const sphere = H.sphere(huge(2.5, 400));
    const encoded = H.codec.encode(sphere);
    expect(encoded.radius).toBe("2.5e400");
    expect(H.equals(H.codec.decode(encoded), sphere)).toBe(true);
  });

  it("rejects a payload from another version", () => {
    const encoded = { ...codec.encode(shapes.sphere(1)), __v: 2 };
    expect(() => codec.decode(encoded)).toThrow(DecodeError);
    expect(() => codec.decode(encoded)).toThrow("Version mismatch: data is v2, codec expects v1");
  });

  it("rejects unknown tags and malformed fields", () => {
    const sphere = codec.encode(shapes.sphere(1));
    expect(() => codec.decode({ ...sphere, shapeType: ShapeType.None })).toThrow(
      "Unknown shape type: 0"
    );
    expect(() => codec.decode({ ...sphere, shapeType: 42 })).toThrow(DecodeError);
    expect(() => codec.decode({ ...sphere, radius: "wide" })).toThrow(DecodeError);
    expect(() => codec.decode({ ...sphere, radius: 1 })).toThrow(
      "Sphere.radius must be a string, got number"
    );
    expect(() => codec.decode({ ...sphere, position: { x: "1", y: "2" } })).toThrow(DecodeError);
    expect(() => codec.decode({ ...sphere, colour: "red" })).toThrow(
      "Sphere has no field 'colour'"
    );
    expect(() => codec.decode({ __v: 1, shapeType: ShapeType.Sphere, radius: "1" })).toThrow(
      "Sphere is missing field 'position'"
    );
    expect(() => codec.decode([])).toThrow(DecodeError);
  });

  it("reports constructor violations as decode errors", () => {
    const torus = { ...codec.encode(shapes.torus(2, 1)), majorRadius: "0.5" };
    expect(() => codec.decode(torus)).toThrow(DecodeError);
  });

  it("rejects text that is not JSON", () => {
    expect(() => codec.decodeFromString("{")).toThrow(DecodeError);
  });
});
