/**
 * Versioned JSON form of shapes.
 *
 * A payload is `{ __v, shapeType, ...fields }` with the fields in their
 * canonical order. Scalars travel as strings produced by the scalar's own
 * `format`, so decimal and huge values keep every digit. Decoding rebuilds
 * through the constructors and so recomputes every derived field.
 */

import { DecodeError, InvalidArgumentError } from "@orbis/core";
import type { Scalar } from "@orbis/numeric";
import type { Quaternion, SpatialAlgebra, Vector3 } from "@orbis/spatial";
import type { ShapeConstructors } from "./constructors.js";
import { ShapeType, type Shape, type ShapeKind } from "./types.js";

/** Version field embedded in every payload. */
const VERSION_KEY = "__v";

export const SHAPE_CODEC_VERSION = 1;

export type FieldType = "scalar" | "vector3" | "quaternion";

export interface FieldMeta {
  readonly name: string;
  readonly type: FieldType;
}

const field = (name: string, type: FieldType): FieldMeta => ({ name, type });

const axial = [field("axis", "vector3"), field("radius", "scalar"), field("position", "vector3")];
const boxed = [
  field("axisX", "scalar"),
  field("axisY", "scalar"),
  field("axisZ", "scalar"),
  field("position", "vector3"),
  field("rotation", "quaternion"),
];

/** Stored fields of each kind, in canonical order. */
export const shapeSchemas: Readonly<Record<ShapeKind, readonly FieldMeta[]>> = {
  [ShapeType.Capsule]: axial,
  [ShapeType.Cone]: axial,
  [ShapeType.Cuboid]: boxed,
  [ShapeType.Cylinder]: axial,
  [ShapeType.Ellipsoid]: boxed,
  [ShapeType.Frustum]: [
    field("aspectRatio", "scalar"),
    field("axis", "vector3"),
    field("fieldOfViewAngle", "scalar"),
    field("nearPlaneDistance", "scalar"),
    field("position", "vector3"),
    field("rotation", "quaternion"),
  ],
  [ShapeType.HollowSphere]: [
    field("innerRadius", "scalar"),
    field("outerRadius", "scalar"),
    field("position", "vector3"),
  ],
  [ShapeType.Line]: [field("path", "vector3"), field("position", "vector3")],
  [ShapeType.SinglePoint]: [field("position", "vector3")],
  [ShapeType.Sphere]: [field("radius", "scalar"), field("position", "vector3")],
  [ShapeType.Torus]: [
    field("majorRadius", "scalar"),
    field("minorRadius", "scalar"),
    field("position", "vector3"),
    field("rotation", "quaternion"),
  ],
};

const KIND_NAMES: Readonly<Record<ShapeKind, string>> = {
  [ShapeType.Capsule]: "Capsule",
  [ShapeType.Cone]: "Cone",
  [ShapeType.Cuboid]: "Cuboid",
  [ShapeType.Cylinder]: "Cylinder",
  [ShapeType.Ellipsoid]: "Ellipsoid",
  [ShapeType.Frustum]: "Frustum",
  [ShapeType.HollowSphere]: "HollowSphere",
  [ShapeType.Line]: "Line",
  [ShapeType.SinglePoint]: "SinglePoint",
  [ShapeType.Sphere]: "Sphere",
  [ShapeType.Torus]: "Torus",
};

export function isShapeKind(value: unknown): value is ShapeKind {
  return (
    typeof value === "number" &&
    value !== ShapeType.None &&
    Object.values(ShapeType).some((tag) => tag === value)
  );
}

export type EncodedValue = string | { readonly [component: string]: string };

export interface EncodedShape {
  readonly __v: number;
  readonly shapeType: ShapeKind;
  readonly [field: string]: EncodedValue | number;
}

export interface ShapeCodec<A> {
  encode(shape: Shape<A>): EncodedShape;
  /** @throws DecodeError for a wrong version, an unknown tag or a malformed field */
  decode(data: unknown): Shape<A>;
  encodeToString(shape: Shape<A>): string;
  decodeFromString(text: string): Shape<A>;
}

type Decoded<A> =
  | { readonly type: "scalar"; readonly value: A }
  | { readonly type: "vector3"; readonly value: Vector3<A> }
  | { readonly type: "quaternion"; readonly value: Quaternion<A> };

const COMPONENTS: Readonly<Record<Exclude<FieldType, "scalar">, readonly string[]>> = {
  vector3: ["x", "y", "z"],
  quaternion: ["x", "y", "z", "w"],
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createShapeCodecFor<A>(
  algebra: SpatialAlgebra<A>,
  make: ShapeConstructors<A>
): ShapeCodec<A> {
  const S: Scalar<A> = algebra.scalar;
  const { vector3: V, quaternion: Q } = algebra;

  const scalarOut = (a: A): string => S.format(a);
  const vectorOut = (v: Vector3<A>) => ({ x: scalarOut(v.x), y: scalarOut(v.y), z: scalarOut(v.z) });
  const quaternionOut = (q: Quaternion<A>) => ({ ...vectorOut(q), w: scalarOut(q.w) });

  const fieldsOf = (shape: Shape<A>): [string, EncodedValue][] => {
    switch (shape.shapeType) {
      case ShapeType.SinglePoint:
        return [["position", vectorOut(shape.position)]];
      case ShapeType.Line:
        return [
          ["path", vectorOut(shape.path)],
          ["position", vectorOut(shape.position)],
        ];
      case ShapeType.Sphere:
        return [
          ["radius", scalarOut(shape.radius)],
          ["position", vectorOut(shape.position)],
        ];
      case ShapeType.HollowSphere:
        return [
          ["innerRadius", scalarOut(shape.innerRadius)],
          ["outerRadius", scalarOut(shape.outerRadius)],
          ["position", vectorOut(shape.position)],
        ];
      case ShapeType.Capsule:
      case ShapeType.Cylinder:
      case ShapeType.Cone:
        return [
          ["axis", vectorOut(shape.axis)],
          ["radius", scalarOut(shape.radius)],
          ["position", vectorOut(shape.position)],
        ];
      case ShapeType.Cuboid:
      case ShapeType.Ellipsoid:
        return [
          ["axisX", scalarOut(shape.axisX)],
          ["axisY", scalarOut(shape.axisY)],
          ["axisZ", scalarOut(shape.axisZ)],
          ["position", vectorOut(shape.position)],
          ["rotation", quaternionOut(shape.rotation)],
        ];
      case ShapeType.Frustum:
        return [
          ["aspectRatio", scalarOut(shape.aspectRatio)],
          ["axis", vectorOut(shape.axis)],
          ["fieldOfViewAngle", scalarOut(shape.fieldOfViewAngle)],
          ["nearPlaneDistance", scalarOut(shape.nearPlaneDistance)],
          ["position", vectorOut(shape.position)],
          ["rotation", quaternionOut(shape.rotation)],
        ];
      case ShapeType.Torus:
        return [
          ["majorRadius", scalarOut(shape.majorRadius)],
          ["minorRadius", scalarOut(shape.minorRadius)],
          ["position", vectorOut(shape.position)],
          ["rotation", quaternionOut(shape.rotation)],
        ];
    }
  };

  const encode = (shape: Shape<A>): EncodedShape => ({
    [VERSION_KEY]: SHAPE_CODEC_VERSION,
    shapeType: shape.shapeType,
    ...Object.fromEntries(fieldsOf(shape)),
  });

  const parseScalar = (text: unknown, where: string): A => {
    if (typeof text !== "string") {
      throw new DecodeError(`${where} must be a string, got ${typeof text}`);
    }
    try {
      return S.parse(text);
    } catch (error) {
      throw new DecodeError(`${where}: ${errorMessage(error)}`);
    }
  };

  const parseField = (meta: FieldMeta, raw: unknown, where: string): Decoded<A> => {
    if (meta.type === "scalar") {
      return { type: "scalar", value: parseScalar(raw, where) };
    }
    if (!isRecord(raw)) {
      throw new DecodeError(`${where} must be an object with ${COMPONENTS[meta.type].join(", ")}`);
    }
    const record = raw;
    const c = (name: string) => parseScalar(record[name], `${where}.${name}`);
    return meta.type === "vector3"
      ? { type: "vector3", value: V.create(c("x"), c("y"), c("z")) }
      : { type: "quaternion", value: Q.create(c("x"), c("y"), c("z"), c("w")) };
  };

  const decode = (data: unknown): Shape<A> => {
    if (!isRecord(data)) {
      throw new DecodeError("Shape data must be an object");
    }
    const version = data[VERSION_KEY];
    if (version !== SHAPE_CODEC_VERSION) {
      throw new DecodeError(
        `Version mismatch: data is v${String(version)}, codec expects v${SHAPE_CODEC_VERSION}`
      );
    }
    const tag = data.shapeType;
    if (!isShapeKind(tag)) {
      throw new DecodeError(`Unknown shape type: ${String(tag)}`);
    }

    const kind = KIND_NAMES[tag];
    const schema = shapeSchemas[tag];
    const known = new Set([VERSION_KEY, "shapeType", ...schema.map((f) => f.name)]);
    for (const key of Object.keys(data)) {
      if (!known.has(key)) throw new DecodeError(`${kind} has no field '${key}'`);
    }

    const values = new Map<string, Decoded<A>>();
    for (const meta of schema) {
      if (!(meta.name in data)) {
        throw new DecodeError(`${kind} is missing field '${meta.name}'`);
      }
      values.set(meta.name, parseField(meta, data[meta.name], `${kind}.${meta.name}`));
    }

    const scalar = (name: string): A => {
      const v = values.get(name);
      if (v?.type !== "scalar") throw new DecodeError(`${kind}.${name} is not a scalar`);
      return v.value;
    };
    const vector = (name: string): Vector3<A> => {
      const v = values.get(name);
      if (v?.type !== "vector3") throw new DecodeError(`${kind}.${name} is not a vector`);
      return v.value;
    };
    const rotation = (): Quaternion<A> => {
      const v = values.get("rotation");
      if (v?.type !== "quaternion") throw new DecodeError(`${kind}.rotation is not a quaternion`);
      return v.value;
    };

    try {
      switch (tag) {
        case ShapeType.SinglePoint:
          return make.singlePoint(vector("position"));
        case ShapeType.Line:
          return make.line(vector("path"), vector("position"));
        case ShapeType.Sphere:
          return make.sphere(scalar("radius"), vector("position"));
        case ShapeType.HollowSphere:
          return make.hollowSphere(scalar("innerRadius"), scalar("outerRadius"), vector("position"));
        case ShapeType.Capsule:
          return make.capsule(vector("axis"), scalar("radius"), vector("position"));
        case ShapeType.Cylinder:
          return make.cylinder(vector("axis"), scalar("radius"), vector("position"));
        case ShapeType.Cone:
          return make.cone(vector("axis"), scalar("radius"), vector("position"));
        case ShapeType.Cuboid:
          return make.cuboid(
            scalar("axisX"),
            scalar("axisY"),
            scalar("axisZ"),
            vector("position"),
            rotation()
          );
        case ShapeType.Ellipsoid:
          return make.ellipsoid(
            scalar("axisX"),
            scalar("axisY"),
            scalar("axisZ"),
            vector("position"),
            rotation()
          );
        case ShapeType.Frustum:
          return make.frustum(
            scalar("aspectRatio"),
            vector("axis"),
            scalar("fieldOfViewAngle"),
            scalar("nearPlaneDistance"),
            vector("position"),
            rotation()
          );
        case ShapeType.Torus:
          return make.torus(
            scalar("majorRadius"),
            scalar("minorRadius"),
            vector("position"),
            rotation()
          );
      }
    } catch (error) {
      if (error instanceof InvalidArgumentError) {
        throw new DecodeError(`${kind}: ${error.message}`);
      }
      throw error;
    }
  };

  return {
    encode,
    decode,
    encodeToString: (shape) => JSON.stringify(encode(shape)),
    decodeFromString: (text) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch (error) {
        throw new DecodeError(`Malformed shape JSON: ${errorMessage(error)}`);
      }
      return decode(parsed);
    },
  };
}
