import { encodeBinary, encodeProjection, encodeUnion } from "./booleans.js";
import { encodeLinearExtrude, encodeRotateExtrude, encodeSweep } from "./extrude.js";
import {
  encodeCircle,
  encodeCone,
  encodeCuboid,
  encodeOffset,
  encodePolygon,
  encodePolyhedron,
  encodeRectangle,
  encodeSphere,
} from "./primitives.js";
import type { ShapeEncoder } from "./types.js";

export type { EncodeInput, EncodeOutcome, ShapeEncoder } from "./types.js";

const ENCODERS: Readonly<Record<string, ShapeEncoder>> = Object.freeze({
  circle: encodeCircle,
  rectangle: encodeRectangle,
  polygon: encodePolygon,
  offset2d: encodeOffset,
  projection2d: encodeProjection,

  sphere: encodeSphere,
  cuboid: encodeCuboid,
  cone: encodeCone,
  polyhedron: encodePolyhedron,
  linear_extrude: encodeLinearExtrude,
  sweep: encodeSweep,
  rotate_extrude: encodeRotateExtrude,

  union2d: encodeUnion,
  union3d: encodeUnion,
  hull2d: encodeUnion,
  hull3d: encodeUnion,
  difference2d: encodeBinary,
  difference3d: encodeBinary,
  intersection2d: encodeBinary,
  intersection3d: encodeBinary,
  minkowski2d: encodeBinary,
  minkowski3d: encodeBinary,
});

export function encoderFor(tag: string): ShapeEncoder | undefined {
  return Object.hasOwn(ENCODERS, tag) ? ENCODERS[tag] : undefined;
}
