import { sweepControlPoints, type SweepSpec } from "../sweep.js";
import { rotationX } from "../transform.js";
import type { CsgNode } from "../tree.js";
import {
  asNumber,
  optionalNumber,
  readBool,
  requireNonNegative,
  requireNumber,
  requirePositive,
} from "./read.js";
import type { EncodeInput, EncodeOutcome } from "./types.js";

/** The source schema's revolve profile lies in XZ; the target's in XY. */
export const ROTATE_EXTRUDE_CORRECTION = rotationX(-90);

export function encodeLinearExtrude({ node, element }: EncodeInput): EncodeOutcome {
  const twist = optionalNumber(node, "twist") ?? 0;
  if (twist !== 0) {
    throw node.fail("shape_unsupported", "linear_extrude with non-zero twist is not supported", {
      parameter: "twist",
      value: twist,
    });
  }
  element.addProperty("dz", requirePositive(node, "height", requireNumber(node, "height")));
  element.addProperty("center", readBool(node, "center", false));
  return { container: element };
}

export function encodeSweep({ node, element }: EncodeInput): EncodeOutcome {
  const points = sweepControlPoints(readSweepSpec(node));
  const path = element.addChild("spline_path");
  for (const { position, tangent } of points) {
    const cpoint = path.addChild("cpoint");
    cpoint.addProperty("x", position[0]);
    cpoint.addProperty("y", position[1]);
    cpoint.addProperty("z", position[2]);
    cpoint.addProperty("vx", tangent[0]);
    cpoint.addProperty("vy", tangent[1]);
    cpoint.addProperty("vz", tangent[2]);
  }
  return { container: element };
}

export function encodeRotateExtrude({ node, element }: EncodeInput): EncodeOutcome {
  const angleDeg = optionalNumber(node, "angle") ?? 360;
  element.addProperty("angle", (angleDeg * Math.PI) / 180);
  return { container: element, corrective: ROTATE_EXTRUDE_CORRECTION.slice() };
}

export function readSweepSpec(node: CsgNode): SweepSpec {
  const height = requirePositive(node, "height", requireNumber(node, "height"));
  const slices = optionalNumber(node, "slices");
  return {
    height,
    twistDeg: optionalNumber(node, "twist") ?? 0,
    slices: slices !== undefined && slices > 0 ? Math.trunc(slices) : undefined,
    scale: readScale(node),
    center: readBool(node, "center", false),
  };
}

function readScale(node: CsgNode): [number, number] {
  const value = node.param("scale");
  if (!value) return [1, 1];
  if (!value.isVector()) {
    const uniform = requireNonNegative(node, "scale", asNumber(node, "scale", value));
    return [uniform, uniform];
  }
  const sx = requireNonNegative(node, "scale", asNumber(node, "scale", value.get(0)));
  const sy = value.size() > 1 ? requireNonNegative(node, "scale", asNumber(node, "scale", value.get(1))) : sx;
  return [sx, sy];
}
