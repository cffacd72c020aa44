import type { Vec3 } from "./transform.js";

export type SweepSpec = {
  height: number;
  twistDeg: number;
  slices?: number;
  scale: [number, number];
  center: boolean;
};

export type ControlPoint = {
  position: Vec3;
  tangent: Vec3;
};

const SEGMENTS_PER_TURN = 36;
const BASE_TANGENT: Vec3 = [0, 1, 0];

export function sweepSegmentCount(twistDeg: number, slices?: number): number {
  if (!Number.isFinite(twistDeg) || (slices !== undefined && !Number.isFinite(slices))) {
    throw new RangeError(`sweep twist and slices must be finite, found ${twistDeg} and ${slices}`);
  }
  let segments = 1;
  if (twistDeg !== 0) {
    segments = Math.ceil((SEGMENTS_PER_TURN * Math.abs(twistDeg)) / 360);
  }
  if (slices !== undefined && slices > segments) segments = Math.trunc(slices);
  return segments;
}

/**
 * Control points of the straight spline path a twisted/scaled extrusion
 * sweeps along. The tangent starts as +Y, turns about Z with the twist and is
 * scaled towards the top scale factor; positions climb evenly along Z.
 */
export function sweepControlPoints(spec: SweepSpec): ControlPoint[] {
  const segments = sweepSegmentCount(spec.twistDeg, spec.slices);
  const baseZ = spec.center ? -spec.height * 0.5 : 0;
  const dz = spec.height / segments;
  const twist = (-spec.twistDeg * Math.PI) / 180;
  const [topX, topY] = spec.scale;

  const [vx, vy, vz] = BASE_TANGENT;

  const points: ControlPoint[] = [{ position: [0, 0, baseZ], tangent: [vx, vy, vz] }];
  for (let i = 1; i <= segments; i += 1) {
    const t = i / segments;
    const angle = twist * t;
    const sx = 1 + (topX - 1) * t;
    const sy = 1 + (topY - 1) * t;
    const sa = Math.sin(angle);
    const ca = Math.cos(angle);
    points.push({
      position: [0, 0, baseZ + dz * i],
      tangent: [(ca * vx - sa * vy) * sx, (sa * vx + ca * vy) * sy, vz],
    });
  }
  return points;
}
