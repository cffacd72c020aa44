import type { CsgNode } from "../tree.js";
import {
  asNumber,
  optionalNumber,
  readBool,
  readExtents,
  readRadius,
  requireNonNegative,
  requireParam,
  requireNumber,
  requirePositive,
} from "./read.js";
import type { EncodeInput, EncodeOutcome } from "./types.js";

const AXES_2D = ["dx", "dy"] as const;
const AXES_3D = ["dx", "dy", "dz"] as const;

export function encodeCircle({ node, element }: EncodeInput): EncodeOutcome {
  element.addProperty("r", requireRadiusParam(node, "r", "d"));
  return { container: element };
}

export function encodeSphere({ node, element }: EncodeInput): EncodeOutcome {
  element.addProperty("r", requireRadiusParam(node, "r", "d"));
  return { container: element };
}

export function encodeRectangle({ node, element }: EncodeInput): EncodeOutcome {
  const extents = readExtents(node, "size", AXES_2D.length);
  AXES_2D.forEach((axis, i) => {
    element.addProperty(axis, requirePositive(node, axis, extents[i] ?? 0));
  });
  element.addProperty("center", readBool(node, "center", false));
  return { container: element };
}

export function encodeCuboid({ node, element }: EncodeInput): EncodeOutcome {
  const extents = readExtents(node, "size", AXES_3D.length);
  AXES_3D.forEach((axis, i) => {
    element.addProperty(axis, requirePositive(node, axis, extents[i] ?? 0));
  });
  element.addProperty("center", readBool(node, "center", false));
  return { container: element };
}

export function encodeCone({ node, element }: EncodeInput): EncodeOutcome {
  const h = requirePositive(node, "h", requireNumber(node, "h"));
  const r = readRadius(node, "r", "d");
  const r1 = requireNonNegative(node, "r1", readRadius(node, "r1", "d1") ?? r ?? missing(node, "r1"));
  const r2 = requireNonNegative(node, "r2", readRadius(node, "r2", "d2") ?? r ?? missing(node, "r2"));
  if (!(r1 + r2 > 0)) {
    throw node.fail("param_domain", "r1+r2 must be > 0", { parameter: "r1+r2", value: r1 + r2 });
  }
  element.addProperty("h", h);
  element.addProperty("r1", r1);
  element.addProperty("r2", r2);
  element.addProperty("center", readBool(node, "center", false));
  return { container: element };
}

export function encodePolygon({ node, element }: EncodeInput): EncodeOutcome {
  const points = requireParam(node, "points");
  const count = points.isVector() ? points.size() : 0;
  let order = Array.from({ length: count }, (_, i) => i);

  const paths = node.param("paths");
  if (paths?.isVector() && paths.size() > 0) {
    // only the outer path is representable
    if (paths.size() > 1) {
      throw node.fail("shape_unsupported", "polygon with internal hole(s) is not supported", {
        paths: paths.size(),
      });
    }
    const outer = paths.get(0);
    order = [];
    for (let i = 0; i < outer.size(); i += 1) order.push(outer.get(i).toInt());
  }

  if (order.length < 3) {
    throw node.fail("param_malformed", `polygon needs at least 3 vertices, found ${order.length}`, {
      parameter: "points",
      found: order.length,
    });
  }

  const vertices = element.addChild("vertices");
  for (const index of order) {
    if (index < 0 || index >= count) {
      throw node.fail("param_malformed", `polygon path index ${index} is outside 0..${count - 1}`, {
        parameter: "paths",
        index,
      });
    }
    const point = points.get(index);
    if (!point.isVector() || point.size() < 2) {
      throw node.fail("param_malformed", `polygon point ${index} must have 2 values: ${point.toString()}`, {
        parameter: "points",
        index,
      });
    }
    const vertex = vertices.addChild("vertex");
    vertex.addProperty("x", asNumber(node, "points", point.get(0)));
    vertex.addProperty("y", asNumber(node, "points", point.get(1)));
  }
  return { container: element };
}

export function encodeOffset({ node, element }: EncodeInput): EncodeOutcome {
  const r = optionalNumber(node, "r");
  const delta = r ?? requireNumber(node, "delta");
  element.addProperty("delta", delta);
  element.addProperty("round", r !== undefined);
  element.addProperty("chamfer", readBool(node, "chamfer", false));
  return { container: element };
}

export function encodePolyhedron({ node, element }: EncodeInput): EncodeOutcome {
  const points = requireParam(node, "points");
  const count = points.isVector() ? points.size() : 0;
  if (count < 4) {
    throw node.fail("param_malformed", `polyhedron with too few points, found ${count}, expected at least 4`, {
      parameter: "points",
      found: count,
      expected: 4,
    });
  }

  const vertices = element.addChild("vertices");
  for (let i = 0; i < count; i += 1) {
    const point = points.get(i);
    if (!point.isVector() || point.size() < 3) {
      throw node.fail(
        "param_malformed",
        `polyhedron point ${i} must have 3 values, found ${point.isVector() ? point.size() : 1}: ${point.toString()}`,
        { parameter: "points", index: i, expected: 3, found: point.isVector() ? point.size() : 1 }
      );
    }
    const vertex = vertices.addChild("vertex");
    vertex.addProperty("x", asNumber(node, "points", point.get(0)));
    vertex.addProperty("y", asNumber(node, "points", point.get(1)));
    vertex.addProperty("z", asNumber(node, "points", point.get(2)));
  }

  // older dumps name the face list "triangles"
  const faces = node.param("faces") ?? node.param("triangles") ?? requireParam(node, "faces");
  const facesElement = element.addChild("faces");
  for (let f = 0; f < faces.size(); f += 1) {
    const face = faces.get(f);
    const size = face.isVector() ? face.size() : 1;
    if (size < 3) {
      throw node.fail("param_malformed", `polyhedron face ${f} must have 3 or more values, found ${size}`, {
        parameter: "faces",
        index: f,
        expected: 3,
        found: size,
      });
    }
    const faceElement = facesElement.addChild("face");
    // source winding is opposite to the target's
    for (let v = size - 1; v >= 0; v -= 1) {
      const index = face.get(v).toInt();
      if (index < 0 || index >= count) {
        throw node.fail("param_malformed", `polyhedron face ${f} refers to missing point ${index}`, {
          parameter: "faces",
          index,
        });
      }
      faceElement.addChild("fv").addProperty("index", index);
    }
  }
  return { container: element };
}

function requireRadiusParam(node: CsgNode, radius: string, diameter: string): number {
  const r = readRadius(node, radius, diameter) ?? missing(node, radius);
  return requirePositive(node, radius, r);
}

function missing(node: CsgNode, name: string): never {
  throw node.fail("param_missing", `parameter '${name}' not found for ${node.tag}`, { parameter: name });
}
