import { resolveDimension, type Dimension } from "../dimension.js";
import type { CsgNode } from "../tree.js";
import { readBool } from "./read.js";
import type { EncodeInput, EncodeOutcome } from "./types.js";

/** Thin slab a cut projection intersects its children with. */
export const CUT_SLAB = { dx: 1.0e4, dy: 1.0e4, dz: 1.0e-4 } as const;

export function encodeUnion({ node, tag, element }: EncodeInput): EncodeOutcome {
  ensureUniformDimension(node, tag);
  return { container: element };
}

/** difference, intersection and minkowski need two operands. */
export function encodeBinary({ node, tag, element }: EncodeInput): EncodeOutcome {
  const count = node.countChildren();
  if (count < 2) {
    throw node.fail(
      "shape_unsupported",
      `Fewer than 2 children provided to '${node.tag}' --> ${tag}`,
      { children: count }
    );
  }
  ensureUniformDimension(node, tag);
  return { container: element };
}

export function encodeProjection({ node, element }: EncodeInput): EncodeOutcome {
  if (!readBool(node, "cut", false)) return { container: element };

  const intersection = element.addChild("intersection3d");
  const slab = intersection.addChild("cuboid");
  slab.addProperty("dx", CUT_SLAB.dx);
  slab.addProperty("dy", CUT_SLAB.dy);
  slab.addProperty("dz", CUT_SLAB.dz);
  slab.addProperty("center", true);
  return { container: intersection };
}

export function ensureUniformDimension(node: CsgNode, tag: string): void {
  const seen = new Set<Dimension>();
  for (const child of node.children) {
    if (child.isDummy()) continue;
    const dim = resolveDimension(child);
    if (dim > 0) seen.add(dim);
    if (seen.size > 1) {
      throw node.fail(
        "shape_unsupported",
        `Mixed dimension children provided to '${node.tag}' --> ${tag}`,
        { dimensions: [...seen] }
      );
    }
  }
}
