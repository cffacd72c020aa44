import type { CsgNode } from "./tree.js";

export type Dimension = 0 | 2 | 3;

const GENERATOR_DIMENSIONS: Readonly<Record<string, 2 | 3>> = Object.freeze({
  circle: 2,
  square: 2,
  polygon: 2,
  projection: 2,
  sphere: 3,
  cylinder: 3,
  cube: 3,
  polyhedron: 3,
  linear_extrude: 3,
  rotate_extrude: 3,
});

const UNSUPPORTED_TAGS: Readonly<Record<string, string>> = Object.freeze({
  text: "'text' is not supported",
  surface: "'surface' is not supported",
  import: "'import' is not supported with this file type",
  resize: "'resize' is not supported",
});

const PASS_THROUGH_TAGS = new Set(["group", "color", "multmatrix"]);
const PASS_THROUGH_PREFIXES = ["unio", "diff", "inte", "mink", "offs", "rend", "hull"];

export function generatorDimension(tag: string): Dimension {
  return Object.hasOwn(GENERATOR_DIMENSIONS, tag) ? GENERATOR_DIMENSIONS[tag] ?? 0 : 0;
}

export function isPassThrough(tag: string): boolean {
  return PASS_THROUGH_TAGS.has(tag) || PASS_THROUGH_PREFIXES.some((prefix) => tag.startsWith(prefix));
}

export function isUnsupportedTag(tag: string): boolean {
  return Object.hasOwn(UNSUPPORTED_TAGS, tag);
}

/**
 * Whether a node produces 2-D or 3-D geometry, or 0 when nothing below it
 * establishes a dimension. Generators answer directly; other nodes take the
 * dimension of their first non-dummy child that has one. Siblings after that
 * child are not consulted.
 */
export function resolveDimension(node: CsgNode): Dimension {
  const own = intrinsicDimension(node);
  if (own > 0 || node.children.length === 0) return own;

  for (const child of node.children) {
    if (child.isDummy()) continue;
    let dim = intrinsicDimension(child);
    if (dim === 0 && isPassThrough(child.tag)) dim = resolveDimension(child);
    if (dim > 0) return dim;
  }
  return 0;
}

function intrinsicDimension(node: CsgNode): Dimension {
  if (isUnsupportedTag(node.tag)) {
    throw node.fail("csg_unsupported", UNSUPPORTED_TAGS[node.tag] ?? `'${node.tag}' is not supported`);
  }
  return generatorDimension(node.tag);
}
