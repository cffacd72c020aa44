import { readFile } from "node:fs/promises";
import type { Dimension } from "./dimension.js";
import { CompileError } from "./errors.js";

export type TagMap = ReadonlyMap<string, string>;

export const WILDCARD = "*";
/** Target for source tags that exist but cannot be converted. */
export const NOT_AVAILABLE = "N/A";

//      source             target
const DEFAULT_ENTRIES: Readonly<Record<string, string>> = {
  cube: "cuboid",
  cylinder: "cone",
  polyhedron: "polyhedron",
  sphere: "sphere",

  linear_extrude: "sweep",
  rotate_extrude: "rotate_extrude",
  group: "union*",
  union: "union*",
  color: "union*",
  multmatrix: "union*",
  render: "union*",
  difference: "difference*",
  intersection: "intersection*",
  hull: "hull*",
  minkowski: "minkowski*",

  circle: "circle",
  polygon: "polygon",
  square: "rectangle",
  offset: "offset2d",
  projection: "projection2d",

  import: NOT_AVAILABLE,
  surface: NOT_AVAILABLE,
  text: NOT_AVAILABLE,
  resize: NOT_AVAILABLE,
};

export function createTagMap(entries: Readonly<Record<string, string>>): TagMap {
  const map = new Map<string, string>();
  for (const [source, target] of Object.entries(entries)) {
    ensureNonEmptyString(source, "Tag map source tag must be a non-empty string");
    ensureNonEmptyString(target, `Tag map target for '${source}' must be a non-empty string`);
    if (target.indexOf(WILDCARD) !== -1 && target.indexOf(WILDCARD) !== target.length - 1) {
      throw new CompileError(
        "csg_syntax",
        `Tag map target '${target}' may only carry '${WILDCARD}' as its last character`
      );
    }
    map.set(source, target);
  }
  return map;
}

export const DEFAULT_TAG_MAP: TagMap = createTagMap(DEFAULT_ENTRIES);

/** Reads a JSON object of `source: target` pairs. */
export async function loadTagMap(path: string): Promise<TagMap> {
  const text = await readFile(path, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new CompileError("csg_syntax", `Tag map ${path} is not valid JSON: ${msg}`);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new CompileError("csg_syntax", `Tag map ${path} must be a JSON object`);
  }
  const entries: Record<string, string> = {};
  for (const [source, target] of Object.entries(parsed)) {
    if (typeof target !== "string") {
      throw new CompileError("csg_syntax", `Tag map target for '${source}' must be a string`);
    }
    entries[source] = target;
  }
  return createTagMap(entries);
}

export function isWildcard(template: string): boolean {
  return template.endsWith(WILDCARD);
}

/**
 * Resolves a target template for a node of the given dimension. Concrete
 * templates come back unchanged; wildcards get a `2d`/`3d` suffix, or null
 * when the dimension is unknown.
 */
export function resolveTemplate(template: string, dimension: Dimension): string | null {
  if (!isWildcard(template)) return template;
  if (dimension === 0) return null;
  return `${template.slice(0, -WILDCARD.length)}${dimension}d`;
}

function ensureNonEmptyString(value: unknown, message: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw new CompileError("csg_syntax", message);
  }
  return value;
}
