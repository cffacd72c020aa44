import { readFile } from "node:fs/promises";
import { resolveDimension } from "./dimension.js";
import { ensureUniformDimension } from "./encode/booleans.js";
import { encoderFor } from "./encode/index.js";
import { CompileError, isCompileError } from "./errors.js";
import { lexCsg } from "./lexer.js";
import { positionalName } from "./params.js";
import { DEFAULT_TAG_MAP, NOT_AVAILABLE, resolveTemplate, type TagMap } from "./tag_map.js";
import { composeTransforms, matrixFromValue, matrixRows, type Matrix4 } from "./transform.js";
import { buildTree, type CsgNode, type SourceRecord } from "./tree.js";
import { serializeXml, XmlNode, type OutputNode } from "./xml.js";

export const XCSG_VERSION = "1.0";

const ROOT_TEMPLATE = "union*";

// the target schema has no single-operand difference/intersection
const SINGLE_CHILD_FALLBACK: Readonly<Record<string, string>> = Object.freeze({
  difference2d: "union2d",
  difference3d: "union3d",
  intersection2d: "union2d",
  intersection3d: "union3d",
});

export type ConvertOptions = {
  tagMap?: TagMap;
  /** Drop nodes without geometry instead of failing on them. */
  skipEmpty?: boolean;
  /** Significant digits for numbers, 1..17. */
  precision?: number;
  warn?: (message: string) => void;
};

export type ConversionResult =
  | { ok: true; document: XmlNode; xml: string }
  | { ok: false; error: CompileError };

type EmitContext = {
  tagMap: TagMap;
  skipEmpty: boolean;
  warn: (message: string) => void;
};

export function createXcsgDocument(): XmlNode {
  const document = new XmlNode("xcsg");
  document.addProperty("version", XCSG_VERSION);
  return document;
}

/**
 * Emits the tree under `target`. The synthetic root always becomes a union,
 * since a dump may hold several top-level shapes. Throws CompileError on the
 * first invalid node.
 */
export function convertTree(root: CsgNode, target: OutputNode, options: ConvertOptions = {}): OutputNode {
  const ctx: EmitContext = {
    tagMap: options.tagMap ?? DEFAULT_TAG_MAP,
    skipEmpty: options.skipEmpty ?? false,
    warn: options.warn ?? defaultWarn,
  };
  const tag = resolveTemplate(ROOT_TEMPLATE, resolveDimension(root));
  if (tag === null) {
    throw root.fail("dimension_unresolved", "document contains no geometry");
  }
  ensureUniformDimension(root, tag);
  const element = target.addChild(tag);
  for (const child of root.children) emitNode(child, element, ctx);
  return element;
}

export function convertRecords(
  records: readonly SourceRecord[],
  options: ConvertOptions = {}
): ConversionResult {
  return collectResult(() => buildTree(records), options);
}

export function convertCsg(text: string, options: ConvertOptions = {}): ConversionResult {
  return collectResult(() => buildTree(lexCsg(text, { warn: options.warn })), options);
}

export async function convertFile(path: string, options: ConvertOptions = {}): Promise<ConversionResult> {
  const text = await readFile(path, "utf8");
  return convertCsg(text, options);
}

function collectResult(build: () => CsgNode, options: ConvertOptions): ConversionResult {
  try {
    const document = createXcsgDocument();
    convertTree(build(), document, options);
    return { ok: true, document, xml: serializeXml(document, { precision: options.precision }) };
  } catch (err) {
    if (isCompileError(err)) return { ok: false, error: err };
    throw err;
  }
}

function emitNode(node: CsgNode, parent: OutputNode, ctx: EmitContext): void {
  if (node.isDummy()) return;

  const template = ctx.tagMap.get(node.tag);
  if (template === undefined) {
    throw node.fail("csg_unsupported", `'${node.tag}' is not supported`);
  }
  const dimension = resolveDimension(node);
  if (template === NOT_AVAILABLE) {
    throw node.fail("csg_unsupported", `'${node.tag}' is not supported`);
  }

  const resolved = resolveTemplate(template, dimension);
  if (dimension === 0 || resolved === null) {
    if (ctx.skipEmpty) {
      ctx.warn(`line ${node.line}: dropped '${node.tag}' without geometry`);
      return;
    }
    throw node.fail(
      "dimension_unresolved",
      `node dimension could not be determined: '${node.tag}' --> ${template}`
    );
  }
  const tag = node.countChildren() === 1 ? SINGLE_CHILD_FALLBACK[resolved] ?? resolved : resolved;

  const encoder = encoderFor(tag);
  if (!encoder) {
    throw node.fail("csg_unsupported", `Not supported: '${node.tag}' --> ${tag}`);
  }

  const explicit = withLocation(node, () => explicitTransform(node));
  const element = parent.addChild(tag);
  const outcome = withLocation(node, () => encoder({ node, element, tag }));
  const transform = composeTransforms(outcome.corrective, explicit);
  if (transform) {
    node.assignTransform(transform);
    writeTransform(outcome.container, transform);
  }

  for (const child of node.children) emitNode(child, outcome.container, ctx);
}

/** Matrix given as the first positional parameter, if the tag takes one. */
function explicitTransform(node: CsgNode): Matrix4 | undefined {
  const value = node.param(positionalName(0));
  if (node.tag === "multmatrix") {
    if (!value) {
      throw node.fail("param_missing", `transform matrix not found for ${node.tag}`, {
        parameter: positionalName(0),
      });
    }
    return matrixFromValue(value);
  }
  if (node.tag === "rotate_extrude" && value) return matrixFromValue(value);
  return undefined;
}

function writeTransform(container: OutputNode, matrix: Matrix4): void {
  const block = container.addChild("tmatrix");
  for (const row of matrixRows(matrix)) {
    const trow = block.addChild("trow");
    row.forEach((cell, col) => trow.addProperty(`c${col}`, cell));
  }
}

function withLocation<T>(node: CsgNode, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (isCompileError(err) && !err.location) {
      throw new CompileError(err.code, err.message, node.location, err.details);
    }
    throw err;
  }
}

function defaultWarn(message: string): void {
  console.warn(`csg2xcsg: ${message}`);
}
