import { CompileError, type CompileErrorCode, type SourceLocation } from "./errors.js";
import { parseSignature, signatureTag, type ParamMap } from "./params.js";
import type { Matrix4 } from "./transform.js";
import type { CsgValue } from "./value.js";

export type SourceRecord = {
  readonly signature: string;
  readonly level: number;
  readonly line: number;
};

export const ROOT_TAG = "root";
export const GROUP_TAG = "group";

export class CsgNode {
  readonly children: CsgNode[] = [];
  private matrix?: Matrix4;

  private constructor(
    readonly level: number,
    readonly line: number,
    readonly signature: string,
    readonly tag: string,
    readonly params: ParamMap
  ) {}

  static root(): CsgNode {
    return new CsgNode(-1, 0, `${ROOT_TAG}()`, ROOT_TAG, new Map());
  }

  static fromRecord(record: SourceRecord): CsgNode {
    const { tag, params } = parseSignature(record.signature, record.line);
    return new CsgNode(record.level, record.line, record.signature, tag, params);
  }

  get isRoot(): boolean {
    return this.level === -1;
  }

  get location(): SourceLocation {
    return { line: this.line, tag: this.tag, signature: this.signature };
  }

  get transform(): Matrix4 | undefined {
    return this.matrix?.slice();
  }

  get hasTransform(): boolean {
    return this.matrix !== undefined;
  }

  assignTransform(matrix: Matrix4): void {
    this.matrix = matrix.slice();
  }

  param(name: string): CsgValue | undefined {
    return this.params.get(name);
  }

  /** A group with no geometric content: empty, or holding only dummy groups. */
  isDummy(): boolean {
    if (this.tag !== GROUP_TAG) return false;
    return this.children.every((child) => child.isDummy());
  }

  /** Number of children that are not dummy. */
  countChildren(): number {
    return this.children.filter((child) => !child.isDummy()).length;
  }

  fail(code: CompileErrorCode, message: string, details?: Record<string, unknown>): CompileError {
    return new CompileError(code, message, this.location, details);
  }
}

/**
 * Rebuilds parent/child nesting from the flat record list. A record one level
 * below its predecessor's parent level becomes a child; a shallower one ends
 * the current subtree.
 */
export function buildTree(records: readonly SourceRecord[]): CsgNode {
  const root = CsgNode.root();
  const cursor = { index: 0 };
  attachChildren(root, records, cursor);
  const leftover = records[cursor.index];
  if (leftover) {
    throw new CompileError(
      "tree_structure",
      `unexpected nesting level ${leftover.level}`,
      recordLocation(leftover),
      { level: leftover.level }
    );
  }
  return root;
}

function attachChildren(
  parent: CsgNode,
  records: readonly SourceRecord[],
  cursor: { index: number }
): void {
  const expected = parent.level + 1;
  while (cursor.index < records.length) {
    const record = records[cursor.index];
    if (!record || record.level < expected) return;
    if (record.level > expected) {
      throw new CompileError(
        "tree_structure",
        `nesting level ${record.level} skips levels below parent level ${parent.level}`,
        recordLocation(record),
        { level: record.level, expected }
      );
    }
    const child = CsgNode.fromRecord(record);
    parent.children.push(child);
    cursor.index += 1;
    attachChildren(child, records, cursor);
  }
}

function recordLocation(record: SourceRecord): SourceLocation {
  return { line: record.line, tag: signatureTag(record.signature), signature: record.signature };
}

export function formatTree(node: CsgNode): string {
  const lines: string[] = [];
  const visit = (current: CsgNode) => {
    if (!current.isRoot) {
      const params = [...current.params]
        .map(([name, value]) => `${name}=${value.toString()}`)
        .join(" ");
      const indent = " ".repeat(current.level);
      lines.push(params ? `${indent}${current.tag} ${params}` : `${indent}${current.tag}`);
    }
    for (const child of current.children) visit(child);
  };
  visit(node);
  return lines.join("\n");
}
