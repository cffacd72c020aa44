export type PropertyValue = string | number | boolean;

/** The only surface the converter writes through. */
export interface OutputNode {
  addChild(tag: string): OutputNode;
  addProperty(name: string, value: PropertyValue): void;
}

export class XmlNode implements OutputNode {
  readonly children: XmlNode[] = [];
  readonly properties = new Map<string, PropertyValue>();

  constructor(readonly tag: string) {}

  addChild(tag: string): XmlNode {
    const child = new XmlNode(tag);
    this.children.push(child);
    return child;
  }

  addProperty(name: string, value: PropertyValue): void {
    this.properties.set(name, value);
  }

  property(name: string): PropertyValue | undefined {
    return this.properties.get(name);
  }

  child(tag: string): XmlNode | undefined {
    return this.children.find((child) => child.tag === tag);
  }
}

export type SerializeOptions = {
  /** Significant digits written for numbers. */
  precision?: number;
  indent?: string;
};

export const DEFAULT_PRECISION = 12;
export const MIN_PRECISION = 1;
export const MAX_PRECISION = 17;

export function serializeXml(root: XmlNode, opts: SerializeOptions = {}): string {
  const precision = opts.precision ?? DEFAULT_PRECISION;
  const indent = opts.indent ?? "  ";
  const lines = ['<?xml version="1.0" encoding="UTF-8"?>'];

  const write = (node: XmlNode, depth: number) => {
    const pad = indent.repeat(depth);
    const attrs = [...node.properties]
      .map(([name, value]) => ` ${name}="${escapeXml(formatProperty(value, precision))}"`)
      .join("");
    if (node.children.length === 0) {
      lines.push(`${pad}<${node.tag}${attrs}/>`);
      return;
    }
    lines.push(`${pad}<${node.tag}${attrs}>`);
    for (const child of node.children) write(child, depth + 1);
    lines.push(`${pad}</${node.tag}>`);
  };

  write(root, 0);
  return `${lines.join("\n")}\n`;
}

export function formatProperty(value: PropertyValue, precision = DEFAULT_PRECISION): string {
  if (typeof value === "number") return formatNum(value, precision);
  return String(value);
}

/**
 * Shortest text for `value` rounded to `precision` significant digits. Very
 * small or large magnitudes use exponent notation; `-0` is written as `0`.
 */
export function formatNum(value: number, precision = DEFAULT_PRECISION): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`cannot write non-finite number ${value}`);
  }
  if (!Number.isInteger(precision) || precision < MIN_PRECISION || precision > MAX_PRECISION) {
    throw new RangeError(`precision must be ${MIN_PRECISION}..${MAX_PRECISION}, found ${precision}`);
  }
  const rounded = Number(value.toPrecision(precision));
  return Object.is(rounded, -0) ? "0" : String(rounded);
}

function escapeXml(value: string): string {
  return value.replace(/[<>&"']/g, (ch) => {
    switch (ch) {
      case "<":
        return "&lt;";
      case ">":
        return "&gt;";
      case "&":
        return "&amp;";
      case '"':
        return "&quot;";
      default:
        return "&apos;";
    }
  });
}
