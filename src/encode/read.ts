import type { CsgNode } from "../tree.js";
import type { CsgValue } from "../value.js";

export function requireParam(node: CsgNode, name: string): CsgValue {
  const value = node.param(name);
  if (!value) {
    throw node.fail("param_missing", `parameter '${name}' not found for ${node.tag}`, {
      parameter: name,
    });
  }
  return value;
}

export function requireNumber(node: CsgNode, name: string): number {
  return asNumber(node, name, requireParam(node, name));
}

export function optionalNumber(node: CsgNode, name: string): number | undefined {
  const value = node.param(name);
  return value ? asNumber(node, name, value) : undefined;
}

export function readBool(node: CsgNode, name: string, fallback: boolean): boolean {
  const value = node.param(name);
  if (!value) return fallback;
  if (value.isVector()) {
    throw node.fail("param_malformed", `parameter '${name}' must be a boolean, found ${value.toString()}`, {
      parameter: name,
    });
  }
  return value.toBool();
}

export function requirePositive(node: CsgNode, name: string, value: number): number {
  if (!(value > 0)) {
    throw node.fail("param_domain", `${name} must be > 0, found ${value}`, {
      parameter: name,
      value,
    });
  }
  return value;
}

export function requireNonNegative(node: CsgNode, name: string, value: number): number {
  if (!(value >= 0)) {
    throw node.fail("param_domain", `${name} must be >= 0, found ${value}`, {
      parameter: name,
      value,
    });
  }
  return value;
}

/** A radius given directly or as a diameter. */
export function readRadius(node: CsgNode, radius: string, diameter: string): number | undefined {
  const r = optionalNumber(node, radius);
  if (r !== undefined) return r;
  const d = optionalNumber(node, diameter);
  return d === undefined ? undefined : d / 2;
}

/**
 * Per-axis extents from a size-like parameter: a scalar applies to every axis,
 * a vector gives one value per axis.
 */
export function readExtents(node: CsgNode, name: string, axes: number): number[] {
  const value = requireParam(node, name);
  if (!value.isVector()) {
    const uniform = asNumber(node, name, value);
    return new Array<number>(axes).fill(uniform);
  }
  if (value.size() === 1) {
    const uniform = asNumber(node, name, value.get(0));
    return new Array<number>(axes).fill(uniform);
  }
  if (value.size() < axes) {
    throw node.fail("param_malformed", `parameter '${name}' must have ${axes} values, found ${value.size()}`, {
      parameter: name,
      expected: axes,
      found: value.size(),
    });
  }
  const out: number[] = [];
  for (let i = 0; i < axes; i += 1) out.push(asNumber(node, name, value.get(i)));
  return out;
}

export function asNumber(node: CsgNode, name: string, value: CsgValue): number {
  if (value.isVector()) {
    throw node.fail("param_malformed", `parameter '${name}' must be a number, found ${value.toString()}`, {
      parameter: name,
    });
  }
  const number = value.toNumber();
  if (!Number.isFinite(number)) {
    throw node.fail("param_domain", `${name} must be finite, found ${value.toString()}`, {
      parameter: name,
    });
  }
  return number;
}
