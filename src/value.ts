import { CompileError } from "./errors.js";

export type ScalarLiteral = number | boolean | string;

export interface CsgValue {
  readonly line: number;
  size(): number;
  get(index: number): CsgValue;
  isVector(): boolean;
  toNumber(): number;
  toInt(): number;
  toBool(): boolean;
  toString(): string;
}

export class ScalarValue implements CsgValue {
  constructor(
    readonly value: ScalarLiteral,
    readonly line: number,
    private readonly text: string = String(value)
  ) {}

  size(): number {
    return 1;
  }

  get(index: number): CsgValue {
    if (index !== 0) {
      throw malformed(this.line, `index ${index} out of range for scalar ${this.text}`);
    }
    return this;
  }

  isVector(): boolean {
    return false;
  }

  toNumber(): number {
    if (typeof this.value !== "number") {
      throw malformed(this.line, `expected a number, found ${this.text}`);
    }
    return this.value;
  }

  toInt(): number {
    return Math.trunc(this.toNumber());
  }

  toBool(): boolean {
    if (typeof this.value === "boolean") return this.value;
    if (typeof this.value === "number") return this.value !== 0;
    throw malformed(this.line, `expected a boolean, found ${this.text}`);
  }

  toString(): string {
    return this.text;
  }
}

export class VectorValue implements CsgValue {
  constructor(readonly items: readonly CsgValue[], readonly line: number) {}

  size(): number {
    return this.items.length;
  }

  get(index: number): CsgValue {
    const item = this.items[index];
    if (!item) {
      throw malformed(
        this.line,
        `index ${index} out of range for vector of size ${this.items.length}`
      );
    }
    return item;
  }

  isVector(): boolean {
    return true;
  }

  toNumber(): number {
    throw malformed(this.line, `expected a number, found ${this.toString()}`);
  }

  toInt(): number {
    return this.toNumber();
  }

  toBool(): boolean {
    throw malformed(this.line, `expected a boolean, found ${this.toString()}`);
  }

  toString(): string {
    return `[${this.items.map((item) => item.toString()).join(",")}]`;
  }
}

const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;

/**
 * Parses one literal as written in a `.csg` parameter list.
 *
 * Returns null for `undef` and for anything that is not a number, boolean,
 * string or (nested) vector of those.
 */
export function parseValue(raw: string, line: number): CsgValue | null {
  const text = raw.trim();
  let pos = 0;

  const skipSpace = () => {
    while (pos < text.length && /\s/.test(text.charAt(pos))) pos += 1;
  };

  const readValue = (): CsgValue | null => {
    skipSpace();
    const ch = text.charAt(pos);
    if (ch === "[") return readVector();
    if (ch === '"') return readString();
    const rest = text.slice(pos);
    const number = NUMBER_PATTERN.exec(rest);
    if (number) {
      pos += number[0].length;
      return new ScalarValue(Number(number[0]), line, number[0]);
    }
    for (const keyword of ["true", "false"] as const) {
      if (rest.startsWith(keyword)) {
        pos += keyword.length;
        return new ScalarValue(keyword === "true", line, keyword);
      }
    }
    return null;
  };

  const readVector = (): CsgValue | null => {
    pos += 1;
    const items: CsgValue[] = [];
    skipSpace();
    if (text.charAt(pos) === "]") {
      pos += 1;
      return new VectorValue(items, line);
    }
    while (pos < text.length) {
      const item = readValue();
      if (!item) return null;
      items.push(item);
      skipSpace();
      const sep = text.charAt(pos);
      pos += 1;
      if (sep === "]") return new VectorValue(items, line);
      if (sep !== ",") return null;
    }
    return null;
  };

  const readString = (): CsgValue | null => {
    let out = "";
    pos += 1;
    while (pos < text.length) {
      const ch = text.charAt(pos);
      pos += 1;
      if (ch === "\\" && pos < text.length) {
        out += text.charAt(pos);
        pos += 1;
        continue;
      }
      if (ch === '"') return new ScalarValue(out, line, out);
      out += ch;
    }
    return null;
  };

  const value = readValue();
  skipSpace();
  if (!value || pos !== text.length) return null;
  return value;
}

function malformed(line: number, message: string): CompileError {
  return new CompileError("param_malformed", message, undefined, { line });
}
