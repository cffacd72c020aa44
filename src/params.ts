import { CompileError } from "./errors.js";
import { parseValue, type CsgValue } from "./value.js";

export type ParamMap = ReadonlyMap<string, CsgValue>;

export type ParsedSignature = {
  tag: string;
  params: ParamMap;
};

const TAG_PATTERN = /^[A-Za-z_$][\w$]*$/;

export function positionalName(index: number): string {
  return `_p${String(index).padStart(3, "0")}`;
}

export function signatureTag(signature: string): string {
  const open = signature.indexOf("(");
  return (open === -1 ? signature : signature.slice(0, open)).trim();
}

export function parseSignature(signature: string, line: number): ParsedSignature {
  const tag = signatureTag(signature);
  if (!TAG_PATTERN.test(tag)) {
    throw new CompileError("csg_syntax", `csg line ${line}: invalid statement '${signature}'`, undefined, {
      line,
    });
  }
  const open = signature.indexOf("(");
  if (open === -1) return { tag, params: new Map() };

  const close = signature.lastIndexOf(")");
  if (close < open || signature.slice(close + 1).trim().length > 0) {
    throw new CompileError("csg_syntax", `unbalanced parentheses`, { line, tag, signature });
  }
  return { tag, params: parseParamList(signature.slice(open + 1, close), line) };
}

/**
 * Splits `name1=value1,name2=value2,...` into a parameter map. Values may be
 * nested vectors; commas and `=` only count outside brackets and strings.
 * Parameters without a name get positional names (`_p000`, `_p001`, ...).
 */
export function parseParamList(list: string, line: number): ParamMap {
  const params = new Map<string, CsgValue>();
  let depth = 0;
  let inString = false;
  let start = 0;
  let eq = -1;
  let position = 0;

  const flush = (end: number) => {
    const raw = list.slice(start, end);
    if (raw.trim().length > 0) {
      const name = eq === -1 ? positionalName(position) : list.slice(start, eq).trim();
      const valueText = eq === -1 ? raw : list.slice(eq + 1, end);
      const value = parseValue(valueText, line);
      if (value) params.set(name, value);
      position += 1;
    }
    start = end + 1;
    eq = -1;
  };

  for (let i = 0; i < list.length; i += 1) {
    const ch = list.charAt(i);
    if (inString) {
      if (ch === "\\") i += 1;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "[") depth += 1;
    else if (ch === "]") depth -= 1;
    else if (depth === 0 && ch === "=" && eq === -1) eq = i;
    else if (depth === 0 && ch === ",") flush(i);
  }
  flush(list.length);
  return params;
}
