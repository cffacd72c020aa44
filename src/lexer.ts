import { CompileError } from "./errors.js";
import { signatureTag } from "./params.js";
import type { SourceRecord } from "./tree.js";

export type LexOptions = {
  warn?: (message: string) => void;
};

/**
 * Splits `.csg` text into leveled statement records. A statement ends with
 * `;` (leaf) or `{` (opens a body one level deeper). Whitespace outside string
 * literals is dropped, as are comments.
 *
 * Modifier prefixes: `*` and `%` remove the statement together with its body,
 * `!` and `#` are stripped.
 */
export function lexCsg(text: string, opts: LexOptions = {}): SourceRecord[] {
  const warn = opts.warn ?? ((message: string) => console.warn(`csg2xcsg: ${message}`));
  const records: SourceRecord[] = [];
  let level = 0;
  let line = 1;
  let buffer = "";
  let startLine = 0;
  let parens = 0;
  let skipAbove: number | null = null;

  const syntaxError = (message: string, at: number, statement: string) =>
    new CompileError("csg_syntax", message, {
      line: at,
      tag: signatureTag(statement),
      signature: statement,
    });

  const finish = (opensBody: boolean) => {
    let statement = buffer;
    buffer = "";
    if (statement.length === 0) {
      if (opensBody) throw syntaxError("'{' without a statement", line, "{");
      return;
    }
    let disabled = false;
    while (/^[*%!#]/.test(statement)) {
      const modifier = statement.charAt(0);
      if (modifier === "*" || modifier === "%") disabled = true;
      else if (modifier === "!") warn(`line ${startLine}: '!' modifier ignored`);
      statement = statement.slice(1);
    }
    if (skipAbove === null) {
      if (disabled) {
        warn(`line ${startLine}: dropped disabled statement ${statement}`);
        if (opensBody) skipAbove = level;
      } else {
        records.push({ signature: statement, level, line: startLine });
      }
    }
    if (opensBody) level += 1;
  };

  for (let i = 0; i < text.length; i += 1) {
    const ch = text.charAt(i);
    if (ch === "\n") line += 1;

    if (ch === '"') {
      // copy the whole literal, escapes included
      if (buffer.length === 0) startLine = line;
      let j = i + 1;
      while (j < text.length && text.charAt(j) !== '"') {
        if (text.charAt(j) === "\\") j += 1;
        if (text.charAt(j) === "\n") line += 1;
        j += 1;
      }
      if (j >= text.length) throw syntaxError("unterminated string", line, buffer);
      buffer += text.slice(i, j + 1);
      i = j;
      continue;
    }

    if (ch === "/" && text.charAt(i + 1) === "/") {
      while (i + 1 < text.length && text.charAt(i + 1) !== "\n") i += 1;
      continue;
    }
    if (ch === "/" && text.charAt(i + 1) === "*") {
      const end = text.indexOf("*/", i + 2);
      if (end === -1) throw syntaxError("unterminated comment", line, buffer);
      for (let j = i + 2; j < end; j += 1) {
        if (text.charAt(j) === "\n") line += 1;
      }
      i = end + 1;
      continue;
    }

    if (/\s/.test(ch)) continue;

    if (parens === 0 && ch === ";") {
      finish(false);
      continue;
    }
    if (parens === 0 && ch === "{") {
      finish(true);
      continue;
    }
    if (parens === 0 && ch === "}") {
      if (buffer.length > 0) throw syntaxError("missing ';' before '}'", startLine, buffer);
      level -= 1;
      if (level < 0) throw syntaxError("unbalanced '}'", line, "}");
      if (skipAbove !== null && level === skipAbove) skipAbove = null;
      continue;
    }

    if (ch === "(") parens += 1;
    else if (ch === ")") parens -= 1;
    if (parens < 0) throw syntaxError("unbalanced ')'", line, buffer + ch);
    if (buffer.length === 0) startLine = line;
    buffer += ch;
  }

  if (buffer.length > 0) throw syntaxError("unterminated statement", startLine, buffer);
  if (level !== 0) throw syntaxError(`missing ${level} closing '}'`, line, "}");
  return records;
}
