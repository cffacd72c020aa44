export type CompileErrorCode =
  | "csg_syntax"
  | "tree_structure"
  | "csg_unsupported"
  | "param_missing"
  | "param_malformed"
  | "param_domain"
  | "shape_unsupported"
  | "dimension_unresolved";

export type SourceLocation = {
  line: number;
  tag: string;
  signature: string;
};

export class CompileError extends Error {
  readonly code: CompileErrorCode;
  readonly location?: SourceLocation;
  readonly details?: Record<string, unknown>;
  constructor(
    code: CompileErrorCode,
    message: string,
    location?: SourceLocation,
    details?: Record<string, unknown>
  ) {
    super(location ? `csg line ${location.line}: ${message}: ${location.signature}` : message);
    this.name = "CompileError";
    this.code = code;
    this.location = location;
    this.details = details;
  }
}

export function isCompileError(err: unknown): err is CompileError {
  return err instanceof CompileError;
}
