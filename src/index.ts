export { CompileError, isCompileError } from "./errors.js";
export type { CompileErrorCode, SourceLocation } from "./errors.js";
export { parseValue, ScalarValue, VectorValue } from "./value.js";
export type { CsgValue, ScalarLiteral } from "./value.js";
export { parseSignature, parseParamList, positionalName, signatureTag } from "./params.js";
export type { ParamMap, ParsedSignature } from "./params.js";
export { lexCsg } from "./lexer.js";
export type { LexOptions } from "./lexer.js";
export { buildTree, CsgNode, formatTree, GROUP_TAG, ROOT_TAG } from "./tree.js";
export type { SourceRecord } from "./tree.js";
export { resolveDimension, generatorDimension, isPassThrough, isUnsupportedTag } from "./dimension.js";
export type { Dimension } from "./dimension.js";
export {
  createTagMap,
  DEFAULT_TAG_MAP,
  isWildcard,
  loadTagMap,
  NOT_AVAILABLE,
  resolveTemplate,
} from "./tag_map.js";
export type { TagMap } from "./tag_map.js";
export {
  composeTransforms,
  matrixFromValue,
  matrixRows,
  multiplyMatrices,
  rotationX,
} from "./transform.js";
export type { Matrix4, Vec3 } from "./transform.js";
export { sweepControlPoints, sweepSegmentCount } from "./sweep.js";
export type { ControlPoint, SweepSpec } from "./sweep.js";
export { encoderFor } from "./encode/index.js";
export type { EncodeInput, EncodeOutcome, ShapeEncoder } from "./encode/index.js";
export {
  convertCsg,
  convertFile,
  convertRecords,
  convertTree,
  createXcsgDocument,
  XCSG_VERSION,
} from "./converter.js";
export type { ConversionResult, ConvertOptions } from "./converter.js";
export { formatNum, serializeXml, XmlNode } from "./xml.js";
export type { OutputNode, PropertyValue, SerializeOptions } from "./xml.js";
