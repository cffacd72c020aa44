import type { Matrix4 } from "../transform.js";
import type { CsgNode } from "../tree.js";
import type { OutputNode } from "../xml.js";

export type EncodeInput = {
  node: CsgNode;
  /** Output element already created under the resolved target tag. */
  element: OutputNode;
  tag: string;
};

export type EncodeOutcome = {
  /** Where the node's transform block and source children are attached. */
  container: OutputNode;
  /** Extra transform applied after any parameter matrix. */
  corrective?: Matrix4;
};

export type ShapeEncoder = (input: EncodeInput) => EncodeOutcome;
