import assert from "node:assert/strict";
import { parseParamList, parseSignature, positionalName, signatureTag } from "../params.js";
import { assertCompileError, runTests } from "./test_utils.js";

const tests = [
  {
    name: "params: named scalars and vectors",
    fn: async () => {
      const { tag, params } = parseSignature("cube(size=[2,3,4],center=true)", 3);
      assert.equal(tag, "cube");
      assert.deepEqual([...params.keys()], ["size", "center"]);
      assert.equal(params.get("size")?.size(), 3);
      assert.equal(params.get("size")?.get(2).toNumber(), 4);
      assert.equal(params.get("center")?.toBool(), true);
    },
  },
  {
    name: "params: commas inside nested vectors do not split",
    fn: async () => {
      const params = parseParamList("points=[[0,0],[1,0],[1,1]],paths=[[0,1,2]],convexity=1", 1);
      assert.equal(params.size, 3);
      assert.equal(params.get("points")?.size(), 3);
      assert.equal(params.get("points")?.get(2).get(1).toNumber(), 1);
      assert.equal(params.get("paths")?.get(0).size(), 3);
      assert.equal(params.get("convexity")?.toNumber(), 1);
    },
  },
  {
    name: "params: positional parameters get ordinal names",
    fn: async () => {
      const { params } = parseSignature(
        "multmatrix([[1,0,0,5],[0,1,0,0],[0,0,1,0],[0,0,0,1]])",
        1
      );
      assert.deepEqual([...params.keys()], ["_p000"]);
      assert.equal(params.get("_p000")?.get(0).get(3).toNumber(), 5);

      const mixed = parseParamList("1,name=2,3", 1);
      assert.deepEqual([...mixed.keys()], ["_p000", "name", "_p002"]);
      assert.equal(positionalName(12), "_p012");
    },
  },
  {
    name: "params: strings may hold separators",
    fn: async () => {
      const params = parseParamList('file="a,b=c[1].dxf",layer=""', 1);
      assert.equal(params.get("file")?.toString(), "a,b=c[1].dxf");
      assert.equal(params.get("layer")?.toString(), "");
    },
  },
  {
    name: "params: unparseable and undef values are dropped",
    fn: async () => {
      const { params } = parseSignature("polygon(points=[[0,0],[1,0],[0,1]],paths=undef,convexity=1)", 1);
      assert.deepEqual([...params.keys()], ["points", "convexity"]);
    },
  },
  {
    name: "params: empty parameter list",
    fn: async () => {
      assert.equal(parseSignature("group()", 1).params.size, 0);
      assert.equal(parseSignature("union", 1).tag, "union");
      assert.equal(signatureTag("render(convexity=2)"), "render");
    },
  },
  {
    name: "params: malformed signatures are syntax errors",
    fn: async () => {
      assertCompileError(() => parseSignature("(size=1)", 5), "csg_syntax", /invalid statement/);
      assertCompileError(() => parseSignature("cube(size=1", 5), "csg_syntax", /^csg line 5: unbalanced parentheses: cube\(size=1$/);
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
