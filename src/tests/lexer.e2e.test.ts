import assert from "node:assert/strict";
import { lexCsg } from "../lexer.js";
import { assertCompileError, runTests } from "./test_utils.js";

const quiet = { warn: () => undefined };

const tests = [
  {
    name: "lexer: statements carry level and line",
    fn: async () => {
      const records = lexCsg(
        [
          "group() {",
          "  multmatrix([[1, 0, 0, 1], [0, 1, 0, 0], [0, 0, 1, 0], [0, 0, 0, 1]]) {",
          "    cube(size = [1, 2, 3], center = false);",
          "  }",
          "  group();",
          "}",
        ].join("\n"),
        quiet
      );
      assert.deepEqual(records, [
        { signature: "group()", level: 0, line: 1 },
        { signature: "multmatrix([[1,0,0,1],[0,1,0,0],[0,0,1,0],[0,0,0,1]])", level: 1, line: 2 },
        { signature: "cube(size=[1,2,3],center=false)", level: 2, line: 3 },
        { signature: "group()", level: 1, line: 5 },
      ]);
    },
  },
  {
    name: "lexer: strings keep their whitespace, comments are skipped",
    fn: async () => {
      const records = lexCsg(
        ['// header', 'import(file = "my part.stl", layer = "");', "/* multi", "line */ sphere(r = 2);"].join("\n"),
        quiet
      );
      assert.deepEqual(records, [
        { signature: 'import(file="my part.stl",layer="")', level: 0, line: 2 },
        { signature: "sphere(r=2)", level: 0, line: 4 },
      ]);
    },
  },
  {
    name: "lexer: statements may span lines",
    fn: async () => {
      const records = lexCsg("polyhedron(points = [[0, 0, 0],\n  [1, 0, 0]],\n faces = []);", quiet);
      assert.equal(records.length, 1);
      assert.equal(records[0]?.line, 1);
      assert.equal(records[0]?.signature, "polyhedron(points=[[0,0,0],[1,0,0]],faces=[])");
    },
  },
  {
    name: "lexer: disabled statements are dropped with their bodies",
    fn: async () => {
      const warnings: string[] = [];
      const records = lexCsg(
        ["*union() {", "  cube(size = 1);", "}", "%sphere(r = 1);", "#cylinder(h = 1, r1 = 1, r2 = 1);", "!circle(r = 1);"].join("\n"),
        { warn: (message) => warnings.push(message) }
      );
      assert.deepEqual(records, [
        { signature: "cylinder(h=1,r1=1,r2=1)", level: 0, line: 5 },
        { signature: "circle(r=1)", level: 0, line: 6 },
      ]);
      assert.deepEqual(warnings, [
        "line 1: dropped disabled statement union()",
        "line 4: dropped disabled statement sphere(r=1)",
        "line 6: '!' modifier ignored",
      ]);
    },
  },
  {
    name: "lexer: unbalanced input is a syntax error",
    fn: async () => {
      assertCompileError(() => lexCsg("group() {\n cube(size = 1);\n", quiet), "csg_syntax", /missing 1 closing/);
      assertCompileError(() => lexCsg("cube(size = 1);\n}", quiet), "csg_syntax", /^csg line 2: unbalanced '}'/);
      assertCompileError(() => lexCsg("cube(size = 1)", quiet), "csg_syntax", /^csg line 1: unterminated statement: cube\(size=1\)$/);
      assertCompileError(() => lexCsg("group() { cube(size = 1) }", quiet), "csg_syntax", /missing ';' before '}'/);
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
