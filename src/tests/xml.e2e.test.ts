import assert from "node:assert/strict";
import { formatNum, serializeXml, XmlNode } from "../xml.js";
import { runTests } from "./test_utils.js";

const tests = [
  {
    name: "xml: numbers keep significant digits",
    fn: async () => {
      assert.equal(formatNum(2), "2");
      assert.equal(formatNum(-0), "0");
      assert.equal(formatNum(1.5), "1.5");
      assert.equal(formatNum(1 / 3), "0.333333333333");
      assert.equal(formatNum(2 * Math.PI), "6.28318530718");
      assert.equal(formatNum(1e-13), "1e-13");
      assert.equal(formatNum(10000), "10000");
      assert.equal(formatNum(0.0001), "0.0001");
      assert.equal(formatNum(2.54321, 3), "2.54");
      assert.equal(formatNum(-0.0000001, 3), "-1e-7");
    },
  },
  {
    name: "xml: non-finite numbers and bad precision are refused",
    fn: async () => {
      assert.throws(() => formatNum(Number.POSITIVE_INFINITY), /cannot write non-finite number Infinity/);
      assert.throws(() => formatNum(Number.NaN), RangeError);
      assert.throws(() => formatNum(1, 0), /precision must be 1\.\.17, found 0/);
      assert.throws(() => formatNum(1, 18), RangeError);
    },
  },
  {
    name: "xml: serializer escapes attributes and closes empty elements",
    fn: async () => {
      const root = new XmlNode("xcsg");
      root.addProperty("version", "1.0");
      const shape = root.addChild("circle");
      shape.addProperty("r", 0.25);
      shape.addProperty("note", 'a<b & "c"');
      root.addChild("union2d");
      assert.equal(
        serializeXml(root),
        [
          '<?xml version="1.0" encoding="UTF-8"?>',
          '<xcsg version="1.0">',
          '  <circle r="0.25" note="a&lt;b &amp; &quot;c&quot;"/>',
          "  <union2d/>",
          "</xcsg>",
          "",
        ].join("\n")
      );
    },
  },
];

runTests(tests).catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
