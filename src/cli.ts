#!/usr/bin/env node
/**
 * Command line converter from OpenSCAD .csg dumps to .xcsg documents.
 */

import { Command } from "commander";
import { existsSync, realpathSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { pathToFileURL } from "node:url";
import { convertCsg, type ConvertOptions } from "./converter.js";
import { lexCsg } from "./lexer.js";
import { loadTagMap } from "./tag_map.js";
import { buildTree, formatTree } from "./tree.js";
import { DEFAULT_PRECISION, MAX_PRECISION, MIN_PRECISION } from "./xml.js";

export const CLI_VERSION = "0.1.0";

type CliOptions = {
  output?: string;
  tagMap?: string;
  skipEmpty?: boolean;
  precision?: string;
  dump?: boolean;
};

export function outputPathFor(input: string): string {
  const ext = path.extname(input);
  return `${ext ? input.slice(0, -ext.length) : input}.xcsg`;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("csg2xcsg")
    .description("Convert an OpenSCAD .csg file to xcsg XML")
    .version(CLI_VERSION)
    .argument("<input>", "OpenSCAD .csg file")
    .option("-o, --output <path>", "Output .xcsg file (default: input with .xcsg extension)")
    .option("-t, --tag-map <path>", "JSON file replacing the built-in tag mapping")
    .option("--skip-empty", "Drop nodes without geometry instead of failing")
    .option("-p, --precision <digits>", "Significant digits written for numbers", String(DEFAULT_PRECISION))
    .option("--dump", "Print the parsed node tree and exit")
    .action(async (input: string, options: CliOptions) => {
      const text = await readFile(input, "utf8");

      if (options.dump) {
        console.log(formatTree(buildTree(lexCsg(text))));
        return;
      }

      const precision = Number(options.precision ?? DEFAULT_PRECISION);
      if (!Number.isInteger(precision) || precision < MIN_PRECISION || precision > MAX_PRECISION) {
        return program.error(
          `Invalid precision '${options.precision}': expected ${MIN_PRECISION}..${MAX_PRECISION}`
        );
      }
      const convertOptions: ConvertOptions = {
        skipEmpty: options.skipEmpty ?? false,
        precision,
      };
      if (options.tagMap) convertOptions.tagMap = await loadTagMap(options.tagMap);

      const result = convertCsg(text, convertOptions);
      if (!result.ok) {
        return program.error(result.error.message);
      }

      const outputPath = path.resolve(options.output ?? outputPathFor(input));
      await writeFile(outputPath, result.xml, "utf8");
      console.log(`csg2xcsg: wrote ${outputPath}`);
    });

  return program;
}

/**
 * Whether `entry` (usually `process.argv[1]`) runs the module at `moduleUrl`.
 * Installed bin entries are symlinks, while module URLs name the real file.
 */
export function isEntryPoint(moduleUrl: string, entry: string | undefined): boolean {
  if (!entry || !existsSync(entry)) return false;
  return moduleUrl === pathToFileURL(realpathSync(entry)).href;
}

if (isEntryPoint(import.meta.url, process.argv[1])) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    });
}
