/**
 * Stage I/O contract.
 *
 * A stage takes one source file, checks that it exists, carries the right
 * extension and lives under the previous stage's output directory, then
 * writes its artifacts into its own directory. `produce` is where the
 * stage-specific work happens; it returns artifacts instead of writing them
 * so that nothing lands on disk until every check has passed.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { InvalidInputError, NotFoundError } from "@/lib/errors";
import { getDataRoot, loadConfig } from "@/lib/config";
import {
  resolveDataPaths,
  type DataPaths,
  type StageInput,
  type StageName,
  type StageOptions,
  type StageResult,
} from "./types";

export interface StageArtifact {
  fileName: string;
  contents: string;
}

export interface SourceRule {
  extensions: string[];
  /** Directory the source must live under; null for stages that accept any location */
  inputDir: string | null;
}

export interface Stage<TOptions extends StageOptions> {
  readonly name: StageName;
  run(input: StageInput, options: TOptions): Promise<StageResult>;
}

export function defineStage<TOptions extends StageOptions>(config: {
  name: StageName;
  extensions: string[];
  inputDir: ((paths: DataPaths) => string) | null;
  outputDir: (paths: DataPaths) => string;
  produce: (
    source: string,
    options: TOptions,
    paths: DataPaths
  ) => Promise<StageArtifact[]>;
}): Stage<TOptions> {
  return {
    name: config.name,
    async run(input: StageInput, options: TOptions): Promise<StageResult> {
      const paths = options.paths ?? defaultDataPaths();
      const source = validateSource(sourceOf(input), {
        extensions: config.extensions,
        inputDir: config.inputDir ? config.inputDir(paths) : null,
      });

      const artifacts = await config.produce(source, options, paths);
      const outputs = writeArtifacts(config.outputDir(paths), artifacts);

      return { stage: config.name, source, outputs };
    },
  };
}

export function defaultDataPaths(): DataPaths {
  return resolveDataPaths(getDataRoot(loadConfig()));
}

export function sourceOf(input: StageInput): string {
  if (typeof input === "string") return input;
  const [primary] = input.outputs;
  if (!primary) {
    throw new InvalidInputError(
      `Stage "${input.stage}" produced no output to continue from`
    );
  }
  return primary;
}

/**
 * Resolve a source path and enforce the stage's rule, in order:
 * existence, extension, then location.
 */
export function validateSource(source: string, rule: SourceRule): string {
  const resolved = path.resolve(expandHome(source));

  if (!fs.existsSync(resolved)) {
    throw new NotFoundError(resolved);
  }

  const ext = path.extname(resolved).toLowerCase();
  if (!rule.extensions.includes(ext)) {
    throw new InvalidInputError(
      `Unsupported file type "${ext || "(none)"}". Provide a ${rule.extensions.join(" or ")} file` +
        (rule.inputDir ? ` from ${rule.inputDir}.` : "."),
      { path: resolved, extension: ext }
    );
  }

  if (rule.inputDir && !isInside(rule.inputDir, resolved)) {
    throw new InvalidInputError(`Source must be inside ${rule.inputDir}`, {
      path: resolved,
      inputDir: rule.inputDir,
    });
  }

  return resolved;
}

export function isInside(dir: string, filePath: string): boolean {
  const rel = path.relative(path.resolve(dir), path.resolve(filePath));
  if (rel === "" || path.isAbsolute(rel)) return false;
  return rel.split(path.sep)[0] !== "..";
}

/** File name without its last extension: "doc.chunks.json" -> "doc.chunks" */
export function stemOf(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

function writeArtifacts(outputDir: string, artifacts: StageArtifact[]): string[] {
  fs.mkdirSync(outputDir, { recursive: true });
  return artifacts.map((artifact) => {
    const outputPath = path.join(outputDir, artifact.fileName);
    fs.writeFileSync(outputPath, artifact.contents, "utf-8");
    return outputPath;
  });
}
