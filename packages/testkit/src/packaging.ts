/**
 * Reads a workspace package's manifest and build config so tests can check
 * that its entry points are files the build actually emits
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";

const ManifestSchema = z.object({
  name: z.string(),
  bin: z.record(z.string()).optional(),
  exports: z
    .object({
      ".": z.object({ types: z.string(), import: z.string(), default: z.string().optional() }),
    })
    .optional(),
});

const BuildConfigSchema = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
});

export interface EntryPoint {
  /** Where the manifest points, relative to the package */
  target: string;
  /** Source file that compiles to `target`, or undefined if none maps to it */
  source: string | undefined;
  sourceExists: boolean;
}

export interface PackageBuild {
  name: string;
  rootDir: string;
  outDir: string;
  bins: Record<string, EntryPoint>;
  /** `exports["."].import`, when the package has one */
  runtimeEntry: EntryPoint | undefined;
  /** `exports["."].types` */
  typesEntry: string | undefined;
}

async function readJson<T>(path: string, schema: z.ZodType<T>): Promise<T> {
  return schema.parse(JSON.parse(await readFile(path, "utf8")));
}

function trimDot(path: string): string {
  return path.replace(/^\.\//, "").replace(/\/$/, "");
}

/**
 * Inspect one package directory
 */
export async function inspectPackageBuild(packageDir: string): Promise<PackageBuild> {
  const manifest = await readJson(join(packageDir, "package.json"), ManifestSchema);
  const { compilerOptions } = await readJson(join(packageDir, "tsconfig.build.json"), BuildConfigSchema);
  const rootDir = trimDot(compilerOptions.rootDir);
  const outDir = trimDot(compilerOptions.outDir);

  const entry = (target: string): EntryPoint => {
    const built = trimDot(target);
    const prefix = `${outDir}/`;
    if (!built.startsWith(prefix) || !built.endsWith(".js")) {
      return { target, source: undefined, sourceExists: false };
    }
    const source = `${rootDir}/${built.slice(prefix.length, -".js".length)}.ts`;
    return { target, source, sourceExists: existsSync(join(packageDir, source)) };
  };

  const bins: Record<string, EntryPoint> = {};
  for (const [name, target] of Object.entries(manifest.bin ?? {})) {
    bins[name] = entry(target);
  }
  const root = manifest.exports?.["."];

  return {
    name: manifest.name,
    rootDir,
    outDir,
    bins,
    runtimeEntry: root ? entry(root.import) : undefined,
    typesEntry: root?.types,
  };
}
