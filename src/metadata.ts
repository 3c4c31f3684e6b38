import path from "path";

import { z } from "zod";

import type { Logger } from "./debug";
import type { ProcessRunner } from "./process-runner";

export type DependencyEdge = {
  /** dependency name as declared by the depending package */
  name: string;
  /** package id the edge resolves to */
  pkgId: string;
};

export type DependencyNode = {
  id: string;
  deps: DependencyEdge[];
};

export type PackageInfo = {
  id: string;
  name: string;
  /** absolute path of the package's manifest file */
  manifestPath: string;
};

/** Typed view of `cargo metadata` output. */
export type DependencyGraph = {
  /** id of the project's own package (`null` for a virtual workspace) */
  rootPackageId: string | null;
  nodes: DependencyNode[];
  packages: PackageInfo[];
};

export type MetadataErrorKind = "query-failed" | "invalid-metadata" | "dependency-not-found";

export class MetadataError extends Error {
  constructor(
    readonly kind: MetadataErrorKind,
    message: string
  ) {
    super(message);
    this.name = "MetadataError";
  }
}

/**
 * Raised when an edge points at a package id missing from `packages`.
 *
 * cargo never emits such a graph; this is an internal fault, not a user error.
 */
export class MetadataIntegrityError extends Error {
  constructor(readonly pkgId: string) {
    super(`cargo metadata is inconsistent: package '${pkgId}' is referenced but not listed`);
    this.name = "MetadataIntegrityError";
  }
}

export type MetadataResult =
  | {
      ok: true;
      /** source directory of the dependency */
      path: string;
      /** name of the root package (`null` when it is not listed) */
      rootPackageName: string | null;
    }
  | { ok: false; error: MetadataError };

const cargoMetadataSchema = z.object({
  packages: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      manifest_path: z.string(),
    })
  ),
  resolve: z.object({
    root: z.string().nullable(),
    nodes: z.array(
      z.object({
        id: z.string(),
        deps: z
          .array(
            z.object({
              name: z.string(),
              pkg: z.string(),
            })
          )
          .default([]),
      })
    ),
  }),
});

/**
 * Validate a `cargo metadata` document into a {@link DependencyGraph}.
 *
 * @throws {MetadataError} with kind `invalid-metadata`
 */
export function parseDependencyGraph(raw: unknown): DependencyGraph {
  const parsed = cargoMetadataSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new MetadataError(
      "invalid-metadata",
      `Unexpected cargo metadata format${where}: ${issue?.message ?? "invalid document"}`
    );
  }

  const { packages, resolve } = parsed.data;
  return {
    rootPackageId: resolve.root,
    nodes: resolve.nodes.map((node) => ({
      id: node.id,
      deps: node.deps.map((dep) => ({ name: dep.name, pkgId: dep.pkg })),
    })),
    packages: packages.map((pkg) => ({
      id: pkg.id,
      name: pkg.name,
      manifestPath: pkg.manifest_path,
    })),
  };
}

/**
 * Find the package id of the root package's dependency called `name`.
 *
 * Both scans stop at the first match.
 */
export function findDependencyPackageId(graph: DependencyGraph, name: string): string | null {
  const root = graph.nodes.find((node) => node.id === graph.rootPackageId);
  if (!root) return null;
  const edge = root.deps.find((dep) => dep.name === name);
  return edge ? edge.pkgId : null;
}

/** Name of the project's own package, first match by id. */
export function findRootPackageName(graph: DependencyGraph): string | null {
  const root = graph.packages.find((pkg) => pkg.id === graph.rootPackageId);
  return root ? root.name : null;
}

/**
 * Directory containing the manifest of package `pkgId`.
 *
 * @throws {MetadataIntegrityError} if no package has that id
 */
export function findManifestDir(graph: DependencyGraph, pkgId: string): string {
  const pkg = graph.packages.find((candidate) => candidate.id === pkgId);
  if (!pkg) {
    throw new MetadataIntegrityError(pkgId);
  }
  return path.dirname(pkg.manifestPath);
}

export type ResolveDependencyOptions = {
  runner: ProcessRunner;
  /** cargo binary path (default: "cargo") */
  cargoPath?: string;
  /** directory cargo runs in; must be the project root */
  cwd?: string;
  logger?: Logger;
};

/**
 * Locate the on-disk source directory of dependency `name`.
 *
 * Runs `cargo metadata` in the project root and walks the resolved graph
 * from the root package. The root package's name comes back alongside, since
 * it is the default kernel binary name.
 */
export async function resolveDependencyPath(
  name: string,
  options: ResolveDependencyOptions
): Promise<MetadataResult> {
  const cargo = options.cargoPath ?? "cargo";
  const logger = options.logger;

  const result = await options.runner.capture(cargo, ["metadata"], { cwd: options.cwd });
  if (result.exitCode !== 0) {
    // stderr was left attached, so cargo already explained the failure
    const reason = result.spawnError
      ? `could not start '${cargo}': ${result.spawnError.message}`
      : `'${cargo} metadata' exited with status ${result.exitCode}`;
    return { ok: false, error: new MetadataError("query-failed", `Failed to query project metadata: ${reason}`) };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(result.stdout);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      ok: false,
      error: new MetadataError("invalid-metadata", `cargo metadata output is not valid JSON: ${message}`),
    };
  }

  let graph: DependencyGraph;
  try {
    graph = parseDependencyGraph(raw);
  } catch (err) {
    if (err instanceof MetadataError) {
      return { ok: false, error: err };
    }
    throw err;
  }
  logger?.debug(
    "metadata",
    `root=${graph.rootPackageId ?? "<none>"} nodes=${graph.nodes.length} packages=${graph.packages.length}`
  );

  const pkgId = findDependencyPackageId(graph, name);
  if (pkgId === null) {
    return {
      ok: false,
      error: new MetadataError("dependency-not-found", `No dependency '${name}' found`),
    };
  }
  logger?.debug("metadata", `${name} -> ${pkgId}`);

  const dir = findManifestDir(graph, pkgId);
  logger?.debug("metadata", `${name} source directory: ${dir}`);
  return { ok: true, path: dir, rootPackageName: findRootPackageName(graph) };
}
