/**
 * Render artifacts to files with sync frontmatter and write them to disk.
 *
 * Generated files are rewritten freely, unless the body no longer matches the
 * recorded `_sync_hash` (someone edited it by hand). Display stubs are
 * written once and then belong to the user.
 */

import { writeFileSync, readFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname, isAbsolute, relative, resolve, sep } from "node:path";
import matter from "gray-matter";
import hash from "object-hash";
import type { Artifact } from "../schema/types.js";
import { UnsafeOutputPathError } from "../schema/errors.js";

export interface ArtifactFrontmatter {
  _id: string;
  _kind: Artifact["kind"];
  _title: string;
  _sync_hash: string;
}

export type WriteStatus = "written" | "unchanged" | "skipped";

export interface WriteResult {
  path: string;
  status: WriteStatus;
  /** Set when skipped */
  reason?: string;
}

export interface WriteSummary {
  written: string[];
  unchanged: string[];
  skipped: Array<{ path: string; reason: string }>;
}

export interface WriteOptions {
  /** Overwrite hand-edited generated files */
  force?: boolean;
}

/** Deterministic hash of an artifact body */
export function computeSyncHash(body: string): string {
  return hash({ body }, { algorithm: "sha1", encoding: "hex" });
}

export function renderArtifact(artifact: Artifact): string {
  const frontmatter: ArtifactFrontmatter = {
    _id: artifact.id,
    _kind: artifact.kind,
    _title: artifact.title,
    _sync_hash: computeSyncHash(artifact.body),
  };
  return matter.stringify(`\n${artifact.body}\n`, frontmatter);
}

/** Body as written by renderArtifact, without the padding newlines */
function storedBody(content: string): string {
  return content.replace(/^\n/, "").replace(/\n$/, "");
}

/** True when the file's body still matches the hash it was written with */
function isPristine(raw: string): boolean {
  const { data, content } = matter(raw);
  const recorded: unknown = data["_sync_hash"];
  if (typeof recorded !== "string") return false;
  return computeSyncHash(storedBody(content)) === recorded;
}

/** Absolute target path; never outside the output directory */
function targetPath(artifact: Artifact, outputDir: string): string {
  const root = resolve(outputDir);
  const filePath = resolve(root, artifact.path);
  const rel = relative(root, filePath);
  if (rel === "" || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new UnsafeOutputPathError(artifact.title, `path "${artifact.path}" leaves the output directory`);
  }
  return filePath;
}

export function writeArtifact(
  artifact: Artifact,
  outputDir: string,
  options: WriteOptions = {}
): WriteResult {
  const filePath = targetPath(artifact, outputDir);
  const content = renderArtifact(artifact);

  if (existsSync(filePath)) {
    const existing = readFileSync(filePath, "utf-8");
    if (existing === content) {
      return { path: filePath, status: "unchanged" };
    }
    if (artifact.kind === "display") {
      return { path: filePath, status: "skipped", reason: "display stub already exists" };
    }
    if (!options.force && !isPristine(existing)) {
      return { path: filePath, status: "skipped", reason: "edited by hand (use --force to overwrite)" };
    }
  }

  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content, "utf-8");
  return { path: filePath, status: "written" };
}

export function writeArtifacts(
  artifacts: Artifact[],
  outputDir: string,
  options: WriteOptions = {}
): WriteSummary {
  const summary: WriteSummary = { written: [], unchanged: [], skipped: [] };
  for (const artifact of artifacts) {
    const result = writeArtifact(artifact, outputDir, options);
    if (result.status === "written") summary.written.push(result.path);
    else if (result.status === "unchanged") summary.unchanged.push(result.path);
    else summary.skipped.push({ path: result.path, reason: result.reason ?? "" });
  }
  return summary;
}
