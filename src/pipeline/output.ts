/**
 * output.ts - Lays out the run directory and writes documents into it
 *
 * Layout:
 *   <output>/<run-id>/
 *     collection-summary.<fmt>
 *     suse-edge-analysis.<fmt>
 *     cluster-wide-resources/[custom-resources/]<resource>/<name>.<fmt>
 *     namespaced-resources/<namespace>/[custom-resources/]<resource>/<name>.<fmt>
 *
 * A record's path is a function of its own (resource, namespace, name), so
 * concurrent writers never touch the same file and the run needs no locks.
 */

import { mkdir, rm, writeFile } from "fs/promises";
import { join } from "path";
import * as YAML from "yaml";
import { WriteError, errorMessage } from "./errors";
import {
  CLUSTER_WIDE_DIR,
  CUSTOM_RESOURCES_DIR,
  NAMESPACED_DIR,
} from "./summary";
import type { OutputFormat, ResourceRecord } from "./types";

export const SUMMARY_BASENAME = "collection-summary";
export const ANALYSIS_BASENAME = "suse-edge-analysis";

type FileFormat = "json" | "yaml";

// ---------------------------------------------------------------------------
// Pure functions (exported for unit testing)
// ---------------------------------------------------------------------------

/**
 * Formats to write for an output format setting, in write order.
 */
export function fileFormats(format: OutputFormat): FileFormat[] {
  return format === "both" ? ["json", "yaml"] : [format];
}

/**
 * Serializes a document: JSON with 2-space indentation and a trailing
 * newline, or YAML.
 *
 * YAML is written under the 1.1 schema that kubectl reads, so strings such
 * as "yes", "on" and "off" are quoted and stay strings on reapply.
 */
export function serializeDocument(document: unknown, format: FileFormat): string {
  return format === "json"
    ? `${JSON.stringify(document, null, 2)}\n`
    : YAML.stringify(document, { version: "1.1" });
}

/**
 * File name for a resource name. Names may contain ":" (system:node) and
 * other characters that are awkward in paths; URI encoding is reversible,
 * so distinct names never collide.
 */
export function encodeFileName(name: string): string {
  return encodeURIComponent(name);
}

/**
 * Directory holding a record's files, relative to the run directory.
 */
export function recordDirectory(record: ResourceRecord): string {
  const custom = record.isCustom ? [CUSTOM_RESOURCES_DIR] : [];
  return record.scope === "Cluster"
    ? join(CLUSTER_WIDE_DIR, ...custom, record.resource)
    : join(NAMESPACED_DIR, record.namespace, ...custom, record.resource);
}

/**
 * Builds the run id from the start time: collection-2026-10-19T10-15-30-123Z.
 */
export function buildRunId(startedAt: Date): string {
  return `collection-${startedAt.toISOString().replace(/[:.]/g, "-")}`;
}

// ---------------------------------------------------------------------------
// Writer
// ---------------------------------------------------------------------------

/**
 * Writes one run's documents. One instance per run.
 */
export class OutputOrganizer {
  readonly runDirectory: string;
  private readonly formats: FileFormat[];

  constructor(options: { outputDir: string; runId: string; format: OutputFormat }) {
    this.runDirectory = join(options.outputDir, options.runId);
    this.formats = fileFormats(options.format);
  }

  /**
   * Creates the run directory. The parent is created as needed; the run
   * directory itself must not exist yet.
   *
   * @throws WriteError when the directory exists or cannot be created
   */
  async createRunDirectory(): Promise<string> {
    try {
      await mkdir(join(this.runDirectory, ".."), { recursive: true });
      await mkdir(this.runDirectory);
    } catch (error) {
      throw new WriteError(
        this.runDirectory,
        `Cannot create run directory ${this.runDirectory}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    return this.runDirectory;
  }

  /**
   * Absolute paths a record is written to, one per format.
   */
  recordPaths(record: ResourceRecord): string[] {
    const dir = join(this.runDirectory, recordDirectory(record));
    const base = encodeFileName(record.name);
    return this.formats.map((format) => join(dir, `${base}.${format}`));
  }

  /**
   * Writes a record's body in every configured format.
   *
   * All or nothing: when one format fails, the files already written for
   * this record are removed before the error is raised.
   *
   * @returns Number of files written
   * @throws WriteError naming the path that failed
   */
  async writeRecord(record: ResourceRecord, body: unknown): Promise<number> {
    const dir = join(this.runDirectory, recordDirectory(record));
    const paths = this.recordPaths(record);
    const written: string[] = [];

    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw new WriteError(dir, `Cannot create ${dir}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    for (let i = 0; i < this.formats.length; i++) {
      const path = paths[i];
      try {
        await writeFile(path, serializeDocument(body, this.formats[i]), "utf-8");
        written.push(path);
      } catch (error) {
        await Promise.all(written.map((p) => rm(p, { force: true })));
        throw new WriteError(path, `Cannot write ${path}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
    }
    return written.length;
  }

  /**
   * Writes a top-level document (summary, analysis) in every format.
   *
   * @returns The written paths
   * @throws WriteError when a file cannot be written
   */
  async writeDocument(baseName: string, document: unknown): Promise<string[]> {
    const paths: string[] = [];
    for (const format of this.formats) {
      const path = join(this.runDirectory, `${baseName}.${format}`);
      try {
        await writeFile(path, serializeDocument(document, format), "utf-8");
      } catch (error) {
        throw new WriteError(path, `Cannot write ${path}: ${errorMessage(error)}`, {
          cause: error,
        });
      }
      paths.push(path);
    }
    return paths;
  }
}
