/**
 * summary.ts - Run-wide counters and the collection summary document
 *
 * SummaryAggregator is the one piece of shared mutable state in a run. Every
 * stage reports into the instance the runner hands it; nothing is global, so
 * two runs in one process (as in the tests) never see each other's counts.
 *
 * Record counts only move when a record's files are on disk, which keeps the
 * summary consistent with the tree.
 */

import { join } from "path";
import type { WorkItemOutcome } from "./discovery";
import type { FetchError } from "./errors";
import type {
  CollectionSummary,
  FailureEntry,
  OutputFormat,
  ResourceRecord,
} from "./types";

export const TOOL_NAME = "cluster-collector";
export const TOOL_VERSION = "0.1.0";

/** Top-level directories of a run */
export const CLUSTER_WIDE_DIR = "cluster-wide-resources";
export const NAMESPACED_DIR = "namespaced-resources";
export const CUSTOM_RESOURCES_DIR = "custom-resources";

function increment(counts: Record<string, number>, key: string, by = 1): void {
  counts[key] = (counts[key] ?? 0) + by;
}

/**
 * Collects counters for one run and produces the final CollectionSummary.
 */
export class SummaryAggregator {
  private readonly runId: string;
  private readonly startedAt: Date;
  private readonly raw: boolean;

  private kubernetesVersion: string | undefined;
  private namespaces: string[] = [];
  private readonly resourceCounts: Record<string, number> = {};
  private readonly namespaceCounts: Record<string, Record<string, number>> = {};
  private readonly categoryCounts: Record<string, number> = {};
  private clusterResourceCount = 0;
  private namespacedResourceCount = 0;
  private filesWritten = 0;
  private readonly sanitization = { processed: 0, succeeded: 0, failed: 0 };
  private readonly fetch = { succeeded: 0, failed: 0, cancelled: 0 };
  private readonly failures: FailureEntry[] = [];
  private deadlineExceeded = false;

  constructor(options: { runId: string; startedAt: Date; raw: boolean }) {
    this.runId = options.runId;
    this.startedAt = options.startedAt;
    this.raw = options.raw;
  }

  setKubernetesVersion(version: string | undefined): void {
    this.kubernetesVersion = version;
  }

  setNamespaces(namespaces: readonly string[]): void {
    this.namespaces = [...namespaces].sort();
  }

  /**
   * Counts a finished work item; failed items become fetch failure entries.
   */
  recordFetchOutcome(outcome: WorkItemOutcome): void {
    if (outcome.status === "succeeded") {
      this.fetch.succeeded++;
    } else if (outcome.status === "cancelled") {
      this.fetch.cancelled++;
    } else {
      this.recordFetchFailure(outcome.error);
    }
  }

  /**
   * Records a listing that failed outside the work item plan (namespaces,
   * CRDs). Cancelled listings are counted, not listed.
   */
  recordFetchFailure(error: FetchError): void {
    if (error.cancelled) {
      this.fetch.cancelled++;
      return;
    }
    this.fetch.failed++;
    this.failures.push({
      stage: "fetch",
      resource: error.resource,
      namespace: error.namespace,
      message: error.message,
    });
  }

  /**
   * Counts one sanitization attempt. Failures are also listed by name.
   */
  recordSanitization(record: ResourceRecord, error?: Error): void {
    this.sanitization.processed++;
    if (!error) {
      this.sanitization.succeeded++;
      return;
    }
    this.sanitization.failed++;
    this.recordFailure("sanitize", record, error.message);
  }

  recordFailure(stage: FailureEntry["stage"], record: ResourceRecord, message: string): void {
    this.failures.push({
      stage,
      resource: record.resource,
      namespace: record.namespace,
      name: record.name,
      message,
    });
  }

  /**
   * Counts a record whose files are all on disk.
   */
  recordWritten(record: ResourceRecord, files: number): void {
    this.filesWritten += files;
    increment(this.resourceCounts, record.resource);
    increment(this.categoryCounts, record.category);
    if (record.scope === "Cluster") {
      this.clusterResourceCount++;
    } else {
      this.namespacedResourceCount++;
      this.namespaceCounts[record.namespace] ??= {};
      increment(this.namespaceCounts[record.namespace], record.resource);
    }
  }

  markDeadlineExceeded(): void {
    this.deadlineExceeded = true;
  }

  /**
   * Produces the summary. Maps are emitted with sorted keys so two runs over
   * the same cluster produce identical documents apart from timestamps.
   */
  finalize(finishedAt: Date = new Date()): CollectionSummary {
    const total = this.clusterResourceCount + this.namespacedResourceCount;
    return {
      runId: this.runId,
      startedAt: this.startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      ...(this.kubernetesVersion ? { kubernetesVersion: this.kubernetesVersion } : {}),
      namespaces: [...this.namespaces],
      resourceCounts: sortKeys(this.resourceCounts),
      namespaceCounts: Object.fromEntries(
        Object.keys(this.namespaceCounts)
          .sort()
          .map((ns) => [ns, sortKeys(this.namespaceCounts[ns])])
      ),
      categoryCounts: sortKeys(this.categoryCounts),
      clusterResourceCount: this.clusterResourceCount,
      namespacedResourceCount: this.namespacedResourceCount,
      totalResourceCount: total,
      sanitization: { mode: this.raw ? "raw" : "sanitized", ...this.sanitization },
      fetch: { ...this.fetch },
      failures: [...this.failures].sort(compareFailures),
      deadlineExceeded: this.deadlineExceeded,
      filesWritten: this.filesWritten,
      empty: this.filesWritten === 0,
    };
  }
}

function sortKeys(counts: Record<string, number>): Record<string, number> {
  return Object.fromEntries(Object.keys(counts).sort().map((k) => [k, counts[k]]));
}

function compareFailures(a: FailureEntry, b: FailureEntry): number {
  return (
    a.stage.localeCompare(b.stage) ||
    a.resource.localeCompare(b.resource) ||
    a.namespace.localeCompare(b.namespace) ||
    (a.name ?? "").localeCompare(b.name ?? "")
  );
}

// ---------------------------------------------------------------------------
// Summary document
// ---------------------------------------------------------------------------

/**
 * Where the run put things, for the summary document and the CLI.
 */
export interface OutputPaths {
  runDirectory: string;
  archivePath?: string;
}

/**
 * The summary as written to collection-summary.<fmt>.
 */
export interface SummaryDocument {
  collection: {
    timestamp: string;
    tool: string;
    version: string;
    runId: string;
    kubernetesVersion?: string;
    durationSeconds: number;
    namespaces: string[];
  };
  totals: {
    resources: number;
    clusterScoped: number;
    namespaced: number;
    filesWritten: number;
    empty: boolean;
  };
  resourceCounts: Record<string, number>;
  namespaceCounts: Record<string, Record<string, number>>;
  categoryHighlights: Record<string, number>;
  sanitization: CollectionSummary["sanitization"];
  fetch: CollectionSummary["fetch"];
  deadlineExceeded: boolean;
  failures: FailureEntry[];
  output: {
    format: OutputFormat;
    runDirectory: string;
    clusterWideResources: string;
    namespacedResources: string;
    archive?: string;
  };
  reapplyHints: string[];
}

/**
 * Builds `kubectl apply` commands for the emitted subtrees.
 *
 * Cluster-wide resources come first: namespaced ones may depend on them
 * (roles, storage classes, CRD instances' definitions).
 */
export function buildReapplyHints(summary: CollectionSummary, runDirectory: string): string[] {
  const hints: string[] = [];
  if (summary.clusterResourceCount > 0) {
    hints.push(`kubectl apply -R -f ${join(runDirectory, CLUSTER_WIDE_DIR)}`);
  }
  if (summary.namespacedResourceCount > 0) {
    hints.push(`kubectl apply -R -f ${join(runDirectory, NAMESPACED_DIR)}`);
    for (const ns of Object.keys(summary.namespaceCounts)) {
      hints.push(`kubectl apply -R -f ${join(runDirectory, NAMESPACED_DIR, ns)}`);
    }
  }
  return hints;
}

export function buildSummaryDocument(
  summary: CollectionSummary,
  paths: OutputPaths,
  format: OutputFormat
): SummaryDocument {
  const durationMs = Date.parse(summary.finishedAt) - Date.parse(summary.startedAt);
  return {
    collection: {
      timestamp: summary.startedAt,
      tool: TOOL_NAME,
      version: TOOL_VERSION,
      runId: summary.runId,
      ...(summary.kubernetesVersion ? { kubernetesVersion: summary.kubernetesVersion } : {}),
      durationSeconds: Math.max(0, durationMs) / 1000,
      namespaces: summary.namespaces,
    },
    totals: {
      resources: summary.totalResourceCount,
      clusterScoped: summary.clusterResourceCount,
      namespaced: summary.namespacedResourceCount,
      filesWritten: summary.filesWritten,
      empty: summary.empty,
    },
    resourceCounts: summary.resourceCounts,
    namespaceCounts: summary.namespaceCounts,
    categoryHighlights: summary.categoryCounts,
    sanitization: summary.sanitization,
    fetch: summary.fetch,
    deadlineExceeded: summary.deadlineExceeded,
    failures: summary.failures,
    output: {
      format,
      runDirectory: paths.runDirectory,
      clusterWideResources: join(paths.runDirectory, CLUSTER_WIDE_DIR),
      namespacedResources: join(paths.runDirectory, NAMESPACED_DIR),
      ...(paths.archivePath ? { archive: paths.archivePath } : {}),
    },
    reapplyHints: buildReapplyHints(summary, paths.runDirectory),
  };
}
