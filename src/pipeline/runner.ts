/**
 * runner.ts - Collection run orchestrator
 *
 * Wires the pipeline stages into one run:
 * 1. Session: prove the kubeconfig reaches the API server
 * 2. Plan: resolve namespaces, discover CRDs, build work items
 * 3. Enumerate: list every work item through the worker pool; each record
 *    is observed by detection, sanitized, written, and counted as it arrives
 * 4. Report: write the collection summary and the analysis document
 * 5. Archive: apply the compression mode, then the retention policy
 *
 * Only SessionError and ArchiveError (and a run directory that cannot be
 * created) escape. Every other failure is counted in the summary and the run
 * carries on; a global deadline cancels the remaining listings and skips
 * straight to the report.
 *
 * The runner takes the same injectable dependencies as the stages, so a
 * whole run is testable against a fake kubectl and a temp directory.
 */

import { withStageTracing } from "../tracing/stage-tracing";
import { createKubectlExecutor, type KubectlExecutor } from "../utils/kubectl";
import { handleCompression, enforceRetention } from "./archive";
import {
  DetectionAccumulator,
  buildAnalysisDocument,
  createEmptyDetectionResult,
} from "./detection";
import {
  buildKindList,
  buildWorkItems,
  crdToResourceKind,
  discoverCustomResourceDefinitions,
  enumerateResources,
  establishSession,
  resolveNamespaces,
} from "./discovery";
import { errorMessage } from "./errors";
import { ANALYSIS_BASENAME, OutputOrganizer, SUMMARY_BASENAME } from "./output";
import { markSanitizationFailure, sanitizeResource } from "./sanitizer";
import { getDefaultSignatureTable, type SignatureTable } from "./signatures";
import {
  SummaryAggregator,
  TOOL_NAME,
  TOOL_VERSION,
  buildSummaryDocument,
} from "./summary";
import type {
  CollectionRun,
  CollectionSummary,
  DetectionResult,
  KubernetesObject,
  ResourceKind,
  ResourceRecord,
} from "./types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Injectable dependencies for a run.
 */
export interface CollectionOptions {
  /** kubectl executor; defaults to one bound to the run's kubeconfig and timeout */
  kubectl?: KubectlExecutor;
  /**
   * Progress callback for the entire run.
   * Passed to every stage so progress flows to a single output.
   * Defaults to stdout.
   */
  onProgress?: (message: string) => void;
  /**
   * Debug callback: one line per kubectl call and per written record.
   * Defaults to discarding them.
   */
  onDebug?: (message: string) => void;
  /** Signature table; defaults to the built-in one */
  signatures?: SignatureTable;
  /** Clock, for the summary's finish time and retention */
  now?: () => Date;
}

/**
 * What a finished run produced.
 */
export interface CollectionResult {
  /** The run directory; removed again in compressed mode */
  runDirectory: string;
  archivePath?: string;
  summary: CollectionSummary;
  /** Present when detection was enabled */
  detection?: DetectionResult;
  /** Files written by the summary and analysis steps */
  reportFiles: string[];
  /** Old archives removed by the retention policy */
  removedArchives: string[];
  /** True when no resource file was written */
  empty: boolean;
}

/**
 * Per-run state shared by the record handler.
 */
interface RunContext {
  run: CollectionRun;
  output: OutputOrganizer;
  aggregator: SummaryAggregator;
  detection: DetectionAccumulator | undefined;
  onProgress: (message: string) => void;
  onDebug: (message: string) => void;
}

/**
 * "pods default/web-0", "nodes node-1"
 */
function describeRecord(record: ResourceRecord): string {
  return record.namespace
    ? `${record.resource} ${record.namespace}/${record.name}`
    : `${record.resource} ${record.name}`;
}

/**
 * Wraps an executor so each call and its result go to the debug callback.
 */
function withCallLogging(
  kubectl: KubectlExecutor,
  onDebug: (message: string) => void
): KubectlExecutor {
  return async (args, signal) => {
    const command = `kubectl ${args.join(" ")}`;
    onDebug(command);
    const result = await kubectl(args, signal);
    onDebug(result.isError ? `${command}: ${result.failure ?? "exit"}` : `${command}: ok`);
    return result;
  };
}

// ---------------------------------------------------------------------------
// Record handling
// ---------------------------------------------------------------------------

/**
 * Picks the body to write for a record, counting the sanitization attempt.
 * Returns undefined when the record is to be omitted.
 */
function prepareBody(record: ResourceRecord, ctx: RunContext): KubernetesObject | undefined {
  const { run, aggregator, onProgress } = ctx;
  if (run.raw) return record.rawBody;

  try {
    record.sanitizedBody = sanitizeResource(
      record.rawBody,
      record.kind,
      run.sanitizerPolicy,
      record.apiGroup
    );
    aggregator.recordSanitization(record);
    return record.sanitizedBody;
  } catch (error) {
    const failure = error instanceof Error ? error : new Error(String(error));
    aggregator.recordSanitization(record, failure);
    if (run.sanitizationFailurePolicy === "omit") {
      onProgress(`  Warning: omitting ${describeRecord(record)} (${failure.message})`);
      return undefined;
    }
    onProgress(`  Warning: writing ${describeRecord(record)} unsanitized (${failure.message})`);
    return markSanitizationFailure(record.rawBody, failure.message);
  }
}

/**
 * Observes, sanitizes, writes and counts one record. Never throws: every
 * failure ends up in the summary.
 */
async function handleRecord(record: ResourceRecord, ctx: RunContext): Promise<void> {
  if (ctx.detection) {
    try {
      ctx.detection.observe(record);
    } catch (error) {
      ctx.onProgress(
        `  Warning: detection skipped ${describeRecord(record)} (${errorMessage(error)})`
      );
    }
  }

  const body = prepareBody(record, ctx);
  if (!body) return;

  try {
    const files = await ctx.output.writeRecord(record, body);
    ctx.aggregator.recordWritten(record, files);
    ctx.onDebug(`Wrote ${describeRecord(record)} (${files} file${files === 1 ? "" : "s"})`);
  } catch (error) {
    ctx.aggregator.recordFailure("write", record, errorMessage(error));
    ctx.onProgress(`  Warning: could not write ${describeRecord(record)} (${errorMessage(error)})`);
  }
}

// ---------------------------------------------------------------------------
// Stages
// ---------------------------------------------------------------------------

/**
 * Plans and runs the listings. Returns when every work item has finished or
 * been cancelled.
 */
async function collect(
  ctx: RunContext,
  kubectl: KubectlExecutor,
  signal: AbortSignal
): Promise<void> {
  const { run, aggregator, detection, onProgress } = ctx;
  const discoveryOptions = { kubectl, onProgress, signal };

  const resolution = await resolveNamespaces(run.namespaces, discoveryOptions);
  if (resolution.failure) aggregator.recordFetchFailure(resolution.failure);
  aggregator.setNamespaces(resolution.namespaces);
  detection?.observeNamespaces(resolution.namespaces);

  let customKinds: ResourceKind[] = [];
  if (run.includeCustomResources || detection) {
    const discovery = await discoverCustomResourceDefinitions(discoveryOptions);
    if (discovery.failure) aggregator.recordFetchFailure(discovery.failure);
    detection?.observeCustomResourceDefinitions(discovery.crds);
    if (run.includeCustomResources) {
      customKinds = discovery.crds.map(crdToResourceKind);
    }
  }

  const items = buildWorkItems(buildKindList(customKinds), resolution.namespaces);
  await withStageTracing("enumerate", { "collector.work_items": items.length }, async (span) => {
    await enumerateResources(items, {
      ...discoveryOptions,
      concurrency: run.concurrency,
      onRecord: (record) => handleRecord(record, ctx),
      onOutcome: (outcome) => aggregator.recordFetchOutcome(outcome),
    });
    span.setAttribute("collector.deadline_exceeded", signal.aborted);
  });
}

/**
 * Runs detection over the collected facts. Never throws.
 */
function analyze(
  detection: DetectionAccumulator,
  signatures: SignatureTable,
  onProgress: (message: string) => void
): DetectionResult {
  try {
    const result = detection.analyze(signatures);
    onProgress(
      `Analysis: ${result.distribution}, ${result.deploymentClass}, ` +
        `confidence ${result.confidenceLevel} (${result.matchedComponents.length} components).`
    );
    return result;
  } catch (error) {
    onProgress(`  Warning: analysis failed (${errorMessage(error)})`);
    return createEmptyDetectionResult();
  }
}

/**
 * Writes a top-level document; a failure is a warning, not a run abort.
 */
async function writeReport(
  output: OutputOrganizer,
  baseName: string,
  document: unknown,
  onProgress: (message: string) => void
): Promise<string[]> {
  try {
    return await output.writeDocument(baseName, document);
  } catch (error) {
    onProgress(`  Warning: could not write ${baseName} (${errorMessage(error)})`);
    return [];
  }
}

// ---------------------------------------------------------------------------
// Main orchestrator
// ---------------------------------------------------------------------------

/**
 * Runs one collection: session, listings, report, archive.
 *
 * @param run - Validated run configuration (see config.ts)
 * @param options - Injectable kubectl, progress and debug callbacks, signature table, clock
 * @returns The run's summary, analysis and output paths
 * @throws SessionError when the cluster is unreachable
 * @throws WriteError when the run directory cannot be created
 * @throws ArchiveError when a requested archive cannot be written
 */
export async function runCollection(
  run: CollectionRun,
  options: CollectionOptions = {}
): Promise<CollectionResult> {
  const onProgress = options.onProgress ?? console.log; // eslint-disable-line no-console
  const now = options.now ?? (() => new Date());
  const onDebug = options.onDebug ?? (() => {});
  const kubectl = withCallLogging(
    options.kubectl ??
      createKubectlExecutor({ kubeconfig: run.kubeconfig, timeoutMs: run.fetchTimeoutMs }),
    onDebug
  );

  return withStageTracing("run", { "collector.run_id": run.runId }, async () => {
    const session = await withStageTracing("session", {}, () =>
      establishSession({ kubectl, onProgress })
    );

    const output = new OutputOrganizer({
      outputDir: run.outputDir,
      runId: run.runId,
      format: run.format,
    });
    await output.createRunDirectory();
    onProgress(`Writing to ${output.runDirectory}`);

    const aggregator = new SummaryAggregator({
      runId: run.runId,
      startedAt: run.startedAt,
      raw: run.raw,
    });
    aggregator.setKubernetesVersion(session.serverVersion);

    const ctx: RunContext = {
      run,
      output,
      aggregator,
      detection: run.detectionEnabled ? new DetectionAccumulator() : undefined,
      onProgress,
      onDebug,
    };

    // The deadline covers the listings; the report and archive always run
    const controller = new AbortController();
    const timer =
      run.runDeadlineMs !== undefined
        ? setTimeout(() => {
            aggregator.markDeadlineExceeded();
            onProgress(
              `  Warning: run deadline of ${run.runDeadlineMs}ms reached, cancelling remaining listings`
            );
            controller.abort();
          }, run.runDeadlineMs)
        : undefined;
    try {
      await collect(ctx, kubectl, controller.signal);
    } finally {
      clearTimeout(timer);
    }

    const summary = aggregator.finalize(now());
    const plannedArchive =
      run.compression === "uncompressed" ? undefined : `${output.runDirectory}.tar.gz`;

    const reportFiles = await writeReport(
      output,
      SUMMARY_BASENAME,
      buildSummaryDocument(
        summary,
        { runDirectory: output.runDirectory, archivePath: plannedArchive },
        run.format
      ),
      onProgress
    );

    let detection: DetectionResult | undefined;
    const accumulator = ctx.detection;
    if (accumulator) {
      const signatures = options.signatures ?? getDefaultSignatureTable();
      detection = await withStageTracing("analyze", {}, async () =>
        analyze(accumulator, signatures, onProgress)
      );
      reportFiles.push(
        ...(await writeReport(
          output,
          ANALYSIS_BASENAME,
          buildAnalysisDocument(detection, {
            runId: run.runId,
            timestamp: summary.finishedAt,
            tool: TOOL_NAME,
            version: TOOL_VERSION,
          }),
          onProgress
        ))
      );
    }

    const archivePath = await withStageTracing(
      "archive",
      { "collector.compression": run.compression },
      () => handleCompression(output.runDirectory, run.compression, { onProgress })
    );

    const removedArchives =
      run.retentionDays !== undefined
        ? await enforceRetention(run.outputDir, run.retentionDays, {
            now: now(),
            keep: archivePath,
            onProgress,
          })
        : [];

    onProgress(
      `Collection complete: ${summary.totalResourceCount} resources ` +
        `(${summary.clusterResourceCount} cluster-wide, ${summary.namespacedResourceCount} namespaced), ` +
        `${summary.failures.length} failures.`
    );
    if (summary.empty) {
      onProgress("  Warning: no resources were written");
    }

    return {
      runDirectory: output.runDirectory,
      ...(archivePath ? { archivePath } : {}),
      summary,
      ...(detection ? { detection } : {}),
      reportFiles,
      removedArchives,
      empty: summary.empty,
    };
  });
}
