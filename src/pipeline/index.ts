/**
 * pipeline/index.ts - Public API for the collection pipeline
 *
 * Re-exports everything other modules need from the pipeline.
 * Import from here rather than from the individual stage files.
 *
 * Usage:
 *   import { loadRunConfiguration, runCollection } from "./pipeline";
 *
 *   const { run, signatures } = await loadRunConfiguration(cliOptions);
 *   const result = await runCollection(run, { signatures });
 */

// Types shared across pipeline stages
export type {
  CollectionRun,
  CollectionSummary,
  CompressionMode,
  ConfidenceLevel,
  CustomResourceDefinitionInfo,
  DeploymentClass,
  DetectionResult,
  DiscoveryOptions,
  Distribution,
  FailureEntry,
  KubernetesObject,
  MatchedComponent,
  OutputFormat,
  ResourceKind,
  ResourceRecord,
  SanitizationFailurePolicy,
  SanitizerPolicy,
  WorkItem,
} from "./types";

// Errors
export {
  ArchiveError,
  CollectorError,
  ConfigError,
  FetchError,
  SanitizationError,
  SessionError,
  WriteError,
  type CollectorStage,
} from "./errors";

// Configuration
export {
  CliOptionsSchema,
  DEFAULT_OUTPUT_DIR,
  buildCollectionRun,
  loadRunConfiguration,
  loadSanitizerPolicy,
  parseNamespaceFilter,
  parseSanitizerPolicy,
  type CliOptions,
  type RunConfiguration,
} from "./config";

// Resource Enumerator
export { CLUSTER_SCOPED_KINDS, NAMESPACED_KINDS } from "./catalog";
export {
  buildWorkItems,
  discoverCustomResourceDefinitions,
  enumerateResources,
  establishSession,
  resolveNamespaces,
  type WorkItemOutcome,
} from "./discovery";

// Sanitizer
export {
  DEFAULT_SANITIZER_POLICY,
  SANITIZATION_FAILED_ANNOTATION,
  markSanitizationFailure,
  sanitizeResource,
} from "./sanitizer";

// Detection Engine
export {
  DetectionAccumulator,
  analyzeFacts,
  buildAnalysisDocument,
  type DetectionFacts,
} from "./detection";
export {
  getDefaultSignatureTable,
  loadSignatureTable,
  parseSignatureTable,
  type SignatureTable,
} from "./signatures";

// Output Organizer
export { OutputOrganizer, buildRunId } from "./output";
export { SummaryAggregator, buildSummaryDocument, TOOL_NAME, TOOL_VERSION } from "./summary";

// Archiver
export { createArchive, enforceRetention, handleCompression } from "./archive";

// Run orchestration
export { runCollection, type CollectionOptions, type CollectionResult } from "./runner";
