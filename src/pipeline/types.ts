/**
 * types.ts - Shared data types for the collection pipeline
 *
 * These types flow through the pipeline stages:
 * - Discovery produces ResourceRecord (one per listed instance)
 * - Sanitization fills in ResourceRecord.sanitizedBody
 * - Output writes records and feeds the SummaryAggregator
 * - Detection folds records into facts and produces a DetectionResult
 * - Archive packages the finished run directory
 */

import type { KubectlExecutor } from "../utils/kubectl";

// ---------------------------------------------------------------------------
// Resource documents
// ---------------------------------------------------------------------------

/**
 * A JSON value as returned by `kubectl get -o json`.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * A resource document as listed from the cluster.
 *
 * Only the envelope is typed; spec, status and any other top-level field stay
 * opaque so no field the collector does not know about is ever dropped.
 * Kind-specific views live in sanitizer.ts.
 */
export interface KubernetesObject extends JsonObject {
  metadata: JsonObject;
}

// ---------------------------------------------------------------------------
// Resource kinds
// ---------------------------------------------------------------------------

export type ResourceScope = "Cluster" | "Namespaced";

/**
 * Grouping used for the summary's per-category highlights.
 */
export type ResourceCategory =
  | "cluster"
  | "workloads"
  | "networking"
  | "configuration"
  | "storage"
  | "rbac"
  | "policy"
  | "custom";

/**
 * A resource type the collector lists: either a catalog entry or a kind
 * derived from a CustomResourceDefinition.
 */
export interface ResourceKind {
  /**
   * Name used on the kubectl command line and as the output directory.
   * Built-ins use the plural ("pods"); custom kinds use "plural.group".
   */
  resource: string;
  /** Argument passed to `kubectl get` (custom kinds pin the version: "sqls.v1beta1.devopstoolkit.live") */
  kubectlName: string;
  /** Kind name (e.g., "Deployment", "SQL") */
  kind: string;
  /** API group (e.g., "apps", "" for core) */
  apiGroup: string;
  /** Full API version (e.g., "apps/v1", "v1") */
  apiVersion: string;
  scope: ResourceScope;
  category: ResourceCategory;
  isCustom: boolean;
}

/**
 * One listing call: a kind at cluster scope, or a kind in one namespace.
 */
export interface WorkItem {
  kind: ResourceKind;
  /** Empty string for cluster-scoped kinds */
  namespace: string;
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

/**
 * One listed resource instance.
 *
 * Identity key is (resource, namespace, name) and is unique within a run.
 * Created by discovery; sanitization only ever adds sanitizedBody.
 */
export interface ResourceRecord {
  apiGroup: string;
  apiVersion: string;
  kind: string;
  resource: string;
  scope: ResourceScope;
  /** Empty string for cluster-scoped records, never empty for namespaced ones */
  namespace: string;
  name: string;
  category: ResourceCategory;
  isCustom: boolean;
  rawBody: KubernetesObject;
  sanitizedBody?: KubernetesObject;
}

/**
 * A CustomResourceDefinition reduced to what listing and detection need.
 */
export interface CustomResourceDefinitionInfo {
  /** CRD name, e.g. "sqls.devopstoolkit.live" */
  name: string;
  group: string;
  /** Storage version when marked, else the first served version */
  version: string;
  plural: string;
  kind: string;
  scope: ResourceScope;
}

// ---------------------------------------------------------------------------
// Run configuration
// ---------------------------------------------------------------------------

export type OutputFormat = "json" | "yaml" | "both";
export type CompressionMode = "compressed" | "uncompressed" | "both";

/**
 * What happens to a record whose shape does not match its kind.
 * - include-raw: write the raw body with a warning annotation
 * - omit: drop the record with a warning
 */
export type SanitizationFailurePolicy = "include-raw" | "omit";

/**
 * Tables the sanitizer works from. Keys ending in "*" match by prefix.
 */
export interface SanitizerPolicy {
  /** metadata.* fields removed from every resource */
  metadataFields: string[];
  annotationDenylist: string[];
  finalizerDenylist: string[];
  /** Inclusive range the API server assigns node ports from */
  nodePortRange: { min: number; max: number };
}

/**
 * Immutable configuration for one collection run.
 */
export interface CollectionRun {
  /** Timestamp-derived run identifier, also the run directory name */
  runId: string;
  startedAt: Date;
  /** Path to the kubeconfig holding the pre-established credential */
  kubeconfig: string;
  /** Explicit namespace filter, or "all" for every visible namespace */
  namespaces: string[] | "all";
  /** Parent directory of the run directory and archive */
  outputDir: string;
  format: OutputFormat;
  compression: CompressionMode;
  includeCustomResources: boolean;
  /** Write resources exactly as listed, skipping sanitization */
  raw: boolean;
  detectionEnabled: boolean;
  /** Maximum kubectl calls in flight */
  concurrency: number;
  /** Per-call kubectl timeout */
  fetchTimeoutMs: number;
  /** Global collection deadline; unset means no deadline */
  runDeadlineMs?: number;
  /** Delete archives older than this many days after a successful run */
  retentionDays?: number;
  sanitizationFailurePolicy: SanitizationFailurePolicy;
  sanitizerPolicy: SanitizerPolicy;
}

// ---------------------------------------------------------------------------
// Detection
// ---------------------------------------------------------------------------

export type Distribution = "K3s" | "RKE2" | "Standard" | "Unknown";

export type ConfidenceLevel = "Minimal" | "Low" | "Medium" | "High" | "VeryHigh";

export type DeploymentClass = "Management" | "Downstream" | "Standalone" | "Unknown";

/**
 * A component the signature table matched, with what made it match.
 */
export interface MatchedComponent {
  name: string;
  category: string;
  weight: number;
  /** Semantic version from an image tag or kubelet version, when one was found */
  version?: string;
  /** Human-readable reasons, e.g. "crd group longhorn.io" */
  evidence: string[];
}

/**
 * Outcome of the platform analysis, computed once per run.
 */
export interface DetectionResult {
  distribution: Distribution;
  distributionVersion?: string;
  /** Sorted names of matched components */
  matchedComponents: string[];
  components: MatchedComponent[];
  /** Normalized to [0, 1] */
  confidenceScore: number;
  confidenceLevel: ConfidenceLevel;
  deploymentClass: DeploymentClass;
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

export type FailureStage = "fetch" | "sanitize" | "write";

/**
 * A recoverable failure, as listed in the summary document.
 */
export interface FailureEntry {
  stage: FailureStage;
  resource: string;
  /** Empty for cluster-scoped work */
  namespace: string;
  /** Present for per-record failures */
  name?: string;
  message: string;
}

export interface SanitizationStats {
  mode: "sanitized" | "raw";
  processed: number;
  succeeded: number;
  failed: number;
}

/**
 * The collection summary, finalized at the end of a run.
 */
export interface CollectionSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  kubernetesVersion?: string;
  namespaces: string[];
  resourceCounts: Record<string, number>;
  namespaceCounts: Record<string, Record<string, number>>;
  categoryCounts: Record<string, number>;
  clusterResourceCount: number;
  namespacedResourceCount: number;
  totalResourceCount: number;
  sanitization: SanitizationStats;
  fetch: { succeeded: number; failed: number; cancelled: number };
  failures: FailureEntry[];
  deadlineExceeded: boolean;
  filesWritten: number;
  empty: boolean;
}

// ---------------------------------------------------------------------------
// Stage options
// ---------------------------------------------------------------------------

/**
 * Options for the discovery functions.
 * Accepts injectable dependencies for testing.
 */
export interface DiscoveryOptions {
  /** Injectable kubectl executor; production binds the run's kubeconfig */
  kubectl: KubectlExecutor;
  /**
   * Progress callback for long-running operations.
   * Warnings are progress messages prefixed with "Warning:".
   * Defaults to stdout.
   */
  onProgress?: (message: string) => void;
  /** Aborts in-flight calls and skips unstarted ones */
  signal?: AbortSignal;
}
