/**
 * discovery.ts - Resource enumeration for a collection run
 *
 * Turns a run configuration into a stream of ResourceRecords:
 * 1. Session: kubectl version proves the kubeconfig reaches an API server
 * 2. Namespaces: kubectl get namespaces, narrowed by the run's filter
 * 3. Kinds: the built-in catalog, plus one kind per CRD when requested
 * 4. List: kubectl get <kind> [-n <namespace>] -o json per work item,
 *    through a bounded worker pool
 *
 * Every listing is isolated: a forbidden kind, an unserved version or a
 * timeout is recorded as that item's failure and never stops the others.
 * Only the session check is allowed to abort the run.
 */

import { mapWithConcurrency } from "../utils/concurrency";
import { CLUSTER_SCOPED_KINDS, NAMESPACED_KINDS } from "./catalog";
import { FetchError, SessionError, errorMessage } from "./errors";
import {
  getArray,
  getObject,
  getString,
  isJsonObject,
  parseJson,
} from "./json";
import type {
  CustomResourceDefinitionInfo,
  DiscoveryOptions,
  JsonValue,
  KubernetesObject,
  ResourceKind,
  ResourceRecord,
  WorkItem,
} from "./types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Result of one work item. Records are streamed to the caller as they are
 * parsed, so the outcome only carries counts.
 */
export type WorkItemOutcome =
  | { status: "succeeded"; item: WorkItem; records: number; skipped: number }
  | { status: "failed"; item: WorkItem; error: FetchError }
  | { status: "cancelled"; item: WorkItem };

/**
 * Options for enumerateResources.
 */
export interface EnumerationOptions extends DiscoveryOptions {
  /** Maximum listings in flight (default 8) */
  concurrency?: number;
  /**
   * Called once per listed instance, awaited before the worker takes its next
   * item. Must not throw: it owns sanitization and write failures.
   */
  onRecord: (record: ResourceRecord) => Promise<void>;
  /** Called once per work item as it finishes */
  onOutcome?: (outcome: WorkItemOutcome) => void;
}

export interface NamespaceResolution {
  namespaces: string[];
  /** Requested namespaces that the cluster does not have */
  missing: string[];
  /** Set when the namespace listing itself failed */
  failure?: FetchError;
}

export interface CrdDiscovery {
  crds: CustomResourceDefinitionInfo[];
  failure?: FetchError;
}

const DEFAULT_CONCURRENCY = 8;

// ---------------------------------------------------------------------------
// Pure functions (exported for unit testing)
// ---------------------------------------------------------------------------

/**
 * Reads the items array of a kubectl List response.
 */
export function parseListItems(json: string, label: string): JsonValue[] {
  const parsed = parseJson(json, label);
  if (!isJsonObject(parsed)) {
    throw new Error(`Failed to parse ${label}: expected a List object`);
  }
  return getArray(parsed, "items") ?? [];
}

/**
 * Parses `kubectl get namespaces -o json` into namespace names.
 */
export function parseNamespaceList(json: string): string[] {
  return parseListItems(json, "namespaces")
    .map((item) => getString(getObject(item, "metadata"), "name"))
    .filter((name): name is string => typeof name === "string" && name.length > 0);
}

/**
 * Parses `kubectl get customresourcedefinitions -o json`.
 *
 * Picks the storage version when one is marked, otherwise the first served
 * version. CRDs with no served version or missing names are skipped: there
 * is nothing to list for them.
 */
export function parseCustomResourceDefinitions(
  json: string
): CustomResourceDefinitionInfo[] {
  const result: CustomResourceDefinitionInfo[] = [];

  for (const item of parseListItems(json, "customresourcedefinitions")) {
    const name = getString(getObject(item, "metadata"), "name");
    const spec = getObject(item, "spec");
    const names = getObject(spec, "names");
    const group = getString(spec, "group");
    const plural = getString(names, "plural");
    const kind = getString(names, "kind");
    if (!name || !group || !plural || !kind) continue;

    const versions = (getArray(spec, "versions") ?? []).filter(
      (v) => isJsonObject(v) && v.served !== false && typeof v.name === "string"
    );
    const chosen =
      versions.find((v) => isJsonObject(v) && v.storage === true) ?? versions[0];
    const version = getString(chosen, "name");
    if (!version) continue;

    result.push({
      name,
      group,
      version,
      plural,
      kind,
      scope: getString(spec, "scope") === "Cluster" ? "Cluster" : "Namespaced",
    });
  }

  return result;
}

/**
 * Turns a CRD into a listable kind.
 *
 * The output directory uses "plural.group" (stable across versions); the
 * kubectl argument pins the version so the listing matches the CRD's
 * storage version rather than whatever kubectl prefers.
 */
export function crdToResourceKind(crd: CustomResourceDefinitionInfo): ResourceKind {
  return {
    resource: `${crd.plural}.${crd.group}`,
    kubectlName: `${crd.plural}.${crd.version}.${crd.group}`,
    kind: crd.kind,
    apiGroup: crd.group,
    apiVersion: `${crd.group}/${crd.version}`,
    scope: crd.scope,
    category: "custom",
    isCustom: true,
  };
}

/**
 * Builds the listing plan: one item per cluster-scoped kind, and one per
 * (namespaced kind, namespace) pair.
 */
export function buildWorkItems(
  kinds: readonly ResourceKind[],
  namespaces: readonly string[]
): WorkItem[] {
  const items: WorkItem[] = [];
  for (const kind of kinds) {
    if (kind.scope === "Cluster") {
      items.push({ kind, namespace: "" });
    } else {
      for (const namespace of namespaces) {
        items.push({ kind, namespace });
      }
    }
  }
  return items;
}

/**
 * Returns the catalog plus, when given, the custom kinds.
 */
export function buildKindList(
  customKinds: readonly ResourceKind[] = []
): ResourceKind[] {
  return [...CLUSTER_SCOPED_KINDS, ...NAMESPACED_KINDS, ...customKinds];
}

/**
 * kubectl arguments for listing one work item.
 */
export function buildListArgs(item: WorkItem): string[] {
  const args = ["get", item.kind.kubectlName];
  if (item.kind.scope === "Namespaced") {
    args.push("-n", item.namespace);
  }
  args.push("-o", "json");
  return args;
}

/**
 * Parses the JSON output of `kubectl get <kind> -o json` into ResourceRecords.
 *
 * Kind and apiVersion come from the work item rather than each item: list
 * responses sometimes report the List kind, and the item fields may be
 * missing entirely. Items without metadata.name cannot be placed on disk and
 * are counted as skipped.
 */
export function parseResourceList(
  json: string,
  item: WorkItem
): { records: ResourceRecord[]; skipped: number } {
  const { kind } = item;
  const records: ResourceRecord[] = [];
  let skipped = 0;

  for (const entry of parseListItems(json, `${kind.resource} list`)) {
    const metadata = getObject(entry, "metadata");
    const name = getString(metadata, "name");
    if (!isJsonObject(entry) || !metadata || !name) {
      skipped++;
      continue;
    }

    const body: KubernetesObject = {
      ...entry,
      apiVersion: getString(entry, "apiVersion") ?? kind.apiVersion,
      kind: getString(entry, "kind") ?? kind.kind,
      metadata,
    };

    records.push({
      apiGroup: kind.apiGroup,
      apiVersion: kind.apiVersion,
      kind: kind.kind,
      resource: kind.resource,
      scope: kind.scope,
      namespace:
        kind.scope === "Namespaced"
          ? item.namespace || getString(metadata, "namespace") || "default"
          : "",
      name,
      category: kind.category,
      isCustom: kind.isCustom,
      rawBody: body,
    });
  }

  return { records, skipped };
}

// ---------------------------------------------------------------------------
// Cluster calls
// ---------------------------------------------------------------------------

/**
 * Proves the kubeconfig reaches an API server and returns its version.
 *
 * @throws SessionError when kubectl cannot talk to the server
 */
export async function establishSession(
  options: DiscoveryOptions
): Promise<{ serverVersion?: string }> {
  const onProgress = options.onProgress ?? console.log; // eslint-disable-line no-console

  onProgress("Connecting to the cluster...");
  const result = await options.kubectl(["version", "-o", "json"], options.signal);
  if (result.isError) {
    throw new SessionError(`Cannot reach the Kubernetes API: ${result.output}`);
  }

  let serverVersion: string | undefined;
  try {
    const parsed = parseJson(result.output, "kubectl version");
    serverVersion = getString(getObject(parsed, "serverVersion"), "gitVersion");
  } catch (error) {
    onProgress(`  Warning: could not read the server version (${errorMessage(error)})`);
  }
  if (!serverVersion) {
    throw new SessionError("Cannot reach the Kubernetes API: no server version reported");
  }

  onProgress(`Connected to Kubernetes ${serverVersion}.`);
  return { serverVersion };
}

/**
 * Lists every namespace visible to the credential.
 *
 * @throws FetchError when the listing fails or cannot be parsed
 */
export async function listNamespaces(options: DiscoveryOptions): Promise<string[]> {
  const result = await options.kubectl(
    ["get", "namespaces", "-o", "json"],
    options.signal
  );
  if (result.isError) {
    throw new FetchError("namespaces", "", result.output, {
      cancelled: result.failure === "cancelled",
    });
  }
  try {
    return parseNamespaceList(result.output);
  } catch (error) {
    throw new FetchError("namespaces", "", errorMessage(error));
  }
}

/**
 * Resolves the run's namespace filter against the cluster.
 *
 * - "all": every visible namespace; none if the listing fails
 * - explicit list: the listed namespaces that exist; if the listing fails
 *   the filter is used as given and the listings will report what's missing
 */
export async function resolveNamespaces(
  filter: string[] | "all",
  options: DiscoveryOptions
): Promise<NamespaceResolution> {
  const onProgress = options.onProgress ?? console.log; // eslint-disable-line no-console

  let available: string[];
  try {
    available = await listNamespaces(options);
  } catch (error) {
    const failure =
      error instanceof FetchError
        ? error
        : new FetchError("namespaces", "", errorMessage(error));
    onProgress(`  Warning: could not list namespaces (${failure.message})`);
    return {
      namespaces: filter === "all" ? [] : [...filter],
      missing: [],
      failure,
    };
  }

  if (filter === "all") {
    onProgress(`Found ${available.length} namespaces.`);
    return { namespaces: [...available].sort(), missing: [] };
  }

  const visible = new Set(available);
  const namespaces: string[] = [];
  const missing: string[] = [];
  for (const ns of filter) {
    if (visible.has(ns)) {
      namespaces.push(ns);
    } else {
      missing.push(ns);
      onProgress(`  Warning: namespace '${ns}' does not exist, skipping`);
    }
  }
  onProgress(`Collecting from ${namespaces.length} of ${filter.length} requested namespaces.`);
  return { namespaces, missing };
}

/**
 * Lists CustomResourceDefinitions. A failure leaves the run without custom
 * kinds rather than aborting it.
 */
export async function discoverCustomResourceDefinitions(
  options: DiscoveryOptions
): Promise<CrdDiscovery> {
  const onProgress = options.onProgress ?? console.log; // eslint-disable-line no-console

  onProgress("Checking for Custom Resource Definitions...");
  const result = await options.kubectl(
    ["get", "customresourcedefinitions", "-o", "json"],
    options.signal
  );
  if (result.isError) {
    const cancelled = result.failure === "cancelled";
    onProgress(
      cancelled
        ? "  Warning: CRD listing cancelled"
        : "  Warning: could not list CRDs (kubectl get failed)"
    );
    return {
      crds: [],
      failure: new FetchError("customresourcedefinitions", "", result.output, { cancelled }),
    };
  }

  try {
    const crds = parseCustomResourceDefinitions(result.output);
    onProgress(`Found ${crds.length} CRDs.`);
    return { crds };
  } catch (error) {
    onProgress(`  Warning: could not parse CRDs (${errorMessage(error)})`);
    return {
      crds: [],
      failure: new FetchError("customresourcedefinitions", "", errorMessage(error)),
    };
  }
}

/**
 * Lists one work item and streams its records to onRecord.
 */
async function collectWorkItem(
  item: WorkItem,
  options: EnumerationOptions
): Promise<WorkItemOutcome> {
  if (options.signal?.aborted) {
    return { status: "cancelled", item };
  }

  const result = await options.kubectl(buildListArgs(item), options.signal);
  if (result.isError) {
    if (result.failure === "cancelled") {
      return { status: "cancelled", item };
    }
    return {
      status: "failed",
      item,
      error: new FetchError(item.kind.resource, item.namespace, result.output),
    };
  }

  let parsed: { records: ResourceRecord[]; skipped: number };
  try {
    parsed = parseResourceList(result.output, item);
  } catch (error) {
    return {
      status: "failed",
      item,
      error: new FetchError(item.kind.resource, item.namespace, errorMessage(error)),
    };
  }

  for (const record of parsed.records) {
    await options.onRecord(record);
  }

  return {
    status: "succeeded",
    item,
    records: parsed.records.length,
    skipped: parsed.skipped,
  };
}

/**
 * Describes a work item for progress messages: "pods in default", "nodes".
 */
function describeWorkItem(item: WorkItem): string {
  return item.namespace ? `${item.kind.resource} in ${item.namespace}` : item.kind.resource;
}

// ---------------------------------------------------------------------------
// Main orchestrator
// ---------------------------------------------------------------------------

/**
 * Lists every work item through a bounded worker pool.
 *
 * Records are handed to onRecord as each listing is parsed; nothing is
 * buffered across work items. Once the signal aborts, in-flight calls are
 * killed and the remaining items finish as "cancelled".
 *
 * @param items - The listing plan from buildWorkItems
 * @param options - Injectable kubectl, record sink, concurrency, signal
 * @returns One outcome per work item, in plan order
 */
export async function enumerateResources(
  items: readonly WorkItem[],
  options: EnumerationOptions
): Promise<WorkItemOutcome[]> {
  const onProgress = options.onProgress ?? console.log; // eslint-disable-line no-console
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;

  onProgress(`Listing ${items.length} resource groups (concurrency ${concurrency})...`);

  let finished = 0;
  const outcomes = await mapWithConcurrency(items, concurrency, async (item) => {
    const outcome = await collectWorkItem(item, options);
    finished++;

    if (outcome.status === "failed") {
      onProgress(
        `  Warning: skipping ${describeWorkItem(item)} (${outcome.error.message})`
      );
    } else if (outcome.status === "succeeded" && outcome.records > 0) {
      onProgress(
        `Listed ${describeWorkItem(item)}: ${outcome.records} (${finished} of ${items.length})`
      );
    }
    if (outcome.status === "succeeded" && outcome.skipped > 0) {
      onProgress(
        `  Warning: ${outcome.skipped} ${describeWorkItem(item)} had no metadata.name and were skipped`
      );
    }

    options.onOutcome?.(outcome);
    return outcome;
  });

  const failed = outcomes.filter((o) => o.status === "failed").length;
  const cancelled = outcomes.filter((o) => o.status === "cancelled").length;
  onProgress(
    `Enumeration complete: ${outcomes.length - failed - cancelled} succeeded, ${failed} failed, ${cancelled} cancelled.`
  );
  return outcomes;
}
