/**
 * detection.ts - Platform fingerprinting from collected resources
 *
 * Works in two steps so the collector never holds the whole cluster in memory:
 * 1. DetectionAccumulator.observe() folds each raw record into a small set of
 *    facts (images, namespaces, label keys, workload names, ...)
 * 2. analyzeFacts() matches those facts against the signature table and
 *    scores the result
 *
 * Adding records can only add facts, and matching is a pure function of the
 * facts, so the confidence score never drops as more resources are seen.
 * Detection reads raw bodies only; it neither needs nor touches sanitized ones.
 */

import { WORKLOAD_KINDS } from "./catalog";
import {
  getArray,
  getObject,
  getString,
  getStringMap,
} from "./json";
import type {
  ConfidenceLevel,
  CustomResourceDefinitionInfo,
  DetectionResult,
  Distribution,
  JsonValue,
  MatchedComponent,
  ResourceRecord,
} from "./types";
import type { SignatureRules, SignatureTable } from "./signatures";

// ---------------------------------------------------------------------------
// Facts
// ---------------------------------------------------------------------------

/**
 * Everything detection needs to know about a cluster, and nothing more.
 * Namespace/name pairs are stored as "namespace/name".
 */
export interface DetectionFacts {
  images: Set<string>;
  namespaces: Set<string>;
  labelKeys: Set<string>;
  crdGroups: Set<string>;
  workloads: Set<string>;
  clusterRoles: Set<string>;
  configMaps: Set<string>;
  kubeletVersions: Set<string>;
  nodeCount: number;
  resourceCount: number;
}

export function createEmptyFacts(): DetectionFacts {
  return {
    images: new Set(),
    namespaces: new Set(),
    labelKeys: new Set(),
    crdGroups: new Set(),
    workloads: new Set(),
    clusterRoles: new Set(),
    configMaps: new Set(),
    kubeletVersions: new Set(),
    nodeCount: 0,
    resourceCount: 0,
  };
}

/** Kinds whose namespace/name identifies an installed component */
const NAMED_WORKLOAD_KINDS = new Set(["Deployment", "DaemonSet", "StatefulSet"]);

/**
 * Finds the pod spec of a workload: Pod.spec, template.spec, or the
 * CronJob's jobTemplate.spec.template.spec.
 */
function findPodSpec(body: JsonValue, kind: string): JsonValue | undefined {
  const spec = getObject(body, "spec");
  if (kind === "Pod") return spec;
  if (kind === "CronJob") {
    return getObject(getObject(getObject(getObject(spec, "jobTemplate"), "spec"), "template"), "spec");
  }
  return getObject(getObject(spec, "template"), "spec");
}

/**
 * Lists container and init container images of a workload body.
 */
export function extractImages(body: JsonValue, kind: string): string[] {
  const podSpec = findPodSpec(body, kind);
  const images: string[] = [];
  for (const key of ["initContainers", "containers"]) {
    for (const container of getArray(podSpec, key) ?? []) {
      const image = getString(container, "image");
      if (image) images.push(image);
    }
  }
  return images;
}

/**
 * Folds records into DetectionFacts as they stream past.
 *
 * One accumulator per run; it is only ever touched from the event loop, so
 * no locking is needed.
 */
export class DetectionAccumulator {
  private readonly facts: DetectionFacts = createEmptyFacts();

  observe(record: ResourceRecord): void {
    const facts = this.facts;
    const body = record.rawBody;
    facts.resourceCount++;

    if (record.namespace) {
      facts.namespaces.add(record.namespace);
    }
    for (const key of Object.keys(getStringMap(body.metadata, "labels"))) {
      facts.labelKeys.add(key);
    }

    const pair = `${record.namespace}/${record.name}`;
    if (record.isCustom) return;

    if (record.kind === "Node") {
      facts.nodeCount++;
      const version = getString(getObject(getObject(body, "status"), "nodeInfo"), "kubeletVersion");
      if (version) facts.kubeletVersions.add(version);
    } else if (record.kind === "ClusterRole") {
      facts.clusterRoles.add(record.name);
    } else if (record.kind === "ConfigMap") {
      facts.configMaps.add(pair);
    }

    if (NAMED_WORKLOAD_KINDS.has(record.kind)) {
      facts.workloads.add(pair);
    }
    if (WORKLOAD_KINDS.has(record.kind)) {
      for (const image of extractImages(body, record.kind)) {
        facts.images.add(image);
      }
    }
  }

  /** Namespaces seen by the namespace listing, including empty ones */
  observeNamespaces(namespaces: readonly string[]): void {
    for (const ns of namespaces) this.facts.namespaces.add(ns);
  }

  observeCustomResourceDefinitions(crds: readonly CustomResourceDefinitionInfo[]): void {
    for (const crd of crds) this.facts.crdGroups.add(crd.group);
  }

  analyze(table: SignatureTable): DetectionResult {
    return analyzeFacts(this.facts, table);
  }
}

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

/**
 * Matches a value against a signature pattern.
 *
 * "*" matches anything; "*x*" contains, "x*" prefix, "*x" suffix, else exact.
 */
export function matchesPattern(value: string, pattern: string): boolean {
  if (pattern === "*") return true;
  const leading = pattern.startsWith("*");
  const trailing = pattern.endsWith("*");
  if (leading && trailing) return value.includes(pattern.slice(1, -1));
  if (trailing) return value.startsWith(pattern.slice(0, -1));
  if (leading) return value.endsWith(pattern.slice(1));
  return value === pattern;
}

function matchAny(values: Iterable<string>, patterns: readonly string[] | undefined): string[] {
  if (!patterns || patterns.length === 0) return [];
  return [...values].filter((v) => patterns.some((p) => matchesPattern(v, p))).sort();
}

function matchPairs(
  values: Iterable<string>,
  patterns: readonly { namespace: string; name: string }[] | undefined
): string[] {
  if (!patterns || patterns.length === 0) return [];
  return [...values]
    .filter((pair) => {
      const slash = pair.indexOf("/");
      const namespace = pair.substring(0, slash);
      const name = pair.substring(slash + 1);
      return patterns.some(
        (p) => matchesPattern(namespace, p.namespace) && matchesPattern(name, p.name)
      );
    })
    .sort();
}

const MAX_EVIDENCE_PER_RULE = 5;

/**
 * Formats matched values as evidence lines, truncating long lists.
 */
function describeMatches(label: string, values: string[]): string[] {
  const shown = values.slice(0, MAX_EVIDENCE_PER_RULE).map((v) => `${label} ${v}`);
  if (values.length > MAX_EVIDENCE_PER_RULE) {
    shown.push(`${values.length - MAX_EVIDENCE_PER_RULE} more ${label} matches`);
  }
  return shown;
}

/**
 * Evaluates every rule of a rule set. Returns evidence lines; empty means
 * no rule fired.
 */
export function evaluateRules(rules: SignatureRules, facts: DetectionFacts): {
  evidence: string[];
  images: string[];
  kubeletVersions: string[];
} {
  const images = matchAny(facts.images, rules.images);
  const kubeletVersions = matchAny(facts.kubeletVersions, rules.kubeletVersions);
  const evidence = [
    ...describeMatches("crd group", matchAny(facts.crdGroups, rules.crdGroups)),
    ...describeMatches("workload", matchPairs(facts.workloads, rules.workloads)),
    ...describeMatches("cluster role", matchAny(facts.clusterRoles, rules.clusterRoles)),
    ...describeMatches("config map", matchPairs(facts.configMaps, rules.configMaps)),
    ...describeMatches("kubelet version", kubeletVersions),
    ...describeMatches("namespace", matchAny(facts.namespaces, rules.namespaces)),
    ...describeMatches("label key", matchAny(facts.labelKeys, rules.labelKeys)),
    ...describeMatches("image", images),
  ];
  return { evidence, images, kubeletVersions };
}

/**
 * Pulls a semantic version out of an image reference.
 *
 * Only tags shaped like "v1.2.3" count; "latest", digests and build hashes
 * say nothing about the release.
 */
export function extractSemanticVersion(image: string): string | undefined {
  const withoutDigest = image.split("@")[0];
  const lastSlash = withoutDigest.lastIndexOf("/");
  const lastColon = withoutDigest.lastIndexOf(":");
  if (lastColon <= lastSlash) return undefined;
  const tag = withoutDigest.substring(lastColon + 1);
  if (tag.startsWith("v") && tag.includes(".") && !tag.includes("sha256")) {
    return tag;
  }
  return undefined;
}

/**
 * Maps a normalized score to its confidence band.
 */
export function confidenceLevelFor(
  score: number,
  levels: SignatureTable["levels"]
): ConfidenceLevel {
  const band = levels.find((l) => score >= l.minScore);
  return band ? band.level : "Minimal";
}

/**
 * The result for a cluster nothing could be learned about.
 */
export function createEmptyDetectionResult(): DetectionResult {
  return {
    distribution: "Unknown",
    matchedComponents: [],
    components: [],
    confidenceScore: 0,
    confidenceLevel: "Minimal",
    deploymentClass: "Unknown",
  };
}

// ---------------------------------------------------------------------------
// Main entry point
// ---------------------------------------------------------------------------

/**
 * Matches facts against the signature table and classifies the cluster.
 *
 * - Components: matched when any of their rules fires
 * - Distribution: first matched distribution component in table order;
 *   Standard when nodes were seen without a marker; Unknown otherwise
 * - Score: sum of matched weights over table.maxScore, clamped to [0, 1]
 * - Deployment class: Management (management-plane component), Downstream
 *   (downstream marker), Standalone (anything observed), Unknown (nothing)
 */
export function analyzeFacts(facts: DetectionFacts, table: SignatureTable): DetectionResult {
  const components: MatchedComponent[] = [];
  let distribution: Distribution | undefined;
  let distributionVersion: string | undefined;
  let management = false;
  let totalWeight = 0;

  for (const signature of table.components) {
    const { evidence, images, kubeletVersions } = evaluateRules(signature.rules, facts);
    if (evidence.length === 0) continue;

    let version: string | undefined;
    if (signature.distribution) {
      version = kubeletVersions[0] ?? [...facts.kubeletVersions].sort()[0];
      if (!distribution) {
        distribution = signature.distribution;
        distributionVersion = version;
      }
    } else {
      version = images.map(extractSemanticVersion).find((v) => v !== undefined);
    }

    components.push({
      name: signature.name,
      category: signature.category,
      weight: signature.weight,
      ...(version ? { version } : {}),
      evidence,
    });
    totalWeight += signature.weight;
    if (signature.managementPlane) management = true;
  }

  if (!distribution && facts.nodeCount > 0) {
    distribution = "Standard";
    distributionVersion = [...facts.kubeletVersions].sort()[0];
  }

  const observedAnything =
    facts.resourceCount > 0 || facts.namespaces.size > 0 || facts.crdGroups.size > 0;

  let deploymentClass: DetectionResult["deploymentClass"];
  if (management) {
    deploymentClass = "Management";
  } else if (evaluateRules(table.downstreamMarkers, facts).evidence.length > 0) {
    deploymentClass = "Downstream";
  } else if (observedAnything) {
    deploymentClass = "Standalone";
  } else {
    deploymentClass = "Unknown";
  }

  const confidenceScore = Math.min(1, Math.max(0, totalWeight / table.maxScore));

  return {
    distribution: distribution ?? "Unknown",
    ...(distributionVersion ? { distributionVersion } : {}),
    matchedComponents: components.map((c) => c.name).sort(),
    components,
    confidenceScore,
    confidenceLevel: confidenceLevelFor(confidenceScore, table.levels),
    deploymentClass,
  };
}

// ---------------------------------------------------------------------------
// Analysis document
// ---------------------------------------------------------------------------

/**
 * The analysis as written to suse-edge-analysis.<fmt>.
 */
export interface AnalysisDocument {
  analysis: { runId: string; timestamp: string; tool: string; version: string };
  distribution: Distribution;
  distributionVersion?: string;
  deploymentClass: DetectionResult["deploymentClass"];
  confidence: { level: ConfidenceLevel; score: number };
  matchedComponents: string[];
  components: MatchedComponent[];
}

export function buildAnalysisDocument(
  result: DetectionResult,
  meta: AnalysisDocument["analysis"]
): AnalysisDocument {
  return {
    analysis: meta,
    distribution: result.distribution,
    ...(result.distributionVersion ? { distributionVersion: result.distributionVersion } : {}),
    deploymentClass: result.deploymentClass,
    confidence: {
      level: result.confidenceLevel,
      score: Math.round(result.confidenceScore * 100) / 100,
    },
    matchedComponents: result.matchedComponents,
    components: result.components,
  };
}
