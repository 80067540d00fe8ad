/**
 * sanitizer.ts - Makes listed resources safe to reapply
 *
 * A resource as listed carries server-assigned state: status, uid,
 * resourceVersion, managedFields, a cluster IP, a bound volume. Reapplying
 * that document elsewhere either fails or silently conflicts. Sanitization
 * strips it.
 *
 * The document stays loosely typed; kind-specific Zod views validate only
 * the fields a rule touches and pass everything else through. A document
 * whose touched fields have the wrong shape raises SanitizationError rather
 * than being half-cleaned.
 *
 * Properties:
 * - deterministic and idempotent: sanitize(sanitize(x)) equals sanitize(x)
 * - kind, metadata.name and metadata.namespace are never changed
 * - the input document is never mutated
 */

import { z } from "zod";
import { SanitizationError } from "./errors";
import { cloneJson, isJsonObject } from "./json";
import type {
  JsonObject,
  JsonValue,
  KubernetesObject,
  SanitizerPolicy,
} from "./types";

/**
 * Annotation written on records that are kept unsanitized after a failure.
 */
export const SANITIZATION_FAILED_ANNOTATION = "cluster-collector.io/sanitization-failed";

/**
 * Default tables. Both denylists and the node port range vary by cluster
 * version and platform, so they are policy data that --policy can replace.
 */
export const DEFAULT_SANITIZER_POLICY: SanitizerPolicy = {
  metadataFields: [
    "uid",
    "resourceVersion",
    "creationTimestamp",
    "generation",
    "managedFields",
    "selfLink",
  ],
  annotationDenylist: [
    "kubectl.kubernetes.io/last-applied-configuration",
    "deployment.kubernetes.io/revision",
    "control-plane.alpha.kubernetes.io/leader",
    "endpoints.kubernetes.io/last-change-trigger-time",
    "pv.kubernetes.io/bind-completed",
    "pv.kubernetes.io/bound-by-controller",
    "volume.kubernetes.io/selected-node",
    "volume.kubernetes.io/storage-provisioner",
    "volume.beta.kubernetes.io/storage-provisioner",
    "field.cattle.io/publicEndpoints",
    "objectset.rio.cattle.io/*",
    "lifecycle.cattle.io/*",
  ],
  finalizerDenylist: [
    "kubernetes.io/pvc-protection",
    "kubernetes.io/pv-protection",
    "controller.cattle.io/*",
    "wrangler.cattle.io/*",
  ],
  nodePortRange: { min: 30000, max: 32767 },
};

// ---------------------------------------------------------------------------
// Typed views
// ---------------------------------------------------------------------------

const MetadataView = z
  .object({
    name: z.string(),
    namespace: z.string().optional(),
    annotations: z.record(z.string()).optional(),
    finalizers: z.array(z.string()).optional(),
  })
  .passthrough();

const ServiceSpecView = z
  .object({
    clusterIP: z.string().optional(),
    clusterIPs: z.array(z.string()).optional(),
    ports: z
      .array(z.object({ nodePort: z.number().int().optional() }).passthrough())
      .optional(),
  })
  .passthrough();

const PersistentVolumeClaimSpecView = z
  .object({ volumeName: z.string().optional() })
  .passthrough();

const PersistentVolumeSpecView = z
  .object({ claimRef: z.object({}).passthrough().optional() })
  .passthrough();

/**
 * Validates a view and names the offending path on failure.
 */
function checkView(view: z.ZodTypeAny, value: JsonValue | undefined, label: string): void {
  const result = view.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${label}.${issue.path.join(".")}` : label;
    throw new SanitizationError(`${where}: ${issue ? issue.message : "unexpected shape"}`);
  }
}

// ---------------------------------------------------------------------------
// Pure functions (exported for unit testing)
// ---------------------------------------------------------------------------

/**
 * Matches a key against a denylist entry: exact, or prefix when the entry
 * ends with "*".
 */
export function matchesDenylist(key: string, denylist: readonly string[]): boolean {
  return denylist.some((entry) =>
    entry.endsWith("*") ? key.startsWith(entry.slice(0, -1)) : key === entry
  );
}

/**
 * Whether a node port was most likely chosen by the user.
 *
 * Ports inside the auto-assigned range are indistinguishable from allocated
 * ones, so they count as allocated; zero means unset.
 */
export function isUserAssignedNodePort(
  nodePort: number,
  range: SanitizerPolicy["nodePortRange"]
): boolean {
  return nodePort !== 0 && (nodePort < range.min || nodePort > range.max);
}

function sanitizeMetadata(metadata: JsonObject, policy: SanitizerPolicy): void {
  for (const field of policy.metadataFields) {
    // Identity fields are never removed, whatever the policy says
    if (field === "name" || field === "namespace") continue;
    delete metadata[field];
  }

  const annotations = metadata.annotations;
  if (isJsonObject(annotations)) {
    for (const key of Object.keys(annotations)) {
      if (matchesDenylist(key, policy.annotationDenylist)) {
        delete annotations[key];
      }
    }
    if (Object.keys(annotations).length === 0) {
      delete metadata.annotations;
    }
  }

  const finalizers = metadata.finalizers;
  if (Array.isArray(finalizers)) {
    const kept = finalizers.filter(
      (f) => typeof f !== "string" || !matchesDenylist(f, policy.finalizerDenylist)
    );
    if (kept.length === 0) {
      delete metadata.finalizers;
    } else {
      metadata.finalizers = kept;
    }
  }
}

function sanitizeService(spec: JsonObject, policy: SanitizerPolicy): void {
  // Headless services declare clusterIP: None; that is the user's choice
  if (spec.clusterIP !== "None") {
    delete spec.clusterIP;
    delete spec.clusterIPs;
  }

  const ports = spec.ports;
  if (Array.isArray(ports)) {
    for (const port of ports) {
      if (!isJsonObject(port) || typeof port.nodePort !== "number") continue;
      if (!isUserAssignedNodePort(port.nodePort, policy.nodePortRange)) {
        delete port.nodePort;
      }
    }
  }
}

/**
 * Kind-specific rules: validate the touched fields, then rewrite them.
 */
const KIND_RULES: Record<
  string,
  (spec: JsonObject, policy: SanitizerPolicy) => void
> = {
  Service: (spec, policy) => {
    checkView(ServiceSpecView, spec, "spec");
    sanitizeService(spec, policy);
  },
  PersistentVolumeClaim: (spec) => {
    checkView(PersistentVolumeClaimSpecView, spec, "spec");
    delete spec.volumeName;
  },
  PersistentVolume: (spec) => {
    checkView(PersistentVolumeSpecView, spec, "spec");
    delete spec.claimRef;
  },
};

// ---------------------------------------------------------------------------
// Main entry points
// ---------------------------------------------------------------------------

/**
 * Returns a reapply-safe copy of a resource.
 *
 * Removes the status subtree, server-assigned metadata, denylisted
 * annotations and finalizers, and the kind-specific fields of the core
 * ("" group) kinds:
 * - Service: clusterIP/clusterIPs (unless headless), allocated nodePorts
 * - PersistentVolumeClaim: spec.volumeName
 * - PersistentVolume: spec.claimRef
 *
 * A custom kind that shares one of those names (a Knative Service) only gets
 * the generic rules.
 *
 * @param body - The resource as listed
 * @param kind - The resource's declared kind (from the catalog, not the body)
 * @param policy - Denylists and node port range
 * @param apiGroup - The kind's API group, "" for core
 * @throws SanitizationError when a touched field has an unexpected shape
 */
export function sanitizeResource(
  body: KubernetesObject,
  kind: string,
  policy: SanitizerPolicy = DEFAULT_SANITIZER_POLICY,
  apiGroup = ""
): KubernetesObject {
  checkView(MetadataView, body.metadata, "metadata");

  const copy = cloneJson(body);
  delete copy.status;
  sanitizeMetadata(copy.metadata, policy);

  const rule = apiGroup === "" ? KIND_RULES[kind] : undefined;
  if (rule) {
    const spec = copy.spec;
    if (spec !== undefined) {
      if (!isJsonObject(spec)) {
        throw new SanitizationError(`spec: expected an object for ${kind}`);
      }
      rule(spec, policy);
    }
  }

  return copy;
}

/**
 * Marks a raw document that could not be sanitized, so nobody reapplies it
 * believing it was cleaned. Returns a copy; the input is untouched.
 */
export function markSanitizationFailure(
  body: KubernetesObject,
  reason: string
): KubernetesObject {
  const copy = cloneJson(body);
  const annotations = isJsonObject(copy.metadata.annotations)
    ? copy.metadata.annotations
    : {};
  annotations[SANITIZATION_FAILED_ANNOTATION] = reason;
  copy.metadata.annotations = annotations;
  return copy;
}
