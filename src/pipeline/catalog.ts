/**
 * catalog.ts - Built-in resource kinds the collector always lists
 *
 * The catalog is fixed rather than read from `kubectl api-resources`: the
 * collector targets reapplyable configuration, and the kinds below are the
 * ones a restore would need. Custom kinds are added at run time from CRDs.
 */

import type { ResourceCategory, ResourceKind, ResourceScope } from "./types";

/**
 * Extracts the API group from a full API version string.
 *
 * - Core resources: "v1" → ""
 * - Grouped resources: "apps/v1" → "apps"
 */
export function extractGroup(apiVersion: string): string {
  const slashIndex = apiVersion.indexOf("/");
  return slashIndex === -1 ? "" : apiVersion.substring(0, slashIndex);
}

/**
 * Builds a catalog entry for a built-in kind.
 */
function builtIn(
  resource: string,
  kind: string,
  apiVersion: string,
  scope: ResourceScope,
  category: ResourceCategory
): ResourceKind {
  const apiGroup = extractGroup(apiVersion);
  return {
    resource,
    // Pin the group so an aggregated API with the same plural can't shadow it
    kubectlName: apiGroup ? `${resource}.${apiGroup}` : resource,
    kind,
    apiGroup,
    apiVersion,
    scope,
    category,
    isCustom: false,
  };
}

export const CLUSTER_SCOPED_KINDS: readonly ResourceKind[] = [
  builtIn("nodes", "Node", "v1", "Cluster", "cluster"),
  builtIn("clusterroles", "ClusterRole", "rbac.authorization.k8s.io/v1", "Cluster", "rbac"),
  builtIn("clusterrolebindings", "ClusterRoleBinding", "rbac.authorization.k8s.io/v1", "Cluster", "rbac"),
  builtIn("persistentvolumes", "PersistentVolume", "v1", "Cluster", "storage"),
  builtIn("storageclasses", "StorageClass", "storage.k8s.io/v1", "Cluster", "storage"),
];

export const NAMESPACED_KINDS: readonly ResourceKind[] = [
  builtIn("pods", "Pod", "v1", "Namespaced", "workloads"),
  builtIn("deployments", "Deployment", "apps/v1", "Namespaced", "workloads"),
  builtIn("replicasets", "ReplicaSet", "apps/v1", "Namespaced", "workloads"),
  builtIn("daemonsets", "DaemonSet", "apps/v1", "Namespaced", "workloads"),
  builtIn("statefulsets", "StatefulSet", "apps/v1", "Namespaced", "workloads"),
  builtIn("jobs", "Job", "batch/v1", "Namespaced", "workloads"),
  builtIn("cronjobs", "CronJob", "batch/v1", "Namespaced", "workloads"),
  builtIn("services", "Service", "v1", "Namespaced", "networking"),
  builtIn("endpoints", "Endpoints", "v1", "Namespaced", "networking"),
  builtIn("endpointslices", "EndpointSlice", "discovery.k8s.io/v1", "Namespaced", "networking"),
  builtIn("ingresses", "Ingress", "networking.k8s.io/v1", "Namespaced", "networking"),
  builtIn("networkpolicies", "NetworkPolicy", "networking.k8s.io/v1", "Namespaced", "networking"),
  builtIn("configmaps", "ConfigMap", "v1", "Namespaced", "configuration"),
  builtIn("secrets", "Secret", "v1", "Namespaced", "configuration"),
  builtIn("persistentvolumeclaims", "PersistentVolumeClaim", "v1", "Namespaced", "storage"),
  builtIn("serviceaccounts", "ServiceAccount", "v1", "Namespaced", "rbac"),
  builtIn("roles", "Role", "rbac.authorization.k8s.io/v1", "Namespaced", "rbac"),
  builtIn("rolebindings", "RoleBinding", "rbac.authorization.k8s.io/v1", "Namespaced", "rbac"),
  builtIn("resourcequotas", "ResourceQuota", "v1", "Namespaced", "policy"),
  builtIn("limitranges", "LimitRange", "v1", "Namespaced", "policy"),
  builtIn("horizontalpodautoscalers", "HorizontalPodAutoscaler", "autoscaling/v2", "Namespaced", "policy"),
  builtIn("poddisruptionbudgets", "PodDisruptionBudget", "policy/v1", "Namespaced", "policy"),
];

/**
 * Kinds whose pod template (or pod spec) carries container images.
 * Used by detection to find images without a schema per kind.
 */
export const WORKLOAD_KINDS = new Set([
  "Pod",
  "Deployment",
  "ReplicaSet",
  "DaemonSet",
  "StatefulSet",
  "Job",
  "CronJob",
]);
