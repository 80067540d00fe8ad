/**
 * discovery.test.ts - Unit tests for resource enumeration
 *
 * Tests parsing, planning, and the worker pool that lists resources. kubectl
 * is replaced by an in-process fake cluster so tests run fast, offline, and
 * deterministically.
 */

import { describe, it, expect } from "vitest";
import { CLUSTER_SCOPED_KINDS, NAMESPACED_KINDS } from "./catalog";
import {
  buildKindList,
  buildListArgs,
  buildWorkItems,
  crdToResourceKind,
  discoverCustomResourceDefinitions,
  enumerateResources,
  establishSession,
  parseCustomResourceDefinitions,
  parseNamespaceList,
  parseResourceList,
  resolveNamespaces,
  type WorkItemOutcome,
} from "./discovery";
import { FetchError, SessionError } from "./errors";
import { createFakeKubectl, crd, resource } from "./testing/fake-kubectl";
import type { ResourceKind, ResourceRecord } from "./types";

// ---------------------------------------------------------------------------
// Test fixture helpers
// ---------------------------------------------------------------------------

function kindOf(resourceName: string): ResourceKind {
  const kind = [...CLUSTER_SCOPED_KINDS, ...NAMESPACED_KINDS].find(
    (k) => k.resource === resourceName
  );
  if (!kind) throw new Error(`no catalog entry for ${resourceName}`);
  return kind;
}

function listJson(items: unknown[]): string {
  return JSON.stringify({ apiVersion: "v1", kind: "List", items });
}

const quiet = () => {};

// ---------------------------------------------------------------------------
// Pure functions
// ---------------------------------------------------------------------------

describe("parseNamespaceList", () => {
  it("returns namespace names from a List", () => {
    const json = listJson([
      { metadata: { name: "default" } },
      { metadata: { name: "kube-system" } },
    ]);
    expect(parseNamespaceList(json)).toEqual(["default", "kube-system"]);
  });

  it("skips entries without a name", () => {
    const json = listJson([{ metadata: {} }, { metadata: { name: "default" } }]);
    expect(parseNamespaceList(json)).toEqual(["default"]);
  });

  it("throws on output that is not JSON", () => {
    expect(() => parseNamespaceList("not json")).toThrow(/Failed to parse namespaces/);
  });
});

describe("parseCustomResourceDefinitions", () => {
  it("reads group, plural, kind, scope and the storage version", () => {
    const json = listJson([
      {
        metadata: { name: "volumes.longhorn.io" },
        spec: {
          group: "longhorn.io",
          scope: "Namespaced",
          names: { plural: "volumes", kind: "Volume" },
          versions: [
            { name: "v1beta1", served: true, storage: false },
            { name: "v1beta2", served: true, storage: true },
          ],
        },
      },
    ]);

    expect(parseCustomResourceDefinitions(json)).toEqual([
      {
        name: "volumes.longhorn.io",
        group: "longhorn.io",
        version: "v1beta2",
        plural: "volumes",
        kind: "Volume",
        scope: "Namespaced",
      },
    ]);
  });

  it("falls back to the first served version when none is marked storage", () => {
    const json = listJson([
      {
        metadata: { name: "clusters.example.com" },
        spec: {
          group: "example.com",
          scope: "Cluster",
          names: { plural: "clusters", kind: "Cluster" },
          versions: [
            { name: "v1alpha1", served: false },
            { name: "v1beta1", served: true },
          ],
        },
      },
    ]);

    const [result] = parseCustomResourceDefinitions(json);
    expect(result.version).toBe("v1beta1");
    expect(result.scope).toBe("Cluster");
  });

  it("skips CRDs with missing names or no served version", () => {
    const json = listJson([
      { metadata: { name: "broken.example.com" }, spec: { group: "example.com" } },
      {
        metadata: { name: "things.example.com" },
        spec: {
          group: "example.com",
          names: { plural: "things", kind: "Thing" },
          versions: [{ name: "v1", served: false }],
        },
      },
    ]);
    expect(parseCustomResourceDefinitions(json)).toEqual([]);
  });
});

describe("crdToResourceKind", () => {
  it("uses plural.group as the resource and pins the version for kubectl", () => {
    const kind = crdToResourceKind({
      name: "sqls.devopstoolkit.live",
      group: "devopstoolkit.live",
      version: "v1beta1",
      plural: "sqls",
      kind: "SQL",
      scope: "Namespaced",
    });

    expect(kind).toEqual({
      resource: "sqls.devopstoolkit.live",
      kubectlName: "sqls.v1beta1.devopstoolkit.live",
      kind: "SQL",
      apiGroup: "devopstoolkit.live",
      apiVersion: "devopstoolkit.live/v1beta1",
      scope: "Namespaced",
      category: "custom",
      isCustom: true,
    });
  });
});

describe("buildWorkItems", () => {
  it("plans one item per cluster kind and one per namespaced kind and namespace", () => {
    const items = buildWorkItems([kindOf("nodes"), kindOf("pods")], ["default", "web"]);

    expect(items.map((i) => `${i.kind.resource}:${i.namespace}`)).toEqual([
      "nodes:",
      "pods:default",
      "pods:web",
    ]);
  });

  it("plans only cluster kinds when there are no namespaces", () => {
    const items = buildWorkItems(buildKindList(), []);
    expect(items).toHaveLength(CLUSTER_SCOPED_KINDS.length);
    expect(items.every((i) => i.namespace === "")).toBe(true);
  });

  it("appends custom kinds after the catalog", () => {
    const custom = crdToResourceKind({
      name: "volumes.longhorn.io",
      group: "longhorn.io",
      version: "v1beta2",
      plural: "volumes",
      kind: "Volume",
      scope: "Namespaced",
    });
    const kinds = buildKindList([custom]);
    expect(kinds).toHaveLength(CLUSTER_SCOPED_KINDS.length + NAMESPACED_KINDS.length + 1);
    expect(kinds[kinds.length - 1]).toBe(custom);
  });
});

describe("buildListArgs", () => {
  it("lists cluster-scoped kinds without a namespace", () => {
    expect(buildListArgs({ kind: kindOf("nodes"), namespace: "" })).toEqual([
      "get",
      "nodes",
      "-o",
      "json",
    ]);
  });

  it("lists namespaced kinds in their namespace with the group pinned", () => {
    expect(buildListArgs({ kind: kindOf("deployments"), namespace: "web" })).toEqual([
      "get",
      "deployments.apps",
      "-n",
      "web",
      "-o",
      "json",
    ]);
  });
});

describe("parseResourceList", () => {
  it("creates one record per item with kind and scope from the catalog", () => {
    const json = listJson([resource("Pod", "web-0", "default"), resource("Pod", "web-1", "default")]);
    const { records, skipped } = parseResourceList(json, {
      kind: kindOf("pods"),
      namespace: "default",
    });

    expect(skipped).toBe(0);
    expect(records).toHaveLength(2);
    expect(records[0]).toMatchObject({
      apiGroup: "",
      apiVersion: "v1",
      kind: "Pod",
      resource: "pods",
      scope: "Namespaced",
      namespace: "default",
      name: "web-0",
      category: "workloads",
      isCustom: false,
    });
  });

  it("fills in apiVersion and kind when items omit them", () => {
    const json = listJson([{ metadata: { name: "node-1" } }]);
    const { records } = parseResourceList(json, { kind: kindOf("nodes"), namespace: "" });

    expect(records[0].rawBody.apiVersion).toBe("v1");
    expect(records[0].rawBody.kind).toBe("Node");
    expect(records[0].namespace).toBe("");
  });

  it("counts items without metadata.name as skipped", () => {
    const json = listJson([{ metadata: {} }, "junk", resource("Pod", "ok", "default")]);
    const { records, skipped } = parseResourceList(json, {
      kind: kindOf("pods"),
      namespace: "default",
    });
    expect(records.map((r) => r.name)).toEqual(["ok"]);
    expect(skipped).toBe(2);
  });

  it("returns no records for an empty list", () => {
    const { records } = parseResourceList(listJson([]), { kind: kindOf("pods"), namespace: "a" });
    expect(records).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// Cluster calls
// ---------------------------------------------------------------------------

describe("establishSession", () => {
  it("returns the server version", async () => {
    const kubectl = createFakeKubectl({ serverVersion: "v1.30.4+k3s1" });
    const session = await establishSession({ kubectl, onProgress: quiet });

    expect(session.serverVersion).toBe("v1.30.4+k3s1");
    expect(kubectl).toHaveBeenCalledWith(["version", "-o", "json"], undefined);
  });

  it("throws SessionError when the API is unreachable", async () => {
    const kubectl = createFakeKubectl({});
    await expect(establishSession({ kubectl, onProgress: quiet })).rejects.toBeInstanceOf(
      SessionError
    );
  });
});

describe("resolveNamespaces", () => {
  it("returns every namespace, sorted, for the 'all' filter", async () => {
    const kubectl = createFakeKubectl({ namespaces: ["web", "default", "kube-system"] });
    const result = await resolveNamespaces("all", { kubectl, onProgress: quiet });

    expect(result).toEqual({ namespaces: ["default", "kube-system", "web"], missing: [] });
  });

  it("skips requested namespaces that do not exist, with a warning", async () => {
    const kubectl = createFakeKubectl({ namespaces: ["default", "web"] });
    const messages: string[] = [];
    const result = await resolveNamespaces(["web", "ghost"], {
      kubectl,
      onProgress: (m) => messages.push(m),
    });

    expect(result.namespaces).toEqual(["web"]);
    expect(result.missing).toEqual(["ghost"]);
    expect(messages).toContain("  Warning: namespace 'ghost' does not exist, skipping");
  });

  it("reports a failed namespace listing without throwing", async () => {
    const kubectl = createFakeKubectl({ failures: { namespaces: "forbidden" } });
    const result = await resolveNamespaces("all", { kubectl, onProgress: quiet });

    expect(result.namespaces).toEqual([]);
    expect(result.failure).toBeInstanceOf(FetchError);
    expect(result.failure?.resource).toBe("namespaces");
    expect(result.failure?.cancelled).toBe(false);
  });

  it("marks the failure cancelled when the deadline cut the listing short", async () => {
    const controller = new AbortController();
    controller.abort();
    const kubectl = createFakeKubectl({ namespaces: ["default"] });
    const result = await resolveNamespaces("all", {
      kubectl,
      onProgress: quiet,
      signal: controller.signal,
    });

    expect(result.namespaces).toEqual([]);
    expect(result.failure?.cancelled).toBe(true);
  });
});

describe("discoverCustomResourceDefinitions", () => {
  it("parses the CRD list", async () => {
    const kubectl = createFakeKubectl({ crds: [crd("longhorn.io", "volumes", "Volume", "v1beta2")] });
    const { crds, failure } = await discoverCustomResourceDefinitions({
      kubectl,
      onProgress: quiet,
    });

    expect(failure).toBeUndefined();
    expect(crds.map((c) => c.name)).toEqual(["volumes.longhorn.io"]);
  });

  it("returns no CRDs and a failure when the listing is forbidden", async () => {
    const kubectl = createFakeKubectl({
      failures: { customresourcedefinitions: "forbidden" },
    });
    const { crds, failure } = await discoverCustomResourceDefinitions({
      kubectl,
      onProgress: quiet,
    });

    expect(crds).toEqual([]);
    expect(failure?.resource).toBe("customresourcedefinitions");
    expect(failure?.cancelled).toBe(false);
  });

  it("marks the failure cancelled when the listing was aborted", async () => {
    const controller = new AbortController();
    const kubectl = createFakeKubectl({
      crds: [crd("longhorn.io", "volumes", "Volume")],
      hang: ["customresourcedefinitions"],
    });
    const messages: string[] = [];
    const pending = discoverCustomResourceDefinitions({
      kubectl,
      onProgress: (m) => messages.push(m),
      signal: controller.signal,
    });
    controller.abort();
    const { crds, failure } = await pending;

    expect(crds).toEqual([]);
    expect(failure?.cancelled).toBe(true);
    expect(messages).toContain("  Warning: CRD listing cancelled");
  });
});

// ---------------------------------------------------------------------------
// enumerateResources
// ---------------------------------------------------------------------------

describe("enumerateResources", () => {
  const namespaces = Array.from({ length: 10 }, (_, i) => `team-${i}`);

  function podsEverywhere() {
    return Object.fromEntries(
      namespaces.map((ns) => [`pods@${ns}`, [resource("Pod", `app-${ns}`, ns)]])
    );
  }

  it("isolates one failed listing from the nine that succeed", async () => {
    const kubectl = createFakeKubectl({
      resources: podsEverywhere(),
      failures: { "pods@team-3": 'pods is forbidden: User "collector" cannot list resource "pods"' },
    });
    const records: ResourceRecord[] = [];

    const outcomes = await enumerateResources(buildWorkItems([kindOf("pods")], namespaces), {
      kubectl,
      onProgress: quiet,
      concurrency: 3,
      onRecord: async (r) => {
        records.push(r);
      },
    });

    expect(outcomes.filter((o) => o.status === "succeeded")).toHaveLength(9);
    const failed = outcomes.filter(
      (o): o is Extract<WorkItemOutcome, { status: "failed" }> => o.status === "failed"
    );
    expect(failed).toHaveLength(1);
    expect(failed[0].error.namespace).toBe("team-3");
    expect(failed[0].error.resource).toBe("pods");
    expect(records).toHaveLength(9);
    expect(records.some((r) => r.namespace === "team-3")).toBe(false);
  });

  it("keeps outcomes in plan order", async () => {
    const kubectl = createFakeKubectl({ resources: podsEverywhere() });
    const items = buildWorkItems([kindOf("pods")], namespaces);

    const outcomes = await enumerateResources(items, {
      kubectl,
      onProgress: quiet,
      concurrency: 4,
      onRecord: async () => {},
    });

    expect(outcomes.map((o) => o.item.namespace)).toEqual(namespaces);
  });

  it("never has more listings in flight than the concurrency limit", async () => {
    const fake = createFakeKubectl({ resources: podsEverywhere() });
    let inFlight = 0;
    let peak = 0;
    const kubectl = async (args: string[], signal?: AbortSignal) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      const result = await fake(args, signal);
      inFlight--;
      return result;
    };

    await enumerateResources(buildWorkItems([kindOf("pods")], namespaces), {
      kubectl,
      onProgress: quiet,
      concurrency: 2,
      onRecord: async () => {},
    });

    expect(peak).toBe(2);
  });

  it("marks every item cancelled when the signal is already aborted", async () => {
    const kubectl = createFakeKubectl({ resources: podsEverywhere() });
    const controller = new AbortController();
    controller.abort();

    const outcomes = await enumerateResources(buildWorkItems([kindOf("pods")], namespaces), {
      kubectl,
      onProgress: quiet,
      signal: controller.signal,
      onRecord: async () => {},
    });

    expect(outcomes.every((o) => o.status === "cancelled")).toBe(true);
    expect(kubectl).not.toHaveBeenCalled();
  });

  it("cancels a hanging listing when the signal aborts", async () => {
    const kubectl = createFakeKubectl({
      resources: podsEverywhere(),
      hang: ["pods@team-0"],
    });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const outcomes = await enumerateResources(buildWorkItems([kindOf("pods")], namespaces), {
      kubectl,
      onProgress: quiet,
      concurrency: 1,
      signal: controller.signal,
      onRecord: async () => {},
    });

    expect(outcomes.every((o) => o.status === "cancelled")).toBe(true);
  });

  it("treats a timed-out listing as a recoverable failure", async () => {
    const kubectl = async (args: string[]) =>
      args.includes("team-1")
        ? {
            output: `Error executing "kubectl ${args.join(" ")}": timed out after 30000ms`,
            isError: true,
            failure: "timeout" as const,
          }
        : { output: listJson([]), isError: false };

    const outcomes = await enumerateResources(
      buildWorkItems([kindOf("pods")], ["team-0", "team-1", "team-2"]),
      { kubectl, onProgress: quiet, onRecord: async () => {} }
    );

    expect(outcomes.map((o) => o.status)).toEqual(["succeeded", "failed", "succeeded"]);
  });

  it("reports each finished item through onOutcome and warns on failures", async () => {
    const kubectl = createFakeKubectl({ failures: { nodes: "forbidden" } });
    const seen: string[] = [];
    const messages: string[] = [];

    await enumerateResources(buildWorkItems([kindOf("nodes")], []), {
      kubectl,
      onProgress: (m) => messages.push(m),
      onRecord: async () => {},
      onOutcome: (o) => seen.push(o.status),
    });

    expect(seen).toEqual(["failed"]);
    expect(messages).toContain(
      '  Warning: skipping nodes (Error executing "kubectl get nodes -o json": forbidden)'
    );
    expect(messages[messages.length - 1]).toBe(
      "Enumeration complete: 0 succeeded, 1 failed, 0 cancelled."
    );
  });
});
