/**
 * runner.test.ts - End-to-end tests for a collection run
 *
 * Each test runs the whole pipeline against an in-process fake cluster and a
 * temp output directory, then checks what landed on disk.
 */

import { mkdtemp, readFile, readdir, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import * as YAML from "yaml";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { DEFAULT_SANITIZER_POLICY, SANITIZATION_FAILED_ANNOTATION } from "./sanitizer";
import { SessionError } from "./errors";
import { runCollection } from "./runner";
import { createFakeKubectl, crd, resource, type FakeCluster } from "./testing/fake-kubectl";
import type { CollectionRun } from "./types";

// ---------------------------------------------------------------------------
// Test fixture helpers
// ---------------------------------------------------------------------------

const STARTED = new Date("2026-10-19T10:00:00.000Z");
const RUN_ID = "collection-2026-10-19T10-00-00-000Z";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "runner-test-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function makeRun(overrides: Partial<CollectionRun> = {}): CollectionRun {
  return {
    runId: RUN_ID,
    startedAt: STARTED,
    kubeconfig: "/tmp/kubeconfig",
    namespaces: "all",
    outputDir: join(dir, "out"),
    format: "json",
    compression: "uncompressed",
    includeCustomResources: false,
    raw: false,
    detectionEnabled: true,
    concurrency: 8,
    fetchTimeoutMs: 30000,
    sanitizationFailurePolicy: "include-raw",
    sanitizerPolicy: DEFAULT_SANITIZER_POLICY,
    ...overrides,
  };
}

async function run(cluster: FakeCluster, overrides: Partial<CollectionRun> = {}) {
  const onProgress = vi.fn();
  const result = await runCollection(makeRun(overrides), {
    kubectl: createFakeKubectl(cluster),
    onProgress,
    now: () => new Date("2026-10-19T10:00:05.000Z"),
  });
  return { result, onProgress };
}

/**
 * Resource files under the run directory, relative and sorted.
 */
async function resourceFiles(runDirectory: string): Promise<string[]> {
  const entries = await readdir(runDirectory, { recursive: true });
  return entries
    .filter((e) => e.endsWith(".json") && e.includes("resources"))
    .sort();
}

const SMALL_CLUSTER: FakeCluster = {
  serverVersion: "v1.30.4+k3s1",
  namespaces: ["shop", "web"],
  resources: {
    nodes: [
      resource("Node", "node-1", undefined, {
        status: { nodeInfo: { kubeletVersion: "v1.30.4+k3s1" } },
      }),
    ],
    "clusterroles.rbac.authorization.k8s.io": [resource("ClusterRole", "system:k3s-controller")],
    "pods@shop": [resource("Pod", "web-0", "shop"), resource("Pod", "web-1", "shop")],
    "services@web": [
      resource("Service", "api", "web", { spec: { clusterIP: "10.43.0.10", ports: [{ port: 80 }] } }),
    ],
  },
};

// ---------------------------------------------------------------------------
// runCollection
// ---------------------------------------------------------------------------

describe("runCollection", () => {
  it("writes one file per counted resource", async () => {
    const { result } = await run(SMALL_CLUSTER);

    expect(result.runDirectory).toBe(join(dir, "out", RUN_ID));
    expect(result.summary.totalResourceCount).toBe(5);
    expect(result.summary.clusterResourceCount).toBe(2);
    expect(result.summary.namespacedResourceCount).toBe(3);
    expect(await resourceFiles(result.runDirectory)).toEqual([
      join("cluster-wide-resources", "clusterroles", "system%3Ak3s-controller.json"),
      join("cluster-wide-resources", "nodes", "node-1.json"),
      join("namespaced-resources", "shop", "pods", "web-0.json"),
      join("namespaced-resources", "shop", "pods", "web-1.json"),
      join("namespaced-resources", "web", "services", "api.json"),
    ]);
    expect(result.reportFiles).toEqual([
      join(result.runDirectory, "collection-summary.json"),
      join(result.runDirectory, "suse-edge-analysis.json"),
    ]);
    expect(result.empty).toBe(false);
  });

  it("writes sanitized bodies by default", async () => {
    const { result } = await run(SMALL_CLUSTER);

    const written = JSON.parse(
      await readFile(
        join(result.runDirectory, "namespaced-resources", "web", "services", "api.json"),
        "utf-8"
      )
    );
    expect(written).toEqual({
      kind: "Service",
      metadata: { name: "api", namespace: "web" },
      spec: { ports: [{ port: 80 }] },
      apiVersion: "v1",
    });
  });

  it("writes YAML that keeps boolean-looking strings as strings", async () => {
    const data = { enabled: "yes", mode: "on", debug: "off" };
    const { result } = await run(
      {
        serverVersion: "v1.30.4",
        namespaces: ["shop"],
        resources: { "configmaps@shop": [resource("ConfigMap", "flags", "shop", { data })] },
      },
      { format: "yaml" }
    );

    const text = await readFile(
      join(result.runDirectory, "namespaced-resources", "shop", "configmaps", "flags.yaml"),
      "utf-8"
    );
    expect(YAML.parse(text, { version: "1.1" }).data).toEqual(data);
  });

  it("keeps spec.clusterIP on a custom kind named Service", async () => {
    const { result } = await run(
      {
        serverVersion: "v1.30.4",
        namespaces: ["shop"],
        crds: [crd("serving.knative.dev", "services", "Service")],
        resources: {
          "services.v1.serving.knative.dev@shop": [
            resource("Service", "hello", "shop", {
              apiVersion: "serving.knative.dev/v1",
              spec: { clusterIP: "custom-value" },
            }),
          ],
        },
      },
      { includeCustomResources: true }
    );

    const written = JSON.parse(
      await readFile(
        join(
          result.runDirectory,
          "namespaced-resources",
          "shop",
          "custom-resources",
          "services.serving.knative.dev",
          "hello.json"
        ),
        "utf-8"
      )
    );
    expect(written.spec).toEqual({ clusterIP: "custom-value" });
  });

  it("detects the distribution from the collected resources", async () => {
    const { result } = await run(SMALL_CLUSTER);

    expect(result.detection).toMatchObject({
      distribution: "K3s",
      distributionVersion: "v1.30.4+k3s1",
      matchedComponents: ["K3s"],
      confidenceScore: 0.2,
      confidenceLevel: "Medium",
      deploymentClass: "Standalone",
    });
  });

  it("matches the summary document to the returned summary", async () => {
    const { result } = await run(SMALL_CLUSTER);

    const document = JSON.parse(
      await readFile(join(result.runDirectory, "collection-summary.json"), "utf-8")
    );
    expect(document.totals).toEqual({
      resources: 5,
      clusterScoped: 2,
      namespaced: 3,
      filesWritten: 5,
      empty: false,
    });
    expect(document.resourceCounts).toEqual({
      clusterroles: 1,
      nodes: 1,
      pods: 2,
      services: 1,
    });
    expect(document.collection.durationSeconds).toBe(5);
    expect(document.collection.kubernetesVersion).toBe("v1.30.4+k3s1");
  });

  it("keeps going when one namespace of ten fails", async () => {
    const namespaces = Array.from({ length: 10 }, (_, i) => `ns-${i}`);
    const resources = Object.fromEntries(
      namespaces.map((ns) => [`pods@${ns}`, [resource("Pod", `pod-${ns}`, ns)]])
    );

    const { result, onProgress } = await run({
      serverVersion: "v1.30.4",
      namespaces,
      resources,
      failures: { "pods@ns-3": 'pods is forbidden: User "test" cannot list pods' },
    });

    expect(result.summary.resourceCounts).toEqual({ pods: 9 });
    expect(result.summary.fetch.failed).toBe(1);
    expect(result.summary.failures).toEqual([
      {
        stage: "fetch",
        resource: "pods",
        namespace: "ns-3",
        message:
          'Error executing "kubectl get pods -n ns-3 -o json": pods is forbidden: User "test" cannot list pods',
      },
    ]);
    expect(onProgress).toHaveBeenCalledWith(
      "Collection complete: 9 resources (0 cluster-wide, 9 namespaced), 1 failures."
    );
  });

  it("writes nothing when the session cannot be established", async () => {
    await expect(run({ namespaces: ["shop"] })).rejects.toBeInstanceOf(SessionError);
    expect(await readdir(dir)).toEqual([]);
  });

  it("writes listed bodies unchanged in raw mode", async () => {
    const pod = {
      apiVersion: "v1",
      kind: "Pod",
      metadata: {
        name: "web-0",
        namespace: "shop",
        uid: "uid-web-0",
        resourceVersion: "812",
        managedFields: [{ manager: "kubelet" }],
      },
      spec: { nodeName: "node-1", containers: [{ name: "web", image: "nginx:1.27" }] },
      status: { phase: "Running" },
    };

    const { result } = await run(
      { serverVersion: "v1.30.4", namespaces: ["shop"], resources: { "pods@shop": [pod] } },
      { raw: true }
    );

    expect(
      await readFile(
        join(result.runDirectory, "namespaced-resources", "shop", "pods", "web-0.json"),
        "utf-8"
      )
    ).toBe(`${JSON.stringify(pod, null, 2)}\n`);
    expect(result.summary.sanitization).toEqual({
      mode: "raw",
      processed: 0,
      succeeded: 0,
      failed: 0,
    });
  });

  it("reports an empty cluster as empty and undetected", async () => {
    const { result, onProgress } = await run({ serverVersion: "v1.30.4", namespaces: [] });

    expect(result.empty).toBe(true);
    expect(result.summary.totalResourceCount).toBe(0);
    expect(result.detection).toMatchObject({
      distribution: "Unknown",
      confidenceLevel: "Minimal",
      confidenceScore: 0,
      deploymentClass: "Unknown",
      matchedComponents: [],
    });
    expect(onProgress).toHaveBeenCalledWith("  Warning: no resources were written");
  });

  it("skips the analysis document when detection is disabled", async () => {
    const { result } = await run(SMALL_CLUSTER, { detectionEnabled: false });

    expect(result.detection).toBeUndefined();
    expect(result.reportFiles).toEqual([join(result.runDirectory, "collection-summary.json")]);
  });

  it("cancels hung listings at the deadline and still writes the summary", async () => {
    const { result } = await run(
      {
        serverVersion: "v1.30.4",
        namespaces: ["shop"],
        resources: { "pods@shop": [resource("Pod", "web-0", "shop")] },
        hang: ["configmaps@shop"],
      },
      { runDeadlineMs: 50 }
    );

    expect(result.summary.deadlineExceeded).toBe(true);
    expect(result.summary.fetch.cancelled).toBeGreaterThanOrEqual(1);
    expect(result.summary.resourceCounts.pods).toBe(1);
    const document = JSON.parse(
      await readFile(join(result.runDirectory, "collection-summary.json"), "utf-8")
    );
    expect(document.deadlineExceeded).toBe(true);
  });

  it("counts a namespace listing cut off by the deadline as cancelled", async () => {
    const { result } = await run(
      { serverVersion: "v1.30.4", namespaces: ["shop"], hang: ["namespaces"] },
      { runDeadlineMs: 20 }
    );

    expect(result.summary.deadlineExceeded).toBe(true);
    expect(result.summary.fetch.failed).toBe(0);
    expect(result.summary.fetch.cancelled).toBeGreaterThanOrEqual(1);
    expect(result.summary.failures).toEqual([]);
  });

  it("sends each kubectl call and written record to the debug callback", async () => {
    const onDebug = vi.fn();
    const onProgress = vi.fn();
    await runCollection(makeRun(), {
      kubectl: createFakeKubectl({
        ...SMALL_CLUSTER,
        failures: { "configmaps@shop": "configmaps is forbidden" },
      }),
      onProgress,
      onDebug,
      now: () => new Date("2026-10-19T10:00:05.000Z"),
    });

    expect(onDebug).toHaveBeenCalledWith("kubectl version -o json");
    expect(onDebug).toHaveBeenCalledWith("kubectl version -o json: ok");
    expect(onDebug).toHaveBeenCalledWith("kubectl get pods -n shop -o json");
    expect(onDebug).toHaveBeenCalledWith("kubectl get configmaps -n shop -o json: exit");
    expect(onDebug).toHaveBeenCalledWith("Wrote pods shop/web-0 (1 file)");
    expect(onProgress).not.toHaveBeenCalledWith("kubectl version -o json");
  });

  describe("sanitization failures", () => {
    const cluster: FakeCluster = {
      serverVersion: "v1.30.4",
      namespaces: ["shop"],
      resources: {
        "services@shop": [resource("Service", "broken", "shop", { spec: "not-an-object" })],
      },
    };
    const servicePath = (runDirectory: string) =>
      join(runDirectory, "namespaced-resources", "shop", "services", "broken.json");

    it("writes the raw body with a marker under include-raw", async () => {
      const { result } = await run(cluster);

      const written = JSON.parse(await readFile(servicePath(result.runDirectory), "utf-8"));
      expect(written.metadata.uid).toBe("uid-broken");
      expect(typeof written.metadata.annotations[SANITIZATION_FAILED_ANNOTATION]).toBe("string");
      expect(result.summary.sanitization.failed).toBe(1);
      expect(result.summary.resourceCounts).toEqual({ services: 1 });
      expect(result.summary.failures.map((f) => f.stage)).toEqual(["sanitize"]);
    });

    it("drops the record under omit", async () => {
      const { result, onProgress } = await run(cluster, { sanitizationFailurePolicy: "omit" });

      await expect(readFile(servicePath(result.runDirectory), "utf-8")).rejects.toThrow();
      expect(result.summary.resourceCounts).toEqual({});
      expect(result.summary.sanitization.failed).toBe(1);
      expect(onProgress).toHaveBeenCalledWith(
        expect.stringMatching(/^ {2}Warning: omitting services shop\/broken \(/)
      );
    });
  });

  describe("compression", () => {
    it("leaves only the archive in compressed mode", async () => {
      const { result } = await run(SMALL_CLUSTER, { compression: "compressed" });

      expect(result.archivePath).toBe(join(dir, "out", `${RUN_ID}.tar.gz`));
      expect(await readdir(join(dir, "out"))).toEqual([`${RUN_ID}.tar.gz`]);
    });

    it("keeps the tree and the archive in both mode", async () => {
      const { result } = await run(SMALL_CLUSTER, { compression: "both" });

      expect(result.archivePath).toBe(join(dir, "out", `${RUN_ID}.tar.gz`));
      expect((await readdir(join(dir, "out"))).sort()).toEqual([RUN_ID, `${RUN_ID}.tar.gz`]);
    });
  });
});
