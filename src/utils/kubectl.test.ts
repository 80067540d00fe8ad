/**
 * kubectl.test.ts - Unit tests for kubectl argument handling and failure
 * classification
 *
 * execFile is replaced so each test decides how the kubectl process ends.
 */

import type { ExecFileException } from "child_process";
import { beforeEach, describe, it, expect, vi } from "vitest";
import {
  MAX_OUTPUT_BYTES,
  buildKubectlArgs,
  classifyFailure,
  executeKubectl,
  extractKubectlMetadata,
} from "./kubectl";

const mocks = vi.hoisted(() => ({ execFile: vi.fn() }));

vi.mock("child_process", async (importOriginal) => ({
  ...(await importOriginal<typeof import("child_process")>()),
  execFile: mocks.execFile,
}));

/**
 * Builds the error execFile hands its callback.
 */
function execError(message: string, fields: Partial<ExecFileException>): ExecFileException {
  return Object.assign(new Error(message), fields);
}

/**
 * Makes the next execFile call end with the given error and output.
 */
function respond(error: ExecFileException | null, stdout = "", stderr = ""): void {
  mocks.execFile.mockImplementation(
    (
      _file: string,
      _args: string[],
      _options: unknown,
      callback: (error: ExecFileException | null, stdout: string, stderr: string) => void
    ) => {
      callback(error, stdout, stderr);
    }
  );
}

const MAXBUFFER = execError("stdout maxBuffer length exceeded", {
  name: "RangeError",
  code: "ERR_CHILD_PROCESS_STDIO_MAXBUFFER",
  killed: true,
});

describe("extractKubectlMetadata", () => {
  it("reads operation, resource and namespace from -n", () => {
    expect(extractKubectlMetadata(["get", "pods", "-n", "shop", "-o", "json"])).toEqual({
      operation: "get",
      resource: "pods",
      namespace: "shop",
    });
  });

  it("reads --namespace", () => {
    expect(extractKubectlMetadata(["get", "services", "--namespace", "web"]).namespace).toBe("web");
  });

  it("leaves namespace unset for cluster-scoped calls", () => {
    expect(extractKubectlMetadata(["get", "nodes", "-o", "json"])).toEqual({
      operation: "get",
      resource: "nodes",
      namespace: undefined,
    });
  });

  it("falls back to unknown for empty args", () => {
    expect(extractKubectlMetadata([])).toEqual({
      operation: "unknown",
      resource: "unknown",
      namespace: undefined,
    });
  });
});

describe("buildKubectlArgs", () => {
  it("puts session flags before the command", () => {
    expect(
      buildKubectlArgs(["get", "nodes", "-o", "json"], { kubeconfig: "/tmp/kubeconfig" })
    ).toEqual(["--kubeconfig", "/tmp/kubeconfig", "--request-timeout=30s", "get", "nodes", "-o", "json"]);
  });

  it("rounds the request timeout up to whole seconds", () => {
    expect(buildKubectlArgs(["version"], { timeoutMs: 2500 })).toEqual([
      "--request-timeout=3s",
      "version",
    ]);
    expect(buildKubectlArgs(["version"], { timeoutMs: 10 })).toEqual([
      "--request-timeout=1s",
      "version",
    ]);
  });
});

describe("classifyFailure", () => {
  it("reports an overflowing output buffer as an output limit, not a timeout", () => {
    expect(classifyFailure(MAXBUFFER, undefined)).toBe("output-limit");
  });

  it("reports a killed process without a buffer overflow as a timeout", () => {
    const error = execError("Command failed", { killed: true, signal: "SIGTERM" });
    expect(classifyFailure(error, undefined)).toBe("timeout");
  });

  it("reports an aborted signal as cancelled", () => {
    const controller = new AbortController();
    controller.abort();
    const error = execError("The operation was aborted", { name: "AbortError", code: "ABORT_ERR" });
    expect(classifyFailure(error, controller.signal)).toBe("cancelled");
  });

  it("separates spawn errors from non-zero exits", () => {
    expect(classifyFailure(execError("spawn kubectl ENOENT", { code: "ENOENT" }), undefined)).toBe(
      "spawn"
    );
    expect(classifyFailure(execError("Command failed", { code: 1, killed: false }), undefined)).toBe(
      "exit"
    );
  });
});

describe("executeKubectl", () => {
  beforeEach(() => {
    mocks.execFile.mockReset();
  });

  it("resolves with stdout on success", async () => {
    respond(null, '{"items":[]}');

    await expect(executeKubectl(["get", "pods", "-o", "json"])).resolves.toEqual({
      output: '{"items":[]}',
      isError: false,
    });
  });

  it("names the output limit when the buffer overflows", async () => {
    respond(MAXBUFFER);

    await expect(executeKubectl(["get", "configmaps", "-o", "json"])).resolves.toEqual({
      output: `Error executing "kubectl get configmaps -o json": output exceeded ${MAX_OUTPUT_BYTES} bytes`,
      isError: true,
      failure: "output-limit",
    });
  });

  it("names the timeout when the process timer kills kubectl", async () => {
    respond(execError("Command failed", { killed: true, signal: "SIGTERM" }));

    await expect(executeKubectl(["get", "pods"], { timeoutMs: 2500 })).resolves.toEqual({
      output: 'Error executing "kubectl get pods": timed out after 2500ms',
      isError: true,
      failure: "timeout",
    });
  });

  it("passes stderr through for a non-zero exit", async () => {
    respond(
      execError("Command failed", { code: 1, killed: false }),
      "",
      'pods is forbidden: User "test" cannot list pods\n'
    );

    await expect(executeKubectl(["get", "pods"])).resolves.toEqual({
      output: 'Error executing "kubectl get pods": pods is forbidden: User "test" cannot list pods',
      isError: true,
      failure: "exit",
    });
  });
});
