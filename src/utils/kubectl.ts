/**
 * kubectl.ts - Executes kubectl commands as subprocesses
 *
 * How it works:
 * 1. Takes an array of kubectl arguments (e.g., ["get", "pods", "-n", "default", "-o", "json"])
 * 2. Prepends the session flags (--kubeconfig, --request-timeout)
 * 3. Spawns kubectl without a shell and resolves with the output or an error
 *
 * Why execFile instead of exec?
 * exec(string) hands the command to /bin/sh, which interprets ; | ` $() in
 * namespace or resource names. execFile(cmd, args[]) passes each array element
 * as a single argument, so a hostile name fails as "not found" instead of
 * running a second command.
 *
 * Why async?
 * The collector fans out dozens of independent list calls through a bounded
 * worker pool. A synchronous spawn would serialize them.
 *
 * OpenTelemetry instrumentation:
 * Each kubectl execution creates a CLIENT span named "kubectl {operation} {resource}"
 * with k8s.* attributes and OTel semconv process.* attributes.
 */

import { execFile, type ExecFileException } from "child_process";
import { SpanKind, SpanStatusCode } from "@opentelemetry/api";
import { getTracer } from "../tracing";

/**
 * Why the call failed, when it failed.
 *
 * - exit: kubectl ran and exited non-zero (forbidden, not found, bad version)
 * - timeout: the per-call timeout killed kubectl
 * - cancelled: the caller's AbortSignal fired (run deadline)
 * - output-limit: stdout or stderr outgrew the buffer and kubectl was killed
 * - spawn: kubectl could not be started at all (not installed)
 */
export type KubectlFailure = "exit" | "timeout" | "cancelled" | "output-limit" | "spawn";

/**
 * Result from executing a kubectl command.
 *
 * The error state comes from kubectl's exit status, never from the output
 * content, so a ConfigMap that happens to contain "Error" is still a success.
 */
export interface KubectlResult {
  output: string;
  isError: boolean;
  failure?: KubectlFailure;
}

/**
 * Session and cancellation settings for one kubectl call.
 */
export interface KubectlExecOptions {
  /** Path to the kubeconfig holding the pre-established credential */
  kubeconfig?: string;
  /** Kill kubectl after this many milliseconds (default 30 s) */
  timeoutMs?: number;
  /** Aborts the call when the run deadline passes */
  signal?: AbortSignal;
}

/**
 * Injectable kubectl executor. Pipeline stages take one of these so tests can
 * replace the cluster with canned responses.
 */
export type KubectlExecutor = (
  args: string[],
  signal?: AbortSignal
) => Promise<KubectlResult>;

const DEFAULT_TIMEOUT_MS = 30_000;

/** List responses for large clusters run to hundreds of megabytes */
export const MAX_OUTPUT_BYTES = 512 * 1024 * 1024;

/**
 * Metadata extracted from kubectl args for tracing attributes.
 */
interface KubectlMetadata {
  operation: string; // get, version
  resource: string; // pods, deployments, etc.
  namespace: string | undefined; // from -n flag
}

/**
 * Extracts operation metadata from kubectl args for tracing.
 *
 * - kubectl get pods -n default -o json → operation=get, resource=pods
 * - kubectl version -o json             → operation=version, resource=-o
 *
 * @param args - kubectl arguments (without "kubectl" itself)
 */
export function extractKubectlMetadata(args: string[]): KubectlMetadata {
  const operation = args[0] || "unknown";
  const resource = args[1] || "unknown";

  let namespaceIndex = args.indexOf("-n");
  if (namespaceIndex === -1) {
    namespaceIndex = args.indexOf("--namespace");
  }
  const namespace =
    namespaceIndex !== -1 && args[namespaceIndex + 1]
      ? args[namespaceIndex + 1]
      : undefined;

  return { operation, resource, namespace };
}

/**
 * Builds the full argument list: session flags first, then the command.
 *
 * --request-timeout bounds the API round trip inside kubectl; the process
 * timeout in executeKubectl bounds everything else (exec plugins, DNS).
 */
export function buildKubectlArgs(
  args: string[],
  options: KubectlExecOptions = {}
): string[] {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const sessionArgs: string[] = [];
  if (options.kubeconfig) {
    sessionArgs.push("--kubeconfig", options.kubeconfig);
  }
  sessionArgs.push(`--request-timeout=${Math.max(1, Math.ceil(timeoutMs / 1000))}s`);
  return [...sessionArgs, ...args];
}

/**
 * Maps an execFile error to the failure category reported to callers.
 *
 * Node kills the child when the output buffer overflows, so `killed` alone
 * does not mean the timeout fired.
 */
export function classifyFailure(
  error: ExecFileException,
  signal: AbortSignal | undefined
): KubectlFailure {
  if (signal?.aborted || error.name === "AbortError") return "cancelled";
  if (error.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") return "output-limit";
  if (error.killed) return "timeout";
  if (typeof error.code === "string") return "spawn";
  return "exit";
}

function describeFailure(
  failure: KubectlFailure,
  timeoutMs: number,
  stderr: string,
  error: ExecFileException
): string {
  switch (failure) {
    case "timeout":
      return `timed out after ${timeoutMs}ms`;
    case "cancelled":
      return "cancelled";
    case "output-limit":
      return `output exceeded ${MAX_OUTPUT_BYTES} bytes`;
    default:
      return stderr.trim() || error.message;
  }
}

/**
 * Executes a kubectl command and resolves with a structured result.
 *
 * Never rejects: spawn errors, non-zero exits, timeouts and cancellation are
 * all reported through isError/failure so one bad call cannot take down the
 * calls running beside it.
 *
 * @param args - Arguments after "kubectl" (e.g., ["get", "pods", "-o", "json"])
 * @param options - kubeconfig path, per-call timeout, abort signal
 *
 * Example:
 *   await executeKubectl(["get", "nodes", "-o", "json"], { kubeconfig: "/tmp/kubeconfig" })
 *   // Resolves: { output: '{"items":[...]}', isError: false }
 */
export function executeKubectl(
  args: string[],
  options: KubectlExecOptions = {}
): Promise<KubectlResult> {
  const tracer = getTracer();
  const metadata = extractKubectlMetadata(args);
  const fullArgs = buildKubectlArgs(args, options);
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const startTime = Date.now();

  // Display form only; the kubeconfig path is left out of messages
  const command = `kubectl ${args.join(" ")}`;

  return tracer.startActiveSpan(
    `kubectl ${metadata.operation} ${metadata.resource}`,
    { kind: SpanKind.CLIENT },
    (span) => {
      span.setAttribute("k8s.client", "kubectl");
      span.setAttribute("k8s.operation", metadata.operation);
      span.setAttribute("k8s.resource", metadata.resource);
      span.setAttribute("k8s.args", args.join(" "));
      if (metadata.namespace) {
        span.setAttribute("k8s.namespace", metadata.namespace);
      }
      span.setAttribute("process.executable.name", "kubectl");
      span.setAttribute("process.command_args", ["kubectl", ...args]);

      return new Promise<KubectlResult>((resolve) => {
        const finish = (result: KubectlResult): void => {
          span.setAttribute("k8s.duration_ms", Date.now() - startTime);
          span.end();
          resolve(result);
        };

        try {
          execFile(
            "kubectl",
            fullArgs,
            {
              encoding: "utf-8",
              timeout: timeoutMs,
              maxBuffer: MAX_OUTPUT_BYTES,
              signal: options.signal,
            },
            (error, stdout, stderr) => {
              if (!error) {
                span.setAttribute("process.exit.code", 0);
                span.setStatus({ code: SpanStatusCode.OK });
                finish({ output: stdout, isError: false });
                return;
              }

              const failure = classifyFailure(error, options.signal);
              const exitCode = typeof error.code === "number" ? error.code : -1;
              const detail = describeFailure(failure, timeoutMs, stderr, error);

              span.setAttribute("process.exit.code", exitCode);
              span.setAttribute("error.type", failure === "exit" ? "KubectlError" : error.name);
              span.setStatus({ code: SpanStatusCode.ERROR, message: detail });

              finish({
                output: `Error executing "${command}": ${detail}`,
                isError: true,
                failure,
              });
            }
          );
        } catch (error) {
          // execFile throws synchronously for invalid options
          const message = error instanceof Error ? error.message : String(error);
          span.setAttribute("process.exit.code", -1);
          span.setAttribute("error.type", error instanceof Error ? error.name : "UnknownError");
          span.recordException(error instanceof Error ? error : new Error(message));
          span.setStatus({ code: SpanStatusCode.ERROR, message });
          finish({
            output: `Error executing "${command}": ${message}`,
            isError: true,
            failure: "spawn",
          });
        }
      });
    }
  );
}

/**
 * Binds session settings into an executor the pipeline can call with just args.
 */
export function createKubectlExecutor(
  options: Omit<KubectlExecOptions, "signal"> = {}
): KubectlExecutor {
  return (args, signal) => executeKubectl(args, { ...options, signal });
}
