#!/usr/bin/env node
/**
 * index.ts - CLI entry point for cluster-collector
 *
 * What this file does:
 * Parses the command line, validates it into a CollectionRun, and runs one
 * collection:
 *
 *   cluster-collector --kubeconfig ~/.kube/config -n default,kube-system
 *
 * Exit codes:
 * - 0: the run finished, even if some listings or records failed (the
 *   summary lists them)
 * - 1: invalid options, unreachable cluster, unwritable output, or a
 *   requested archive that could not be written
 *
 * The shebang (#!/usr/bin/env node):
 * This line tells the OS to run this file with Node.js.
 * It's what makes `cluster-collector --kubeconfig ...` work after npm link.
 */

// Initialize OpenTelemetry tracing before any other imports
// This ensures the tracer provider is registered before any instrumented code runs
import "./tracing";

import { Command, Option } from "commander";
import { execSync } from "child_process";
import {
  CollectorError,
  DEFAULT_OUTPUT_DIR,
  TOOL_NAME,
  TOOL_VERSION,
  loadRunConfiguration,
  runCollection,
} from "./pipeline";
import { shutdownTracing } from "./tracing";

// ---------------------------------------------------------------------------
// Environment validation
// ---------------------------------------------------------------------------

/**
 * Validates that kubectl is available.
 */
function validateKubectl(): void {
  try {
    execSync("kubectl version --client", {
      encoding: "utf-8",
      stdio: ["pipe", "pipe", "pipe"],
    });
  } catch {
    console.error("Error: kubectl is not installed or not in PATH.");
    console.error("");
    console.error("Install kubectl:");
    console.error("  https://kubernetes.io/docs/tasks/tools/");
    process.exit(1);
  }
}

/**
 * Prints a fatal error with the stage that raised it.
 */
function reportFatal(error: unknown): void {
  if (error instanceof CollectorError) {
    console.error(`\nCollection failed during ${error.stage}: ${error.message}`);
    if (error.stage === "session") {
      console.error("Check that the kubeconfig is valid and the API server is reachable.");
    } else if (error.stage === "archive") {
      console.error("The uncompressed run directory was left in place.");
    }
    return;
  }
  const message = error instanceof Error ? error.message : String(error);
  console.error(`\nCollection failed: ${message}`);
}

/**
 * Main function - defines the options and runs one collection
 */
async function main() {
  const program = new Command();

  program
    .name(TOOL_NAME)
    .description(
      "Collects a sanitized, reapplyable snapshot of a Kubernetes cluster and fingerprints its platform components"
    )
    .version(TOOL_VERSION)
    .requiredOption("-k, --kubeconfig <path>", "kubeconfig file holding the cluster credential")
    .option("-n, --namespaces <list>", "comma-separated namespaces (default: all)")
    .option("-o, --output <dir>", "output directory", DEFAULT_OUTPUT_DIR)
    .addOption(
      new Option("-f, --format <format>", "output format")
        .choices(["json", "yaml", "both"])
        .default("yaml")
    )
    .addOption(
      new Option("-c, --compression <mode>", "archive mode")
        .choices(["compressed", "uncompressed", "both"])
        .default("both")
    )
    .option("--include-custom-resources", "also collect custom resource instances")
    .option("--raw", "write resources exactly as listed, without sanitization")
    .option("--disable-detection", "skip the platform component analysis")
    .addOption(
      new Option("--on-sanitize-failure <policy>", "what to do with records that fail sanitization")
        .choices(["include-raw", "omit"])
        .default("include-raw")
    )
    .option("--policy <file>", "sanitizer policy override (YAML or JSON)")
    .option("--signatures <file>", "signature table override (YAML or JSON)")
    .option("--concurrency <n>", "parallel kubectl calls", "8")
    .option("--fetch-timeout <seconds>", "timeout for each kubectl call", "30")
    .option("--deadline <seconds>", "stop listing after this many seconds")
    .option("--retention-days <days>", "delete collection archives older than this")
    .option("-v, --verbose", "print each kubectl call and written file")
    .action(async (options: Record<string, unknown>) => {
      let exitCode = 0;
      try {
        const { run, verbose, signatures } = await loadRunConfiguration(options);
        validateKubectl();

        const onDebug = verbose
          ? (message: string) => console.log(`[debug] ${message}`) // eslint-disable-line no-console
          : undefined;
        console.log(`\nStarting collection ${run.runId}...\n`); // eslint-disable-line no-console
        onDebug?.(`kubeconfig: ${run.kubeconfig}`);
        onDebug?.(`output: ${run.outputDir} (${run.format}, ${run.compression})`);
        const result = await runCollection(run, { signatures, onDebug });

        console.log(""); // eslint-disable-line no-console
        if (result.archivePath) {
          console.log(`Archive: ${result.archivePath}`); // eslint-disable-line no-console
        }
        if (run.compression !== "compressed") {
          console.log(`Directory: ${result.runDirectory}`); // eslint-disable-line no-console
        }
        if (result.detection) {
          console.log( // eslint-disable-line no-console
            `Detected: ${result.detection.distribution}, ${result.detection.deploymentClass}, ` +
              `confidence ${result.detection.confidenceLevel}`
          );
        }
      } catch (error) {
        reportFatal(error);
        exitCode = 1;
      } finally {
        await shutdownTracing();
      }
      if (exitCode !== 0) process.exit(exitCode);
    });

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error("Error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
