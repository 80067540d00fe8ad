/**
 * config.ts - Turns CLI input into a validated CollectionRun
 *
 * commander hands over strings and booleans; this module checks them with
 * Zod, fills in defaults, and loads the optional override files. Anything
 * wrong is a ConfigError raised before the run touches the cluster.
 */

import { readFile } from "fs/promises";
import { tmpdir } from "os";
import { join, resolve } from "path";
import * as YAML from "yaml";
import { z } from "zod";
import { ConfigError, errorMessage } from "./errors";
import { buildRunId } from "./output";
import { DEFAULT_SANITIZER_POLICY } from "./sanitizer";
import { loadSignatureTable, type SignatureTable } from "./signatures";
import type { CollectionRun, SanitizerPolicy } from "./types";

export const DEFAULT_OUTPUT_DIR = join(tmpdir(), "cluster-collector");
export const DEFAULT_CONCURRENCY = 8;
export const DEFAULT_FETCH_TIMEOUT_SECONDS = 30;

/** Largest delay Node timers take; longer ones fire after 1 ms */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

/** RFC 1123 label, the rule Kubernetes applies to namespace names */
const NAMESPACE_NAME = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

/**
 * Reads numeric flags, which arrive from commander as strings.
 */
function numberOption<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === "string" && value.trim() !== "" ? Number(value) : value),
    schema
  );
}

/** Seconds, from 1 ms up to the timer limit */
const seconds = () => z.number().min(0.001).max(MAX_TIMEOUT_SECONDS);

/**
 * Options as parsed by commander (camel-cased flag names).
 */
export const CliOptionsSchema = z.object({
  kubeconfig: z.string().min(1, "kubeconfig path is required"),
  namespaces: z.string().optional(),
  output: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  format: z.enum(["json", "yaml", "both"]).default("yaml"),
  compression: z.enum(["compressed", "uncompressed", "both"]).default("both"),
  includeCustomResources: z.boolean().default(false),
  raw: z.boolean().default(false),
  disableDetection: z.boolean().default(false),
  onSanitizeFailure: z.enum(["include-raw", "omit"]).default("include-raw"),
  policy: z.string().min(1).optional(),
  signatures: z.string().min(1).optional(),
  concurrency: numberOption(z.number().int().min(1).max(64)).default(DEFAULT_CONCURRENCY),
  fetchTimeout: numberOption(seconds()).default(DEFAULT_FETCH_TIMEOUT_SECONDS),
  deadline: numberOption(seconds().optional()),
  retentionDays: numberOption(z.number().int().min(1).optional()),
  verbose: z.boolean().default(false),
});

export type CliOptions = z.input<typeof CliOptionsSchema>;

/**
 * Sanitizer policy override file. Each list given replaces the default
 * list; omitted fields keep their defaults.
 */
export const SanitizerPolicySchema = z
  .object({
    metadataFields: z.array(z.string().min(1)).optional(),
    annotationDenylist: z.array(z.string().min(1)).optional(),
    finalizerDenylist: z.array(z.string().min(1)).optional(),
    nodePortRange: z
      .object({
        min: z.number().int().min(1).max(65535),
        max: z.number().int().min(1).max(65535),
      })
      .refine((range) => range.min <= range.max, "min must not exceed max")
      .optional(),
  })
  .strict();

/**
 * Result of resolving the CLI input.
 */
export interface RunConfiguration {
  run: CollectionRun;
  /** Print per-request debug lines */
  verbose: boolean;
  /** Replacement signature table, when --signatures was given */
  signatures?: SignatureTable;
}

// ---------------------------------------------------------------------------
// Pure functions (exported for unit testing)
// ---------------------------------------------------------------------------

/**
 * Parses the --namespaces value.
 *
 * - missing, empty or "all": every visible namespace
 * - otherwise: comma-separated names, trimmed and de-duplicated in order
 *
 * @throws ConfigError on a name Kubernetes would not accept
 */
export function parseNamespaceFilter(value: string | undefined): string[] | "all" {
  if (value === undefined || value.trim() === "" || value.trim() === "all") {
    return "all";
  }

  const names: string[] = [];
  for (const raw of value.split(",")) {
    const name = raw.trim();
    if (name === "") continue;
    if (name.length > 63 || !NAMESPACE_NAME.test(name)) {
      throw new ConfigError(`Invalid namespace name: "${name}"`);
    }
    if (!names.includes(name)) names.push(name);
  }
  if (names.length === 0) {
    throw new ConfigError(`No namespace names in "${value}"`);
  }
  return names;
}

/**
 * Validates an unknown value as a policy override and merges it over the
 * defaults.
 *
 * @throws ConfigError naming the first invalid field
 */
export function parseSanitizerPolicy(raw: unknown, source = "sanitizer policy"): SanitizerPolicy {
  const result = SanitizerPolicySchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(formatIssue(source, result.error));
  }
  const override = result.data;
  return {
    metadataFields: override.metadataFields ?? [...DEFAULT_SANITIZER_POLICY.metadataFields],
    annotationDenylist:
      override.annotationDenylist ?? [...DEFAULT_SANITIZER_POLICY.annotationDenylist],
    finalizerDenylist:
      override.finalizerDenylist ?? [...DEFAULT_SANITIZER_POLICY.finalizerDenylist],
    nodePortRange: override.nodePortRange ?? { ...DEFAULT_SANITIZER_POLICY.nodePortRange },
  };
}

function formatIssue(source: string, error: z.ZodError): string {
  const issue = error.issues[0];
  const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `Invalid ${source} at ${where}: ${issue ? issue.message : "unexpected shape"}`;
}

/**
 * Validates CLI options and builds the run configuration.
 *
 * @param input - Options object from commander
 * @param startedAt - Run start, which also names the run
 * @param policy - Sanitizer policy (defaults when omitted)
 * @throws ConfigError on any invalid option
 */
export function buildCollectionRun(
  input: unknown,
  startedAt: Date,
  policy: SanitizerPolicy = DEFAULT_SANITIZER_POLICY
): CollectionRun {
  const result = CliOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(formatIssue("options", result.error));
  }
  const options = result.data;

  return {
    runId: buildRunId(startedAt),
    startedAt,
    kubeconfig: resolve(options.kubeconfig),
    namespaces: parseNamespaceFilter(options.namespaces),
    outputDir: resolve(options.output),
    format: options.format,
    compression: options.compression,
    includeCustomResources: options.includeCustomResources,
    raw: options.raw,
    detectionEnabled: !options.disableDetection,
    concurrency: options.concurrency,
    fetchTimeoutMs: Math.round(options.fetchTimeout * 1000),
    ...(options.deadline !== undefined
      ? { runDeadlineMs: Math.round(options.deadline * 1000) }
      : {}),
    ...(options.retentionDays !== undefined ? { retentionDays: options.retentionDays } : {}),
    sanitizationFailurePolicy: options.onSanitizeFailure,
    sanitizerPolicy: policy,
  };
}

// ---------------------------------------------------------------------------
// Main entry points
// ---------------------------------------------------------------------------

/**
 * Loads a sanitizer policy override from a YAML or JSON file.
 *
 * @throws ConfigError when the file is unreadable or invalid
 */
export async function loadSanitizerPolicy(path: string): Promise<SanitizerPolicy> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read sanitizer policy ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    throw new ConfigError(`Cannot parse sanitizer policy ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return parseSanitizerPolicy(raw, `sanitizer policy ${path}`);
}

/**
 * Validates CLI options and loads the override files they name.
 *
 * @throws ConfigError on any invalid option or override file
 */
export async function loadRunConfiguration(
  input: unknown,
  startedAt: Date = new Date()
): Promise<RunConfiguration> {
  const options = CliOptionsSchema.safeParse(input);
  if (!options.success) {
    throw new ConfigError(formatIssue("options", options.error));
  }

  const policy = options.data.policy
    ? await loadSanitizerPolicy(options.data.policy)
    : DEFAULT_SANITIZER_POLICY;
  const run = buildCollectionRun(input, startedAt, policy);
  const verbose = options.data.verbose;

  if (!options.data.signatures) {
    return { run, verbose };
  }
  return { run, verbose, signatures: await loadSignatureTable(options.data.signatures) };
}
