/**
 * signatures.ts - The component signature table
 *
 * Which platform components the detection engine recognizes, and how, is
 * data: signatures.json ships the defaults and --signatures can replace it.
 * This module validates a table with Zod so the matcher in detection.ts can
 * trust every field it reads. Adding a component means adding a JSON entry,
 * not a branch.
 */

import { readFile } from "fs/promises";
import * as YAML from "yaml";
import { z } from "zod";
import defaultTable from "./signatures.json";
import { ConfigError, errorMessage } from "./errors";

/** A pattern list entry: exact, or "*" at the start/end for suffix/prefix/contains */
const PatternList = z.array(z.string().min(1));

const NamespacedNamePattern = z.object({
  namespace: z.string().min(1),
  name: z.string().min(1),
});

/**
 * Match rules of one component. Any single rule firing matches the component.
 */
export const SignatureRulesSchema = z
  .object({
    /** Container images (pods and pod templates) */
    images: PatternList.optional(),
    /** Namespace names */
    namespaces: PatternList.optional(),
    /** Label keys on any collected resource */
    labelKeys: PatternList.optional(),
    /** CRD API groups */
    crdGroups: PatternList.optional(),
    /** Deployment, DaemonSet and StatefulSet namespace/name pairs */
    workloads: z.array(NamespacedNamePattern).optional(),
    /** ClusterRole names */
    clusterRoles: PatternList.optional(),
    /** ConfigMap namespace/name pairs */
    configMaps: z.array(NamespacedNamePattern).optional(),
    /** Node kubelet versions (status.nodeInfo.kubeletVersion) */
    kubeletVersions: PatternList.optional(),
  })
  .strict();

export const ComponentSignatureSchema = z
  .object({
    name: z.string().min(1),
    category: z.string().min(1),
    weight: z.number().nonnegative(),
    /** Set on Kubernetes distribution markers; first match in table order wins */
    distribution: z.enum(["K3s", "RKE2"]).optional(),
    /** A matched management-plane component classifies the cluster as Management */
    managementPlane: z.boolean().optional(),
    rules: SignatureRulesSchema,
  })
  .strict();

export const SignatureTableSchema = z
  .object({
    /** Score that maps to confidence 1.0 */
    maxScore: z.number().positive(),
    /** Confidence bands; a score takes the first band whose minScore it reaches */
    levels: z
      .array(
        z.object({
          level: z.enum(["Minimal", "Low", "Medium", "High", "VeryHigh"]),
          minScore: z.number().min(0).max(1),
        })
      )
      .min(1),
    components: z.array(ComponentSignatureSchema),
    /** Markers of a cluster managed from elsewhere */
    downstreamMarkers: SignatureRulesSchema,
  })
  .strict()
  .transform((table) => ({
    ...table,
    // Highest band first so the first reached band is the right one
    levels: [...table.levels].sort((a, b) => b.minScore - a.minScore),
  }));

export type SignatureRules = z.infer<typeof SignatureRulesSchema>;
export type SignatureTable = z.infer<typeof SignatureTableSchema>;

/**
 * Validates an unknown value as a signature table.
 *
 * @throws ConfigError naming the first invalid field
 */
export function parseSignatureTable(raw: unknown, source = "signature table"): SignatureTable {
  const result = SignatureTableSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new ConfigError(
      `Invalid ${source} at ${where}: ${issue ? issue.message : "unexpected shape"}`
    );
  }
  return result.data;
}

let cachedDefault: SignatureTable | undefined;

/**
 * The built-in table from signatures.json, validated once.
 */
export function getDefaultSignatureTable(): SignatureTable {
  cachedDefault ??= parseSignatureTable(defaultTable, "built-in signature table");
  return cachedDefault;
}

/**
 * Loads a replacement table from a YAML or JSON file (YAML is a JSON superset).
 *
 * @throws ConfigError when the file is unreadable or invalid
 */
export async function loadSignatureTable(path: string): Promise<SignatureTable> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read signature table ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    throw new ConfigError(`Cannot parse signature table ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return parseSignatureTable(raw, `signature table ${path}`);
}
