import { join, resolve } from "node:path";
import { z } from "zod";
import { normalizeBaseUrl } from "./api.js";
import { ConfigError } from "./errors.js";
import { DEFAULT_COMMIT_MESSAGE } from "./ingest.js";
import { MANIFEST_FILENAME } from "./manifest.js";

export interface RunConfig {
  datasetDir: string;
  manifestPath: string;
  apiBase: string;
  materialize: boolean;
  commitMessage: string;
}

const ManifestNameSchema = z
  .string()
  .min(1)
  .refine((value) => !/[\\/]/.test(value), { message: "manifest must be a file name inside the dataset" });

const IngestOptionsSchema = z.object({
  dataset: z.string().trim().min(1, "--dataset is required"),
  apiBase: z.string().trim().url("--api-base must be an absolute URL"),
  get: z.boolean().optional().default(false),
  manifest: ManifestNameSchema.optional().default(MANIFEST_FILENAME),
  message: z.string().trim().min(1).optional().default(DEFAULT_COMMIT_MESSAGE),
});

const ManifestOptionsSchema = z.object({
  dataset: z.string().trim().min(1, "--dataset is required"),
  manifest: ManifestNameSchema.optional().default(MANIFEST_FILENAME),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseRunConfig(rawOptions: unknown): RunConfig {
  const parsed = IngestOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    throw new ConfigError(`Invalid options: ${formatIssues(parsed.error)}`);
  }
  const datasetDir = resolve(parsed.data.dataset);
  return {
    datasetDir,
    manifestPath: join(datasetDir, parsed.data.manifest),
    apiBase: normalizeBaseUrl(parsed.data.apiBase),
    materialize: parsed.data.get,
    commitMessage: parsed.data.message,
  };
}

export function parseManifestPath(rawOptions: unknown): string {
  const parsed = ManifestOptionsSchema.safeParse(rawOptions);
  if (!parsed.success) {
    throw new ConfigError(`Invalid options: ${formatIssues(parsed.error)}`);
  }
  return join(resolve(parsed.data.dataset), parsed.data.manifest);
}
