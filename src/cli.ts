import { Command, CommanderError } from "commander";
import type { FetchLike } from "./api.js";
import { authenticate } from "./auth.js";
import { parseManifestPath, parseRunConfig, type RunConfig } from "./config.js";
import { resolveCredential } from "./credentials.js";
import type { DatasetBackend } from "./dataset/backend.js";
import { DataladBackend } from "./dataset/datalad.js";
import { ResourceEnumerator } from "./enumerator.js";
import { DatasetError, IngestError, describeCause } from "./errors.js";
import { IngestionOrchestrator } from "./ingest.js";
import { errorMeta, logger } from "./logger.js";
import { ManifestStore } from "./manifest.js";
import type { Credential, IngestSummary } from "./types.js";

export interface CliDependencies {
  resolveCredential: () => Promise<Credential>;
  createBackend: (datasetDir: string) => DatasetBackend;
  fetchImpl?: FetchLike;
}

export const defaultDependencies: CliDependencies = {
  resolveCredential: () => resolveCredential(),
  createBackend: (datasetDir) => new DataladBackend(datasetDir),
};

/** Logs in, creates the dataset if needed, then ingests every project. */
export async function runIngest(config: RunConfig, deps: CliDependencies = defaultDependencies): Promise<IngestSummary> {
  const credential = await deps.resolveCredential();
  const backend = deps.createBackend(config.datasetDir);

  const session = await authenticate({
    baseUrl: config.apiBase,
    credential,
    backend,
    fetchImpl: deps.fetchImpl,
    prepareBackend: async () => {
      try {
        await backend.init();
      } catch (error) {
        throw new DatasetError(`Failed to initialize dataset: ${describeCause(error)}`, { dataset: config.datasetDir }, {
          cause: error,
        });
      }
    },
  });

  const orchestrator = new IngestionOrchestrator({
    source: new ResourceEnumerator(session, { fetchImpl: deps.fetchImpl }),
    backend,
    manifest: new ManifestStore(config.manifestPath),
    datasetDir: config.datasetDir,
    apiBase: session.baseUrl,
    materialize: config.materialize,
    commitMessage: config.commitMessage,
  });
  const summary = await orchestrator.run();

  if (!config.materialize && summary.registered > 0) {
    logger.info("Files are registered but not downloaded; fetch them with `datalad get <path>`", {
      dataset: config.datasetDir,
    });
  }
  return summary;
}

export function buildProgram(deps: CliDependencies = defaultDependencies): Command {
  const program = new Command();
  program
    .name("loris-ingest")
    .description("Mirror LORIS imaging records into a DataLad dataset with a BIDS-style layout")
    .version("0.1.0")
    .exitOverride();

  program
    .command("ingest", { isDefault: true })
    .description("Register new images from every project and save the dataset")
    .requiredOption("--dataset <path>", "Path to the DataLad dataset (created if missing)")
    .requiredOption("--api-base <url>", "LORIS API base, e.g. https://example.org/api/v0.0.3")
    .option("--get", "Download file content after registering it", false)
    .option("--manifest <name>", "Manifest file name inside the dataset")
    .option("--message <text>", "Commit message for the dataset save")
    .action(async (rawOpts: unknown) => {
      await runIngest(parseRunConfig(rawOpts), deps);
    });

  program
    .command("check-manifest")
    .description("Load the manifest and report how many paths it has registered")
    .requiredOption("--dataset <path>", "Path to the DataLad dataset")
    .option("--manifest <name>", "Manifest file name inside the dataset")
    .action(async (rawOpts: unknown) => {
      const store = new ManifestStore(parseManifestPath(rawOpts));
      const known = await store.load();
      logger.info("Manifest is readable", { manifest: store.filePath, registered: known.size });
    });

  return program;
}

/** Runs one command line (without the node and script entries) and returns the exit code. */
export async function runCli(args: string[], deps: CliDependencies = defaultDependencies): Promise<number> {
  try {
    await buildProgram(deps).parseAsync(args, { from: "user" });
    return 0;
  } catch (error) {
    // Commander has already printed usage problems, help and version output.
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    const context = error instanceof IngestError ? error.context : {};
    logger.error("Fatal error", { ...errorMeta(error), ...context });
    return 1;
  }
}
