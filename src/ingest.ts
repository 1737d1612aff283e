import { mkdir } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { resolveCanonicalEntry } from "./bids.js";
import type { DatasetBackend } from "./dataset/backend.js";
import type { RecordSource } from "./enumerator.js";
import { DatasetError, MaterializationError, RegistrationError, describeCause } from "./errors.js";
import { logger } from "./logger.js";
import type { ManifestAppender, ManifestStore } from "./manifest.js";
import type { CanonicalEntry, IngestSummary, ManifestRecord } from "./types.js";

export const DEFAULT_COMMIT_MESSAGE = "Ingest Loris images via API (multi-project, BIDS, incremental)";

export interface IngestionOrchestratorOptions {
  source: RecordSource;
  backend: DatasetBackend;
  manifest: ManifestStore;
  datasetDir: string;
  apiBase: string;
  /** Fetch content right after registering, and for earlier registrations still missing it. */
  materialize: boolean;
  commitMessage?: string;
}

function toManifestRecord(entry: CanonicalEntry): ManifestRecord {
  return {
    project: entry.project,
    candidate: entry.candidate,
    visit: entry.visit,
    filename: entry.filename,
    modality: entry.modality,
    target_path: entry.destinationPath,
    url: entry.url,
  };
}

/**
 * Walks every project and image once, in a fixed order, and registers what the manifest
 * has not seen yet. Each record is fully registered and recorded before the next one
 * starts; the first failure aborts the run without a commit.
 */
export class IngestionOrchestrator {
  private readonly datasetDir: string;

  constructor(private readonly options: IngestionOrchestratorOptions) {
    this.datasetDir = resolve(options.datasetDir);
  }

  async run(): Promise<IngestSummary> {
    const known = await this.options.manifest.load();
    logger.info("Manifest loaded", { manifest: this.options.manifest.filePath, registered: known.size });

    const summary: IngestSummary = { projects: 0, registered: 0, skipped: 0, materialized: 0 };
    const appender = await this.options.manifest.openAppender();
    try {
      const projects = [...(await this.options.source.listProjects())].sort();
      for (const project of projects) {
        await this.ingestProject(project, known, appender, summary);
        summary.projects += 1;
      }
    } finally {
      await appender.close();
    }

    const message = this.options.commitMessage ?? DEFAULT_COMMIT_MESSAGE;
    try {
      await this.options.backend.commit(message);
    } catch (error) {
      throw new DatasetError(`Failed to save dataset: ${describeCause(error)}`, { dataset: this.datasetDir }, {
        cause: error,
      });
    }
    logger.info("Ingest complete", { dataset: this.datasetDir, ...summary });
    return summary;
  }

  private async ingestProject(
    project: string,
    known: Set<string>,
    appender: ManifestAppender,
    summary: IngestSummary
  ): Promise<void> {
    logger.info("Fetching images for project", { project });
    const records = await this.options.source.listRecords(project);

    for (const record of records) {
      const entry = resolveCanonicalEntry(project, record, this.options.apiBase);

      if (known.has(entry.destinationPath)) {
        summary.skipped += 1;
        logger.debug("Already registered", { project, target: entry.destinationPath });
        if (this.options.materialize && !(await this.isMaterialized(entry))) {
          await this.materialize(entry);
          summary.materialized += 1;
        }
        continue;
      }

      await this.register(entry);
      await appender.append(toManifestRecord(entry));
      known.add(entry.destinationPath);
      summary.registered += 1;

      if (this.options.materialize) {
        await this.materialize(entry);
        summary.materialized += 1;
      }
    }
  }

  private async register(entry: CanonicalEntry): Promise<void> {
    logger.info("Registering remote image", { project: entry.project, url: entry.url, target: entry.destinationPath });
    try {
      await mkdir(dirname(join(this.datasetDir, entry.destinationPath)), { recursive: true });
      await this.options.backend.registerRemote(entry.url, entry.destinationPath);
    } catch (error) {
      throw new RegistrationError({ project: entry.project, destinationPath: entry.destinationPath, cause: error });
    }
  }

  private async materialize(entry: CanonicalEntry): Promise<void> {
    logger.info("Downloading image", { project: entry.project, target: entry.destinationPath });
    try {
      await this.options.backend.materialize(entry.destinationPath);
    } catch (error) {
      throw new MaterializationError({ project: entry.project, destinationPath: entry.destinationPath, cause: error });
    }
  }

  private async isMaterialized(entry: CanonicalEntry): Promise<boolean> {
    try {
      return await this.options.backend.isMaterialized(entry.destinationPath);
    } catch (error) {
      throw new MaterializationError({ project: entry.project, destinationPath: entry.destinationPath, cause: error });
    }
  }
}
