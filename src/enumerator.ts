import {
  ImagesResponseSchema,
  ProjectsResponseSchema,
  joinApiUrl,
  parseResponse,
  requestJson,
  type FetchLike,
} from "./api.js";
import { NoProjectsError } from "./errors.js";
import { logger } from "./logger.js";
import type { ImageRecord, Session } from "./types.js";

export interface RecordSource {
  listProjects(): Promise<string[]>;
  listRecords(project: string): Promise<ImageRecord[]>;
}

export interface ResourceEnumeratorOptions {
  fetchImpl?: FetchLike;
}

export class ResourceEnumerator implements RecordSource {
  constructor(
    private readonly session: Session,
    private readonly options: ResourceEnumeratorOptions = {}
  ) {}

  async listProjects(): Promise<string[]> {
    const url = joinApiUrl(this.session.baseUrl, "/projects");
    const payload = parseResponse(ProjectsResponseSchema, await this.get(url), url);
    const names = Object.keys(payload.Projects ?? {}).sort();
    if (!names.length) {
      throw new NoProjectsError("No projects returned by API", { url });
    }
    logger.info("Found projects", { projects: names });
    return names;
  }

  async listRecords(project: string): Promise<ImageRecord[]> {
    const url = joinApiUrl(this.session.baseUrl, `/projects/${encodeURIComponent(project)}/images`);
    const payload = parseResponse(ImagesResponseSchema, await this.get(url), url);
    const records = (payload.Images ?? []).map((image) => ({
      candidate: image.Candidate,
      visit: image.Visit,
      scanType: image.ScanType,
      link: image.Link,
    }));
    logger.info("Fetched image list", { project, images: records.length });
    return records;
  }

  private get(url: string): Promise<unknown> {
    return requestJson(url, { token: this.session.token, fetchImpl: this.options.fetchImpl });
  }
}
