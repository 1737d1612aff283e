import type { DatasetBackend } from "./backend.js";

export interface MemoryBackendOptions {
  failRegister?: ReadonlySet<string>;
  failMaterialize?: ReadonlySet<string>;
}

/** Keeps the dataset state in memory. Paths listed in the options reject when touched. */
export class MemoryBackend implements DatasetBackend {
  token: string | null = null;
  readonly registered = new Map<string, string>();
  readonly materialized = new Set<string>();
  readonly commits: string[] = [];
  /** Every backend call in order, e.g. `register:loris/sub-1/...`. */
  readonly calls: string[] = [];

  constructor(private readonly options: MemoryBackendOptions = {}) {}

  async init(): Promise<void> {
    this.calls.push("init");
  }

  async configureAuth(token: string): Promise<void> {
    this.calls.push("configureAuth");
    this.token = token;
  }

  async registerRemote(url: string, destinationPath: string): Promise<void> {
    this.calls.push(`register:${destinationPath}`);
    if (this.options.failRegister?.has(destinationPath)) {
      throw new Error(`addurl refused ${url}`);
    }
    this.registered.set(destinationPath, url);
  }

  async materialize(destinationPath: string): Promise<void> {
    this.calls.push(`materialize:${destinationPath}`);
    if (this.options.failMaterialize?.has(destinationPath)) {
      throw new Error(`download failed for ${destinationPath}`);
    }
    if (!this.registered.has(destinationPath)) {
      throw new Error(`${destinationPath} is not registered`);
    }
    this.materialized.add(destinationPath);
  }

  async isMaterialized(destinationPath: string): Promise<boolean> {
    return this.materialized.has(destinationPath);
  }

  async commit(message: string): Promise<void> {
    this.calls.push("commit");
    this.commits.push(message);
  }
}
