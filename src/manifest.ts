import { mkdir, open, readFile, stat, type FileHandle } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { ManifestCorruptError } from "./errors.js";
import type { ManifestRecord } from "./types.js";

export const MANIFEST_FILENAME = "images_manifest.csv";

export const MANIFEST_COLUMNS = [
  "project",
  "candidate",
  "visit",
  "filename",
  "modality",
  "target_path",
  "url",
] as const satisfies ReadonlyArray<keyof ManifestRecord>;

const RowsSchema = z.array(z.record(z.string()));

async function hasContent(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    return info.size > 0;
  } catch (error) {
    const code = (error as { code?: string } | undefined)?.code;
    if (code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

async function endsWithNewline(filePath: string): Promise<boolean> {
  const handle = await open(filePath, "r");
  try {
    const { size } = await handle.stat();
    const last = Buffer.alloc(1);
    await handle.read(last, 0, 1, size - 1);
    return last[0] === 0x0a;
  } finally {
    await handle.close();
  }
}

/**
 * CSV ledger of every registered image. The file is read once per run to build the
 * dedup set and otherwise only ever appended to.
 */
export class ManifestStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = resolve(filePath);
  }

  async load(): Promise<Set<string>> {
    if (!(await hasContent(this.filePath))) {
      return new Set();
    }
    const raw = await readFile(this.filePath, "utf8");

    let rows: Array<Record<string, string>>;
    try {
      const parsed: unknown = parse(raw, { columns: true, skip_empty_lines: true, bom: true });
      rows = RowsSchema.parse(parsed);
    } catch (error) {
      throw new ManifestCorruptError(
        `Manifest ${this.filePath} could not be parsed: ${error instanceof Error ? error.message : String(error)}`,
        this.filePath,
        { cause: error }
      );
    }

    const paths = new Set<string>();
    rows.forEach((row, index) => {
      const target = row.target_path;
      if (!target) {
        // Header is line 1, so data row N sits on line N + 2.
        throw new ManifestCorruptError(
          `Manifest ${this.filePath} line ${index + 2} has no target_path`,
          this.filePath
        );
      }
      paths.add(target);
    });
    return paths;
  }

  async openAppender(): Promise<ManifestAppender> {
    if (!(await hasContent(this.filePath))) {
      return new ManifestAppender(this.filePath, "header");
    }
    return new ManifestAppender(this.filePath, (await endsWithNewline(this.filePath)) ? "none" : "newline");
  }
}

export function formatManifestRow(record: ManifestRecord): string {
  return stringify([MANIFEST_COLUMNS.map((column) => record[column])]);
}

export function formatManifestHeader(): string {
  return stringify([[...MANIFEST_COLUMNS]]);
}

/** What has to precede the first row: a header for a new file, a line break for an unterminated one. */
export type AppendPrelude = "header" | "newline" | "none";

export class ManifestAppender {
  private handle: FileHandle | null = null;
  private closed = false;

  constructor(
    readonly filePath: string,
    private prelude: AppendPrelude
  ) {}

  /** Resolves once the row is on disk. */
  async append(record: ManifestRecord): Promise<void> {
    if (this.closed) {
      throw new Error(`Manifest appender for ${this.filePath} is closed`);
    }
    const handle = await this.ensureOpen();
    const prefix = this.prelude === "header" ? formatManifestHeader() : this.prelude === "newline" ? "\n" : "";
    await handle.write(prefix + formatManifestRow(record));
    await handle.sync();
    this.prelude = "none";
  }

  async close(): Promise<void> {
    this.closed = true;
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      await handle.close();
    }
  }

  private async ensureOpen(): Promise<FileHandle> {
    if (!this.handle) {
      await mkdir(dirname(this.filePath), { recursive: true });
      this.handle = await open(this.filePath, "a");
    }
    return this.handle;
  }
}
