import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runCli, type CliDependencies } from "../src/cli.js";
import { MemoryBackend } from "../src/dataset/memory.js";
import { setLogSink, type LogSink } from "../src/logger.js";
import { createFakeFetch, createTempDir, type FakeRoute } from "./helpers.js";

const BASE = "https://loris.example.org/api/v0.0.3";
const TARGET = "loris/sub-300001/ses-V1/anat/sub-300001_ses-V1_T1w.mnc";

const loginRoute: Record<string, FakeRoute> = { [`POST ${BASE}/login`]: { body: { token: "test-token" } } };

const populatedRoutes: Record<string, FakeRoute> = {
  ...loginRoute,
  [`GET ${BASE}/projects`]: { body: { Projects: { loris: {} } } },
  [`GET ${BASE}/projects/loris/images`]: {
    body: { Images: [{ Candidate: "300001", Visit: "V1", ScanType: "t1w", Link: "/candidates/300001/V1/images/a.mnc" }] },
  },
};

describe("runCli", () => {
  let lines: Array<Record<string, unknown>>;
  let restore: LogSink;
  let datasetDir: string;
  let backend: MemoryBackend;

  function deps(routes: Record<string, FakeRoute>): CliDependencies {
    return {
      resolveCredential: async () => ({ username: "tester", password: "test-secret" }),
      createBackend: () => backend,
      fetchImpl: createFakeFetch(routes),
    };
  }

  function fatal(): Record<string, unknown> | undefined {
    return lines.find((line) => line.message === "Fatal error");
  }

  beforeEach(async () => {
    lines = [];
    restore = setLogSink((line) => {
      lines.push(JSON.parse(line));
    });
    datasetDir = await createTempDir("loris-ingest-cli-");
    backend = new MemoryBackend();
  });

  afterEach(() => {
    setLogSink(restore);
    vi.unstubAllEnvs();
  });

  it("logs in before creating the dataset, then ingests and commits", async () => {
    vi.stubEnv("LOG_LEVEL", "info");
    const code = await runCli(["--dataset", datasetDir, "--api-base", BASE], deps(populatedRoutes));

    expect(code).toBe(0);
    expect(backend.calls).toEqual(["init", "configureAuth", `register:${TARGET}`, "commit"]);
    expect(backend.token).toBe("test-token");
    expect((await readFile(path.join(datasetDir, "images_manifest.csv"), "utf8")).split("\n")[1]).toBe(
      `loris,300001,V1,sub-300001_ses-V1_T1w.mnc,anat,${TARGET},${BASE}/candidates/300001/V1/images/a.mnc`
    );
    expect(lines.map((line) => line.message)).toContain(
      "Files are registered but not downloaded; fetch them with `datalad get <path>`"
    );
  });

  it("downloads with --get and skips the download hint", async () => {
    vi.stubEnv("LOG_LEVEL", "info");
    const code = await runCli(["ingest", "--dataset", datasetDir, "--api-base", BASE, "--get"], deps(populatedRoutes));

    expect(code).toBe(0);
    expect(backend.materialized.has(TARGET)).toBe(true);
    expect(lines.map((line) => line.message)).not.toContain(
      "Files are registered but not downloaded; fetch them with `datalad get <path>`"
    );
  });

  it("exits 1 without touching the dataset when the login is rejected", async () => {
    const routes = { [`POST ${BASE}/login`]: { status: 401, body: { error: "bad" } } };
    const code = await runCli(["--dataset", datasetDir, "--api-base", BASE], deps(routes));

    expect(code).toBe(1);
    expect(backend.calls).toEqual([]);
    expect(fatal()).toMatchObject({ level: "error", errorName: "AuthError", url: `${BASE}/login`, status: 401 });
  });

  it("exits 1 and names NoProjectsError when the API lists no projects", async () => {
    const routes = { ...loginRoute, [`GET ${BASE}/projects`]: { body: { Projects: {} } } };
    const code = await runCli(["--dataset", datasetDir, "--api-base", BASE], deps(routes));

    expect(code).toBe(1);
    expect(fatal()).toMatchObject({
      errorName: "NoProjectsError",
      error: "No projects returned by API",
      url: `${BASE}/projects`,
    });
    expect(backend.commits).toEqual([]);
  });

  it("exits 1 on invalid options", async () => {
    const code = await runCli(["--dataset", datasetDir, "--api-base", "not-a-url"], deps(populatedRoutes));

    expect(code).toBe(1);
    expect(fatal()).toMatchObject({ errorName: "ConfigError" });
    expect(backend.calls).toEqual([]);
  });

  it("reports a readable manifest from check-manifest", async () => {
    await writeFile(
      path.join(datasetDir, "images_manifest.csv"),
      `project,candidate,visit,filename,modality,target_path,url\nloris,1,V1,a.mnc,anat,${TARGET},${BASE}/a.mnc\n`,
      "utf8"
    );
    vi.stubEnv("LOG_LEVEL", "info");

    expect(await runCli(["check-manifest", "--dataset", datasetDir], deps({}))).toBe(0);
    expect(lines.find((line) => line.message === "Manifest is readable")).toMatchObject({ registered: 1 });
  });

  it("exits 1 from check-manifest on a corrupt manifest", async () => {
    const manifestPath = path.join(datasetDir, "images_manifest.csv");
    await writeFile(manifestPath, "project,candidate,url\nloris,1,https://x/1\n", "utf8");

    expect(await runCli(["check-manifest", "--dataset", datasetDir], deps({}))).toBe(1);
    expect(fatal()).toMatchObject({ errorName: "ManifestCorruptError", manifest: manifestPath });
  });

  it("refuses to ingest over a corrupt manifest after logging in", async () => {
    await writeFile(path.join(datasetDir, "images_manifest.csv"), "project,url\nloris,https://x/1\n", "utf8");

    expect(await runCli(["--dataset", datasetDir, "--api-base", BASE], deps(populatedRoutes))).toBe(1);
    expect(fatal()).toMatchObject({ errorName: "ManifestCorruptError" });
    expect(backend.calls).toEqual(["init", "configureAuth"]);
  });
});
