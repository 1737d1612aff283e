import { mkdir, symlink, writeFile } from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { CommandError, DataladBackend, type CommandOptions } from "../src/dataset/datalad.js";
import { createTempDir } from "./helpers.js";

interface RecordedCommand {
  line: string;
  options: CommandOptions;
}

function recordingRunner(fail?: (line: string) => boolean) {
  const commands: RecordedCommand[] = [];
  const runner = async (command: string, args: string[], options: CommandOptions): Promise<void> => {
    const line = [command, ...args].join(" ");
    commands.push({ line, options });
    if (fail?.(line)) {
      throw new CommandError(line, 1, "fatal: refused");
    }
  };
  return { commands, runner };
}

describe("DataladBackend", () => {
  it("creates the dataset only when .datalad is missing", async () => {
    const root = await createTempDir();
    const { commands, runner } = recordingRunner();
    const backend = new DataladBackend(root, { runner, env: {} });

    await backend.init();
    await mkdir(path.join(root, ".datalad"));
    await backend.init();

    expect(commands.map((command) => command.line)).toEqual([`datalad create -c text2git ${root}`]);
  });

  it("issues git-annex and datalad commands inside the dataset", async () => {
    const root = await createTempDir();
    const { commands, runner } = recordingRunner();
    const backend = new DataladBackend(root, { runner, env: { PATH: "/usr/bin" } });

    await backend.configureAuth("test-token");
    await backend.registerRemote("https://x.example/a.mnc", "loris/sub-1/ses-V1/anat/sub-1_ses-V1_T1w.mnc");
    await backend.materialize("loris/sub-1/ses-V1/anat/sub-1_ses-V1_T1w.mnc");
    await backend.commit("Ingest");

    expect(commands.map((command) => command.line)).toEqual([
      "git config annex.security.allowed-http-addresses all",
      "git config annex.http-headers Authorization: Bearer test-token",
      "git annex addurl https://x.example/a.mnc --file loris/sub-1/ses-V1/anat/sub-1_ses-V1_T1w.mnc --fast --relaxed",
      "datalad get loris/sub-1/ses-V1/anat/sub-1_ses-V1_T1w.mnc",
      "datalad save -m Ingest",
    ]);
    expect(commands.every((command) => command.options.cwd === root)).toBe(true);
    expect(commands[0].options.env.GIT_ANNEX_URL_AUTHORIZATION).toBeUndefined();
    expect(commands[2].options.env).toEqual({ PATH: "/usr/bin", GIT_ANNEX_URL_AUTHORIZATION: "Bearer test-token" });
  });

  it("keeps the token out of command failures", async () => {
    const root = await createTempDir();
    const { runner } = recordingRunner((line) => line.includes("http-headers"));
    const backend = new DataladBackend(root, { runner, env: {} });

    const failure = backend.configureAuth("test-token");
    await expect(failure).rejects.toBeInstanceOf(CommandError);
    await expect(failure).rejects.toThrow(
      "git config annex.http-headers Authorization: Bearer *** exited with 1: fatal: refused"
    );
  });

  it("reports content as materialized only when the annex link resolves", async () => {
    const root = await createTempDir();
    const backend = new DataladBackend(root, { runner: recordingRunner().runner, env: {} });
    const dir = path.join(root, "loris/sub-1/ses-V1/anat");
    await mkdir(dir, { recursive: true });
    await writeFile(path.join(dir, "present.mnc"), "data");
    await symlink(path.join(root, ".git/annex/objects/missing"), path.join(dir, "pointer.mnc"));

    expect(await backend.isMaterialized("loris/sub-1/ses-V1/anat/present.mnc")).toBe(true);
    expect(await backend.isMaterialized("loris/sub-1/ses-V1/anat/pointer.mnc")).toBe(false);
    expect(await backend.isMaterialized("loris/sub-1/ses-V1/anat/absent.mnc")).toBe(false);
  });
});
