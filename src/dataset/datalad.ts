import { execFile } from "node:child_process";
import { access, mkdir, stat } from "node:fs/promises";
import { join, resolve } from "node:path";
import { logger } from "../logger.js";
import type { DatasetBackend } from "./backend.js";

export interface CommandOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<void>;

export class CommandError extends Error {
  constructor(
    readonly commandLine: string,
    readonly exitCode: number | string | null,
    readonly stderr: string
  ) {
    super(`${commandLine} exited with ${String(exitCode)}${stderr ? `: ${stderr.trim()}` : ""}`);
    this.name = "CommandError";
  }
}

export const execCommand: CommandRunner = (command, args, options) =>
  new Promise((resolvePromise, reject) => {
    execFile(
      command,
      args,
      { cwd: options.cwd, env: options.env, maxBuffer: 16 * 1024 * 1024 },
      (error, _stdout, stderr) => {
        if (error) {
          reject(new CommandError([command, ...args].join(" "), error.code ?? null, String(stderr)));
          return;
        }
        resolvePromise();
      }
    );
  });

export interface DataladBackendOptions {
  runner?: CommandRunner;
  env?: NodeJS.ProcessEnv;
}

/** Drives `datalad` and `git annex` as child processes inside one dataset directory. */
export class DataladBackend implements DatasetBackend {
  readonly root: string;
  private readonly runner: CommandRunner;
  private env: NodeJS.ProcessEnv;

  constructor(root: string, options: DataladBackendOptions = {}) {
    this.root = resolve(root);
    this.runner = options.runner ?? execCommand;
    this.env = { ...(options.env ?? process.env) };
  }

  async init(): Promise<void> {
    await mkdir(this.root, { recursive: true });
    if (await pathExists(join(this.root, ".datalad"))) {
      logger.debug("Dataset already initialized", { dataset: this.root });
      return;
    }
    logger.info("Creating DataLad dataset", { dataset: this.root });
    await this.run("datalad", ["create", "-c", "text2git", this.root]);
  }

  async configureAuth(token: string): Promise<void> {
    await this.run("git", ["config", "annex.security.allowed-http-addresses", "all"]);
    await this.run("git", ["config", "annex.http-headers", `Authorization: Bearer ${token}`], [token]);
    this.env = { ...this.env, GIT_ANNEX_URL_AUTHORIZATION: `Bearer ${token}` };
  }

  async registerRemote(url: string, destinationPath: string): Promise<void> {
    await this.run("git", ["annex", "addurl", url, "--file", destinationPath, "--fast", "--relaxed"]);
  }

  async materialize(destinationPath: string): Promise<void> {
    await this.run("datalad", ["get", destinationPath]);
  }

  async isMaterialized(destinationPath: string): Promise<boolean> {
    // stat follows the annex symlink, so a pointer without content reads as missing.
    try {
      const info = await stat(join(this.root, destinationPath));
      return info.isFile();
    } catch (error) {
      const code = (error as { code?: string } | undefined)?.code;
      if (code === "ENOENT") {
        return false;
      }
      throw error;
    }
  }

  async commit(message: string): Promise<void> {
    await this.run("datalad", ["save", "-m", message]);
  }

  private async run(command: string, args: string[], secrets: string[] = []): Promise<void> {
    logger.debug("Running dataset command", { command, args: redact(args, secrets) });
    try {
      await this.runner(command, args, { cwd: this.root, env: this.env });
    } catch (error) {
      if (error instanceof CommandError && secrets.length > 0) {
        throw new CommandError([command, ...redact(args, secrets)].join(" "), error.exitCode, error.stderr);
      }
      throw error;
    }
  }
}

function redact(args: string[], secrets: string[]): string[] {
  return args.map((arg) => secrets.reduce((value, secret) => value.split(secret).join("***"), arg));
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await access(target);
    return true;
  } catch {
    return false;
  }
}
