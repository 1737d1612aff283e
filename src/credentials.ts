import { stdin, stdout } from "node:process";
import { createInterface } from "node:readline/promises";
import { Writable } from "node:stream";
import type { Credential } from "./types.js";

export const USERNAME_ENV = "LORIS_USERNAME";
export const PASSWORD_ENV = "LORIS_PASSWORD";

export type Asker = (question: string, options: { hidden: boolean }) => Promise<string>;

/** Reads one line from the terminal; with `hidden` the typed characters are not echoed. */
export const askTerminal: Asker = async (question, { hidden }) => {
  let muted = false;
  const output = new Writable({
    write(chunk, encoding, callback) {
      if (!muted) {
        stdout.write(chunk, encoding);
      }
      callback();
    },
  });
  const rl = createInterface({ input: stdin, output, terminal: stdin.isTTY === true });
  try {
    const pending = rl.question(question);
    muted = hidden;
    const answer = await pending;
    if (hidden) {
      stdout.write("\n");
    }
    return answer;
  } finally {
    rl.close();
  }
};

export async function resolveCredential(
  env: NodeJS.ProcessEnv = process.env,
  ask: Asker = askTerminal
): Promise<Credential> {
  const username = env[USERNAME_ENV]?.trim() || (await ask("Loris username: ", { hidden: false })).trim();
  const password = env[PASSWORD_ENV] || (await ask("Loris password: ", { hidden: true }));
  return { username, password };
}
