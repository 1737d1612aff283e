import { mkdtemp } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import type { FetchLike } from "../src/api.js";

export async function createTempDir(prefix = "loris-ingest-"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), prefix));
}

export interface FakeRoute {
  status?: number;
  body: unknown;
}

/** A fetch stand-in answering by `METHOD url`; unknown routes answer 404. */
export function createFakeFetch(routes: Record<string, FakeRoute>) {
  const fetchImpl = vi.fn<FetchLike>(async (input, init) => {
    const key = `${init?.method ?? "GET"} ${input}`;
    const route = routes[key];
    if (!route) {
      return new Response("not found", { status: 404 });
    }
    const body = typeof route.body === "string" ? route.body : JSON.stringify(route.body);
    return new Response(body, { status: route.status ?? 200, headers: { "Content-Type": "application/json" } });
  });
  return fetchImpl;
}
