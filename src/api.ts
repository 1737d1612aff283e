import { z } from "zod";
import { TransportError } from "./errors.js";
import { logger } from "./logger.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchLike = (input, init) => fetch(input, init);

export function normalizeBaseUrl(raw: string): string {
  return raw.trim().replace(/\/+$/, "");
}

/** Appends an API-relative link (`/candidates/...`) to the base URL. */
export function joinApiUrl(base: string, link: string): string {
  const suffix = link.startsWith("/") ? link : `/${link}`;
  return `${normalizeBaseUrl(base)}${suffix}`;
}

const idField = z.union([z.string().min(1), z.number()]).transform((value) => String(value));

export const LoginResponseSchema = z.object({
  token: z.string().optional(),
});

export const ProjectsResponseSchema = z.object({
  Projects: z.record(z.unknown()).optional(),
});

export const ImageSchema = z.object({
  Candidate: idField,
  Visit: idField,
  ScanType: z.string().min(1),
  Link: z.string().min(1),
});

export const ImagesResponseSchema = z.object({
  Images: z.array(ImageSchema).nullish(),
});

export interface RequestOptions {
  method?: "GET" | "POST";
  token?: string;
  body?: unknown;
  fetchImpl?: FetchLike;
}

/**
 * Performs one HTTP exchange and returns the decoded JSON body. Non-2xx responses,
 * network failures and undecodable bodies all surface as TransportError with the URL.
 */
export async function requestJson(url: string, options: RequestOptions = {}): Promise<unknown> {
  const headers: Record<string, string> = { Accept: "application/json" };
  if (options.token) {
    headers["Authorization"] = `Bearer ${options.token}`;
  }
  let body: string | undefined;
  if (options.body !== undefined) {
    headers["Content-Type"] = "application/json";
    body = JSON.stringify(options.body);
  }

  const fetchImpl = options.fetchImpl ?? defaultFetch;
  const method = options.method ?? "GET";
  logger.debug("API request", { method, url });

  let response: Response;
  try {
    response = await fetchImpl(url, { method, headers, body });
  } catch (error) {
    throw new TransportError(
      `${method} ${url} failed: ${error instanceof Error ? error.message : String(error)}`,
      url,
      undefined,
      { cause: error }
    );
  }

  if (!response.ok) {
    const text = await response.text().catch(() => "");
    throw new TransportError(
      `${method} ${url} failed (${response.status})${text ? `: ${text.slice(0, 200)}` : ""}`,
      url,
      response.status
    );
  }

  try {
    return (await response.json()) as unknown;
  } catch (error) {
    throw new TransportError(`${method} ${url} returned a body that is not JSON`, url, response.status, {
      cause: error,
    });
  }
}

export function parseResponse<T extends z.ZodTypeAny>(schema: T, payload: unknown, url: string): z.output<T> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new TransportError(
      `Unexpected response shape from ${url}${where}: ${issue?.message ?? "invalid payload"}`,
      url
    );
  }
  return parsed.data;
}
