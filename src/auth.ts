import { LoginResponseSchema, joinApiUrl, normalizeBaseUrl, requestJson, type FetchLike } from "./api.js";
import type { DatasetBackend } from "./dataset/backend.js";
import { AuthError, DatasetError, TransportError, describeCause } from "./errors.js";
import { logger } from "./logger.js";
import type { Credential, Session } from "./types.js";

export interface AuthenticateOptions {
  baseUrl: string;
  credential: Credential;
  backend: DatasetBackend;
  /** Runs after the login succeeds and before the token is handed to the backend. */
  prepareBackend?: () => Promise<void>;
  fetchImpl?: FetchLike;
}

const REJECTED_STATUSES = new Set([401, 403]);

/**
 * Exchanges the credential for a bearer token, then hands the token to the dataset
 * backend so that later lazy content fetches are authorized without per-record headers.
 * A rejected login never reaches `prepareBackend`, so nothing is created on disk for it.
 */
export async function authenticate(options: AuthenticateOptions): Promise<Session> {
  const baseUrl = normalizeBaseUrl(options.baseUrl);
  const url = joinApiUrl(baseUrl, "/login");
  logger.info("Logging in to LORIS API", { url, username: options.credential.username });

  let payload: unknown;
  try {
    payload = await requestJson(url, {
      method: "POST",
      body: { username: options.credential.username, password: options.credential.password },
      fetchImpl: options.fetchImpl,
    });
  } catch (error) {
    if (error instanceof TransportError && error.status !== undefined && REJECTED_STATUSES.has(error.status)) {
      throw new AuthError(`Login rejected by ${url} (${error.status})`, { url, status: error.status }, { cause: error });
    }
    throw error;
  }

  const parsed = LoginResponseSchema.safeParse(payload);
  const token = parsed.success ? parsed.data.token?.trim() : undefined;
  if (!token) {
    throw new AuthError("Login succeeded but no token was returned", { url });
  }

  if (options.prepareBackend) {
    await options.prepareBackend();
  }

  try {
    await options.backend.configureAuth(token);
  } catch (error) {
    throw new DatasetError(`Failed to configure dataset authorization: ${describeCause(error)}`, {}, { cause: error });
  }

  logger.info("Login successful");
  return { token, baseUrl };
}
