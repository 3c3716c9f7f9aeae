import { Value } from "@sinclair/typebox/value";

import { FetchError, errorMessage } from "../errors.js";
import { directoryLogger } from "../logger.js";
import { ContactsResponseSchema, TokenResponseSchema } from "../types/index.js";

const AUTH_URL = "https://oauth.wildapricot.org/auth/token";
const API_BASE_URL = "https://api.wildapricot.org/v2.2";
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

/**
 * Anything that can produce the current upstream contact list.
 * Records come back unvalidated so one malformed contact cannot hide the rest.
 */
export interface ContactSource {
  fetchContacts(): Promise<unknown[]>;
}

export interface DirectoryClientOptions {
  accountId: number;
  apiKey: string;
  timeoutMs: number;
  authUrl?: string;
  apiBaseUrl?: string;
}

interface CachedToken {
  value: string;
  expiresAt: number;
}

async function timedFetch(
  url: string,
  timeoutMs: number,
  options?: RequestInit
): Promise<Response> {
  const method = options?.method ?? "GET";
  directoryLogger.debug({ method, url }, "Sending request to Wild Apricot");

  const startTime = performance.now();
  let response: Response;
  try {
    response = await fetch(url, {
      ...options,
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const timedOut = error instanceof Error && error.name === "TimeoutError";
    throw new FetchError(
      timedOut
        ? `Request to ${url} timed out after ${String(timeoutMs)}ms`
        : `Request to ${url} failed: ${errorMessage(error)}`,
      { cause: error }
    );
  }
  const duration = Math.round(performance.now() - startTime);

  directoryLogger.debug(
    {
      method,
      url,
      status: response.status,
      statusText: response.statusText,
      duration: `${String(duration)}ms`,
    },
    "Received response from Wild Apricot"
  );

  return response;
}

async function readJson(response: Response, url: string): Promise<unknown> {
  try {
    const body: unknown = await response.json();
    return body;
  } catch (error) {
    throw new FetchError(`Invalid JSON from ${url}`, { cause: error });
  }
}

// ============================================================================
// Directory Client
// ============================================================================

export class DirectoryClient implements ContactSource {
  private token: CachedToken | null = null;
  private readonly authUrl: string;
  private readonly apiBaseUrl: string;

  constructor(private readonly options: DirectoryClientOptions) {
    this.authUrl = options.authUrl ?? AUTH_URL;
    this.apiBaseUrl = options.apiBaseUrl ?? API_BASE_URL;
  }

  /**
   * Fetch every contact of the configured account in one synchronous request.
   */
  async fetchContacts(): Promise<unknown[]> {
    const { accountId, timeoutMs } = this.options;
    const url = `${this.apiBaseUrl}/accounts/${String(accountId)}/contacts?$async=false`;
    directoryLogger.info({ url, accountId }, "Fetching contacts");

    const token = await this.getAccessToken();
    const response = await timedFetch(url, timeoutMs, {
      headers: {
        Accept: "application/json",
        Authorization: `Bearer ${token}`,
      },
    });

    if (!response.ok) {
      directoryLogger.error(
        { status: response.status, statusText: response.statusText },
        "Failed to fetch contacts"
      );
      if (response.status === 401) {
        this.token = null;
      }
      throw new FetchError(
        `Failed to fetch contacts: ${String(response.status)} ${response.statusText}`,
        { status: response.status }
      );
    }

    const body = await readJson(response, url);
    if (!Value.Check(ContactsResponseSchema, body)) {
      const first = Value.Errors(ContactsResponseSchema, body).First();
      throw new FetchError(
        `Unexpected contacts response shape at ${first?.path ?? "/"}: ${first?.message ?? "invalid"}`
      );
    }

    directoryLogger.debug(
      { contactCount: body.Contacts.length },
      "Successfully fetched contacts"
    );

    return body.Contacts;
  }

  /**
   * Exchange the API key for a bearer token, reusing it until shortly before expiry.
   */
  async getAccessToken(): Promise<string> {
    if (this.token !== null && this.token.expiresAt > Date.now()) {
      return this.token.value;
    }

    const credentials = Buffer.from(`APIKEY:${this.options.apiKey}`).toString(
      "base64"
    );
    const response = await timedFetch(this.authUrl, this.options.timeoutMs, {
      method: "POST",
      headers: {
        Authorization: `Basic ${credentials}`,
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: "grant_type=client_credentials&scope=auto",
    });

    if (!response.ok) {
      directoryLogger.error(
        { status: response.status, statusText: response.statusText },
        "Failed to obtain access token"
      );
      throw new FetchError(
        `Failed to obtain access token: ${String(response.status)} ${response.statusText}`,
        { status: response.status }
      );
    }

    const body = await readJson(response, this.authUrl);
    if (!Value.Check(TokenResponseSchema, body)) {
      throw new FetchError("Token response did not contain an access_token");
    }

    const lifetimeMs = (body.expires_in ?? 0) * 1000 - TOKEN_EXPIRY_MARGIN_MS;
    this.token = {
      value: body.access_token,
      expiresAt: Date.now() + Math.max(lifetimeMs, 0),
    };

    return body.access_token;
  }
}
