import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { DirectoryClient } from "../../../src/directory/client.js";
import { FetchError } from "../../../src/errors.js";
import { makeContact, trainingItems } from "../../fixtures/contacts.js";

const AUTH_URL = "https://auth.test/token";
const API_BASE_URL = "https://api.test/v2.2";
const CONTACTS_URL = `${API_BASE_URL}/accounts/42/contacts?$async=false`;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function tokenResponse(expiresIn = 1800): Response {
  return jsonResponse({
    access_token: "test-token",
    token_type: "Bearer",
    expires_in: expiresIn,
  });
}

describe("directory/client", () => {
  const fetchMock = vi.fn<typeof fetch>();
  let client: DirectoryClient;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
    client = new DirectoryClient({
      accountId: 42,
      apiKey: "test-api-key",
      timeoutMs: 1000,
      authUrl: AUTH_URL,
      apiBaseUrl: API_BASE_URL,
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("getAccessToken", () => {
    it("should exchange the API key for a token", async () => {
      fetchMock.mockResolvedValueOnce(tokenResponse());

      await expect(client.getAccessToken()).resolves.toBe("test-token");

      const [url, init] = fetchMock.mock.calls[0] ?? [];
      expect(url).toBe(AUTH_URL);
      expect(init?.method).toBe("POST");
      expect(init?.body).toBe("grant_type=client_credentials&scope=auto");
      expect(init?.headers).toEqual({
        Authorization: `Basic ${Buffer.from("APIKEY:test-api-key").toString("base64")}`,
        "Content-Type": "application/x-www-form-urlencoded",
      });
    });

    it("should reuse the token until it expires", async () => {
      fetchMock.mockResolvedValueOnce(tokenResponse());

      await client.getAccessToken();
      await client.getAccessToken();

      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it("should fail with the status of a rejected exchange", async () => {
      fetchMock.mockResolvedValueOnce(
        new Response("denied", { status: 401, statusText: "Unauthorized" })
      );

      const error = await client.getAccessToken().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      expect(error).toMatchObject({
        status: 401,
        message: "Failed to obtain access token: 401 Unauthorized",
      });
    });

    it("should fail when the token is missing from the response", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ token_type: "Bearer" }));

      await expect(client.getAccessToken()).rejects.toThrow(
        "Token response did not contain an access_token"
      );
    });
  });

  describe("fetchContacts", () => {
    it("should return the contacts of the account", async () => {
      const contacts = [
        makeContact(1, { tag: "1023", trainings: trainingItems("Laser"), level: 3 }),
        makeContact(2, { tag: "" }),
      ];
      fetchMock
        .mockResolvedValueOnce(tokenResponse())
        .mockResolvedValueOnce(jsonResponse({ Contacts: contacts }));

      await expect(client.fetchContacts()).resolves.toEqual(contacts);

      const [url, init] = fetchMock.mock.calls[1] ?? [];
      expect(url).toBe(CONTACTS_URL);
      expect(init?.headers).toEqual({
        Accept: "application/json",
        Authorization: "Bearer test-token",
      });
    });

    it("should fail with the status of an error response", async () => {
      fetchMock
        .mockResolvedValueOnce(tokenResponse())
        .mockResolvedValueOnce(
          new Response("oops", {
            status: 500,
            statusText: "Internal Server Error",
          })
        );

      const error = await client.fetchContacts().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      expect(error).toMatchObject({
        status: 500,
        message: "Failed to fetch contacts: 500 Internal Server Error",
      });
    });

    it("should request a new token after a 401", async () => {
      fetchMock
        .mockResolvedValueOnce(tokenResponse())
        .mockResolvedValueOnce(
          new Response("expired", { status: 401, statusText: "Unauthorized" })
        )
        .mockResolvedValueOnce(tokenResponse())
        .mockResolvedValueOnce(jsonResponse({ Contacts: [] }));

      await expect(client.fetchContacts()).rejects.toThrow(FetchError);
      await expect(client.fetchContacts()).resolves.toEqual([]);

      expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
        AUTH_URL,
        CONTACTS_URL,
        AUTH_URL,
        CONTACTS_URL,
      ]);
    });

    it("should pass malformed contacts through for per-contact checks", async () => {
      const good = makeContact(1, { tag: "1023", level: 3 });
      const bad = { Id: 2, FieldValues: null };
      fetchMock
        .mockResolvedValueOnce(tokenResponse())
        .mockResolvedValueOnce(jsonResponse({ Contacts: [good, bad] }));

      await expect(client.fetchContacts()).resolves.toEqual([good, bad]);
    });

    it("should reject an envelope without a contact list", async () => {
      fetchMock
        .mockResolvedValueOnce(tokenResponse())
        .mockResolvedValueOnce(jsonResponse({ Contacts: "none" }));

      await expect(client.fetchContacts()).rejects.toThrow(
        /^Unexpected contacts response shape at \/Contacts: /
      );
    });

    it("should reject a body that is not JSON", async () => {
      fetchMock
        .mockResolvedValueOnce(tokenResponse())
        .mockResolvedValueOnce(new Response("<html>", { status: 200 }));

      await expect(client.fetchContacts()).rejects.toThrow(
        `Invalid JSON from ${CONTACTS_URL}`
      );
    });

    it("should wrap a network failure", async () => {
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));

      await expect(client.fetchContacts()).rejects.toThrow(
        `Request to ${AUTH_URL} failed: fetch failed`
      );
    });

    it("should report a timeout", async () => {
      fetchMock.mockRejectedValueOnce(
        new DOMException("The operation was aborted due to timeout", "TimeoutError")
      );

      await expect(client.fetchContacts()).rejects.toThrow(
        `Request to ${AUTH_URL} timed out after 1000ms`
      );
    });
  });
});
