import { describe, it, expect } from "vitest";
import { CommunityClient } from "./index.js";
import { InvalidConfigurationError, POSTRequestError } from "./core/errors.js";
import { MemoryObservability } from "./observability/noop.js";
import { COMMUNITY_URL, V1_BASE, V2_BASE, queueFetch, sentRequest } from "./testing/fake-fetch.js";

const LOGIN_OK = { json: { response: { status: "success", value: { type: "string", $: "test-new-key" } } } };

function baseConfig(fetch: ReturnType<typeof queueFetch>) {
  return {
    communityUrl: COMMUNITY_URL,
    fetch,
    observability: new MemoryObservability(),
    retry: { baseDelay: 0, maxDelay: 0, jitter: false },
  };
}

describe("CommunityClient.create", () => {
  it("uses a session key directly", async () => {
    const fetch = queueFetch({ json: { status: "success", data: { id: "ideas" } } });
    const client = await CommunityClient.create({
      ...baseConfig(fetch),
      auth: { type: "session-key", sessionKey: "test-session-key" },
    });

    await expect(client.v2.get("/boards/ideas", { returnId: true })).resolves.toBe("ideas");

    const request = sentRequest(fetch);
    expect(request.url).toBe(`${V2_BASE}/boards/ideas`);
    expect(request.headers.get("li-api-session-key")).toBe("test-session-key");
  });

  it("sends an OAuth token as a bearer header", async () => {
    const fetch = queueFetch({ json: { status: "success" } });
    const client = await CommunityClient.create({
      ...baseConfig(fetch),
      auth: { type: "oauth2", accessToken: "test-token" },
    });

    await client.v2.get("/boards");

    expect(sentRequest(fetch).headers.get("authorization")).toBe("Bearer test-token");
    expect(client.session.authType).toBe("oauth2");
  });

  it("logs in first for session-login", async () => {
    const fetch = queueFetch(LOGIN_OK, { json: { status: "success" } });
    const client = await CommunityClient.create({
      ...baseConfig(fetch),
      auth: { type: "session-login", username: "api-user", password: "test-secret" },
    });

    expect(client.session.token).toBe("test-new-key");
    expect(client.session.authType).toBe("session-key");
    expect(sentRequest(fetch, 0).url).toBe(`${V1_BASE}/authentication/sessions/login?restapi.response_format=json`);

    await client.v2.get("/boards");
    expect(sentRequest(fetch, 1).headers.get("li-api-session-key")).toBe("test-new-key");
  });

  it("fails when the login is rejected", async () => {
    const fetch = queueFetch({
      json: { response: { status: "error", error: { code: 303, message: "User authentication failed." } } },
    });

    await expect(
      CommunityClient.create({
        ...baseConfig(fetch),
        auth: { type: "session-login", username: "api-user", password: "test-wrong" },
      })
    ).rejects.toBeInstanceOf(POSTRequestError);
  });

  it("rejects an invalid configuration before any request", async () => {
    const fetch = queueFetch({ json: {} });
    await expect(
      CommunityClient.create({ ...baseConfig(fetch), communityUrl: "", auth: { type: "sso", ssoToken: "test-sso" } })
    ).rejects.toBeInstanceOf(InvalidConfigurationError);
    expect(fetch).not.toHaveBeenCalled();
  });

  it("applies custom error translations", async () => {
    const fetch = queueFetch({ json: { status: "error", message: "custom.error.key" } });
    const client = await CommunityClient.create({
      ...baseConfig(fetch),
      auth: { type: "session-key", sessionKey: "test-session-key" },
      errorTranslations: { "custom.error.key": "Something readable" },
    });

    await expect(client.v2.post("/messages", { json: {}, returnErrorMessages: true })).resolves.toBe(
      "Something readable"
    );
  });
});

describe("CommunityClient.fromEnvironment", () => {
  it("reads the connection from the environment", async () => {
    const fetch = queueFetch({ json: { status: "success" } });
    const client = await CommunityClient.fromEnvironment(
      { COMMUNITY_URL, COMMUNITY_SSO_TOKEN: "test-sso", COMMUNITY_PREFER_JSON: "no" },
      { fetch, observability: new MemoryObservability() }
    );

    expect(client.session.authType).toBe("sso");
    expect(client.session.preferJson).toBe(false);
  });
});

describe("CommunityClient sessions", () => {
  it("refreshes the token for later requests", async () => {
    const fetch = queueFetch({ json: { status: "success" } });
    const client = await CommunityClient.create({
      ...baseConfig(fetch),
      auth: { type: "session-key", sessionKey: "test-session-key" },
    });

    const refreshed = client.refreshSession("test-refreshed-key");
    await client.v2.get("/boards");

    expect(refreshed.token).toBe("test-refreshed-key");
    expect(sentRequest(fetch).headers.get("li-api-session-key")).toBe("test-refreshed-key");
  });

  it("logs the session out", async () => {
    const fetch = queueFetch({ json: { response: { status: "success" } } });
    const client = await CommunityClient.create({
      ...baseConfig(fetch),
      auth: { type: "session-key", sessionKey: "test-session-key" },
    });

    await client.invalidateSession();

    expect(sentRequest(fetch).url).toBe(`${V1_BASE}/authentication/sessions/logout?restapi.response_format=json`);
    expect(sentRequest(fetch).method).toBe("POST");
  });

  it("reaches the v1 API through the client", async () => {
    const fetch = queueFetch({ json: { response: { status: "success", value: { type: "int", $: 12 } } } });
    const client = await CommunityClient.create({
      ...baseConfig(fetch),
      auth: { type: "session-key", sessionKey: "test-session-key" },
    });

    const result = await client.v1.request("boards/count");
    expect(result.value).toBe(12);
  });
});
