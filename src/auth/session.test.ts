import { describe, it, expect } from "vitest";
import { SessionAuthenticator, createSessionContext, credentialsFor, withToken } from "./session.js";
import { InvalidURLError, MissingAuthDataError, POSTRequestError } from "../core/errors.js";
import { COMMUNITY_URL, V1_BASE, createTestApi, queueFetch, sentRequest } from "../testing/fake-fetch.js";

describe("createSessionContext", () => {
  it("derives both API bases", () => {
    const session = createSessionContext({
      communityUrl: "community.example.com/",
      authType: "oauth2",
      token: "test-token",
    });

    expect(session).toEqual({
      communityUrl: COMMUNITY_URL,
      v2Base: `${COMMUNITY_URL}/api/2.0`,
      v1Base: V1_BASE,
      tenantId: undefined,
      authType: "oauth2",
      token: "test-token",
      preferJson: true,
      translateErrors: true,
    });
    expect(Object.isFrozen(session)).toBe(true);
  });

  it("uses a custom v1 base path", () => {
    const session = createSessionContext({
      communityUrl: COMMUNITY_URL,
      authType: "session-key",
      token: "test-session-key",
      v1BasePath: "/restapi/v1",
    });
    expect(session.v1Base).toBe(`${COMMUNITY_URL}/restapi/v1`);
  });

  it("rejects an empty token and a bad URL", () => {
    expect(() => createSessionContext({ communityUrl: COMMUNITY_URL, authType: "sso", token: " " })).toThrow(
      MissingAuthDataError
    );
    expect(() => createSessionContext({ communityUrl: "", authType: "sso", token: "test-sso" })).toThrow(
      InvalidURLError
    );
  });
});

describe("withToken", () => {
  it("returns a new context and leaves the old one alone", () => {
    const session = createSessionContext({ communityUrl: COMMUNITY_URL, authType: "session-key", token: "pending" });
    const refreshed = withToken(session, "test-refreshed-key");

    expect(refreshed.token).toBe("test-refreshed-key");
    expect(refreshed.authType).toBe("session-key");
    expect(session.token).toBe("pending");
    expect(() => withToken(session, "")).toThrow("A session cannot be refreshed with an empty token.");
  });
});

describe("credentialsFor", () => {
  it("maps each token scheme", () => {
    expect(credentialsFor({ type: "oauth2", accessToken: "test-token" })).toEqual({
      authType: "oauth2",
      token: "test-token",
    });
    expect(credentialsFor({ type: "session-key", sessionKey: "test-session-key" })).toEqual({
      authType: "session-key",
      token: "test-session-key",
    });
    expect(credentialsFor({ type: "sso", ssoToken: "test-sso" })).toEqual({ authType: "sso", token: "test-sso" });
  });
});

describe("SessionAuthenticator", () => {
  it("posts the credentials as a form and returns the key", async () => {
    const fetch = queueFetch({ json: { response: { status: "success", value: { type: "string", $: "test-new-key" } } } });
    const { dispatcher, session } = createTestApi(fetch);

    const key = await new SessionAuthenticator(dispatcher).login(session, "api-user", "test-secret");

    expect(key).toBe("test-new-key");
    const request = sentRequest(fetch);
    expect(request.url).toBe(`${V1_BASE}/authentication/sessions/login?restapi.response_format=json`);
    expect(request.method).toBe("POST");
    expect(request.body).toBe("user.login=api-user&user.password=test-secret");
  });

  it("raises the POST error for a rejected login", async () => {
    const fetch = queueFetch({
      json: { response: { status: "error", error: { code: 303, message: "User authentication failed." } } },
    });
    const { dispatcher, session } = createTestApi(fetch);

    const error = await new SessionAuthenticator(dispatcher)
      .login(session, "api-user", "test-wrong")
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(POSTRequestError);
    if (error instanceof POSTRequestError) {
      expect(error.apiMessage).toBe("User authentication failed.");
    }
  });

  it("requires both credentials", async () => {
    const fetch = queueFetch({ json: {} });
    const { dispatcher, session } = createTestApi(fetch);

    await expect(new SessionAuthenticator(dispatcher).login(session, " ", "test-secret")).rejects.toBeInstanceOf(
      MissingAuthDataError
    );
    expect(fetch).not.toHaveBeenCalled();
  });

  it("fails when no key comes back", async () => {
    const { dispatcher, session } = createTestApi(queueFetch({ json: { response: { status: "success" } } }));
    await expect(new SessionAuthenticator(dispatcher).login(session, "api-user", "test-secret")).rejects.toThrow(
      "The login response did not contain a session key."
    );
  });

  it("logs out with the session key", async () => {
    const fetch = queueFetch({ json: { response: { status: "success" } } });
    const { dispatcher, session } = createTestApi(fetch);

    await new SessionAuthenticator(dispatcher).invalidate(session);

    const request = sentRequest(fetch);
    expect(request.url).toBe(`${V1_BASE}/authentication/sessions/logout?restapi.response_format=json`);
    expect(request.headers.get("li-api-session-key")).toBe("test-session-key");
  });
});
