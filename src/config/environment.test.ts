import { describe, it, expect } from "vitest";
import { loadEnvironmentConfig, parseBoolean } from "./environment.js";
import { InvalidConfigurationError, MissingAuthDataError } from "../core/errors.js";

const URL_ONLY = { COMMUNITY_URL: "https://community.example.com" };

describe("loadEnvironmentConfig", () => {
  it("reads the connection settings and flags", () => {
    const config = loadEnvironmentConfig({
      ...URL_ONLY,
      COMMUNITY_TENANT_ID: "example-tenant",
      COMMUNITY_SESSION_KEY: "test-session-key",
      COMMUNITY_PREFER_JSON: "no",
      COMMUNITY_TRANSLATE_ERRORS: "Yes",
    });

    expect(config).toEqual({
      communityUrl: "https://community.example.com",
      tenantId: "example-tenant",
      auth: { type: "session-key", sessionKey: "test-session-key" },
      preferJson: false,
      translateErrors: true,
    });
  });

  it("infers OAuth ahead of the other credentials", () => {
    const config = loadEnvironmentConfig({
      ...URL_ONLY,
      COMMUNITY_OAUTH2_TOKEN: "test-token",
      COMMUNITY_SESSION_KEY: "test-session-key",
      COMMUNITY_SSO_TOKEN: "test-sso",
    });
    expect(config.auth).toEqual({ type: "oauth2", accessToken: "test-token" });
  });

  it("infers a session login from user and password", () => {
    const config = loadEnvironmentConfig({
      ...URL_ONLY,
      COMMUNITY_SESSION_USER: "api-user",
      COMMUNITY_SESSION_PW: "test-secret",
      COMMUNITY_SSO_TOKEN: "test-sso",
    });
    expect(config.auth).toEqual({ type: "session-login", username: "api-user", password: "test-secret" });
  });

  it("honors an explicit default auth type", () => {
    const config = loadEnvironmentConfig({
      ...URL_ONLY,
      COMMUNITY_DEFAULT_AUTH: "SSO",
      COMMUNITY_OAUTH2_TOKEN: "test-token",
      COMMUNITY_SSO_TOKEN: "test-sso",
    });
    expect(config.auth).toEqual({ type: "sso", ssoToken: "test-sso" });
  });

  it("requires the credentials of the selected auth type", () => {
    expect(() =>
      loadEnvironmentConfig({ ...URL_ONLY, COMMUNITY_DEFAULT_AUTH: "session-login", COMMUNITY_SESSION_USER: "api-user" })
    ).toThrow("COMMUNITY_SESSION_USER and COMMUNITY_SESSION_PW are required for session authentication.");
  });

  it("fails without any credentials", () => {
    expect(() => loadEnvironmentConfig(URL_ONLY)).toThrow(MissingAuthDataError);
  });

  it("fails without a community URL", () => {
    expect(() => loadEnvironmentConfig({ COMMUNITY_SESSION_KEY: "test-session-key" })).toThrow(
      "Invalid environment configuration:\n  - COMMUNITY_URL is not set"
    );
  });

  it("rejects an unknown auth type", () => {
    expect(() => loadEnvironmentConfig({ ...URL_ONLY, COMMUNITY_DEFAULT_AUTH: "basic" })).toThrow(
      InvalidConfigurationError
    );
  });

  it("reads custom variable names", () => {
    const config = loadEnvironmentConfig(
      { MY_URL: "https://other.example.com", MY_KEY: "test-session-key" },
      { communityUrl: "MY_URL", sessionKey: "MY_KEY" }
    );
    expect(config.communityUrl).toBe("https://other.example.com");
    expect(config.auth).toEqual({ type: "session-key", sessionKey: "test-session-key" });
  });
});

describe("parseBoolean", () => {
  it("maps yes/no words", () => {
    expect(parseBoolean("on", "FLAG")).toBe(true);
    expect(parseBoolean(" 0 ", "FLAG")).toBe(false);
    expect(parseBoolean(undefined, "FLAG")).toBeUndefined();
    expect(parseBoolean("", "FLAG")).toBeUndefined();
  });

  it("rejects other values", () => {
    expect(() => parseBoolean("maybe", "FLAG")).toThrow(
      "Invalid environment configuration:\n  - FLAG: 'maybe' is not a boolean value"
    );
  });
});
