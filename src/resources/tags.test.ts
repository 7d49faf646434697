import { describe, it, expect } from "vitest";
import { TagsResource, structureSingleTagPayload, structureTagsForMessage } from "./tags.js";
import { InvalidPayloadValueError, POSTRequestError } from "../core/errors.js";
import { V2_BASE, createTestApi, queueFetch, sentJson, sentRequest } from "../testing/fake-fetch.js";

describe("tag payloads", () => {
  it("wraps a single tag", () => {
    expect(structureSingleTagPayload("release")).toEqual({ data: { type: "tag", text: "release" } });
    expect(() => structureSingleTagPayload(" ")).toThrow(InvalidPayloadValueError);
  });

  it("lists tags for a message", () => {
    expect(structureTagsForMessage("a", "b")).toEqual([
      { type: "tag", text: "a" },
      { type: "tag", text: "b" },
    ]);
  });
});

describe("TagsResource", () => {
  it("adds a tag to a message", async () => {
    const fetch = queueFetch({ json: { status: "success", data: { type: "tag", text: "release" } } });
    const { api, liql } = createTestApi(fetch);

    await expect(new TagsResource(api, liql).addSingleTagToMessage("release", "1042")).resolves.toBe(true);
    expect(sentRequest(fetch).url).toBe(`${V2_BASE}/messages/1042/tags`);
    expect(sentJson(fetch)).toEqual({ data: { type: "tag", text: "release" } });
  });

  it("warns and returns false for a rejected tag", async () => {
    const { api, liql, observability } = createTestApi(
      queueFetch({ status: 400, json: { status: "error", message: "Tag not allowed" } })
    );

    await expect(new TagsResource(api, liql).addSingleTagToMessage("banned", "1042")).resolves.toBe(false);
    const warning = observability.warnings.find((entry) => entry.metadata?.kind === "tag_rejected");
    expect(warning?.message).toBe("The tag 'banned' could not be added to message 1042: Tag not allowed");
  });

  it("throws for a rejected tag when exceptions are allowed", async () => {
    const { api, liql } = createTestApi(
      queueFetch({ status: 400, json: { status: "error", message: "Tag not allowed" } })
    );

    const error = await new TagsResource(api, liql)
      .addSingleTagToMessage("banned", "1042", { allowExceptions: true })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(POSTRequestError);
    if (error instanceof POSTRequestError) {
      expect(error.statusCode).toBe(400);
      expect(error.apiMessage).toBe("Tag not allowed");
    }
  });

  it("adds several tags in order", async () => {
    const fetch = queueFetch(
      { json: { status: "success" } },
      { status: 400, json: { status: "error", message: "Tag not allowed" } }
    );
    const { api, liql } = createTestApi(fetch);

    await expect(new TagsResource(api, liql).addTagsToMessage(["ok", "banned"], "1042")).resolves.toEqual([
      true,
      false,
    ]);
    expect(sentJson(fetch, 0)).toEqual({ data: { type: "tag", text: "ok" } });
    expect(sentJson(fetch, 1)).toEqual({ data: { type: "tag", text: "banned" } });
  });

  it("reads the tags of a message", async () => {
    const fetch = queueFetch({
      json: { status: "success", data: { items: [{ text: "release" }, { text: "notes" }] } },
    });
    const { api, liql } = createTestApi(fetch);

    await expect(new TagsResource(api, liql).getTagsForMessage("1042")).resolves.toEqual(["release", "notes"]);
    expect(sentRequest(fetch).url).toBe(`${V2_BASE}/search?q=SELECT+text+FROM+tags+WHERE+messages.id+%3D+1042`);
  });
});
