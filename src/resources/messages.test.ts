import { describe, it, expect } from "vitest";
import { MessagesResource, structureMessagePayload } from "./messages.js";
import { NodeRef } from "./nodes.js";
import { MissingRequiredDataError } from "../core/errors.js";
import { COMMUNITY_URL, V2_BASE, createTestApi, queueFetch, sentJson, sentRequest } from "../testing/fake-fetch.js";

describe("structureMessagePayload", () => {
  it("builds the message with tags and labels", () => {
    expect(
      structureMessagePayload({
        subject: "Release notes",
        body: "<p>Hello</p>",
        node: NodeRef.byUrl(`${COMMUNITY_URL}/t5/Announcements/bd-p/announcements`),
        tags: ["release", "notes"],
        labels: ["News"],
      })
    ).toEqual({
      data: {
        type: "message",
        subject: "Release notes",
        board: { id: "announcements" },
        body: "<p>Hello</p>",
        tags: { items: [{ type: "tag", text: "release" }, { type: "tag", text: "notes" }] },
        labels: { items: [{ type: "label", text: "News" }] },
      },
    });
  });

  it("describes attachments in the payload", () => {
    const payload = structureMessagePayload({ subject: "With file", node: NodeRef.byId("general") }, [
      { title: "Guide", filename: "guide.pdf", content: "pdf" },
    ]);
    expect(payload.data.attachments).toEqual({
      list_item_type: "attachment",
      items: [{ type: "attachment", field: "Guide", filename: "guide.pdf" }],
    });
  });

  it("requires a subject", () => {
    expect(() => structureMessagePayload({ subject: "", node: NodeRef.byId("general") })).toThrow(
      MissingRequiredDataError
    );
  });
});

describe("MessagesResource", () => {
  it("posts JSON and returns id and URL", async () => {
    const fetch = queueFetch({
      json: { status: "success", data: { id: "1042", view_href: `${COMMUNITY_URL}/t5/General/m-p/1042` } },
    });
    const { api } = createTestApi(fetch);

    const result = await new MessagesResource(api).create(
      { subject: "Hello", node: NodeRef.byId("general") },
      { returnId: true, returnUrl: true }
    );

    expect(result).toEqual(["1042", `${COMMUNITY_URL}/t5/General/m-p/1042`]);
    expect(sentRequest(fetch).url).toBe(`${V2_BASE}/messages`);
    expect(sentJson(fetch)).toEqual({ data: { type: "message", subject: "Hello", board: { id: "general" } } });
  });

  it("uploads attachments as multipart parts", async () => {
    const fetch = queueFetch({ json: { status: "success" } });
    const { api } = createTestApi(fetch);

    await new MessagesResource(api).create(
      { subject: "With file", node: NodeRef.byId("general") },
      { attachments: [{ title: "Guide", filename: "guide.txt", content: "read me", contentType: "text/plain" }] }
    );

    const { body, headers } = sentRequest(fetch);
    expect(headers.has("content-type")).toBe(false);
    expect(body).toBeInstanceOf(FormData);
    if (!(body instanceof FormData)) return;
    expect([...body.keys()]).toEqual(["api.request", "Guide"]);
    const request = body.get("api.request");
    expect(typeof request === "string" ? JSON.parse(request) : undefined).toEqual({
      data: {
        type: "message",
        subject: "With file",
        board: { id: "general" },
        attachments: {
          list_item_type: "attachment",
          items: [{ type: "attachment", field: "Guide", filename: "guide.txt" }],
        },
      },
    });
  });
});
