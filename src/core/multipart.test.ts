import { describe, it, expect } from "vitest";
import { MultipartFormBuilder } from "./multipart.js";

describe("MultipartFormBuilder", () => {
  it("builds one part per field and file", async () => {
    const form = MultipartFormBuilder.create()
      .addJson("api.request", { data: { type: "message", subject: "Hello" } })
      .addFile("first", "alpha", "first.txt", "text/plain")
      .addFile("second", new Uint8Array([1, 2, 3]), "second.bin")
      .build();

    expect([...form.keys()]).toEqual(["api.request", "first", "second"]);
    expect(form.get("api.request")).toBe('{"data":{"type":"message","subject":"Hello"}}');

    const first = form.get("first");
    expect(first).toBeInstanceOf(Blob);
    if (first instanceof Blob) {
      expect(await first.text()).toBe("alpha");
      expect(first.type).toBe("text/plain");
    }

    const second = form.get("second");
    if (second instanceof Blob) {
      expect(second.size).toBe(3);
      expect(second.type).toBe("application/octet-stream");
    }
  });

  it("keeps the filename of each file part", () => {
    const form = MultipartFormBuilder.create().addFile("avatar", "x", "avatar.png", "image/png").build();
    const part = form.get("avatar");
    expect(part).toBeInstanceOf(File);
    if (part instanceof File) {
      expect(part.name).toBe("avatar.png");
    }
  });

  it("counts its parts", () => {
    const builder = MultipartFormBuilder.create().addField("a", "1").addField("b", "2");
    expect(builder.size).toBe(2);
  });
});
