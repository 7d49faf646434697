/**
 * Multipart payload encoding
 */

export type MultipartContent = Blob | Uint8Array | string;

export interface MultipartFile {
  name: string;
  content: MultipartContent;
  filename: string;
  contentType?: string;
}

export interface MultipartField {
  name: string;
  value: string;
}

export type MultipartPart = MultipartFile | MultipartField;

export class MultipartFormBuilder {
  private parts: MultipartPart[] = [];

  addField(name: string, value: string): this {
    this.parts.push({ name, value });
    return this;
  }

  /**
   * Adds a field whose value is a JSON document, e.g. the `api.request` part.
   */
  addJson(name: string, value: unknown): this {
    return this.addField(name, JSON.stringify(value));
  }

  addFile(name: string, content: MultipartContent, filename: string, contentType?: string): this {
    const part: MultipartFile = { name, content, filename };
    if (contentType !== undefined) {
      part.contentType = contentType;
    }
    this.parts.push(part);
    return this;
  }

  get size(): number {
    return this.parts.length;
  }

  build(): FormData {
    const formData = new FormData();

    for (const part of this.parts) {
      if ("value" in part) {
        formData.append(part.name, part.value);
      } else {
        const blob = part.content instanceof Blob
          ? part.content
          : new Blob([part.content], { type: part.contentType ?? "application/octet-stream" });
        formData.append(part.name, blob, part.filename);
      }
    }

    return formData;
  }

  static create(): MultipartFormBuilder {
    return new MultipartFormBuilder();
  }
}
