import { describe, it, expect } from "vitest";
import { createResourceFetcher, extensionFor, findPageItems, summarizePageItem } from "./resources.js";
import { createRecordingTransport, textResponse } from "../graph/test-transport.js";
import { RemoteError, ValidationError } from "../errors.js";

const BASE = "https://graph.microsoft.com/v1.0";
const resourceUrl = (id: string) => `${BASE}/me/onenote/resources/${id}/$value`;

describe("extensionFor", () => {
  it("maps known MIME types and falls back to .bin", () => {
    expect(extensionFor("image/jpeg")).toBe(".jpg");
    expect(extensionFor("image/svg+xml")).toBe(".svg");
    expect(extensionFor("application/vnd.openxmlformats-officedocument.spreadsheetml.sheet")).toBe(".xlsx");
    expect(extensionFor("application/x-unknown")).toBe(".bin");
  });
});

describe("findPageItems", () => {
  it("finds img and object resources in document order", () => {
    const html =
      `<p>x</p><object data="${resourceUrl("0-B!2")}" type="text/plain"></object>` +
      `<img src="${resourceUrl("0-A!1")}" alt="pic"><img src="https://example.com/a.png">`;

    expect(findPageItems(html)).toEqual([
      {
        tagName: "object",
        pageItemId: "0-B!2",
        attributes: { data: resourceUrl("0-B!2"), type: "text/plain" },
        originalUrl: resourceUrl("0-B!2"),
      },
      {
        tagName: "img",
        pageItemId: "0-A!1",
        attributes: { src: resourceUrl("0-A!1"), alt: "pic" },
        originalUrl: resourceUrl("0-A!1"),
      },
    ]);
  });
});

describe("summarizePageItem", () => {
  it("tells objects that are not attachments apart", () => {
    expect(
      summarizePageItem({ tagName: "object", pageItemId: "0-B!2", attributes: {}, originalUrl: resourceUrl("0-B!2") }),
    ).toEqual({ pageItemId: "0-B!2", tagName: "object", type: "object" });
  });

  it("prefers data-src-type for the MIME type", () => {
    expect(
      summarizePageItem({
        tagName: "object",
        pageItemId: "0-B!2",
        attributes: { "data-src-type": "text/csv", type: "application/octet-stream" },
        originalUrl: resourceUrl("0-B!2"),
      }).mimeType,
    ).toBe("text/csv");
  });
});

describe("createResourceFetcher", () => {
  it("downloads the resource with exactly one request", async () => {
    const transport = createRecordingTransport(() => textResponse(200, "GIF89a", { "content-type": "image/gif" }));
    const fetchResource = createResourceFetcher(transport, { base_url: BASE });

    const item = await fetchResource("0-PAGE!1", "0-A!1");

    expect(transport.requests.map((r) => `${r.method} ${r.url}`)).toEqual([`GET ${resourceUrl("0-A!1")}`]);
    expect(item).toEqual({
      contentType: "image/gif",
      filename: "0-A!1.gif",
      size: 6,
      content: Buffer.from("GIF89a"),
      tagName: "img",
      attributes: {},
      originalUrl: resourceUrl("0-A!1"),
    });
  });

  it("falls back to application/octet-stream", async () => {
    const transport = createRecordingTransport(() => textResponse(200, "??"));
    const item = await createResourceFetcher(transport, { base_url: BASE })("0-PAGE!1", "0-A!1");

    expect(item.contentType).toBe("application/octet-stream");
    expect(item.filename).toBe("0-A!1.bin");
  });

  it("fails on error statuses and invalid ids", async () => {
    const transport = createRecordingTransport(() => textResponse(404, "gone"));
    const fetchResource = createResourceFetcher(transport, { base_url: BASE });

    await expect(fetchResource("0-PAGE!1", "0-A!1")).rejects.toBeInstanceOf(RemoteError);
    await expect(fetchResource("0-PAGE!1", "a/b")).rejects.toBeInstanceOf(ValidationError);
    expect(transport.requests).toHaveLength(1);
  });
});
