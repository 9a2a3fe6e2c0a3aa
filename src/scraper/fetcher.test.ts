import axios, { AxiosError, AxiosHeaders } from "axios";
import type { AxiosAdapter, InternalAxiosRequestConfig } from "axios";
import { describe, expect, it, vi } from "vitest";
import { NetworkError, ParseError } from "../errors";
import { decodeBody, fetchHtml } from "./fetcher";

const PAGE_URL = "https://huskers.test/sports/football/schedule";

function stubClient(
  status: number,
  body: string | Buffer,
  contentType = "text/html; charset=utf-8"
) {
  const adapter = vi.fn(async (config: InternalAxiosRequestConfig) => ({
    data: typeof body === "string" ? Buffer.from(body, "utf-8") : body,
    status,
    statusText: String(status),
    headers: new AxiosHeaders({ "content-type": contentType }),
    config,
  }));
  return { client: axios.create({ adapter }), adapter };
}

describe("fetchHtml", () => {
  it("returns the page body as text", async () => {
    const { client, adapter } = stubClient(200, "<html><body>ok</body></html>");
    await expect(fetchHtml(PAGE_URL, client)).resolves.toBe("<html><body>ok</body></html>");
    expect(adapter).toHaveBeenCalledTimes(1);
  });

  it("fails with a NetworkError on HTTP 500 without retrying", async () => {
    const { client, adapter } = stubClient(500, "Internal Server Error", "text/plain");

    const error = await fetchHtml(PAGE_URL, client).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({
      message: `HTTP 500: ${PAGE_URL}`,
      status: 500,
      url: PAGE_URL,
    });
    expect(adapter).toHaveBeenCalledTimes(1);
  });

  it("fails with a NetworkError on 404", async () => {
    const { client } = stubClient(404, "Not Found");
    await expect(fetchHtml(PAGE_URL, client)).rejects.toThrow(`HTTP 404: ${PAGE_URL}`);
  });

  it("wraps transport failures such as timeouts", async () => {
    const adapter: AxiosAdapter = async (config) => {
      throw new AxiosError("timeout of 50ms exceeded", AxiosError.ECONNABORTED, config);
    };
    const client = axios.create({ adapter });

    const error = await fetchHtml(PAGE_URL, client).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({
      message: `Request to ${PAGE_URL} failed: timeout of 50ms exceeded`,
      status: undefined,
    });
  });

  it("decodes a windows-1252 page that declares its charset in a meta tag", async () => {
    const page = Buffer.concat([
      Buffer.from('<html><head><meta charset="windows-1252"></head><body><p>Caf', "latin1"),
      Buffer.from([0xe9]),
      Buffer.from("</p></body></html>", "latin1"),
    ]);
    const { client } = stubClient(200, page, "text/html");
    await expect(fetchHtml(PAGE_URL, client)).resolves.toBe(
      '<html><head><meta charset="windows-1252"></head><body><p>Café</p></body></html>'
    );
  });

  it("decodes the body with the declared charset", async () => {
    const latin1 = Buffer.from([0x43, 0x61, 0x66, 0xe9]);
    const { client } = stubClient(200, latin1, "text/html; charset=ISO-8859-1");
    await expect(fetchHtml(PAGE_URL, client)).resolves.toBe("Café");
  });
});

describe("decodeBody", () => {
  it("uses the charset declared in the page when the header has none", () => {
    const page = Buffer.concat([
      Buffer.from('<meta charset="windows-1252"><p>Caf', "latin1"),
      Buffer.from([0xe9]),
    ]);
    expect(decodeBody(page, "text/html")).toBe('<meta charset="windows-1252"><p>Café');
  });

  it("prefers the Content-Type charset over the page", () => {
    const page = Buffer.from('<meta charset="windows-1252"><p>Café', "utf-8");
    expect(decodeBody(page, "text/html; charset=utf-8")).toBe('<meta charset="windows-1252"><p>Café');
  });

  it("defaults to utf-8 when nothing is declared", () => {
    expect(decodeBody(Buffer.from("<p>Café</p>", "utf-8"), "")).toBe("<p>Café</p>");
  });

  it("falls back to utf-8 for an unknown charset", () => {
    expect(decodeBody(Buffer.from("Memorial Stadium", "utf-8"), "text/html; charset=x-unknown")).toBe(
      "Memorial Stadium"
    );
  });

  it("passes strings through", () => {
    expect(decodeBody("<p>hi</p>", "")).toBe("<p>hi</p>");
  });

  it("rejects bodies that are neither text nor bytes", () => {
    expect(() => decodeBody({ games: [] }, "application/json")).toThrow(ParseError);
  });
});
