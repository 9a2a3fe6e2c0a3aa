import axios from "axios";
import { decodeBuffer } from "encoding-sniffer";
import type { AxiosInstance, AxiosResponse } from "axios";
import { NetworkError, ParseError } from "../errors";
import { logger } from "../utils/logger";

export interface HttpClientOptions {
  timeoutMs: number;
  userAgent: string;
}

export function createHttpClient({ timeoutMs, userAgent }: HttpClientOptions): AxiosInstance {
  return axios.create({
    timeout: timeoutMs,
    headers: { "User-Agent": userAgent },
  });
}

function charsetOf(contentType: string): string | undefined {
  return contentType.match(/charset=["']?([^;"'\s]+)/i)?.[1];
}

function toBuffer(data: ArrayBuffer | ArrayBufferView): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

/**
 * Decodes a response body the way cheerio decodes buffers: a BOM first, then
 * the Content-Type charset, then a `<meta charset>` in the page, else UTF-8.
 */
export function decodeBody(data: unknown, contentType: string): string {
  if (typeof data === "string") return data;
  if (!(data instanceof ArrayBuffer) && !ArrayBuffer.isView(data)) {
    throw new ParseError(`Unexpected response body of type ${typeof data}`);
  }

  return decodeBuffer(toBuffer(data), {
    transportLayerEncodingLabel: charsetOf(contentType),
    defaultEncoding: "utf-8",
  });
}

/**
 * Fetches a page with a single GET. Transport failures and non-2xx
 * statuses become a NetworkError; nothing is retried.
 */
export async function fetchHtml(url: string, client: AxiosInstance): Promise<string> {
  let response: AxiosResponse<unknown>;
  try {
    response = await client.get<unknown>(url, {
      responseType: "arraybuffer",
      // status codes are checked below
      validateStatus: () => true,
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new NetworkError(`Request to ${url} failed: ${reason}`, url, undefined, error);
  }

  if (response.status < 200 || response.status >= 300) {
    throw new NetworkError(`HTTP ${response.status}: ${url}`, url, response.status);
  }

  const contentType = response.headers["content-type"]?.toString() ?? "";
  if (contentType && !contentType.includes("html")) {
    logger.warn(`Received non-HTML response (${contentType}) from ${url}`);
  }

  return decodeBody(response.data, contentType);
}
