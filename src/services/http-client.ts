/**
 * HTTP access used by the lister and the mirror
 *
 * Both operations sit behind the HttpClient interface so tests can
 * substitute fixtures for the network.
 */

import { rm, writeFile } from "node:fs/promises";
import { Readable } from "node:stream";
import { DownloadError, MalformedResponseError, NetworkError, describeError } from "./errors";

export interface HttpClient {
  /**
   * GET a URL and parse the body as JSON.
   * Throws NetworkError or MalformedResponseError.
   */
  fetchJson(url: string, timeoutMs: number): Promise<unknown>;

  /**
   * Stream a URL into a file. On failure the partial file is removed
   * and DownloadError is thrown.
   */
  download(url: string, destination: string, timeoutMs: number): Promise<void>;
}

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

const USER_AGENT = "wheel-release-index";

/**
 * HttpClient on top of the global fetch
 */
export class FetchHttpClient implements HttpClient {
  private readonly fetchFn: FetchFn;

  constructor(fetchFn: FetchFn = (url, init) => fetch(url, init)) {
    this.fetchFn = fetchFn;
  }

  async fetchJson(url: string, timeoutMs: number): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: {
          Accept: "application/vnd.github+json",
          "User-Agent": USER_AGENT,
        },
        redirect: "follow",
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new NetworkError(`Request to ${url} failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new NetworkError(
        `Request to ${url} failed: HTTP ${response.status} ${response.statusText}`,
        { status: response.status }
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new NetworkError(`Reading response from ${url} failed: ${describeError(error)}`, {
        cause: error,
      });
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new MalformedResponseError(
        `Response from ${url} is not valid JSON: ${text.slice(0, 500)}`,
        { cause: error }
      );
    }
  }

  async download(url: string, destination: string, timeoutMs: number): Promise<void> {
    try {
      const response = await this.fetchFn(url, {
        headers: { "User-Agent": USER_AGENT },
        redirect: "follow",
        signal: AbortSignal.timeout(timeoutMs),
      });

      if (!response.ok) {
        throw new NetworkError(`HTTP ${response.status} ${response.statusText}`, {
          status: response.status,
        });
      }
      if (!response.body) {
        throw new NetworkError("Response has no body");
      }

      await writeFile(destination, Readable.fromWeb(response.body));
    } catch (error) {
      // A failed cleanup must not hide the download failure
      await rm(destination, { force: true }).catch((cleanupError: unknown) => {
        console.warn(
          `WARNING: Could not remove partial download ${destination}: ${describeError(cleanupError)}`
        );
      });
      throw new DownloadError(
        `Download of ${url} failed: ${describeError(error)}`,
        url,
        destination,
        { cause: error }
      );
    }
  }
}
