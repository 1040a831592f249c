import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { FetchHttpClient, type FetchFn } from "../http-client";
import { DownloadError, MalformedResponseError, NetworkError } from "../errors";

const URL_UNDER_TEST = "https://example.test/release";

function createFetch(respond: () => Response | Promise<Response>) {
  const fetchFn: FetchFn = async () => respond();
  return vi.fn(fetchFn);
}

/**
 * Fetch that only settles when the request signal aborts
 */
function createHangingFetch(respond?: (signal: AbortSignal) => Response) {
  const fetchFn: FetchFn = (_url, init) =>
    new Promise<Response>((resolve, reject) => {
      const signal = init?.signal;
      if (!signal) return;
      if (respond) {
        resolve(respond(signal));
        return;
      }
      signal.addEventListener("abort", () => reject(signal.reason));
    });
  return vi.fn(fetchFn);
}

describe("FetchHttpClient.fetchJson", () => {
  it("should parse a JSON body", async () => {
    const fetchFn = createFetch(() => new Response('{"assets":[]}', { status: 200 }));
    const client = new FetchHttpClient(fetchFn);

    expect(await client.fetchJson(URL_UNDER_TEST, 1000)).toEqual({ assets: [] });
    expect(fetchFn).toHaveBeenCalledWith(
      URL_UNDER_TEST,
      expect.objectContaining({ redirect: "follow" })
    );
  });

  it("should fail with the status on non-success responses", async () => {
    const client = new FetchHttpClient(
      createFetch(() => new Response("oops", { status: 500, statusText: "Internal Server Error" }))
    );

    const error = await client.fetchJson(URL_UNDER_TEST, 1000).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ status: 500 });
  });

  it("should wrap transport failures", async () => {
    const client = new FetchHttpClient(
      createFetch(() => {
        throw new TypeError("fetch failed");
      })
    );

    await expect(client.fetchJson(URL_UNDER_TEST, 1000)).rejects.toThrow(
      `Request to ${URL_UNDER_TEST} failed: fetch failed`
    );
  });

  it("should fail with a network error when the request times out", async () => {
    const client = new FetchHttpClient(createHangingFetch());

    const error = await client.fetchJson(URL_UNDER_TEST, 20).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ status: undefined });
  });

  it("should fail on bodies that are not JSON", async () => {
    const client = new FetchHttpClient(createFetch(() => new Response("<html>", { status: 200 })));

    await expect(client.fetchJson(URL_UNDER_TEST, 1000)).rejects.toBeInstanceOf(
      MalformedResponseError
    );
  });
});

describe("FetchHttpClient.download", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "wheel-index-http-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should stream the body into the destination", async () => {
    const destination = path.join(dir, "foo-1.0-py3-none-any.whl");
    const client = new FetchHttpClient(createFetch(() => new Response("wheel-bytes")));

    await client.download("https://example.test/foo.whl", destination, 1000);

    expect(await readFile(destination, "utf8")).toBe("wheel-bytes");
  });

  it("should fail on non-success responses without leaving a file", async () => {
    const destination = path.join(dir, "missing.whl");
    const client = new FetchHttpClient(
      createFetch(() => new Response("not found", { status: 404, statusText: "Not Found" }))
    );

    const error = await client
      .download("https://example.test/missing.whl", destination, 1000)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DownloadError);
    expect(error).toMatchObject({
      url: "https://example.test/missing.whl",
      destination,
    });
    expect(existsSync(destination)).toBe(false);
  });

  it("should fail without leaving a file when the request times out", async () => {
    const destination = path.join(dir, "slow.whl");
    const client = new FetchHttpClient(createHangingFetch());

    await expect(
      client.download("https://example.test/slow.whl", destination, 20)
    ).rejects.toBeInstanceOf(DownloadError);
    expect(existsSync(destination)).toBe(false);
  });

  it("should remove a partial file when the body stalls past the timeout", async () => {
    const destination = path.join(dir, "stalled.whl");
    const client = new FetchHttpClient(
      createHangingFetch(
        (signal) =>
          new Response(
            new ReadableStream<Uint8Array>({
              start(controller) {
                controller.enqueue(new TextEncoder().encode("partial"));
                signal.addEventListener("abort", () => controller.error(signal.reason));
              },
            })
          )
      )
    );

    await expect(
      client.download("https://example.test/stalled.whl", destination, 20)
    ).rejects.toBeInstanceOf(DownloadError);
    expect(existsSync(destination)).toBe(false);
  });

  it("should still report the download failure when cleanup fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    // A non-empty directory at the destination makes both the write and the removal fail
    const destination = path.join(dir, "blocked.whl");
    await mkdir(destination);
    await writeFile(path.join(destination, "keep"), "x");
    const client = new FetchHttpClient(createFetch(() => new Response("wheel-bytes")));

    await expect(
      client.download("https://example.test/blocked.whl", destination, 1000)
    ).rejects.toBeInstanceOf(DownloadError);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(
      /^WARNING: Could not remove partial download .*blocked\.whl: /
    );
    warn.mockRestore();
  });

  it("should remove a partially written file when the stream breaks", async () => {
    const destination = path.join(dir, "broken.whl");
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode("partial"));
        controller.error(new Error("connection reset"));
      },
    });
    const client = new FetchHttpClient(createFetch(() => new Response(body)));

    await expect(
      client.download("https://example.test/broken.whl", destination, 1000)
    ).rejects.toBeInstanceOf(DownloadError);
    expect(existsSync(destination)).toBe(false);
  });
});
