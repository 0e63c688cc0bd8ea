/**
 * Target directory tests
 *
 * Mocks fetch to exercise the discovery endpoint handling without a browser.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TargetDirectory } from "../cdp/target-directory";
import { BrowserUnreachableError } from "../errors";
import type { BrowserVersionInfo } from "../types";

const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

function mockJsonResponse<T>(data: T, status = 200): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: () => Promise.resolve(data),
    text: () => Promise.resolve(JSON.stringify(data)),
  } as Response;
}

describe("TargetDirectory", () => {
  let directory: TargetDirectory;

  beforeEach(() => {
    mockFetch.mockReset();
    directory = new TargetDirectory({ host: "localhost", port: 9222 });
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  it("should build its base URL from the endpoint", () => {
    expect(directory.baseUrl).toBe("http://localhost:9222");
    expect(new TargetDirectory({ host: "127.0.0.1", port: 9333 }).baseUrl).toBe("http://127.0.0.1:9333");
  });

  describe("browserEndpoint()", () => {
    it("should return webSocketDebuggerUrl from /json/version", async () => {
      const version: BrowserVersionInfo = {
        Browser: "Chrome/120.0.0.0",
        webSocketDebuggerUrl: "ws://localhost:9222/devtools/browser/abc",
      };
      mockFetch.mockResolvedValueOnce(mockJsonResponse(version));

      const url = await directory.browserEndpoint();

      expect(url).toBe("ws://localhost:9222/devtools/browser/abc");
      expect(mockFetch).toHaveBeenCalledWith(
        "http://localhost:9222/json/version",
        expect.objectContaining({ signal: expect.any(AbortSignal) })
      );
    });

    it("should throw BrowserUnreachableError when the field is missing", async () => {
      mockFetch.mockResolvedValueOnce(mockJsonResponse({ Browser: "Chrome" }));

      await expect(directory.browserEndpoint()).rejects.toBeInstanceOf(BrowserUnreachableError);
    });

    it("should throw BrowserUnreachableError when fetch fails", async () => {
      mockFetch.mockRejectedValueOnce(new TypeError("fetch failed"));

      const err = await directory.browserEndpoint().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(BrowserUnreachableError);
      expect((err as BrowserUnreachableError).message).toBe("CDP Chrome not reachable at http://localhost:9222. Start Chrome with --remote-debugging-port=9222");
      expect((err as BrowserUnreachableError).cause).toBeInstanceOf(TypeError);
    });

    it("should throw BrowserUnreachableError on HTTP errors", async () => {
      mockFetch.mockResolvedValueOnce(mockJsonResponse({}, 500));

      await expect(directory.browserEndpoint()).rejects.toBeInstanceOf(BrowserUnreachableError);
    });
  });

  describe("listTargets()", () => {
    it("should return targets in browser order", async () => {
      mockFetch.mockResolvedValueOnce(
        mockJsonResponse([
          {
            id: "B",
            type: "page",
            title: "Second",
            url: "https://b.test/",
            webSocketDebuggerUrl: "ws://localhost:9222/devtools/page/B",
          },
          { id: "A", type: "page", title: "First", url: "https://a.test/" },
        ])
      );

      const targets = await directory.listTargets();

      expect(mockFetch).toHaveBeenCalledWith("http://localhost:9222/json", expect.any(Object));
      expect(targets).toEqual([
        {
          id: "B",
          type: "page",
          title: "Second",
          url: "https://b.test/",
          webSocketDebuggerUrl: "ws://localhost:9222/devtools/page/B",
        },
        { id: "A", type: "page", title: "First", url: "https://a.test/" },
      ]);
    });

    it("should drop entries without a string id", async () => {
      mockFetch.mockResolvedValueOnce(mockJsonResponse([{ type: "page" }, { id: 42 }, "junk", { id: "ok" }]));

      await expect(directory.listTargets()).resolves.toEqual([{ id: "ok" }]);
    });

    it("should throw BrowserUnreachableError when the body is not a list", async () => {
      mockFetch.mockResolvedValueOnce(mockJsonResponse({ targets: [] }));

      await expect(directory.listTargets()).rejects.toBeInstanceOf(BrowserUnreachableError);
    });
  });

  describe("findTarget()", () => {
    it("should find a target by id", async () => {
      mockFetch.mockResolvedValueOnce(mockJsonResponse([{ id: "A" }, { id: "B", url: "https://b.test/" }]));

      await expect(directory.findTarget("B")).resolves.toEqual({ id: "B", url: "https://b.test/" });
    });

    it("should return undefined for a missing target", async () => {
      mockFetch.mockResolvedValueOnce(mockJsonResponse([{ id: "A" }]));

      await expect(directory.findTarget("B")).resolves.toBeUndefined();
    });
  });

  describe("reachable()", () => {
    it("should be true when /json/version answers", async () => {
      mockFetch.mockResolvedValueOnce(mockJsonResponse({ webSocketDebuggerUrl: "ws://x" }));

      await expect(directory.reachable()).resolves.toBe(true);
    });

    it("should be false on HTTP errors", async () => {
      mockFetch.mockResolvedValueOnce(mockJsonResponse({}, 404));

      await expect(directory.reachable()).resolves.toBe(false);
    });

    it("should be false instead of throwing when fetch rejects", async () => {
      mockFetch.mockRejectedValueOnce(new Error("ECONNREFUSED"));

      await expect(directory.reachable()).resolves.toBe(false);
    });
  });
});
