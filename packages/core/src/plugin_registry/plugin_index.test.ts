import { fetchWithMirror, parsePluginIndex } from "./plugin_index";
import type { Logger } from "../logger";

const HASH = "a".repeat(64);

function createMockLogger(): jest.Mocked<Logger> {
  const logger: jest.Mocked<Logger> = {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    child: jest.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

describe("parsePluginIndex", () => {
  it("should read the code-keyed layout", () => {
    const raw = {
      "12345": {
        displayName: "Test University",
        version: "20260101_000000",
        downloadUrl: "https://plugins.test/12345.js",
        contentHash: HASH,
      },
    };

    expect(parsePluginIndex(raw, createMockLogger())).toEqual([
      {
        institutionCode: "12345",
        displayName: "Test University",
        version: "20260101_000000",
        downloadUrl: "https://plugins.test/12345.js",
        contentHash: HASH,
      },
    ]);
  });

  it("should read the release-asset layout with snake_case fields", () => {
    const raw = {
      plugins: [
        {
          school_code: "10001",
          school_name: "Sample College",
          plugin_version: "20251201_093000",
          download_url: "https://plugins.test/10001.js",
          sha256: HASH,
          contributor: "maintainers",
        },
      ],
    };

    expect(parsePluginIndex(raw, createMockLogger())).toEqual([
      {
        institutionCode: "10001",
        displayName: "Sample College",
        version: "20251201_093000",
        downloadUrl: "https://plugins.test/10001.js",
        contentHash: HASH,
        contributor: "maintainers",
      },
    ]);
  });

  it("should skip invalid entries with a warning and keep the rest", () => {
    const logger = createMockLogger();
    const raw = {
      good: { version: "1", downloadUrl: "https://plugins.test/good.js", contentHash: HASH },
      shorthash: { version: "1", downloadUrl: "https://plugins.test/s.js", contentHash: "abc" },
      "bad code": { version: "1", downloadUrl: "https://plugins.test/b.js", contentHash: HASH },
      scalar: 42,
    };

    const result = parsePluginIndex(raw, logger);

    expect(result.map((d) => d.institutionCode)).toEqual(["good"]);
    expect(result[0]?.displayName).toBe("good");
    expect(logger.warn).toHaveBeenCalledTimes(3);
  });

  it("should return an empty list for documents that are not objects", () => {
    const logger = createMockLogger();

    expect(parsePluginIndex([1, 2], logger)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith("Plugin index is not a JSON object");
  });
});

describe("fetchWithMirror", () => {
  it("should retry through the mirror prefix when the direct request fails", async () => {
    const fakeFetch = jest.fn(async (input: Parameters<typeof fetch>[0]): Promise<Response> => {
      if (input === "https://mirror.test/https://plugins.test/index.json") {
        return new Response("{}", { status: 200 });
      }
      return new Response("unavailable", { status: 503 });
    });

    const body = await fetchWithMirror("https://plugins.test/index.json", {
      fetch: fakeFetch,
      mirrorPrefix: "https://mirror.test/",
      timeoutMs: 1000,
      logger: createMockLogger(),
    });

    expect(body.toString("utf8")).toBe("{}");
    expect(fakeFetch).toHaveBeenCalledTimes(2);
  });

  it("should report both failures when the mirror fails too", async () => {
    const fakeFetch = jest.fn(async (): Promise<Response> => {
      throw new TypeError("fetch failed");
    });

    await expect(
      fetchWithMirror("https://plugins.test/index.json", {
        fetch: fakeFetch,
        mirrorPrefix: "https://mirror.test/",
        timeoutMs: 1000,
        logger: createMockLogger(),
      })
    ).rejects.toThrow("direct: fetch failed; mirror: fetch failed");
  });

  it("should not retry without a mirror prefix", async () => {
    const fakeFetch = jest.fn(async (): Promise<Response> => new Response("", { status: 404 }));

    await expect(
      fetchWithMirror("https://plugins.test/index.json", { fetch: fakeFetch, timeoutMs: 1000, logger: createMockLogger() })
    ).rejects.toThrow("HTTP 404");
    expect(fakeFetch).toHaveBeenCalledTimes(1);
  });
});
