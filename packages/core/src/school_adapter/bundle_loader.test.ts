import { loadAdapterBundle } from "./bundle_loader";
import { LoadError } from "./school_adapter.errors";
import type { AdapterContext } from "./school_adapter.types";
import type { Logger } from "../logger";

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

function createContext(logger: Logger = createMockLogger()): AdapterContext {
  return { fetch, logger, setTimeout, clearTimeout };
}

const COUNTER_BUNDLE = `
let calls = 0;
module.exports = {
  SCHOOL_NAME: "Test University",
  PLUGIN_VERSION: "20260101_120000",
  fetchGrades(username, password, forceUpdate) {
    calls += 1;
    return [{ term: "2024-1", courseName: "Math", score: String(calls), credit: "4", courseCategory: "Required" }];
  },
  async fetchCourseSchedule() {
    return confirmedEmpty();
  },
};
`;

describe("loadAdapterBundle", () => {
  it("should load a CommonJS bundle and read its metadata", async () => {
    const { adapter, metadata } = loadAdapterBundle(COUNTER_BUNDLE, {
      filename: "12345/adapter.js",
      context: createContext(),
    });

    expect(metadata).toEqual({ schoolName: "Test University", pluginVersion: "20260101_120000" });
    expect(await adapter.fetchGrades("s1", "test-password", false)).toEqual([
      { term: "2024-1", courseName: "Math", score: "1", credit: "4", courseCategory: "Required" },
    ]);
    expect(await adapter.fetchCourseSchedule("s1", "test-password", false)).toEqual({ confirmedEmpty: true });
  });

  it("should give every load its own module state", async () => {
    const options = { filename: "adapter.js", context: createContext() };
    const first = loadAdapterBundle(COUNTER_BUNDLE, options).adapter;
    const second = loadAdapterBundle(COUNTER_BUNDLE, options).adapter;

    await first.fetchGrades("s1", "test-password", false);
    await first.fetchGrades("s1", "test-password", false);
    const fromSecond = await second.fetchGrades("s1", "test-password", false);

    expect(fromSecond).toEqual([expect.objectContaining({ score: "1" })]);
  });

  it("should support an export default bundle", async () => {
    const source = `
export default {
  fetchGrades: () => null,
  fetchCourseSchedule: () => [],
};
`;
    const { adapter } = loadAdapterBundle(source, { filename: "esm.js", context: createContext() });

    expect(await adapter.fetchGrades("s1", "test-password", false)).toBeNull();
  });

  it("should not expose host globals to the bundle", async () => {
    const source = `
module.exports = {
  fetchGrades: () => [{ term: typeof process + "/" + typeof require, courseName: "Math", score: "1", credit: "1", courseCategory: "x" }],
  fetchCourseSchedule: () => [],
};
`;
    const { adapter } = loadAdapterBundle(source, { filename: "probe.js", context: createContext() });

    expect(await adapter.fetchGrades("s1", "test-password", false)).toEqual([
      expect.objectContaining({ term: "undefined/undefined" }),
    ]);
  });

  it("should route console output to the context logger", () => {
    const logger = createMockLogger();
    const source = `
console.log("adapter ready");
module.exports = { fetchGrades: () => [], fetchCourseSchedule: () => [] };
`;

    loadAdapterBundle(source, { filename: "noisy.js", context: createContext(logger) });

    expect(logger.info).toHaveBeenCalledWith("adapter ready");
  });

  it("should raise LoadError on syntax errors", () => {
    expect(() =>
      loadAdapterBundle("module.exports = {", { filename: "broken.js", context: createContext() })
    ).toThrow(/^LoadError: broken.js: bundle failed to evaluate/);
  });

  it("should raise LoadError when evaluation exceeds the timeout", () => {
    expect(() =>
      loadAdapterBundle("while (true) {}", {
        filename: "spin.js",
        context: createContext(),
        evaluationTimeoutMs: 50,
      })
    ).toThrow(LoadError);
  });

  it("should raise LoadError listing missing functions", () => {
    expect(() =>
      loadAdapterBundle("module.exports = { fetchGrades() { return []; } };", {
        filename: "half.js",
        context: createContext(),
      })
    ).toThrow("LoadError: half.js: missing required function(s): fetchCourseSchedule");
  });
});
