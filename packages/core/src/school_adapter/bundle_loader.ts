import * as vm from "vm";
import { errorMessage } from "../utils/error_message";
import type { Logger } from "../logger";
import { LoadError } from "./school_adapter.errors";
import { confirmedEmpty, validateAdapter } from "./school_adapter";
import type { AdapterContext, ValidatedAdapter } from "./school_adapter.types";

/** Upper bound for the synchronous top-level evaluation of a bundle */
export const DEFAULT_EVALUATION_TIMEOUT_MS = 5000;

export type BundleLoadOptions = {
  /** Shown in stack traces and LoadError messages */
  filename: string;
  context: AdapterContext;
  evaluationTimeoutMs?: number;
};

function consoleFor(logger: Logger): Pick<Console, "log" | "info" | "warn" | "error" | "debug"> {
  return {
    log: (message?: unknown, ...args: unknown[]) => logger.info(String(message), ...args),
    info: (message?: unknown, ...args: unknown[]) => logger.info(String(message), ...args),
    warn: (message?: unknown, ...args: unknown[]) => logger.warn(String(message), ...args),
    error: (message?: unknown, ...args: unknown[]) => logger.error(String(message), ...args),
    debug: (message?: unknown, ...args: unknown[]) => logger.debug(String(message), ...args),
  };
}

/**
 * Rewrites a trailing `export default` so ESM-style single-file bundles load
 * like CommonJS ones.
 */
function wrapBundle(source: string): string {
  const commonJs = source.replace(/^\s*export\s+default\s+/m, "module.exports = ");
  return `(function (module, exports) {\n${commonJs}\n})(module, module.exports);`;
}

/**
 * Evaluates an adapter bundle in a fresh VM context and validates its
 * exports. Each call gets its own context, so module-level state is never
 * shared between two institution codes.
 *
 * @throws LoadError when evaluation fails or the exports are incomplete
 */
export function loadAdapterBundle(source: string, options: BundleLoadOptions): ValidatedAdapter {
  const moduleRecord: { exports: unknown } = { exports: {} };
  const sandbox = vm.createContext({
    module: moduleRecord,
    fetch: options.context.fetch,
    logger: options.context.logger,
    console: consoleFor(options.context.logger),
    setTimeout: options.context.setTimeout,
    clearTimeout: options.context.clearTimeout,
    confirmedEmpty,
    URL,
    URLSearchParams,
    TextEncoder,
    TextDecoder,
    AbortController,
  });

  try {
    const script = new vm.Script(wrapBundle(source), { filename: options.filename });
    script.runInContext(sandbox, {
      timeout: options.evaluationTimeoutMs ?? DEFAULT_EVALUATION_TIMEOUT_MS,
    });
  } catch (error) {
    throw new LoadError(options.filename, [], `bundle failed to evaluate: ${errorMessage(error)}`);
  }

  return validateAdapter(moduleRecord.exports, options.filename);
}
