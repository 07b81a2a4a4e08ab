/**
 * Shared types for Google Cloud authentication
 * No runtime dependencies beyond the WHATWG fetch globals
 */

// =============================================================================
// Logging
// =============================================================================

/**
 * Structured logger accepted by every component
 * @public
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Logger that drops everything. Used when no logger is configured.
 * @public
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

// =============================================================================
// I/O seams
// =============================================================================

/**
 * fetch-compatible function used for token endpoints and the metadata server
 * @public
 */
export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

/**
 * Milliseconds since epoch
 * @public
 */
export type Clock = () => number;

/**
 * Result of running an external command
 * @public
 */
export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunOptions {
  /** Kills the process when aborted */
  signal?: AbortSignal;
}

/**
 * Runs an executable with arguments without a shell
 * @public
 */
export type CommandRunner = (file: string, args: readonly string[], options?: CommandRunOptions) => Promise<CommandOutput>;

/**
 * Reads a UTF-8 file. Rejects with a NodeJS.ErrnoException on failure.
 * @public
 */
export type ReadFileFn = (path: string) => Promise<string>;

/**
 * Environment variable bag (usually process.env)
 * @public
 */
export type Env = Record<string, string | undefined>;

// =============================================================================
// Header results
// =============================================================================

/**
 * A header that is valid right now, plus how long it stays valid
 * @public
 */
export interface ValidAuth {
  /** `Bearer <token>` */
  header: string;
  /** Milliseconds before the token enters the refresh skew window */
  validForMs: number;
}

/**
 * Outcome of asking the cache for a header.
 * `cached` is usable immediately; `refreshing` settles once the shared refresh completes.
 * @public
 */
export type GetHeaderResult = { kind: 'cached'; auth: ValidAuth } | { kind: 'refreshing'; promise: Promise<ValidAuth> };

// =============================================================================
// HTTP service stack
// =============================================================================

/**
 * An asynchronous request handler. The innermost service is usually `fetch`.
 * @public
 */
export type HttpService = (request: Request) => Promise<Response>;

/**
 * Wraps a service with extra behavior
 * @public
 */
export type Layer = (inner: HttpService) => HttpService;

/**
 * Anything that hands out bearer headers and can be told a header was rejected
 * @public
 */
export interface HeaderSource {
  getHeader(): GetHeaderResult;
  revoke(startNew: boolean): void;
}
