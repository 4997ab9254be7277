import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

import { getRequestContext } from "./infra/requestContext.js";
import type { ErrnoException } from "./nodePrimitives.js";

const REDACTED = "[REDACTED]";

const REDACT_ON = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const REDACT_OFF = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Payload keys always masked while redaction is on, compared case-insensitively. */
const SENSITIVE_KEYS = new Set([
  "authorization",
  "x-api-key",
  "api-key",
  "api_key",
  "token",
  "access_token",
  "refresh_token",
  "password",
  "secret",
  "cookie",
]);

export interface RedactionDirectives {
  enabled: boolean;
  tokens: string[];
}

/**
 * Reads `LANEKEEPER_LOG_REDACT`: a comma-separated mix of toggles (`on`,
 * `off`, ...) and literal substrings to mask, e.g. `on,ghp_`. Substrings
 * without a toggle switch redaction on; the last toggle wins.
 */
export function parseRedactionDirectives(raw: string | undefined): RedactionDirectives {
  let toggle: boolean | undefined;
  const tokens = new Set<string>();
  for (const part of (raw ?? "").split(",")) {
    const directive = part.trim();
    if (directive.length === 0) {
      continue;
    }
    const lowered = directive.toLowerCase();
    if (REDACT_OFF.has(lowered)) {
      toggle = false;
    } else if (REDACT_ON.has(lowered)) {
      toggle = true;
    } else {
      tokens.add(directive);
    }
  }
  return { enabled: toggle ?? tokens.size > 0, tokens: [...tokens] };
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/** One JSON line. Correlation fields are present while a request is being handled. */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
  request_id?: string;
  session_id?: string;
  method?: string;
}

export interface LoggerOptions {
  /** Mirror file; its directory is created on the first write. */
  readonly logFile?: string | null;
  /** Size the mirror may reach before it is rotated. Defaults to 5 MiB. */
  readonly maxFileSizeBytes?: number;
  /** Files kept by rotation, the active one included. Defaults to 5. */
  readonly maxFileCount?: number;
  /** Masked in every string of a payload while redaction is on. */
  readonly redactSecrets?: ReadonlyArray<string | RegExp>;
  /** Overrides the toggle read from `LANEKEEPER_LOG_REDACT`. */
  readonly redactionEnabled?: boolean;
  readonly onEntry?: (entry: LogEntry) => void;
  /** Drops the stdout copy; the file mirror and `onEntry` still receive entries. */
  readonly silent?: boolean;
}

function isErrno(error: unknown): error is ErrnoException {
  return error instanceof Error && "code" in error;
}

function isMissing(error: unknown): boolean {
  return isErrno(error) && error.code === "ENOENT";
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Last-resort channel for failures of the file mirror itself. */
function reportSinkFailure(message: string, error: unknown, extra: Record<string, unknown> = {}): void {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level: "error",
    message,
    payload: { ...extra, error: describeError(error) },
  };
  process.stderr.write(`${JSON.stringify(entry)}\n`);
}

/**
 * Append-only mirror of the log stream with numbered rotation (`core.log`,
 * `core.log.1`, ...). Writes are chained so lines land in emission order; a
 * failed write is reported on stderr and never reaches the caller.
 */
class RotatingFileSink {
  private queue: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(
    private readonly file: string,
    private readonly maxBytes: number,
    private readonly keep: number,
  ) {}

  write(line: string): void {
    this.queue = this.queue.then(() => this.append(line));
  }

  drain(): Promise<void> {
    return this.queue;
  }

  private async append(line: string): Promise<void> {
    try {
      if (!this.directoryReady) {
        await mkdir(dirname(this.file), { recursive: true });
        this.directoryReady = true;
      }
      await this.rotateBefore(Buffer.byteLength(line, "utf8"));
      await appendFile(this.file, line, "utf8");
    } catch (error) {
      this.directoryReady = false;
      reportSinkFailure("log_file_write_failed", error, { file: this.file });
    }
  }

  private async rotateBefore(incomingBytes: number): Promise<void> {
    let size: number;
    try {
      size = (await stat(this.file)).size;
    } catch (error) {
      if (isMissing(error)) {
        return;
      }
      throw error;
    }
    if (size + incomingBytes <= this.maxBytes) {
      return;
    }
    try {
      await this.shift();
    } catch (error) {
      reportSinkFailure("log_file_rotation_failed", error, { file: this.file });
    }
  }

  private async shift(): Promise<void> {
    if (this.keep === 1) {
      await rm(this.file, { force: true });
      return;
    }
    await rm(`${this.file}.${this.keep - 1}`, { force: true });
    for (let generation = this.keep - 2; generation >= 0; generation -= 1) {
      const source = generation === 0 ? this.file : `${this.file}.${generation}`;
      try {
        await rename(source, `${this.file}.${generation + 1}`);
      } catch (error) {
        if (!isMissing(error)) {
          throw error;
        }
      }
    }
  }
}

/**
 * JSON-lines logger. Entries go to stdout, to the optional rotating file
 * mirror and to the `onEntry` listener, stamped with the correlation fields
 * of the request being handled.
 */
export class StructuredLogger {
  private readonly sink?: RotatingFileSink;
  private readonly secrets: ReadonlyArray<string | RegExp>;
  private readonly redacting: boolean;
  private readonly onEntry?: (entry: LogEntry) => void;
  private readonly silent: boolean;

  constructor(options: LoggerOptions = {}) {
    const directives = parseRedactionDirectives(process.env.LANEKEEPER_LOG_REDACT);
    this.secrets = [...new Set<string | RegExp>([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.redacting = options.redactionEnabled ?? directives.enabled;
    this.onEntry = options.onEntry;
    this.silent = options.silent ?? false;
    if (options.logFile) {
      this.sink = new RotatingFileSink(
        options.logFile,
        options.maxFileSizeBytes ?? 5 * 1024 * 1024,
        Math.max(1, options.maxFileCount ?? 5),
      );
    }
  }

  debug(message: string, payload?: unknown): void {
    this.emit("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.emit("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.emit("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.emit("error", message, payload);
  }

  /** Resolves once every queued file write has completed. */
  async flush(): Promise<void> {
    await this.sink?.drain();
  }

  private emit(level: LogLevel, message: string, payload: unknown): void {
    const context = getRequestContext();
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (context) {
      entry.request_id = context.requestId;
      entry.session_id = context.sessionId;
      entry.method = context.method;
    }
    if (payload !== undefined) {
      entry.payload = this.redacting ? this.mask(payload) : payload;
    }

    const line = `${JSON.stringify(entry)}\n`;
    if (!this.silent) {
      process.stdout.write(line);
    }
    this.onEntry?.(structuredClone(entry));
    this.sink?.write(line);
  }

  private mask(value: unknown): unknown {
    if (typeof value === "string") {
      return this.maskString(value);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.mask(item));
    }
    if (value !== null && typeof value === "object") {
      return Object.fromEntries(
        Object.entries(value).map(([key, inner]) => [key, SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : this.mask(inner)]),
      );
    }
    return value;
  }

  private maskString(value: string): string {
    let masked = value;
    for (const secret of this.secrets) {
      if (typeof secret === "string") {
        masked = secret.length > 0 ? masked.split(secret).join(REDACTED) : masked;
      } else {
        masked = masked.replace(secret, REDACTED);
      }
    }
    return masked;
  }
}
