import { Buffer } from "node:buffer";
import { appendFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { dirname } from "node:path";

const REDACTED = "[REDACTED]";

const DIRECTIVE_ON = new Set(["on", "true", "yes", "1", "enable", "enabled"]);
const DIRECTIVE_OFF = new Set(["off", "false", "no", "0", "disable", "disabled"]);

/** Payload keys (compared lower-cased) whose values are masked when redaction is on. */
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
]);

export interface RedactionDirectives {
  readonly enabled: boolean;
  readonly tokens: string[];
}

/**
 * Parses a comma separated redaction directive such as `"on,test-secret"`.
 * Toggle words (`on`/`off` and their synonyms) switch masking; every other
 * entry is a literal scrubbed from string values. Literals alone turn masking
 * on, and the last toggle wins.
 */
export function parseRedactionDirectives(raw: string | undefined): RedactionDirectives {
  let toggle: boolean | undefined;
  const tokens = new Set<string>();
  for (const part of (raw ?? "").split(",")) {
    const directive = part.trim();
    const lower = directive.toLowerCase();
    if (directive.length === 0) {
      continue;
    } else if (DIRECTIVE_OFF.has(lower)) {
      toggle = false;
    } else if (DIRECTIVE_ON.has(lower)) {
      toggle = true;
    } else {
      tokens.add(directive);
    }
  }
  return { enabled: toggle ?? tokens.size > 0, tokens: [...tokens] };
}

/** Rotation kicks in once the mirror would grow past 5 MiB. */
const DEFAULT_MAX_FILE_SIZE = 5 * 1024 * 1024;
const DEFAULT_MAX_FILE_COUNT = 5;

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

/** Anything accepting text chunks, such as `process.stderr`. */
export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly level?: LogLevel;
  /** File receiving a copy of every line. */
  readonly logFile?: string | null;
  readonly maxFileSizeBytes?: number;
  /** Files kept by rotation, the active one included. */
  readonly maxFileCount?: number;
  /** Raw directive, usually `TOOL_ROUTER_LOG_REDACT`. See {@link parseRedactionDirectives}. */
  readonly redact?: string;
  readonly redactSecrets?: Array<string | RegExp>;
  /** Overrides the toggle carried by {@link redact}. */
  readonly redactionEnabled?: boolean;
  /** Defaults to stderr since stdout carries the MCP stream; `null` disables it. */
  readonly sink?: LogSink | null;
  readonly onEntry?: (entry: LogEntry) => void;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function isMissingFile(error: unknown): boolean {
  return isErrnoException(error) && error.code === "ENOENT";
}

/**
 * JSON-lines logger. Entries go to the sink synchronously; the optional file
 * mirror is appended through a promise chain so lines land in emission order.
 */
export class StructuredLogger {
  private readonly threshold: number;
  private readonly sink: LogSink | null;
  private readonly listener?: (entry: LogEntry) => void;
  private readonly mirror?: string;
  private readonly maxFileSizeBytes: number;
  private readonly maxFileCount: number;
  private readonly secrets: Array<string | RegExp>;
  private readonly masking: boolean;
  private pending: Promise<void> = Promise.resolve();
  /** Reset after a failed append so the next write recreates the directory. */
  private mirrorDirectoryReady = false;

  constructor(options: LoggerOptions = {}) {
    const directives = parseRedactionDirectives(options.redact);
    this.threshold = LEVEL_RANK[options.level ?? "info"];
    this.sink = options.sink === undefined ? process.stderr : options.sink;
    this.listener = options.onEntry;
    this.mirror = options.logFile ?? undefined;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
    this.maxFileCount = Math.max(1, options.maxFileCount ?? DEFAULT_MAX_FILE_COUNT);
    this.secrets = [...new Set([...directives.tokens, ...(options.redactSecrets ?? [])])];
    this.masking = options.redactionEnabled ?? directives.enabled;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.threshold;
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

  /** Resolves once every queued mirror write has settled. */
  async flush(): Promise<void> {
    await this.pending;
  }

  private emit(level: LogLevel, message: string, payload: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (payload !== undefined) {
      entry.payload = this.sanitise(payload);
    }
    const line = `${JSON.stringify(entry)}\n`;
    this.sink?.write(line);
    this.listener?.(structuredClone(entry));
    if (this.mirror) {
      this.enqueueMirrorWrite(this.mirror, line);
    }
  }

  private enqueueMirrorWrite(file: string, line: string): void {
    this.pending = this.pending.then(async () => {
      try {
        if (!this.mirrorDirectoryReady) {
          await mkdir(dirname(file), { recursive: true });
          this.mirrorDirectoryReady = true;
        }
        await this.rotate(file, Buffer.byteLength(line, "utf8"));
        await appendFile(file, line, "utf8");
      } catch (error) {
        this.mirrorDirectoryReady = false;
        const failure: LogEntry = {
          timestamp: new Date().toISOString(),
          level: "error",
          message: "log_file_write_failed",
          payload: { file, message: error instanceof Error ? error.message : String(error) },
        };
        process.stderr.write(`${JSON.stringify(failure)}\n`);
      }
    });
  }

  /** Shifts `file` → `file.1` → … when the next line would overflow the size limit. */
  private async rotate(file: string, incomingBytes: number): Promise<void> {
    let size: number;
    try {
      ({ size } = await stat(file));
    } catch (error) {
      if (isMissingFile(error)) {
        return;
      }
      throw error;
    }
    if (size + incomingBytes <= this.maxFileSizeBytes) {
      return;
    }
    if (this.maxFileCount === 1) {
      await rm(file, { force: true });
      return;
    }
    await rm(`${file}.${this.maxFileCount - 1}`, { force: true });
    for (let generation = this.maxFileCount - 1; generation >= 1; generation -= 1) {
      const from = generation === 1 ? file : `${file}.${generation - 1}`;
      try {
        await rename(from, `${file}.${generation}`);
      } catch (error) {
        if (!isMissingFile(error)) {
          throw error;
        }
      }
    }
  }

  private sanitise(value: unknown): unknown {
    if (typeof value === "string") {
      return this.scrub(value);
    }
    if (Array.isArray(value) || value instanceof Set) {
      return Array.from(value, (item: unknown) => this.sanitise(item));
    }
    if (value !== null && typeof value === "object") {
      return Object.fromEntries(
        Object.entries(value).map(([key, item]) => [
          key,
          this.masking && SENSITIVE_KEYS.has(key.toLowerCase()) ? REDACTED : this.sanitise(item),
        ]),
      );
    }
    return value;
  }

  private scrub(text: string): string {
    if (!this.masking) {
      return text;
    }
    return this.secrets.reduce<string>(
      (current, secret) =>
        typeof secret === "string"
          ? secret.length > 0
            ? current.split(secret).join(REDACTED)
            : current
          : current.replace(secret, REDACTED),
      text,
    );
  }
}
