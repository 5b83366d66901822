/**
 * Namespaced structured logger.
 *
 * Every line goes to stderr: in stdio mode stdout carries the MCP protocol.
 */

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export interface LogMeta {
  [key: string]: unknown;
  error?: unknown;
}

export interface Logger {
  trace(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(namespace: string): Logger;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  service?: string;
  /** Line sink, stderr by default. */
  write?: (line: string) => void;
}

const LEVELS: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
};

function serializeError(err: unknown): unknown {
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  return err;
}

function safeStringify(obj: unknown): string {
  try {
    return JSON.stringify(obj);
  } catch {
    return '{"_":"[unserializable]"}';
  }
}

export function createLogger(options: LoggerOptions, namespace: string[] = []): Logger {
  const min = LEVELS[options.level];
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));
  const ns = namespace.join(":");

  const log = (level: Exclude<LogLevel, "silent">, msg: string, meta?: LogMeta) => {
    if (LEVELS[level] < min) return;

    const ts = new Date().toISOString();
    const fields = meta && meta.error !== undefined ? { ...meta, error: serializeError(meta.error) } : meta;

    if (options.json) {
      write(
        safeStringify({
          ts,
          level,
          ...(ns ? { ns } : {}),
          ...(options.service ? { service: options.service } : {}),
          msg,
          ...(fields ? { meta: fields } : {}),
        })
      );
      return;
    }

    const tags = [`[${ts}]`, `[${level.toUpperCase()}]`, ns && `[${ns}]`].filter(Boolean).join(" ");
    const tail = fields ? ` ${safeStringify(fields)}` : "";
    write(`${tags} ${msg}${tail}`);
  };

  return {
    trace: (m, meta) => log("trace", m, meta),
    debug: (m, meta) => log("debug", m, meta),
    info: (m, meta) => log("info", m, meta),
    warn: (m, meta) => log("warn", m, meta),
    error: (m, meta) => log("error", m, meta),
    child: (sub) => createLogger(options, [...namespace, sub]),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent", json: false });
