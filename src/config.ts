import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logger.js";

const booleanish = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return fallback;
      const normalized = value.trim().toLowerCase();
      if (["true", "1", "yes", "y"].includes(normalized)) return true;
      if (["false", "0", "no", "n"].includes(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be boolean-like (true/false)" });
      return z.NEVER;
    });

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const emptyAsUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const EnvSchema = z
  .object({
    PROXMOX_HOST: z.string().min(1, "is required"),
    PROXMOX_PORT: z.preprocess(emptyAsUndefined, positiveInt(8006)),
    PROXMOX_USER: z.string().min(1, "is required"),
    PROXMOX_PASSWORD: z.preprocess(emptyAsUndefined, z.string().optional()),
    PROXMOX_TOKEN_NAME: z.preprocess(emptyAsUndefined, z.string().optional()),
    PROXMOX_TOKEN_VALUE: z.preprocess(emptyAsUndefined, z.string().optional()),
    PROXMOX_VERIFY_SSL: booleanish(true),
    PROXMOX_TIMEOUT_MS: z.preprocess(emptyAsUndefined, positiveInt(30_000)),
    TASK_POLL_INTERVAL_MS: z.preprocess(emptyAsUndefined, positiveInt(1_500)),
    TASK_TIMEOUT_SECONDS: z.preprocess(emptyAsUndefined, positiveInt(300)),
    LONG_TASK_TIMEOUT_SECONDS: z.preprocess(emptyAsUndefined, positiveInt(3_600)),
    HTTP_MODE: booleanish(false),
    HTTP_PORT: z.preprocess(emptyAsUndefined, positiveInt(3333)),
    LOG_LEVEL: z.preprocess(
      (value) => (typeof value === "string" && value.trim() !== "" ? value.trim().toLowerCase() : undefined),
      z.enum(["trace", "debug", "info", "warn", "error", "silent"]).default("info")
    ),
    LOG_JSON: booleanish(false),
  })
  .superRefine((env, ctx) => {
    const hasToken = env.PROXMOX_TOKEN_NAME !== undefined || env.PROXMOX_TOKEN_VALUE !== undefined;
    if (hasToken && (env.PROXMOX_TOKEN_NAME === undefined || env.PROXMOX_TOKEN_VALUE === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PROXMOX_TOKEN_NAME"],
        message: "must be set together with PROXMOX_TOKEN_VALUE",
      });
    }
    if (!hasToken && env.PROXMOX_PASSWORD === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PROXMOX_PASSWORD"],
        message: "is required unless an API token is set",
      });
    }
  });

export type ProxmoxAuth =
  | { type: "token"; user: string; tokenName: string; tokenValue: string }
  | { type: "password"; user: string; password: string };

export interface Config {
  proxmox: {
    host: string;
    port: number;
    verifySsl: boolean;
    timeoutMs: number;
    auth: ProxmoxAuth;
  };
  tasks: {
    pollIntervalMs: number;
    timeoutSeconds: number;
    longTimeoutSeconds: number;
  };
  http: {
    enabled: boolean;
    port: number;
  };
  logging: {
    level: LogLevel;
    json: boolean;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`));
  }
  const e = parsed.data;

  const auth: ProxmoxAuth =
    e.PROXMOX_TOKEN_NAME !== undefined && e.PROXMOX_TOKEN_VALUE !== undefined
      ? { type: "token", user: e.PROXMOX_USER, tokenName: e.PROXMOX_TOKEN_NAME, tokenValue: e.PROXMOX_TOKEN_VALUE }
      : { type: "password", user: e.PROXMOX_USER, password: e.PROXMOX_PASSWORD ?? "" };

  return {
    proxmox: {
      host: e.PROXMOX_HOST,
      port: e.PROXMOX_PORT,
      verifySsl: e.PROXMOX_VERIFY_SSL,
      timeoutMs: e.PROXMOX_TIMEOUT_MS,
      auth,
    },
    tasks: {
      pollIntervalMs: e.TASK_POLL_INTERVAL_MS,
      timeoutSeconds: e.TASK_TIMEOUT_SECONDS,
      longTimeoutSeconds: e.LONG_TASK_TIMEOUT_SECONDS,
    },
    http: {
      enabled: e.HTTP_MODE,
      port: e.HTTP_PORT,
    },
    logging: {
      level: e.LOG_LEVEL,
      json: e.LOG_JSON,
    },
  };
}
