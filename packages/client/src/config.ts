import { existsSync, readFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";

export const PROTOCOL_VERSION = 3;
export const CLIENT_VERSION = "0.1.0";

export const DEFAULT_HEARTBEAT_PATTERNS = [
  "HEARTBEAT_OK",
  "READ HEARTBEAT.MD",
  "# HEARTBEAT - EVENT-DRIVEN STATUS",
];

const LogConfigSchema = z
  .object({
    level: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).optional(),
    format: z.enum(["pretty", "json"]).optional(),
  })
  .strict();

const ClientDescriptorSchema = z
  .object({
    id: z.string().min(1).default("gateway-client"),
    displayName: z.string().min(1).default("Tidewire"),
    version: z.string().min(1).default(CLIENT_VERSION),
    platform: z.string().min(1).default("node"),
    mode: z.string().min(1).default("backend"),
  })
  .strict();

const ReconnectConfigSchema = z
  .object({
    enabled: z.boolean().default(false),
    baseDelayMs: z.number().int().positive().default(1500),
    maxDelayMs: z.number().int().positive().default(30_000),
    maxAttempts: z.number().int().nonnegative().default(5),
  })
  .strict();

const GatewayUrlSchema = z
  .string()
  .trim()
  .url()
  .refine((value) => /^wss?:\/\//i.test(value), {
    message: "Gateway URL must use ws:// or wss://",
  });

export const GatewayConfigSchema = z
  .object({
    url: GatewayUrlSchema,
    token: z.string().optional(),
    password: z.string().optional(),
    role: z.string().min(1).default("operator"),
    requestTimeoutMs: z.number().int().positive().default(30_000),
    challengeTimeoutMs: z.number().int().positive().default(10_000),
    challengePollIntervalMs: z.number().int().positive().default(100),
    allowSelfSignedCertificates: z.boolean().default(false),
    heartbeatPatterns: z.array(z.string().min(1)).default(DEFAULT_HEARTBEAT_PATTERNS),
    client: ClientDescriptorSchema.default({}),
    reconnect: ReconnectConfigSchema.default({}),
    log: LogConfigSchema.optional(),
  })
  .strict();

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type GatewayConfigInput = z.input<typeof GatewayConfigSchema>;
export type ClientDescriptor = GatewayConfig["client"];
export type ReconnectConfig = GatewayConfig["reconnect"];

const CONFIG_FILENAME = "config.json";

export class GatewayConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GatewayConfigError";
  }
}

function expandHomeDir(input: string): string {
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  if (input === "~") {
    return os.homedir();
  }
  return input;
}

export function resolveTidewireHome(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(expandHomeDir(env.TIDEWIRE_HOME ?? "~/.tidewire"));
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(resolveTidewireHome(env), CONFIG_FILENAME);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${location}: ${issue.message}`;
    })
    .join("; ");
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!existsSync(configPath)) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new GatewayConfigError(`Unable to read ${configPath}: ${reason}`);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new GatewayConfigError(`${configPath} must contain a JSON object`);
  }
  return { ...parsed };
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.TIDEWIRE_URL) {
    overrides.url = env.TIDEWIRE_URL;
  }
  if (env.TIDEWIRE_TOKEN) {
    overrides.token = env.TIDEWIRE_TOKEN;
  }
  if (env.TIDEWIRE_PASSWORD) {
    overrides.password = env.TIDEWIRE_PASSWORD;
  }
  return overrides;
}

function dropUndefined(input: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(input).filter(([, value]) => value !== undefined));
}

export function parseGatewayConfig(input: unknown): GatewayConfig {
  const result = GatewayConfigSchema.safeParse(input);
  if (!result.success) {
    throw new GatewayConfigError(`Invalid gateway config: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Layers config sources, later ones winning: the JSON config file, then
 * TIDEWIRE_* environment variables, then explicit overrides.
 */
export function loadGatewayConfig(options: {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<GatewayConfigInput>;
} = {}): GatewayConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? resolveConfigPath(env);

  return parseGatewayConfig({
    ...readConfigFile(configPath),
    ...readEnvOverrides(env),
    ...dropUndefined(options.overrides ?? {}),
  });
}

export type AuthCredentials = { token: string } | { password: string } | Record<string, never>;

/** Token wins over password; empty strings count as absent. Never both. */
export function selectAuthCredentials(config: {
  token?: string;
  password?: string;
}): AuthCredentials {
  if (config.token && config.token.length > 0) {
    return { token: config.token };
  }
  if (config.password && config.password.length > 0) {
    return { password: config.password };
  }
  return {};
}
