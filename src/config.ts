import { fileURLToPath } from "node:url";
import { z } from "zod";

const DEFAULT_MAPPING = fileURLToPath(
  new URL("../mappings/DocumentMapping.json", import.meta.url),
);

const booleanString = (fallback: boolean) =>
  z
    .enum(["true", "false"])
    .default(fallback ? "true" : "false")
    .transform((value) => value === "true");

const integerString = (fallback: number) =>
  z
    .string()
    .regex(/^\d+$/)
    .default(String(fallback))
    .transform((value) => Number.parseInt(value, 10));

const envSchema = z.object({
  ELASTICSEARCH_HOST: z.string().min(1).default("localhost"),
  ELASTICSEARCH_PORT: integerString(9200),
  ELASTICSEARCH_SCHEME: z.enum(["http", "https"]).default("http"),
  ELASTICSEARCH_INDEX: z.string().min(1).default("papers"),
  ELASTICSEARCH_USER: z.string().min(1).optional(),
  ELASTICSEARCH_PASSWORD: z.string().optional(),
  ELASTICSEARCH_MAPPING: z.string().min(1).default(DEFAULT_MAPPING),
  ELASTICSEARCH_VERIFY: booleanString(true),
  ELASTICSEARCH_TIMEOUT: integerString(10_000),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warning", "error", "fatal"])
    .default("info"),
  BIND: z.string().min(1).optional(),
  PORT: integerString(3000),
});

export interface ElasticsearchConfig {
  host: string;
  port: number;
  scheme: "http" | "https";
  index: string;
  user?: string;
  password?: string;
  /** Path to the index definition used when creating the index. */
  mapping: string;
  verify: boolean;
  /** Request timeout in milliseconds. */
  timeout: number;
}

export type LogLevel = z.output<typeof envSchema>["LOG_LEVEL"];

export interface Config {
  elasticsearch: ElasticsearchConfig;
  logLevel: LogLevel;
  bind?: string;
  port: number;
}

/**
 * Read the configuration from environment variables.
 *
 * @throws {Error} When a variable is present but invalid.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }
  const vars = parsed.data;
  return {
    elasticsearch: {
      host: vars.ELASTICSEARCH_HOST,
      port: vars.ELASTICSEARCH_PORT,
      scheme: vars.ELASTICSEARCH_SCHEME,
      index: vars.ELASTICSEARCH_INDEX,
      user: vars.ELASTICSEARCH_USER,
      password: vars.ELASTICSEARCH_PASSWORD,
      mapping: vars.ELASTICSEARCH_MAPPING,
      verify: vars.ELASTICSEARCH_VERIFY,
      timeout: vars.ELASTICSEARCH_TIMEOUT,
    },
    logLevel: vars.LOG_LEVEL,
    bind: vars.BIND,
    port: vars.PORT,
  };
}
