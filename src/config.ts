import { z } from "zod";
import { DEFAULT_TTL_SECONDS } from "./state/snapshot-cache.js";

export interface ServerConfig {
  cacheTtlSeconds: number;
  defaultLimit: number;
  maxLimit: number;
}

const FLAGS: Record<string, keyof ServerConfig> = {
  "--cache-ttl": "cacheTtlSeconds",
  "--default-limit": "defaultLimit",
  "--max-limit": "maxLimit",
};

const positiveInt = z.coerce.number().int().positive();

const configSchema = z
  .object({
    cacheTtlSeconds: positiveInt.default(DEFAULT_TTL_SECONDS),
    defaultLimit: positiveInt.default(1000),
    maxLimit: positiveInt.default(10000),
  })
  .refine((config) => config.defaultLimit <= config.maxLimit, {
    message: "--default-limit cannot exceed --max-limit",
  });

export function parseArgs(argv: string[]): ServerConfig {
  const raw: Partial<Record<keyof ServerConfig, string>> = {};
  for (let i = 0; i < argv.length; i++) {
    const key = FLAGS[argv[i]];
    if (!key) {
      throw new Error(`Unknown option: ${argv[i]}`);
    }
    const value = argv[i + 1];
    if (value === undefined) {
      throw new Error(`Missing value for ${argv[i]}`);
    }
    raw[key] = value;
    i++;
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const flag = Object.keys(FLAGS).find((f) => FLAGS[f] === issue.path[0]);
      return flag ? `${flag}: ${issue.message}` : issue.message;
    });
    throw new Error(`Invalid options: ${issues.join("; ")}`);
  }
  return parsed.data;
}
