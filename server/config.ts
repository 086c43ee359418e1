import { z } from "zod";
import { InvalidConfigError } from "../src/lib/errors";
import type { SourceOptions } from "./loader";

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    NODE_ENV: z.string().default("development"),
    AQI_DATA_DIR: z.string().min(1).default("data"),
    AQI_FILE_PATTERN: z
      .string()
      .includes("{year}", { message: "must contain {year}" })
      .default("hyd_air_quality_{year}.csv"),
    AQI_YEAR_START: z.coerce.number().int().default(2016),
    AQI_YEAR_END: z.coerce.number().int().default(2023),
  })
  .refine(env => env.AQI_YEAR_START <= env.AQI_YEAR_END, {
    message: "AQI_YEAR_START must not be after AQI_YEAR_END",
    path: ["AQI_YEAR_START"],
  });

export interface AppConfig {
  port: number;
  production: boolean;
  source: SourceOptions;
}

/** Read and validate server settings from environment variables. */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map(issue => `${issue.path.join(".") || "env"}: ${issue.message}`).join("; ");
    throw new InvalidConfigError(`Invalid configuration: ${details}`);
  }
  const parsed = result.data;
  return {
    port: parsed.PORT,
    production: parsed.NODE_ENV === "production",
    source: {
      years: { start: parsed.AQI_YEAR_START, end: parsed.AQI_YEAR_END },
      dataDir: parsed.AQI_DATA_DIR,
      filePattern: parsed.AQI_FILE_PATTERN,
    },
  };
}
