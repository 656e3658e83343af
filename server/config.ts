/**
 * @module server/config
 * @description Environment configuration parsed with zod at start-up.
 */

import { z } from "zod";
import { fromZodError } from "zod-validation-error";

const booleanString = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.preprocess(emptyToUndefined, z.string().optional()),
  MINIO_ENDPOINT: z.preprocess(emptyToUndefined, z.string().optional()),
  MINIO_PORT: z.coerce.number().int().positive().default(9000),
  MINIO_USE_SSL: booleanString,
  MINIO_ACCESS_KEY: z.string().default(""),
  MINIO_SECRET_KEY: z.string().default(""),
  MINIO_SNAPSHOT_BUCKET: z.string().min(1).default("test-attempts"),
  SNAPSHOT_INLINE_THRESHOLD_BYTES: z.coerce.number().int().min(0).default(0),
  ANSWER_WRITE_RETRIES: z.coerce.number().int().min(1).default(5),
});

export interface MinioConfig {
  endPoint: string;
  port: number;
  useSSL: boolean;
  accessKey: string;
  secretKey: string;
  bucket: string;
}

export interface AppConfig {
  port: number;
  databaseUrl?: string;
  minio?: MinioConfig;
  snapshotInlineThresholdBytes: number;
  answerWriteRetries: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${fromZodError(parsed.error).message}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    databaseUrl: vars.DATABASE_URL,
    minio: vars.MINIO_ENDPOINT
      ? {
          endPoint: vars.MINIO_ENDPOINT,
          port: vars.MINIO_PORT,
          useSSL: vars.MINIO_USE_SSL,
          accessKey: vars.MINIO_ACCESS_KEY,
          secretKey: vars.MINIO_SECRET_KEY,
          bucket: vars.MINIO_SNAPSHOT_BUCKET,
        }
      : undefined,
    snapshotInlineThresholdBytes: vars.SNAPSHOT_INLINE_THRESHOLD_BYTES,
    answerWriteRetries: vars.ANSWER_WRITE_RETRIES,
  };
}
