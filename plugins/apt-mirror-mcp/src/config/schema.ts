import { z } from "zod";
import { DISTRIBUTORS } from "../types/distributor.js";

const riskLevel = z.enum(["read-only", "low", "moderate", "high", "critical"]);
const seconds = z.number().positive();
const signatureList = z.array(z.string().min(1));

/** Validated shape of config.yaml after defaults are merged in. */
export const configSchema = z.object({
  target: z.object({
    distributor: z.enum(DISTRIBUTORS).nullable(),
    codename: z.string().min(1).nullable(),
    architecture: z.string().min(1).nullable(),
    upstream_mode: z.boolean(),
    country: z.string().min(1).nullable(),
    custom_mirror_file: z.string().min(1).nullable(),
    sources_list: z.string().min(1).nullable(),
  }),
  ranking: z.object({
    concurrency: z.number().int().min(1).nullable(),
    max_mirrors: z.number().int().min(0),
    request_timeout_seconds: seconds,
    mirror_timeout_seconds: seconds,
    bandwidth_window_ms: z.number().int().positive(),
    bandwidth_min_bytes: z.number().int().min(0),
    bandwidth_max_bytes: z.number().int().positive(),
    discovery_attempts: z.number().int().min(1),
  }),
  exclude: z.array(z.string()),
  update: z.object({
    max_attempts: z.number().int().min(1),
    same_mirror_retries: z.number().int().min(0),
    retry_backoff_seconds: z.number().min(0),
    command_timeout_seconds: seconds,
    signatures: z.object({
      fatal: signatureList,
      mirror: signatureList,
      transient: signatureList,
    }),
  }),
  safety: z.object({
    confirmation_threshold: riskLevel,
    dry_run_bypass_confirmation: z.boolean(),
  }),
});
