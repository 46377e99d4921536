import type { z } from "zod";
import type { configSchema } from "../config/schema.js";

/** Full plugin configuration. Shape and constraints live in config/schema.ts. */
export type PluginConfig = z.infer<typeof configSchema>;
