import { z } from "zod";
import type { CmdkitConfig } from "./types.js";

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const settingsSchema = z.object({
  overrideExistingCommands: z.boolean().default(false),
});

export const cmdkitConfigSchema = z.object({
  logging: loggingSchema.default({}),
  settings: settingsSchema.default({}),
});

export function parseConfig(raw: unknown): CmdkitConfig {
  return cmdkitConfigSchema.parse(raw);
}
