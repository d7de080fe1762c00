import { z } from "zod";
import type { DecoyConfig } from "./types.js";

const gatewaySchema = z.object({
  port: z.number().int().positive().default(8000),
  hostname: z.string().default("127.0.0.1"),
  apiKey: z.string().min(1).optional(),
});

const sessionDefaultsSchema = z.object({
  channel: z.string().min(1).default("SMS"),
  language: z.string().min(1).default("English"),
  locale: z.string().min(1).default("IN"),
});

const sessionsSchema = z.object({
  confirmThreshold: z.number().int().min(1).default(2),
  flagConfidence: z.number().min(0).max(1).default(0.3),
  timeoutMs: z.number().int().positive().default(300_000),
  sweepIntervalMs: z.number().int().positive().default(60_000),
  defaults: sessionDefaultsSchema.default({}),
  fallbackReply: z.string().min(1).default("Sorry sir, network issue. Can you repeat?"),
});

const reporterSchema = z.object({
  enabled: z.boolean().default(false),
  endpoint: z.string().url().default("http://127.0.0.1:9000/api/report"),
  timeoutMs: z.number().int().positive().default(5_000),
  maxAttempts: z.number().int().min(1).max(10).default(3),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const decoyConfigSchema = z.object({
  gateway: gatewaySchema.default({}),
  sessions: sessionsSchema.default({}),
  reporter: reporterSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): DecoyConfig {
  return decoyConfigSchema.parse(raw);
}
