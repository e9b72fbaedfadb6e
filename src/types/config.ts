/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  pattern: z.string(),
  ignore: z.array(z.string()),
  encoding: z.enum(["utf-8", "utf8", "utf16le", "latin1", "ascii"]),
});

export const ImagesConfigSchema = z.object({
  // Subdirectory (relative to each document) that receives downloaded images.
  // Empty string or "." stores images beside the document.
  directory: z.string(),
  timeout: z.number().int().positive(), // In milliseconds
  retries: z.number().int().nonnegative(),
  retryDelay: z.number().int().nonnegative(), // Base backoff in milliseconds
  maxSize: z.number().int().positive(), // In bytes (default: 20MB)
  userAgent: z.string(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const LocalizerConfigSchema = z.object({
  input: InputConfigSchema,
  images: ImagesConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialLocalizerConfigSchema = z.object({
  input: InputConfigSchema.partial().optional(),
  images: ImagesConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type ImagesConfig = z.infer<typeof ImagesConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type LocalizerConfig = z.infer<typeof LocalizerConfigSchema>;
export type PartialLocalizerConfig = z.infer<
  typeof PartialLocalizerConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}
