/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const TextConfigSchema = z.object({
  pageSize: z.enum(["A4", "Letter"]),
  // All distances are in PDF points (1/72 inch)
  margin: z.number().nonnegative(),
  fontSize: z.number().positive(),
  leading: z.number().positive(),
  paragraphSpacing: z.number().nonnegative(),
  blankLineSpacing: z.number().nonnegative(),
});

export const DocxConfigSchema = z.object({
  // Explicit path to a LibreOffice `soffice` binary; null searches PATH
  converter: z.string().min(1).nullable(),
});

export const TempConfigSchema = z.object({
  prefix: z.string().min(1),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const MergeConfigSchema = z.object({
  text: TextConfigSchema,
  docx: DocxConfigSchema,
  temp: TempConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialMergeConfigSchema = z.object({
  text: TextConfigSchema.partial().optional(),
  docx: DocxConfigSchema.partial().optional(),
  temp: TempConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type TextConfig = z.infer<typeof TextConfigSchema>;
export type DocxConfig = z.infer<typeof DocxConfigSchema>;
export type TempConfig = z.infer<typeof TempConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type MergeConfig = z.infer<typeof MergeConfigSchema>;
export type PartialMergeConfig = z.infer<typeof PartialMergeConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
