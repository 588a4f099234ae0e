import { z } from "zod";
import { COMPRESS_FORMATS } from "../core/domain/entities/run-config.entity.js";

/**
 * Validation schemas for the YAML config file, CLI flags and the final
 * resolved run settings.
 */

const EMAIL_REGEX = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/** rclone duration: 30m, 1h30m, 2d, 1.5h, 500ms ... */
const DURATION_REGEX = /^(\d+(\.\d+)?(ms|s|m|h|d|w|M|y))+$/;

/** Blank strings count as "not set". */
const optionalText = z
  .string()
  .trim()
  .transform((v) => (v === "" ? undefined : v))
  .optional();

export const RecipientSchema = z
  .string()
  .trim()
  .refine((val) => {
    if (!val) return true;
    const emails = val.split(",").map((e) => e.trim());
    return emails.every((email) => EMAIL_REGEX.test(email));
  }, "Invalid email address format")
  .transform((v) => (v === "" ? undefined : v))
  .optional();

export const SmtpFileSchema = z
  .object({
    service: z.string().optional(),
    host: z.string().optional(),
    port: z.number().int().positive().optional(),
    secure: z.boolean().optional(),
    user: z.string().optional(),
    password: z.string().optional(),
    from: z.string().optional(),
  })
  .strict();

export const FileConfigSchema = z
  .object({
    localDir: z.string().optional(),
    remoteBucket: z.string().optional(),
    transfers: z.union([z.number(), z.string()]).optional(),
    excludeFrom: z.string().optional(),
    minAge: z.string().optional(),
    dryRun: z.boolean().optional(),
    logDir: z.string().optional(),
    maxLogFiles: z.union([z.number(), z.string()]).optional(),
    compressLog: z.boolean().optional(),
    compressFormat: z.string().optional(),
    cleanupPath: z.string().optional(),
    email: z.string().optional(),
    rcloneConfig: z.string().optional(),
    rclonePath: z.string().optional(),
    extraFlags: z.array(z.string()).optional(),
    notificationLog: z.string().optional(),
    smtp: SmtpFileSchema.optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

/** Options as commander hands them over: values are strings, switches booleans. */
export const CliOptionsSchema = z.object({
  localDir: z.string().optional(),
  remoteBucket: z.string().optional(),
  transfers: z.string().optional(),
  excludeFrom: z.string().optional(),
  email: z.string().optional(),
  rcloneConfig: z.string().optional(),
  compressLog: z.boolean().optional(),
  compressFormat: z.string().optional(),
  minAge: z.string().optional(),
  logDir: z.string().optional(),
  maxLogFiles: z.string().optional(),
  dryRun: z.boolean().optional(),
  cleanupPath: z.string().optional(),
  rclonePath: z.string().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export const ScheduleOptionsSchema = z.object({
  cron: z.string().trim().min(1, "Cron expression is required"),
  timezone: z.string().trim().min(1).optional(),
});

export const RunSettingsSchema = z.object({
  localDir: z.string().trim().min(1, "localDir is required"),
  remoteBucket: z.string().trim().min(1, "remoteBucket is required"),
  transfers: z.coerce.number().int().min(1, "transfers must be at least 1"),
  excludeFrom: optionalText,
  minAge: optionalText.refine(
    (v) => v === undefined || DURATION_REGEX.test(v),
    "minAge must be an rclone duration such as 30m or 1h30m",
  ),
  dryRun: z.boolean(),
  logDir: z.string().trim().min(1, "logDir is required"),
  maxLogFiles: z.coerce.number().int("maxLogFiles must be an integer"),
  compressLog: z.boolean(),
  compressFormat: z.enum(COMPRESS_FORMATS),
  cleanupPath: optionalText,
  email: RecipientSchema,
  rcloneConfig: optionalText,
  rclonePath: z.string().trim().min(1, "rclonePath is required"),
  extraFlags: z.array(z.string()),
  notificationLog: optionalText,
});

export const SmtpSettingsSchema = z.object({
  service: optionalText,
  host: z.string().trim().min(1, "smtp.host is required"),
  port: z.coerce.number().int().positive(),
  secure: z.boolean(),
  user: optionalText,
  password: z.string().optional(),
  from: optionalText,
});
