import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import yaml from "js-yaml";
import { ZodError } from "zod";
import {
  CliOptions,
  FileConfig,
  FileConfigSchema,
  RunSettingsSchema,
  SmtpSettingsSchema,
} from "../../adapters/validation.js";
import {
  RunConfiguration,
  RunMode,
} from "../../core/domain/entities/run-config.entity.js";
import { ConfigurationError, errorMessage } from "../../core/domain/errors.js";

export const DEFAULTS = {
  localDir: "/mnt/data",
  remoteBucket: "secret:/",
  transfers: 8,
  minAge: "30m",
  logDir: "/var/log/rclone-backup",
  maxLogFiles: 120,
  compressLog: true,
  compressFormat: "gzip",
  rclonePath: "rclone",
  smtpHost: "localhost",
  smtpPort: 587,
} as const;

type Env = Record<string, string | undefined>;

/** Replaces ${VAR} references in string values; unknown variables stay as written. */
export function substituteEnv(value: unknown, env: Env = process.env): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{(\w+)\}/g, (ref, key: string) => env[key] ?? ref);
  }
  if (Array.isArray(value)) return value.map((v) => substituteEnv(v, env));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v, env);
    return out;
  }
  return value;
}

/**
 * Explicit path, then CONFIG_PATH, then config/config.yaml if present.
 * An explicit or CONFIG_PATH file must exist; the fallback is optional.
 */
export function getConfigPath(
  explicit?: string,
  env: Env = process.env,
  cwd: string = process.cwd(),
): string | undefined {
  const chosen = explicit || env.CONFIG_PATH;
  if (chosen) return resolve(cwd, chosen);
  const fallback = resolve(cwd, "config", "config.yaml");
  return existsSync(fallback) ? fallback : undefined;
}

function formatIssues(error: ZodError, prefix = ""): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${prefix}${path}: ${issue.message}` : `${prefix}${issue.message}`;
  });
}

export function loadConfigFile(path: string, env: Env = process.env): FileConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(path, "utf-8"));
  } catch (e) {
    throw new ConfigurationError(
      `Cannot read config file ${path}: ${errorMessage(e)}`,
    );
  }
  if (parsed === undefined || parsed === null) return {};

  const result = FileConfigSchema.safeParse(substituteEnv(parsed, env));
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(
      `Invalid config file ${path}:\n  ${issues.join("\n  ")}`,
      issues,
    );
  }
  return result.data;
}

function parsePort(raw: string | undefined): number | string | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  return raw.trim();
}

export class ConfigService {
  private readonly file: FileConfig;

  constructor(
    readonly configPath?: string,
    private readonly env: Env = process.env,
  ) {
    this.file = configPath ? loadConfigFile(configPath, env) : {};
  }

  /** Merges defaults, config file and CLI flags (in that order) and validates. */
  resolve(mode: RunMode, cli: CliOptions = {}): RunConfiguration {
    const file = this.file;
    const smtpFile = file.smtp ?? {};

    const settings = RunSettingsSchema.safeParse({
      localDir: cli.localDir ?? file.localDir ?? DEFAULTS.localDir,
      remoteBucket: cli.remoteBucket ?? file.remoteBucket ?? DEFAULTS.remoteBucket,
      transfers: cli.transfers ?? file.transfers ?? DEFAULTS.transfers,
      excludeFrom: cli.excludeFrom ?? file.excludeFrom,
      minAge: cli.minAge ?? file.minAge ?? DEFAULTS.minAge,
      // Dry run only means something to sync.
      dryRun: mode === "sync" && (cli.dryRun ?? file.dryRun ?? false),
      logDir: cli.logDir ?? file.logDir ?? DEFAULTS.logDir,
      maxLogFiles: cli.maxLogFiles ?? file.maxLogFiles ?? DEFAULTS.maxLogFiles,
      compressLog: cli.compressLog ?? file.compressLog ?? DEFAULTS.compressLog,
      compressFormat:
        cli.compressFormat ?? file.compressFormat ?? DEFAULTS.compressFormat,
      cleanupPath: cli.cleanupPath ?? file.cleanupPath,
      email: cli.email ?? file.email,
      rcloneConfig: cli.rcloneConfig ?? file.rcloneConfig,
      rclonePath: cli.rclonePath ?? file.rclonePath ?? DEFAULTS.rclonePath,
      extraFlags: file.extraFlags ?? [],
      notificationLog: file.notificationLog,
    });

    const smtp = SmtpSettingsSchema.safeParse({
      service: smtpFile.service,
      host: this.env.SMTP_HOST || smtpFile.host || DEFAULTS.smtpHost,
      port:
        parsePort(this.env.SMTP_PORT) ?? smtpFile.port ?? DEFAULTS.smtpPort,
      secure: smtpFile.secure ?? false,
      user: this.env.MAILER_EMAIL || smtpFile.user,
      password: this.env.MAILER_PASSWORD || smtpFile.password,
      from: smtpFile.from,
    });

    const issues = [
      ...(settings.success ? [] : formatIssues(settings.error)),
      ...(smtp.success ? [] : formatIssues(smtp.error, "smtp.")),
    ];
    if (!settings.success || !smtp.success) {
      throw new ConfigurationError(
        `Invalid configuration:\n  ${issues.join("\n  ")}`,
        issues,
      );
    }

    const s = settings.data;
    return Object.freeze({
      mode,
      ...s,
      extraFlags: Object.freeze([...s.extraFlags]),
      notificationLog: s.notificationLog ?? join(s.logDir, "notifications.jsonl"),
      smtp: Object.freeze(smtp.data),
    });
  }
}
