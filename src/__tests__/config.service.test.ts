import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../core/domain/errors.js";
import {
  ConfigService,
  getConfigPath,
  substituteEnv,
} from "../infrastructure/services/config.service.js";

describe("substituteEnv", () => {
  it("replaces known variables in nested values", () => {
    expect(
      substituteEnv(
        { a: "${X}", b: ["x-${Y}"], c: 3, d: "${MISSING}" },
        { X: "1", Y: "2" },
      ),
    ).toEqual({ a: "1", b: ["x-2"], c: 3, d: "${MISSING}" });
  });
});

describe("ConfigService", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "rclone-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeConfig(yaml: string): Promise<string> {
    const path = join(dir, "config.yaml");
    await writeFile(path, yaml);
    return path;
  }

  function issuesOf(fn: () => unknown): readonly string[] {
    try {
      fn();
    } catch (e) {
      if (e instanceof ConfigurationError) return e.issues;
      throw e;
    }
    throw new Error("expected a ConfigurationError");
  }

  it("resolves compiled-in defaults", () => {
    const config = new ConfigService(undefined, {}).resolve("sync");

    expect(config).toEqual({
      mode: "sync",
      localDir: "/mnt/data",
      remoteBucket: "secret:/",
      transfers: 8,
      minAge: "30m",
      dryRun: false,
      logDir: "/var/log/rclone-backup",
      maxLogFiles: 120,
      compressLog: true,
      compressFormat: "gzip",
      rclonePath: "rclone",
      extraFlags: [],
      notificationLog: join("/var/log/rclone-backup", "notifications.jsonl"),
      smtp: { host: "localhost", port: 587, secure: false },
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("layers the config file under CLI flags", async () => {
    const path = await writeConfig(
      [
        "localDir: /data/photos",
        'remoteBucket: "b2:photos"',
        "transfers: 4",
        "email: ${REPORT_EMAIL}",
        'extraFlags: ["--bwlimit", "10M"]',
        "smtp:",
        "  host: smtp.example.com",
        "  port: 465",
        "  secure: true",
        "  user: backup@example.com",
      ].join("\n"),
    );
    const service = new ConfigService(path, {
      REPORT_EMAIL: "ops@example.com",
      MAILER_PASSWORD: "test-secret",
    });

    const config = service.resolve("sync", { transfers: "16", dryRun: true });

    expect(config).toMatchObject({
      localDir: "/data/photos",
      remoteBucket: "b2:photos",
      transfers: 16,
      dryRun: true,
      email: "ops@example.com",
      extraFlags: ["--bwlimit", "10M"],
      smtp: {
        host: "smtp.example.com",
        port: 465,
        secure: true,
        user: "backup@example.com",
        password: "test-secret",
      },
    });
  });

  it("ignores dry run outside sync", () => {
    const config = new ConfigService(undefined, {}).resolve("check", {
      dryRun: true,
    });
    expect(config.dryRun).toBe(false);
  });

  it("lets SMTP environment variables win", () => {
    const config = new ConfigService(undefined, {
      SMTP_HOST: "mail.internal",
      SMTP_PORT: "2525",
      MAILER_EMAIL: "backup@example.com",
    }).resolve("sync");

    expect(config.smtp).toMatchObject({
      host: "mail.internal",
      port: 2525,
      user: "backup@example.com",
    });
  });

  it("treats blank values as unset", () => {
    const config = new ConfigService(undefined, {}).resolve("sync", {
      minAge: "",
      email: " ",
    });
    expect(config.minAge).toBeUndefined();
    expect(config.email).toBeUndefined();
  });

  it("accepts several comma-separated recipients", () => {
    const config = new ConfigService(undefined, {}).resolve("sync", {
      email: "a@example.com, b@example.com",
    });
    expect(config.email).toBe("a@example.com, b@example.com");
  });

  it("collects every invalid setting into one error", () => {
    const service = new ConfigService(undefined, {});
    const issues = issuesOf(() =>
      service.resolve("sync", {
        transfers: "0",
        minAge: "soon",
        email: "not-an-email",
      }),
    );

    expect(issues).toEqual([
      "transfers: transfers must be at least 1",
      "minAge: minAge must be an rclone duration such as 30m or 1h30m",
      "email: Invalid email address format",
    ]);
  });

  it("rejects unknown keys in the config file", async () => {
    const path = await writeConfig("localDir: /data\nbogus: 1\n");
    expect(issuesOf(() => new ConfigService(path, {}))).toEqual([
      "Unrecognized key(s) in object: 'bogus'",
    ]);
  });

  it("rejects a config file that is not valid YAML", async () => {
    const path = await writeConfig("localDir: [unclosed\n");
    expect(() => new ConfigService(path, {})).toThrow(/^Cannot read config file/);
  });

  it("treats an empty config file as no overrides", async () => {
    const path = await writeConfig("");
    expect(new ConfigService(path, {}).resolve("sync").localDir).toBe("/mnt/data");
  });
});

describe("getConfigPath", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "rclone-config-path-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prefers the explicit path, then CONFIG_PATH", () => {
    expect(getConfigPath("my.yaml", { CONFIG_PATH: "/etc/x.yaml" }, dir)).toBe(
      join(dir, "my.yaml"),
    );
    expect(getConfigPath(undefined, { CONFIG_PATH: "/etc/x.yaml" }, dir)).toBe(
      "/etc/x.yaml",
    );
  });

  it("falls back to config/config.yaml only when it exists", async () => {
    expect(getConfigPath(undefined, {}, dir)).toBeUndefined();

    await mkdir(join(dir, "config"));
    await writeFile(join(dir, "config", "config.yaml"), "");
    expect(getConfigPath(undefined, {}, dir)).toBe(
      join(dir, "config", "config.yaml"),
    );
  });
});
