import { describe, expect, it } from "vitest";
import { RUN_MODES } from "../core/domain/entities/run-config.entity.js";
import {
  TRANSFER_FLAGS,
  buildCleanupArgs,
  buildRcloneArgs,
  formatCommand,
} from "../infrastructure/utils/command.utils.js";
import { makeConfig } from "./fixtures.js";

describe("buildRcloneArgs", () => {
  it("builds the sync vector", () => {
    const args = buildRcloneArgs(
      makeConfig({ excludeFrom: "/etc/rclone/excludes.txt" }),
    );
    expect(args).toEqual([
      "sync",
      "--config",
      "/etc/rclone/rclone.conf",
      "--transfers",
      "8",
      "--exclude-from",
      "/etc/rclone/excludes.txt",
      "--min-age",
      "30m",
      "--log-level",
      "INFO",
      "--stats-file-name-length",
      "0",
      "--fast-list",
      "--links",
      "--b2-hard-delete",
      "/mnt/data",
      "b2:test-bucket",
    ]);
  });

  it("adds --dry-run and extra flags before the paths", () => {
    const args = buildRcloneArgs(
      makeConfig({ dryRun: true, extraFlags: ["--bwlimit", "10M"] }),
    );
    expect(args.slice(6, 9)).toEqual(["30m", "--dry-run", "--log-level"]);
    expect(args.slice(-4)).toEqual([
      "--bwlimit",
      "10M",
      "/mnt/data",
      "b2:test-bucket",
    ]);
  });

  it("builds the check vector without transfer flags", () => {
    expect(
      buildRcloneArgs(makeConfig({ mode: "check", minAge: undefined })),
    ).toEqual([
      "check",
      "--config",
      "/etc/rclone/rclone.conf",
      "--log-level",
      "INFO",
      "--stats-file-name-length",
      "0",
      "--fast-list",
      "--links",
      "/mnt/data",
      "b2:test-bucket",
    ]);
  });

  it("never passes transfer flags to check or cryptcheck", () => {
    for (const mode of RUN_MODES.filter((m) => m !== "sync")) {
      const args = buildRcloneArgs(
        makeConfig({ mode, dryRun: true, transfers: 32, minAge: "1h" }),
      );
      expect(args[0]).toBe(mode);
      for (const flag of TRANSFER_FLAGS) expect(args).not.toContain(flag);
    }
  });

  it("omits blank optional values", () => {
    const args = buildRcloneArgs(
      makeConfig({ rcloneConfig: undefined, minAge: "  " }),
    );
    expect(args).not.toContain("--config");
    expect(args).not.toContain("--min-age");
  });
});

describe("buildCleanupArgs", () => {
  it("targets the cleanup path with the same config", () => {
    expect(buildCleanupArgs(makeConfig(), "b2:test-bucket")).toEqual([
      "cleanup",
      "b2:test-bucket",
      "--config",
      "/etc/rclone/rclone.conf",
      "--log-level",
      "INFO",
    ]);
    expect(
      buildCleanupArgs(makeConfig({ rcloneConfig: undefined }), "b2:x"),
    ).toEqual(["cleanup", "b2:x", "--log-level", "INFO"]);
  });
});

describe("formatCommand", () => {
  it("quotes arguments a shell would split", () => {
    expect(formatCommand("rclone", ["sync", "/mnt/my data", "b2:x", ""])).toBe(
      'rclone sync "/mnt/my data" b2:x ""',
    );
  });
});
