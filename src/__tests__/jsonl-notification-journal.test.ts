import { appendFile, mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JsonlNotificationJournal } from "../infrastructure/storage/jsonl-notification-journal.repository.js";
import { captureLogger, silentLogger } from "./fixtures.js";

describe("JsonlNotificationJournal", () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "rclone-journal-"));
    path = join(dir, "nested", "notifications.jsonl");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("appends one JSON line per attempt and reads newest first", async () => {
    const journal = new JsonlNotificationJournal(path, silentLogger());
    journal.append({ mode: "sync", recipient: "ops@example.com", subject: "first", status: "sent" });
    journal.append({ mode: "check", subject: "second", status: "skipped" });

    const lines = (await readFile(path, "utf-8")).trim().split("\n");
    expect(lines).toHaveLength(2);

    const entries = journal.read();
    expect(entries.map((e) => [e.mode, e.subject, e.status])).toEqual([
      ["check", "second", "skipped"],
      ["sync", "first", "sent"],
    ]);
    expect(entries[1].recipient).toBe("ops@example.com");
    expect(Number.isNaN(Date.parse(entries[0].timestamp))).toBe(false);
  });

  it("limits the entries returned", () => {
    const journal = new JsonlNotificationJournal(path, silentLogger());
    for (let i = 0; i < 5; i++) {
      journal.append({ mode: "sync", subject: `run ${i}`, status: "sent" });
    }
    expect(journal.read(2).map((e) => e.subject)).toEqual(["run 4", "run 3"]);
  });

  it("skips malformed lines", async () => {
    const journal = new JsonlNotificationJournal(path, silentLogger());
    journal.append({ mode: "sync", subject: "kept", status: "failed", error: "timeout" });
    await appendFile(path, "not json\n{\"mode\":\"copy\",\"subject\":\"x\"}\n");

    expect(journal.read()).toEqual([
      expect.objectContaining({ subject: "kept", status: "failed", error: "timeout" }),
    ]);
  });

  it("reads nothing before the first attempt", () => {
    expect(new JsonlNotificationJournal(path, silentLogger()).read()).toEqual([]);
  });

  it("logs instead of throwing when the journal cannot be written", () => {
    const { logger, lines } = captureLogger();
    // A directory where the file should be.
    const journal = new JsonlNotificationJournal(dir, logger);

    journal.append({ mode: "sync", subject: "lost", status: "sent" });

    const warnings = lines
      .map((l): unknown => JSON.parse(l))
      .filter(
        (l) =>
          typeof l === "object" &&
          l !== null &&
          "msg" in l &&
          l.msg === "Could not append to notification journal",
      );
    expect(warnings).toHaveLength(1);
  });
});
