import { describe, expect, it } from "vitest";
import type { BackupRecord } from "../../../core/types.js";
import type { EvictionReport } from "../../retention/retention-manager.js";
import {
  autosaveCompleteMessage,
  backupFailedMessage,
  budgetExceededMessage,
  evictionFailureMessage,
  evictionMessage,
  formatBytes
} from "../messages.js";

const backup: BackupRecord = {
  worldId: "Muldraugh",
  name: "Muldraugh_20240101-000000.zip",
  path: "/backups/Muldraugh/Muldraugh_20240101-000000.zip",
  sizeBytes: 3 * 1024 ** 2,
  createdAt: new Date(Date.UTC(2024, 0, 1)),
  timestampSource: "name"
};

function report(overrides: Partial<EvictionReport> = {}): EvictionReport {
  return { deleted: [], finalAggregateBytes: 0, budgetStillExceeded: false, failure: null, ...overrides };
}

describe("notification messages", () => {
  it("formats byte counts", () => {
    expect(formatBytes(512)).toBe("512 B");
    expect(formatBytes(1536)).toBe("1.5 KB");
    expect(formatBytes(3 * 1024 ** 2)).toBe("3.0 MB");
    expect(formatBytes(5 * 1024 ** 3)).toBe("5.0 GB");
  });

  it("describes a failed backup", () => {
    expect(backupFailedMessage("Survival~Muldraugh", "disk full")).toEqual({
      level: "error",
      title: "Auto-save error",
      body: "Backup of Survival~Muldraugh failed: disk full"
    });
  });

  it("announces a finished autosave by the worlds it covered", () => {
    expect(autosaveCompleteMessage([])).toBeNull();
    expect(autosaveCompleteMessage(["Survival~Muldraugh"])).toEqual({
      level: "info",
      title: "Auto-save complete",
      body: "Backups created for: Survival~Muldraugh"
    });
    expect(autosaveCompleteMessage(["A~1", "A~2", "B~3", "B~4"])?.body).toBe("Backups created for: A~1, A~2 +2");
  });

  it("summarises evictions only when something was removed", () => {
    expect(evictionMessage(report(), 3)).toBeNull();
    expect(evictionMessage(report({ deleted: [backup, backup] }), 3)).toEqual({
      level: "info",
      title: "Old backups removed",
      body: "Removed 2 older backups (freed 6.0 MB) to stay under the size limit. At least 3 backups per world were kept."
    });
  });

  it("warns when the budget cannot be met", () => {
    expect(budgetExceededMessage(report(), 1024)).toBeNull();
    expect(budgetExceededMessage(report({ budgetStillExceeded: true, finalAggregateBytes: 6 * 1024 ** 3 }), 5 * 1024 ** 3)).toEqual({
      level: "warning",
      title: "Backup limit exceeded",
      body:
        "Backups use 6.0 GB (limit 5.0 GB) and nothing more can be removed without going below the per-world minimum. " +
          "Raise the limit or delete backups manually."
    });
    expect(budgetExceededMessage(report({ budgetStillExceeded: true, finalAggregateBytes: null }), 1024)).toBeNull();
  });

  it("names the backup a cleanup stopped at", () => {
    const failure = { backup, code: "ERR_IO", message: "Cannot delete backup" };
    expect(evictionFailureMessage(report({ failure }))).toEqual({
      level: "error",
      title: "Backup cleanup failed",
      body: "Cleanup stopped at Muldraugh_20240101-000000.zip: Cannot delete backup"
    });
  });

  it("reports a cleanup that could not read the backups", () => {
    const failure = { backup: null, code: "ERR_ACCESS", message: "Backups root is unreadable" };
    expect(evictionFailureMessage(report({ failure, finalAggregateBytes: null }))?.body).toBe(
      "Cleanup could not read the backups: Backups root is unreadable"
    );
  });
});
