import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createActivityForm } from "./activity-form.js";
import { FitnessTrackerDb } from "./db.js";

let db: FitnessTrackerDb;
let tmpDir: string;

const today = () => new Date().toISOString().slice(0, 10);

function fakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "fitness-tracker-activity-test-"));
  db = new FitnessTrackerDb(path.join(tmpDir, "test.db"));
});

afterEach(() => {
  db.close();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("activity form", () => {
  it("logs an activity and refreshes the list", () => {
    const form = createActivityForm({ store: db, logger: fakeLogger() });

    const outcome = form.submit({ name: "Running", duration: "30", intensity: "High" });

    expect(outcome).toEqual({
      status: "success",
      title: "Success",
      notice: "Activity logged successfully!",
      record: {
        id: 1,
        activity_name: "Running",
        duration: 30,
        intensity: "High",
        date: today(),
      },
      lines: [`Running - 30 min - High - ${today()}`],
    });
    expect(form.state()).toBe("idle");
  });

  it("appends each new activity to the end of the list", () => {
    const form = createActivityForm({ store: db, logger: fakeLogger() });
    form.submit({ name: "Running", duration: "30", intensity: "High" });
    const outcome = form.submit({ name: "Cycling", duration: "50", intensity: "Medium" });

    expect(outcome.status === "success" ? outcome.lines : []).toEqual([
      `Running - 30 min - High - ${today()}`,
      `Cycling - 50 min - Medium - ${today()}`,
    ]);
  });

  it("rejects a non-numeric duration without storing anything", () => {
    const logger = fakeLogger();
    const form = createActivityForm({ store: db, logger });

    const outcome = form.submit({ name: "Running", duration: "abc", intensity: "High" });

    expect(outcome).toEqual({
      status: "error",
      title: "Input Error",
      notice: "Duration (min) must be a whole number.",
      error: {
        kind: "NotNumeric",
        fields: ["duration"],
        message: "Duration (min) must be a whole number.",
      },
    });
    expect(db.listActivities()).toEqual([]);
    expect(logger.debug).toHaveBeenCalledWith("activity: rejected input (NotNumeric: duration)");
    expect(form.state()).toBe("idle");
  });

  it("rejects an empty intensity without storing anything", () => {
    const form = createActivityForm({ store: db, logger: fakeLogger() });

    const outcome = form.submit({ name: "Running", duration: "30", intensity: "" });

    expect(outcome.status).toBe("error");
    expect(outcome.status === "error" ? outcome.error.kind : undefined).toBe("MissingField");
    expect(db.listActivities()).toEqual([]);
  });

  it("shows the placeholder line before anything is logged", () => {
    const form = createActivityForm({ store: db, logger: fakeLogger() });
    expect(form.refresh()).toEqual(["No activities logged yet."]);
  });

  it("describes its fields for the presentation layer", () => {
    const form = createActivityForm({ store: db, logger: fakeLogger() });

    expect(form.describe()).toEqual({
      name: "activity",
      title: "Activity Tracking",
      submitLabel: "Log Activity",
      fields: [
        { key: "name", label: "Activity Name", kind: "text" },
        { key: "duration", label: "Duration (min)", kind: "integer" },
        {
          key: "intensity",
          label: "Intensity",
          kind: "choice",
          options: ["Low", "Medium", "High"],
        },
      ],
    });
    expect(Object.keys(form.parameters.properties)).toEqual(["name", "duration", "intensity"]);
  });
});
