import { describe, expect, it } from "vitest";
import {
  formatActivityLines,
  formatGoalStatus,
  formatGoalSummary,
  formatNutritionLines,
} from "./views.js";

describe("formatActivityLines", () => {
  it("renders one line per activity in order", () => {
    expect(
      formatActivityLines([
        { id: 1, activity_name: "Running", duration: 30, intensity: "High", date: "2026-03-02" },
        { id: 2, activity_name: "Yoga", duration: 45, intensity: "Low", date: "2026-03-03" },
      ]),
    ).toEqual(["Running - 30 min - High - 2026-03-02", "Yoga - 45 min - Low - 2026-03-03"]);
  });

  it("renders a placeholder line when empty", () => {
    expect(formatActivityLines([])).toEqual(["No activities logged yet."]);
  });
});

describe("formatNutritionLines", () => {
  it("renders calories and macros", () => {
    expect(
      formatNutritionLines([
        {
          id: 4,
          food_item: "Apple",
          calories: 95,
          carbs: 0,
          protein: 0,
          fats: 0,
          date: "2026-03-02",
        },
      ]),
    ).toEqual(["Apple - 95 cal - 0g carbs - 0g protein - 0g fats - 2026-03-02"]);
  });

  it("renders a placeholder line when empty", () => {
    expect(formatNutritionLines([])).toEqual(["No nutrition records found."]);
  });
});

describe("goal views", () => {
  const goal = { id: 3, weekly_exercise_goal: 7, daily_calorie_limit: 1800 };

  it("formats the status line", () => {
    expect(formatGoalStatus(goal)).toBe("Weekly Goal: 7 hrs | Daily Limit: 1800 cal");
    expect(formatGoalStatus(null)).toBe("No goals set yet.");
  });

  it("formats the two-line summary", () => {
    expect(formatGoalSummary(goal)).toEqual({
      title: "Your Current Goals:",
      lines: ["Weekly Exercise: 7 hrs", "Daily Calorie Limit: 1800 cal"],
    });
  });

  it("summarizes a missing goal as a notice", () => {
    expect(formatGoalSummary(null)).toEqual({
      title: "Your Current Goals:",
      lines: ["No goals set yet."],
    });
  });
});
