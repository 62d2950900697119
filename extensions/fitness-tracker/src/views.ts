import type { ActivityRecord, GoalRecord, GoalSummary, NutritionRecord } from "./types.js";

export const NO_ACTIVITIES_LINE = "No activities logged yet.";
export const NO_NUTRITION_LINE = "No nutrition records found.";
export const NO_GOALS_LINE = "No goals set yet.";
export const GOAL_SUMMARY_TITLE = "Your Current Goals:";

export function formatActivityLines(records: readonly ActivityRecord[]): string[] {
  if (records.length === 0) {
    return [NO_ACTIVITIES_LINE];
  }
  return records.map(
    (record) =>
      `${record.activity_name} - ${record.duration} min - ${record.intensity} - ${record.date}`,
  );
}

export function formatNutritionLines(records: readonly NutritionRecord[]): string[] {
  if (records.length === 0) {
    return [NO_NUTRITION_LINE];
  }
  return records.map(
    (record) =>
      `${record.food_item} - ${record.calories} cal - ${record.carbs}g carbs - ${record.protein}g protein - ${record.fats}g fats - ${record.date}`,
  );
}

/** One-line status shown on the goal tab. */
export function formatGoalStatus(goal: GoalRecord | null): string {
  if (!goal) {
    return NO_GOALS_LINE;
  }
  return `Weekly Goal: ${goal.weekly_exercise_goal} hrs | Daily Limit: ${goal.daily_calorie_limit} cal`;
}

export function formatGoalSummary(goal: GoalRecord | null): GoalSummary {
  if (!goal) {
    return { title: GOAL_SUMMARY_TITLE, lines: [NO_GOALS_LINE] };
  }
  return {
    title: GOAL_SUMMARY_TITLE,
    lines: [
      `Weekly Exercise: ${goal.weekly_exercise_goal} hrs`,
      `Daily Calorie Limit: ${goal.daily_calorie_limit} cal`,
    ],
  };
}
