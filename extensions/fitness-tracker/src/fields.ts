import type { FormField } from "./types.js";

export const INTENSITY_LEVELS = ["Low", "Medium", "High"] as const;

export const ACTIVITY_FIELDS = {
  name: { key: "name", label: "Activity Name", kind: "text" },
  duration: { key: "duration", label: "Duration (min)", kind: "integer" },
  intensity: { key: "intensity", label: "Intensity", kind: "choice", options: INTENSITY_LEVELS },
} as const satisfies Record<string, FormField>;

export const NUTRITION_FIELDS = {
  foodItem: { key: "foodItem", label: "Food Item", kind: "text" },
  calories: { key: "calories", label: "Calories", kind: "integer" },
  carbs: { key: "carbs", label: "Carbs (g)", kind: "optional-integer" },
  protein: { key: "protein", label: "Protein (g)", kind: "optional-integer" },
  fats: { key: "fats", label: "Fats (g)", kind: "optional-integer" },
} as const satisfies Record<string, FormField>;

export const GOAL_FIELDS = {
  weeklyExerciseGoal: {
    key: "weeklyExerciseGoal",
    label: "Weekly Exercise Goal (hours)",
    kind: "integer",
  },
  dailyCalorieLimit: { key: "dailyCalorieLimit", label: "Daily Calorie Limit", kind: "integer" },
} as const satisfies Record<string, FormField>;
