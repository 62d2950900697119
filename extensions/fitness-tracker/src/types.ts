// ── Stored rows (column names as persisted) ─────────────────────────────────
export type ActivityRecord = {
  id: number;
  activity_name: string;
  duration: number; // minutes
  intensity: string;
  date: string; // YYYY-MM-DD
};

export type NutritionRecord = {
  id: number;
  food_item: string;
  calories: number;
  carbs: number;
  protein: number;
  fats: number;
  date: string; // YYYY-MM-DD
};

export type GoalRecord = {
  id: number;
  weekly_exercise_goal: number; // hours
  daily_calorie_limit: number;
};

// ── Normalized input (validator output, store input) ────────────────────────
export type ActivityInput = {
  name: string;
  duration: number;
  intensity: string;
};

export type NutritionInput = {
  foodItem: string;
  calories: number;
  carbs: number;
  protein: number;
  fats: number;
};

export type GoalInput = {
  weeklyExerciseGoal: number;
  dailyCalorieLimit: number;
};

// ── Form fields ─────────────────────────────────────────────────────────────
export type FieldKind = "text" | "choice" | "integer" | "optional-integer";

export type FormField = {
  key: string;
  label: string;
  kind: FieldKind;
  options?: readonly string[];
};

/** Raw field values exactly as the presentation layer submitted them. */
export type RawInput = Record<string, string | undefined>;

// ── Validation ──────────────────────────────────────────────────────────────
export type ValidationFailureKind = "MissingField" | "NotNumeric";

export type ValidationFailure = {
  kind: ValidationFailureKind;
  fields: string[];
  message: string;
};

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; error: ValidationFailure };

// ── Views ───────────────────────────────────────────────────────────────────
export type GoalSummary = {
  title: string;
  lines: string[];
};
