import { ACTIVITY_FIELDS, GOAL_FIELDS, NUTRITION_FIELDS } from "./fields.js";
import type {
  ActivityInput,
  FormField,
  GoalInput,
  NutritionInput,
  RawInput,
  ValidationFailure,
  ValidationFailureKind,
  ValidationResult,
} from "./types.js";

// Whole numbers only; no range is enforced on any numeric field.
const INTEGER_PATTERN = /^[+-]?\d+$/;

export function parseInteger(raw: string): number | null {
  const trimmed = raw.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    return null;
  }
  // "-0"
  return value === 0 ? 0 : value;
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === "";
}

function joinLabels(fields: readonly FormField[]): string {
  const labels = fields.map((field) => field.label);
  if (labels.length <= 1) {
    return labels.join("");
  }
  return `${labels.slice(0, -1).join(", ")} and ${labels.slice(-1).join("")}`;
}

function failure(kind: ValidationFailureKind, fields: readonly FormField[]): ValidationFailure {
  const plural = fields.length > 1;
  const message =
    kind === "MissingField"
      ? `${joinLabels(fields)} ${plural ? "are" : "is"} required.`
      : `${joinLabels(fields)} must be ${plural ? "whole numbers" : "a whole number"}.`;
  return { kind, fields: fields.map((field) => field.key), message };
}

function findMissing(fields: readonly FormField[], raw: RawInput): ValidationFailure | null {
  const missing = fields.filter(
    (field) => field.kind !== "optional-integer" && isBlank(raw[field.key]),
  );
  return missing.length > 0 ? failure("MissingField", missing) : null;
}

function text(raw: RawInput, field: FormField): string {
  return (raw[field.key] ?? "").trim();
}

/**
 * Reads integer fields one by one, remembering every field that fails to
 * parse so a single failure can name all of them.
 */
function createIntegerReader(raw: RawInput) {
  const invalid: FormField[] = [];

  const read = (field: FormField): number => {
    const value = raw[field.key];
    if (field.kind === "optional-integer" && isBlank(value)) {
      return 0;
    }
    const parsed = parseInteger(value ?? "");
    if (parsed === null) {
      invalid.push(field);
      return 0;
    }
    return parsed;
  };

  const finish = <T>(value: T): ValidationResult<T> =>
    invalid.length > 0
      ? { ok: false, error: failure("NotNumeric", invalid) }
      : { ok: true, value };

  return { read, finish };
}

// ── Per-form validators ─────────────────────────────────────────────────────

export function validateActivity(raw: RawInput): ValidationResult<ActivityInput> {
  const missing = findMissing(Object.values(ACTIVITY_FIELDS), raw);
  if (missing) {
    return { ok: false, error: missing };
  }

  const integers = createIntegerReader(raw);
  return integers.finish({
    name: text(raw, ACTIVITY_FIELDS.name),
    duration: integers.read(ACTIVITY_FIELDS.duration),
    intensity: text(raw, ACTIVITY_FIELDS.intensity),
  });
}

export function validateNutrition(raw: RawInput): ValidationResult<NutritionInput> {
  const missing = findMissing(Object.values(NUTRITION_FIELDS), raw);
  if (missing) {
    return { ok: false, error: missing };
  }

  const integers = createIntegerReader(raw);
  return integers.finish({
    foodItem: text(raw, NUTRITION_FIELDS.foodItem),
    calories: integers.read(NUTRITION_FIELDS.calories),
    carbs: integers.read(NUTRITION_FIELDS.carbs),
    protein: integers.read(NUTRITION_FIELDS.protein),
    fats: integers.read(NUTRITION_FIELDS.fats),
  });
}

export function validateGoals(raw: RawInput): ValidationResult<GoalInput> {
  const missing = findMissing(Object.values(GOAL_FIELDS), raw);
  if (missing) {
    return { ok: false, error: missing };
  }

  const integers = createIntegerReader(raw);
  return integers.finish({
    weeklyExerciseGoal: integers.read(GOAL_FIELDS.weeklyExerciseGoal),
    dailyCalorieLimit: integers.read(GOAL_FIELDS.dailyCalorieLimit),
  });
}
