import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import { StorageUnavailableError } from "./errors.js";
import type {
  ActivityInput,
  ActivityRecord,
  GoalInput,
  GoalRecord,
  NutritionInput,
  NutritionRecord,
} from "./types.js";

// ── Schema ──────────────────────────────────────────────────────────────────

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS activities (
  id            INTEGER PRIMARY KEY AUTOINCREMENT,
  activity_name TEXT NOT NULL,
  duration      INTEGER NOT NULL,
  intensity     TEXT NOT NULL,
  date          DATE DEFAULT (DATE('now'))
);

CREATE TABLE IF NOT EXISTS nutrition (
  id        INTEGER PRIMARY KEY AUTOINCREMENT,
  food_item TEXT NOT NULL,
  calories  INTEGER NOT NULL,
  carbs     INTEGER,
  protein   INTEGER,
  fats      INTEGER,
  date      DATE DEFAULT (DATE('now'))
);

CREATE TABLE IF NOT EXISTS goals (
  id                   INTEGER PRIMARY KEY AUTOINCREMENT,
  weekly_exercise_goal INTEGER,
  daily_calorie_limit  INTEGER
);
`;

const ACTIVITY_COLUMNS = "id, activity_name, duration, intensity, date";
// Macro columns are nullable; rows written elsewhere still read back as numbers.
const NUTRITION_COLUMNS =
  "id, food_item, calories, COALESCE(carbs, 0) AS carbs, COALESCE(protein, 0) AS protein, COALESCE(fats, 0) AS fats, date";
const GOAL_COLUMNS = "id, weekly_exercise_goal, daily_calorie_limit";

function openDatabase(dbPath: string): Database.Database {
  try {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const db = new Database(dbPath);
    db.pragma("journal_mode = WAL");
    db.exec(SCHEMA_SQL);
    return db;
  } catch (err) {
    throw new StorageUnavailableError(`Cannot open database at ${dbPath}`, err);
  }
}

/** Operations the form controllers persist through. */
export type RecordStore = Pick<
  FitnessTrackerDb,
  | "insertActivity"
  | "insertNutrition"
  | "replaceGoal"
  | "listActivities"
  | "listNutrition"
  | "latestGoal"
>;

// ── Database class ──────────────────────────────────────────────────────────

export class FitnessTrackerDb {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = openDatabase(dbPath);
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StorageUnavailableError(`Failed to ${operation}`, err);
    }
  }

  // ── Activities ────────────────────────────────────────────────────────

  insertActivity(params: ActivityInput): ActivityRecord {
    return this.run("insert activity", () => {
      const row = this.db
        .prepare<[string, number, string], ActivityRecord>(
          `INSERT INTO activities (activity_name, duration, intensity)
           VALUES (?, ?, ?)
           RETURNING ${ACTIVITY_COLUMNS}`,
        )
        .get(params.name, params.duration, params.intensity);
      if (!row) {
        throw new Error("insert returned no row");
      }
      return row;
    });
  }

  listActivities(): ActivityRecord[] {
    return this.run("list activities", () =>
      this.db
        .prepare<[], ActivityRecord>(`SELECT ${ACTIVITY_COLUMNS} FROM activities ORDER BY id ASC`)
        .all(),
    );
  }

  // ── Nutrition ─────────────────────────────────────────────────────────

  insertNutrition(params: NutritionInput): NutritionRecord {
    return this.run("insert nutrition entry", () => {
      const row = this.db
        .prepare<[string, number, number, number, number], NutritionRecord>(
          `INSERT INTO nutrition (food_item, calories, carbs, protein, fats)
           VALUES (?, ?, ?, ?, ?)
           RETURNING ${NUTRITION_COLUMNS}`,
        )
        .get(params.foodItem, params.calories, params.carbs, params.protein, params.fats);
      if (!row) {
        throw new Error("insert returned no row");
      }
      return row;
    });
  }

  listNutrition(): NutritionRecord[] {
    return this.run("list nutrition entries", () =>
      this.db
        .prepare<[], NutritionRecord>(`SELECT ${NUTRITION_COLUMNS} FROM nutrition ORDER BY id ASC`)
        .all(),
    );
  }

  // ── Goals ─────────────────────────────────────────────────────────────

  /** Deletes every stored goal and inserts the new one in a single transaction. */
  replaceGoal(params: GoalInput): GoalRecord {
    return this.run("set goals", () => {
      const deleteStmt = this.db.prepare("DELETE FROM goals");
      const insertStmt = this.db.prepare<[number, number], GoalRecord>(
        `INSERT INTO goals (weekly_exercise_goal, daily_calorie_limit)
         VALUES (?, ?)
         RETURNING ${GOAL_COLUMNS}`,
      );

      const txn = this.db.transaction((weekly: number, daily: number) => {
        deleteStmt.run();
        const row = insertStmt.get(weekly, daily);
        if (!row) {
          throw new Error("insert returned no row");
        }
        return row;
      });

      return txn(params.weeklyExerciseGoal, params.dailyCalorieLimit);
    });
  }

  latestGoal(): GoalRecord | null {
    return this.run("read goals", () => {
      const row = this.db
        .prepare<[], GoalRecord>(`SELECT ${GOAL_COLUMNS} FROM goals ORDER BY id DESC LIMIT 1`)
        .get();
      return row ?? null;
    });
  }

  // ── Cleanup ───────────────────────────────────────────────────────────

  close(): void {
    this.db.close();
  }
}
