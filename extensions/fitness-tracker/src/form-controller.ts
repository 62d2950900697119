import { Type, type TObject, type TProperties } from "@sinclair/typebox";
import type { RecordStore } from "./db.js";
import { StorageUnavailableError, describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { FormField, RawInput, ValidationFailure, ValidationResult } from "./types.js";

export type FormDeps = {
  store: RecordStore;
  logger: Logger;
};

export type FormState = "idle" | "submitting";

export type StorageFailure = {
  kind: "StorageUnavailable";
  fields: string[];
  message: string;
};

export type FormError = ValidationFailure | StorageFailure;

export type FormOutcome<TRecord> =
  | { status: "success"; title: string; notice: string; record: TRecord; lines: string[] }
  | { status: "error"; title: string; notice: string; error: FormError };

/** What the presentation layer needs to render a form. */
export type FormDescription = {
  name: string;
  title: string;
  submitLabel: string;
  fields: readonly FormField[];
};

export type FormDefinition<TInput, TRecord> = FormDescription & {
  successNotice: string;
  validate(raw: RawInput): ValidationResult<TInput>;
  persist(store: RecordStore, input: TInput): TRecord;
  refresh(store: RecordStore): string[];
};

export type FormController<TRecord> = {
  readonly name: string;
  /** JSON schema of a raw submission: every field optional, every value a string. */
  readonly parameters: TObject;
  state(): FormState;
  describe(): FormDescription;
  submit(raw: RawInput): FormOutcome<TRecord>;
  refresh(): string[];
};

function buildParameters(fields: readonly FormField[]): TObject {
  const properties: TProperties = {};
  for (const field of fields) {
    properties[field.key] = Type.Optional(Type.String({ description: field.label }));
  }
  return Type.Object(properties, { additionalProperties: false });
}

export function createFormController<TInput, TRecord extends { id: number }>(
  definition: FormDefinition<TInput, TRecord>,
  deps: FormDeps,
): FormController<TRecord> {
  const session: { state: FormState } = { state: "idle" };
  const { name, title, submitLabel, fields } = definition;

  // Runs after the record is committed: a failed re-read still reports
  // success, with no lines.
  function refreshAfterCommit(): string[] {
    try {
      return definition.refresh(deps.store);
    } catch (err) {
      if (!(err instanceof StorageUnavailableError)) {
        throw err;
      }
      deps.logger.error(`${name}: ${err.message}: ${describeError(err.cause)}`);
      return [];
    }
  }

  return {
    name,
    parameters: buildParameters(fields),

    state() {
      return session.state;
    },

    describe() {
      return { name, title, submitLabel, fields };
    },

    submit(raw) {
      if (session.state === "submitting") {
        throw new Error(`${name} form is already submitting`);
      }
      session.state = "submitting";

      try {
        const result = definition.validate(raw);
        if (!result.ok) {
          deps.logger.debug(
            `${name}: rejected input (${result.error.kind}: ${result.error.fields.join(", ")})`,
          );
          return {
            status: "error",
            title: "Input Error",
            notice: result.error.message,
            error: result.error,
          };
        }

        const record = definition.persist(deps.store, result.value);
        deps.logger.debug(`${name}: stored record ${record.id}`);

        return {
          status: "success",
          title: "Success",
          notice: definition.successNotice,
          record,
          lines: refreshAfterCommit(),
        };
      } catch (err) {
        if (!(err instanceof StorageUnavailableError)) {
          throw err;
        }
        deps.logger.error(`${name}: ${err.message}: ${describeError(err.cause)}`);
        return {
          status: "error",
          title: "Storage Error",
          notice: err.message,
          error: { kind: "StorageUnavailable", fields: [], message: err.message },
        };
      } finally {
        session.state = "idle";
      }
    },

    refresh() {
      return definition.refresh(deps.store);
    },
  };
}
