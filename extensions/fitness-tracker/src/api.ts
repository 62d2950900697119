import { Type } from "@sinclair/typebox";
import { Ajv, type ErrorObject, type ValidateFunction } from "ajv";
import type { IncomingMessage } from "node:http";
import type { DecorativeImage } from "./assets.js";
import type { RecordStore } from "./db.js";
import type { FormController, FormOutcome } from "./form-controller.js";
import type { GoalFormController } from "./goal-form.js";
import type { HttpResponse, HttpRoute } from "./host.js";
import type { Logger } from "./logger.js";
import type { ActivityRecord, NutritionRecord, RawInput } from "./types.js";

const MAX_BODY_BYTES = 1_000_000;

export type ApiDeps = {
  store: RecordStore;
  forms: {
    activity: FormController<ActivityRecord>;
    nutrition: FormController<NutritionRecord>;
    goals: GoalFormController;
  };
  images: readonly DecorativeImage[];
  logger: Logger;
  /** Called after a confirmed exit request has been answered. */
  onExit: () => void;
};

const EXIT_SCHEMA = Type.Object({ confirm: Type.Boolean() }, { additionalProperties: false });

// ── Helpers ─────────────────────────────────────────────────────────────────

class RequestBodyTooLargeError extends Error {
  constructor() {
    super("Request body too large");
  }
}

function jsonResponse(res: HttpResponse, status: number, data: unknown): void {
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.end(JSON.stringify(data));
}

function errorResponse(res: HttpResponse, status: number, message: string): void {
  jsonResponse(res, status, { error: message });
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    const onData = (chunk: Buffer | string) => {
      const buf = typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk;
      size += buf.byteLength;
      if (size > MAX_BODY_BYTES) {
        // Stop buffering; the rest of the upload is drained and dropped.
        req.off("data", onData);
        req.resume();
        reject(new RequestBodyTooLargeError());
        return;
      }
      chunks.push(buf);
    };
    req.on("data", onData);
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  return (
    errors?.map((e) => `${e.instancePath || "<root>"} ${e.message || "invalid"}`).join("; ") ??
    "invalid"
  );
}

/**
 * Reads and checks a JSON body. Answers the request itself and resolves
 * undefined when the body is unusable.
 */
async function readJsonBody<T>(
  req: IncomingMessage,
  res: HttpResponse,
  validate: ValidateFunction<T>,
): Promise<T | undefined> {
  let body: string;
  try {
    body = await readBody(req);
  } catch (err) {
    if (err instanceof RequestBodyTooLargeError) {
      errorResponse(res, 413, err.message);
      return undefined;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    errorResponse(res, 400, "Invalid JSON body");
    return undefined;
  }

  if (!validate(parsed)) {
    errorResponse(res, 400, `Invalid submission: ${formatSchemaErrors(validate.errors)}`);
    return undefined;
  }
  return parsed;
}

function outcomeStatus(outcome: FormOutcome<unknown>, successStatus: number): number {
  if (outcome.status === "success") {
    return successStatus;
  }
  return outcome.error.kind === "StorageUnavailable" ? 500 : 400;
}

// ── Route registration ──────────────────────────────────────────────────────

export function createApiRoutes(deps: ApiDeps): HttpRoute[] {
  const { store, forms, images, logger } = deps;
  const ajv = new Ajv({ allErrors: true, strict: false });

  const validateActivity = ajv.compile<RawInput>(forms.activity.parameters);
  const validateNutrition = ajv.compile<RawInput>(forms.nutrition.parameters);
  const validateGoals = ajv.compile<RawInput>(forms.goals.parameters);
  const validateExit = ajv.compile<{ confirm: boolean }>(EXIT_SCHEMA);

  async function submit<TRecord>(
    req: IncomingMessage,
    res: HttpResponse,
    form: FormController<TRecord>,
    validate: ValidateFunction<RawInput>,
    successStatus: number,
  ): Promise<void> {
    const raw = await readJsonBody(req, res, validate);
    if (raw === undefined) {
      return;
    }
    const outcome = form.submit(raw);
    jsonResponse(res, outcomeStatus(outcome, successStatus), outcome);
  }

  // Every handler answers 500 with the error text when something unexpected escapes.
  function guarded(handler: HttpRoute["handler"]): HttpRoute["handler"] {
    return async (req, res) => {
      try {
        await handler(req, res);
      } catch (err) {
        logger.error(`${req.method ?? "?"} ${req.url ?? "/"} failed: ${String(err)}`);
        errorResponse(res, 500, String(err));
      }
    };
  }

  return [
    {
      path: "/api/forms",
      handler: guarded(async (req, res) => {
        if (req.method !== "GET") {
          errorResponse(res, 405, "Method not allowed");
          return;
        }
        jsonResponse(res, 200, {
          forms: [forms.activity.describe(), forms.nutrition.describe(), forms.goals.describe()],
        });
      }),
    },
    {
      path: "/api/activities",
      handler: guarded(async (req, res) => {
        if (req.method === "GET") {
          jsonResponse(res, 200, {
            records: store.listActivities(),
            lines: forms.activity.refresh(),
          });
        } else if (req.method === "POST") {
          await submit(req, res, forms.activity, validateActivity, 201);
        } else {
          errorResponse(res, 405, "Method not allowed");
        }
      }),
    },
    {
      path: "/api/nutrition",
      handler: guarded(async (req, res) => {
        if (req.method === "GET") {
          jsonResponse(res, 200, {
            records: store.listNutrition(),
            lines: forms.nutrition.refresh(),
          });
        } else if (req.method === "POST") {
          await submit(req, res, forms.nutrition, validateNutrition, 201);
        } else {
          errorResponse(res, 405, "Method not allowed");
        }
      }),
    },
    {
      path: "/api/goals",
      handler: guarded(async (req, res) => {
        if (req.method === "GET") {
          jsonResponse(res, 200, { goal: store.latestGoal(), lines: forms.goals.refresh() });
        } else if (req.method === "PUT") {
          await submit(req, res, forms.goals, validateGoals, 200);
        } else {
          errorResponse(res, 405, "Method not allowed");
        }
      }),
    },
    {
      path: "/api/goals/summary",
      handler: guarded(async (req, res) => {
        if (req.method !== "GET") {
          errorResponse(res, 405, "Method not allowed");
          return;
        }
        jsonResponse(res, 200, forms.goals.summarize());
      }),
    },
    {
      path: "/api/images",
      handler: guarded(async (req, res) => {
        if (req.method !== "GET") {
          errorResponse(res, 405, "Method not allowed");
          return;
        }
        jsonResponse(res, 200, {
          images: images.map((image) => ({ name: image.name, url: `/assets/${image.name}` })),
        });
      }),
    },
    {
      path: "/api/exit",
      handler: guarded(async (req, res) => {
        if (req.method !== "POST") {
          errorResponse(res, 405, "Method not allowed");
          return;
        }
        const body = await readJsonBody(req, res, validateExit);
        if (body === undefined) {
          return;
        }
        jsonResponse(res, 200, { exiting: body.confirm });
        if (body.confirm) {
          logger.info("Exit confirmed from the dashboard");
          deps.onExit();
        }
      }),
    },
  ];
}
