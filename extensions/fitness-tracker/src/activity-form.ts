import { ACTIVITY_FIELDS } from "./fields.js";
import { createFormController, type FormController, type FormDeps } from "./form-controller.js";
import type { ActivityRecord } from "./types.js";
import { validateActivity } from "./validation.js";
import { formatActivityLines } from "./views.js";

export function createActivityForm(deps: FormDeps): FormController<ActivityRecord> {
  return createFormController(
    {
      name: "activity",
      title: "Activity Tracking",
      submitLabel: "Log Activity",
      successNotice: "Activity logged successfully!",
      fields: Object.values(ACTIVITY_FIELDS),
      validate: validateActivity,
      persist: (store, input) => store.insertActivity(input),
      refresh: (store) => formatActivityLines(store.listActivities()),
    },
    deps,
  );
}
