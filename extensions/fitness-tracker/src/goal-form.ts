import { GOAL_FIELDS } from "./fields.js";
import { createFormController, type FormController, type FormDeps } from "./form-controller.js";
import type { GoalRecord, GoalSummary } from "./types.js";
import { validateGoals } from "./validation.js";
import { formatGoalStatus, formatGoalSummary } from "./views.js";

export type GoalFormController = FormController<GoalRecord> & {
  /** Read-only; available whatever state the form is in. */
  summarize(): GoalSummary;
};

export function createGoalForm(deps: FormDeps): GoalFormController {
  const controller = createFormController(
    {
      name: "goals",
      title: "Goal Setting",
      submitLabel: "Set Goals",
      successNotice: "Goals set successfully!",
      fields: Object.values(GOAL_FIELDS),
      validate: validateGoals,
      persist: (store, input) => store.replaceGoal(input),
      refresh: (store) => [formatGoalStatus(store.latestGoal())],
    },
    deps,
  );

  return {
    ...controller,
    summarize() {
      return formatGoalSummary(deps.store.latestGoal());
    },
  };
}
