import { NUTRITION_FIELDS } from "./fields.js";
import { createFormController, type FormController, type FormDeps } from "./form-controller.js";
import type { NutritionRecord } from "./types.js";
import { validateNutrition } from "./validation.js";
import { formatNutritionLines } from "./views.js";

export function createNutritionForm(deps: FormDeps): FormController<NutritionRecord> {
  return createFormController(
    {
      name: "nutrition",
      title: "Nutrition Logging",
      submitLabel: "Log Nutrition",
      successNotice: "Nutrition logged successfully!",
      fields: Object.values(NUTRITION_FIELDS),
      validate: validateNutrition,
      persist: (store, input) => store.insertNutrition(input),
      refresh: (store) => formatNutritionLines(store.listNutrition()),
    },
    deps,
  );
}
