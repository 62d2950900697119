import { createActivityForm } from "./src/activity-form.js";
import { createApiRoutes } from "./src/api.js";
import { createAssetHandler, loadDecorativeImages } from "./src/assets.js";
import type { RecordStore } from "./src/db.js";
import { createGoalForm } from "./src/goal-form.js";
import type { AppHost } from "./src/host.js";
import { createNutritionForm } from "./src/nutrition-form.js";
import { createDashboardHandler } from "./src/static.js";

export type RegisterOptions = {
  store: RecordStore;
  onExit: () => void;
};

export default function register(host: AppHost, options: RegisterOptions) {
  const { config, logger } = host;
  const deps = { store: options.store, logger };

  // ── Forms ───────────────────────────────────────────────────────────────
  const forms = {
    activity: createActivityForm(deps),
    nutrition: createNutritionForm(deps),
    goals: createGoalForm(deps),
  };

  // ── Decorative pictures (optional) ──────────────────────────────────────
  const images = loadDecorativeImages(config.images, logger);

  // ── HTTP API routes ─────────────────────────────────────────────────────
  const routes = createApiRoutes({
    store: options.store,
    forms,
    images,
    logger,
    onExit: options.onExit,
  });
  for (const route of routes) {
    host.registerHttpRoute(route);
  }

  // ── GET /assets/:name ───────────────────────────────────────────────────
  host.registerHttpHandler(createAssetHandler(images, logger));

  // ── Static file handler for dashboard ───────────────────────────────────
  host.registerHttpHandler(createDashboardHandler(config.dashboardDir));

  return { forms, images };
}
