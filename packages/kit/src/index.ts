export { clamp } from "./clamp.js";
export { finiteOr } from "./finite-or.js";
export { roundTo } from "./round-to.js";
export { deepFreeze } from "./deep-freeze.js";
export { formatZodErrors } from "./zod-helpers.js";
export { parseEnv } from "./parse-env.js";
export { isMainModule } from "./is-main.js";
export { GoalGuardError } from "./goal-guard-error.js";
export { errorMessage } from "./error-message.js";
