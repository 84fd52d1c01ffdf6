/**
 * Core orchestration module.
 * Plan execution, its observed variant, planning and task templates.
 */

export { PlanExecutor } from './planExecutor.js';
export type { ExecutionHooks, PlanExecutorOptions, PlanSetInfo, StepInfo } from './planExecutor.js';
export { ObservedPlanExecutor } from './observedExecutor.js';
export { EXIT_CODES, ConfigError, PlanStateError, ResourceExhaustionError, errorMessage } from './errors.js';
export { planSteps, extractJSON, PlannerError } from './planner.js';
export type { PlannerInput } from './planner.js';
export {
  loadTemplates,
  planFromTemplate,
  resolveTemplate,
  UnknownTemplateError,
} from './templates.js';
export type { TaskTemplate } from './templates.js';
