/**
 * Workflow capture
 * Library entry point
 */

export { CompositionRoot } from './infrastructure/di/CompositionRoot';
export type { ApplicationContainer, CompositionOptions } from './infrastructure/di/CompositionRoot';
export { ConfigFactory } from './infrastructure/config/ConfigFactory';
export type { AppConfig, AppConfigOverrides } from './infrastructure/config/ConfigSchema';

export { WorkflowCaptureService, defaultTaskId } from './application/services/WorkflowCaptureService';
export type { CaptureRequest } from './application/services/WorkflowCaptureService';
export { WorkflowExecutor } from './application/services/WorkflowExecutor';
export type { CaptureSummary, WorkflowExecutorOptions } from './application/services/WorkflowExecutor';
export { ElementResolver } from './application/services/resolution/ElementResolver';
export type { ResolutionResult, StrategyName } from './application/services/resolution/ElementResolver';
export { StateSignatureService } from './application/services/StateSignatureService';
export type * from './application/ports';

export { PlaywrightBrowserAdapter } from './infrastructure/browser/PlaywrightBrowserAdapter';
export { PlaywrightPageQuery } from './infrastructure/browser/PlaywrightPageQuery';
export { PlaywrightSignalSource } from './infrastructure/browser/PlaywrightSignalSource';
export { ScreenshotEvidenceCollector } from './infrastructure/evidence/ScreenshotEvidenceCollector';
export { FileBasedWorkflowRepository } from './infrastructure/persistence/FileBasedWorkflowRepository';
export { RuleBasedPlanner } from './infrastructure/planning/RuleBasedPlanner';
export { StaticPlanner } from './infrastructure/planning/StaticPlanner';
export { getLogger, setGlobalLoggerConfig } from './infrastructure/logging';

export { WorkflowRecord } from './domain/workflow/WorkflowRecord';
export { StepResult } from './domain/workflow/StepResult';
export type { StepOutcome, StepEvidence, EvidenceBundle } from './domain/workflow/StepResult';
export type { StepPlan, TaskPlan } from './domain/workflow/StepPlan';
export { parseTaskPlan } from './domain/workflow/TaskPlanSchema';
export { CaptureState } from './domain/workflow/CaptureState';
export * from './domain/errors/AppErrors';
