export { BrowserPort, NavigateOptions, ClickOptions, ActionResult } from './BrowserPort';
export { PageQueryPort, ElementHandle, ViewportSize } from './PageQueryPort';
export { SignalSource } from './SignalSource';
export { EvidencePort } from './EvidencePort';
export { PlannerPort, PlanRequest } from './PlannerPort';
export { WorkflowRepository } from './WorkflowRepository';
