import { EvidenceBundle } from '../../domain/workflow/StepResult';
import { ElementHandle } from './PageQueryPort';

/**
 * Screenshot capture for step evidence.
 * Implementations write into the task's own directory and return the paths
 * keyed by artifact name.
 */
export interface EvidencePort {
  /**
   * Capture the page, optionally highlighting the element the step acts on.
   */
  captureState(
    stepName: string,
    taskId: string,
    annotation?: string,
    highlight?: ElementHandle
  ): Promise<EvidenceBundle>;

  /**
   * Capture the page after a step failed.
   */
  captureErrorState(stepName: string, taskId: string, message: string): Promise<EvidenceBundle>;
}
