import { WorkflowRecord } from '../../domain/workflow/WorkflowRecord';

/**
 * Persistence for workflow records. Saving an existing task id overwrites it.
 */
export interface WorkflowRepository {
  /**
   * Saves a record and returns where it was written.
   */
  save(record: WorkflowRecord): Promise<string>;

  findById(taskId: string): Promise<WorkflowRecord | null>;

  /**
   * All stored records, most recent capture first.
   */
  findAll(): Promise<WorkflowRecord[]>;

  exists(taskId: string): Promise<boolean>;

  delete(taskId: string): Promise<boolean>;

  /**
   * Directory the task's artifacts live in.
   */
  getTaskDir(taskId: string): string;
}
