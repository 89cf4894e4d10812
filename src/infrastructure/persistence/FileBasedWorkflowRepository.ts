import * as fs from 'fs/promises';
import * as path from 'path';
import { WorkflowRepository } from '../../application/ports/WorkflowRepository';
import { WorkflowRecord } from '../../domain/workflow/WorkflowRecord';
import { RecordCorruptedError, errorMessage } from '../../domain/errors/AppErrors';
import { getLogger } from '../logging';

const RECORD_FILE = 'workflow.json';

const logger = getLogger('Repository');

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * File-based implementation of WorkflowRepository.
 * Each task gets `<baseDir>/<taskId>/workflow.json`, next to its screenshots.
 */
export class FileBasedWorkflowRepository implements WorkflowRepository {
  private readonly baseDir: string;
  private cache: Map<string, WorkflowRecord> = new Map();

  constructor(baseDir?: string) {
    this.baseDir = path.resolve(baseDir || path.join(process.cwd(), 'output'));
  }

  getTaskDir(taskId: string): string {
    return path.join(this.baseDir, taskId);
  }

  private getFilePath(taskId: string): string {
    return path.join(this.getTaskDir(taskId), RECORD_FILE);
  }

  async save(record: WorkflowRecord): Promise<string> {
    const dir = this.getTaskDir(record.taskId);
    await fs.mkdir(dir, { recursive: true });

    const filePath = this.getFilePath(record.taskId);
    await fs.writeFile(filePath, JSON.stringify(record.toJSON(), null, 2), 'utf-8');
    this.cache.set(record.taskId, record);

    logger.debug('Saved workflow record', { taskId: record.taskId, filePath });
    return filePath;
  }

  /**
   * @throws RecordCorruptedError when the file exists but does not hold a valid record
   */
  async findById(taskId: string): Promise<WorkflowRecord | null> {
    const cached = this.cache.get(taskId);
    if (cached) {
      return cached;
    }

    let data: string;
    try {
      data = await fs.readFile(this.getFilePath(taskId), 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    let record: WorkflowRecord;
    try {
      record = WorkflowRecord.fromJSON(JSON.parse(data));
    } catch (error) {
      throw new RecordCorruptedError(taskId, errorMessage(error));
    }

    this.cache.set(taskId, record);
    return record;
  }

  /**
   * Readable records, most recent capture first. Unreadable ones are logged and left out.
   */
  async findAll(): Promise<WorkflowRecord[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.baseDir);
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    const records: WorkflowRecord[] = [];
    for (const taskId of entries) {
      try {
        const record = await this.findById(taskId);
        if (record) {
          records.push(record);
        }
      } catch (error) {
        logger.warn('Skipping unreadable workflow record', { taskId, error: errorMessage(error) });
      }
    }

    return records.sort((a, b) => b.capturedAt.getTime() - a.capturedAt.getTime());
  }

  async exists(taskId: string): Promise<boolean> {
    if (this.cache.has(taskId)) {
      return true;
    }

    try {
      await fs.access(this.getFilePath(taskId));
      return true;
    } catch (error) {
      if (isMissingFile(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Removes the task directory, screenshots included.
   */
  async delete(taskId: string): Promise<boolean> {
    const existed = await this.exists(taskId);
    await fs.rm(this.getTaskDir(taskId), { recursive: true, force: true });
    this.cache.delete(taskId);
    return existed;
  }

  clearCache(): void {
    this.cache.clear();
  }
}
