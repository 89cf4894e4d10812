import * as fs from 'fs/promises';
import { PlannerPort } from '../../application/ports/PlannerPort';

/**
 * Planner for callers that already hold a plan, as an object or JSON text.
 * The plan is validated by the capture service like any other planner output.
 */
export class StaticPlanner implements PlannerPort {
  constructor(private readonly rawPlan: unknown) {}

  /**
   * Reads the plan from a JSON file. The text is passed on unparsed.
   */
  static async fromFile(filePath: string): Promise<StaticPlanner> {
    return new StaticPlanner(await fs.readFile(filePath, 'utf-8'));
  }

  async plan(): Promise<unknown> {
    return this.rawPlan;
  }
}
