export interface PlanItem {
  /** Start time reported by the planner */
  time: number;
  /** Ground action text, e.g. "(move r2d2 wp1 wp2)" */
  action: string;
  duration: number;
}

export interface Plan {
  items: PlanItem[];
}

export interface PlanningService {
  getDomain(): Promise<string>;
  getProblem(): Promise<string>;
  /**
   * Resolves to undefined when the planner finds no plan.
   * Rejects with ServiceUnavailableError when the planner cannot be reached.
   */
  getPlan(domain: string, problem: string): Promise<Plan | undefined>;
}

/**
 * Runs a solver over domain/problem files and returns its raw stdout
 */
export interface PlanSolver {
  solve(domainFile: string, problemFile: string): Promise<string>;
}
