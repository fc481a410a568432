export interface Instance {
  name: string;
  type: string;
}

export interface Fact {
  name: string;
  args: string[];
}

/**
 * Declarative problem state: typed instances, ground facts and the goal.
 * Methods are async so a remote problem store can sit behind the same seam.
 */
export interface KnowledgeStore {
  addInstance(name: string, type: string): Promise<boolean>;
  getInstances(): Promise<Instance[]>;
  /** Returns false when the fact was already present */
  addPredicate(fact: string): Promise<boolean>;
  /** Returns false when the fact was not present */
  removePredicate(fact: string): Promise<boolean>;
  hasPredicate(fact: string): Promise<boolean>;
  getPredicates(): Promise<string[]>;
  setGoal(goal: string): Promise<void>;
  getGoal(): Promise<string | undefined>;
  clearGoal(): Promise<void>;
  /** PDDL problem text for the current state and goal */
  getProblem(): Promise<string>;
}
