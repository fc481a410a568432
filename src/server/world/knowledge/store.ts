import { KnowledgeError } from "@shared/errors.js";
import { formatFact, normalizeExpression, parseFact } from "./pddl.js";
import type { Instance, KnowledgeStore } from "./types.js";

export interface InMemoryKnowledgeStoreOptions {
  domainName?: string;
  problemName?: string;
}

/**
 * Knowledge store held in process memory
 */
export class InMemoryKnowledgeStore implements KnowledgeStore {
  private instances = new Map<string, Instance>();
  private predicates = new Set<string>();
  private goal: string | undefined;
  private readonly domainName: string;
  private readonly problemName: string;

  constructor(options: InMemoryKnowledgeStoreOptions = {}) {
    this.domainName = options.domainName ?? "patrol";
    this.problemName = options.problemName ?? "patrol_problem";
  }

  async addInstance(name: string, type: string): Promise<boolean> {
    const existing = this.instances.get(name);
    if (existing) {
      if (existing.type !== type) {
        throw new KnowledgeError(`Instance "${name}" already exists with type "${existing.type}"`);
      }
      return false;
    }
    this.instances.set(name, { name, type });
    return true;
  }

  async getInstances(): Promise<Instance[]> {
    return Array.from(this.instances.values(), (instance) => ({ ...instance }));
  }

  async addPredicate(fact: string): Promise<boolean> {
    const normalized = this.checkFact(fact);
    if (this.predicates.has(normalized)) {
      return false;
    }
    this.predicates.add(normalized);
    return true;
  }

  async removePredicate(fact: string): Promise<boolean> {
    return this.predicates.delete(formatFact(parseFact(fact)));
  }

  async hasPredicate(fact: string): Promise<boolean> {
    return this.predicates.has(formatFact(parseFact(fact)));
  }

  async getPredicates(): Promise<string[]> {
    return Array.from(this.predicates);
  }

  async setGoal(goal: string): Promise<void> {
    this.goal = normalizeExpression(goal);
  }

  async getGoal(): Promise<string | undefined> {
    return this.goal;
  }

  async clearGoal(): Promise<void> {
    this.goal = undefined;
  }

  async getProblem(): Promise<string> {
    const byType = new Map<string, string[]>();
    for (const instance of this.instances.values()) {
      const names = byType.get(instance.type) ?? [];
      names.push(instance.name);
      byType.set(instance.type, names);
    }

    const lines = [
      `(define (problem ${this.problemName})`,
      `  (:domain ${this.domainName})`,
      "  (:objects",
      ...Array.from(byType, ([type, names]) => `    ${names.join(" ")} - ${type}`),
      "  )",
      "  (:init",
      ...Array.from(this.predicates, (predicate) => `    ${predicate}`),
      "  )",
    ];
    if (this.goal) {
      lines.push(`  (:goal ${this.goal})`);
    }
    lines.push(")");
    return lines.join("\n") + "\n";
  }

  private checkFact(text: string): string {
    const parsed = parseFact(text);
    for (const arg of parsed.args) {
      if (!this.instances.has(arg)) {
        throw new KnowledgeError(`Unknown instance "${arg}" in ${formatFact(parsed)}`);
      }
    }
    return formatFact(parsed);
  }
}
