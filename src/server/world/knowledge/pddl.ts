/**
 * Small helpers for the PDDL text the store exchanges with the planner
 */

import { KnowledgeError } from "@shared/errors.js";
import type { Fact } from "./types.js";

function tokenize(text: string): string[] {
  return text.replace(/\(/g, " ( ").replace(/\)/g, " ) ").trim().split(/\s+/).filter(Boolean);
}

/**
 * Canonical spacing: "(and(robot_at r2d2  wp1))" -> "(and (robot_at r2d2 wp1))"
 */
export function normalizeExpression(text: string): string {
  let depth = 0;
  let out = "";
  for (const token of tokenize(text)) {
    if (token === ")") {
      depth--;
      if (depth < 0) {
        throw new KnowledgeError(`Unbalanced parentheses in "${text}"`);
      }
      out += ")";
      continue;
    }
    if (token === "(") {
      depth++;
    }
    out += out === "" || out.endsWith("(") ? token : ` ${token}`;
  }
  if (depth !== 0 || out === "") {
    throw new KnowledgeError(`Unbalanced parentheses in "${text}"`);
  }
  return out;
}

export function parseFact(text: string): Fact {
  const normalized = normalizeExpression(text);
  const match = /^\(([^()\s]+)((?: [^()\s]+)*)\)$/.exec(normalized);
  if (!match) {
    throw new KnowledgeError(`Not a ground fact: "${text}"`);
  }
  return {
    name: match[1],
    args: match[2].trim() === "" ? [] : match[2].trim().split(" "),
  };
}

export function formatFact(fact: Fact): string {
  return fact.args.length > 0 ? `(${fact.name} ${fact.args.join(" ")})` : `(${fact.name})`;
}

export function fact(name: string, ...args: string[]): string {
  return formatFact({ name, args });
}

export function conjunction(facts: string[]): string {
  return normalizeExpression(`(and ${facts.join(" ")})`);
}
