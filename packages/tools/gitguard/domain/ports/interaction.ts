// Interaction port - questions asked to the operator

import type { Plan } from "../entities/plan.ts";

/**
 * Blocking conversation with the person at the terminal.
 */
export interface Interaction {
  /** Ask a yes/no question. An empty answer selects `defaultValue`. */
  confirm(message: string, defaultValue: boolean): Promise<boolean>;

  /** Ask for a single free-form value. */
  ask(message: string): Promise<string>;

  /** Show a plan under a title. */
  presentPlan(plan: Plan, title: string): void;
}
