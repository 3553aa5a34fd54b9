/**
 * Agent Types
 *
 * Every agent, rule-based or backed by a generative model, scores exactly
 * one concern of a profile and returns one verdict. Agents hold no mutable
 * state, so one instance may analyze many profiles concurrently.
 */

import type { AgentConcern, ProfileRecord, Verdict } from '../types';

export interface Agent {
  /** Name recorded on every verdict the agent produces */
  readonly name: string;
  readonly concern: AgentConcern;
  analyze(profile: ProfileRecord): Verdict | Promise<Verdict>;
}

/**
 * Names of the built-in rule-based agents, also their canonical order
 */
export const CANONICAL_AGENT_ORDER: readonly string[] = ['database', 'factory', 'intent', 'risk'];

/**
 * Stable sort: built-in agents first in canonical order, every other agent
 * after them in its original position
 */
export function sortByCanonicalOrder<T extends { agentName: string }>(items: readonly T[]): T[] {
  const rank = (item: T, index: number): number => {
    const canonical = CANONICAL_AGENT_ORDER.indexOf(item.agentName);
    return canonical === -1 ? CANONICAL_AGENT_ORDER.length + index : canonical;
  };
  return items
    .map((item, index) => ({ item, rank: rank(item, index) }))
    .sort((a, b) => a.rank - b.rank)
    .map(entry => entry.item);
}
