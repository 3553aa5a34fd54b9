/**
 * Profile signals shared by several agents
 */

import type { EventUsage, FactoryUsage, ProfileRecord } from '../types';

export interface NamedFactory {
  name: string;
  usage: FactoryUsage;
}

export interface NamedEvent {
  name: string;
  usage: EventUsage;
}

const RELOAD_PATTERN = /reload/i;

/**
 * SQL and backtrace lines of every example, lowercased
 */
export function exampleText(usage: EventUsage): string {
  return usage.examples
    .flatMap(example => [example.sql ?? '', ...(example.backtrace ?? [])])
    .join('\n')
    .toLowerCase();
}

/**
 * True when the event name or any example matches the pattern
 */
export function eventMatches(name: string, usage: EventUsage, pattern: RegExp): boolean {
  return pattern.test(name) || usage.examples.some(example =>
    (example.sql !== undefined && pattern.test(example.sql)) ||
    (example.backtrace ?? []).some(line => pattern.test(line))
  );
}

export function eventList(profile: ProfileRecord): NamedEvent[] {
  return Object.entries(profile.events).map(([name, usage]) => ({ name, usage }));
}

/**
 * Factories built with create at least once, in record order
 */
export function createFactories(profile: ProfileRecord): NamedFactory[] {
  return Object.entries(profile.factories)
    .filter(([, usage]) => usage.strategy === 'create' && usage.count > 0)
    .map(([name, usage]) => ({ name, usage }));
}

export function totalCount(factories: readonly NamedFactory[]): number {
  return factories.reduce((sum, f) => sum + f.usage.count, 0);
}

export function reloadEvents(profile: ProfileRecord): NamedEvent[] {
  return eventList(profile).filter(e => eventMatches(e.name, e.usage, RELOAD_PATTERN));
}

/**
 * Whole-word match of a factory name or its plural table name
 */
export function factoryPattern(factoryName: string): RegExp {
  const escaped = factoryName.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`\\b${escaped}(?:e?s)?\\b`, 'i');
}

/**
 * True when the event name or an example's SQL or backtrace names the factory
 * or its table as a whole word
 */
export function isKeyedTo(event: NamedEvent, factoryName: string): boolean {
  const pattern = factoryPattern(factoryName);
  return pattern.test(event.name) || pattern.test(exampleText(event.usage));
}

/**
 * Reload events keyed to a create factory
 */
export function keyedReloads(profile: ProfileRecord): Array<{ factory: string; event: string }> {
  const reloads = reloadEvents(profile);
  return createFactories(profile).flatMap(factory =>
    reloads
      .filter(event => isKeyedTo(event, factory.name))
      .map(event => ({ factory: factory.name, event: event.name }))
  );
}

/**
 * Highest count wins; ties go to the first factory in record order
 */
export function dominantFactory(factories: readonly NamedFactory[]): NamedFactory | undefined {
  let best: NamedFactory | undefined;
  for (const factory of factories) {
    if (!best || factory.usage.count > best.usage.count) best = factory;
  }
  return best;
}
