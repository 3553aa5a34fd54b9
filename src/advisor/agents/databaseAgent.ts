/**
 * Database Agent
 *
 * Decides whether an example actually needs records persisted.
 */

import { RuleBasedAgent } from './baseAgent';
import { createFactories, keyedReloads, reloadEvents } from './signals';
import { createVerdict } from '../types/builders';
import type { ProfileRecord, Verdict } from '../types';

export class DatabaseAgent extends RuleBasedAgent {
  readonly concern = 'database' as const;

  protected evaluate(profile: ProfileRecord): Verdict {
    const { db, metadata } = profile;

    if (metadata.dbQueriesError !== undefined) {
      return createVerdict({
        agentName: this.name,
        verdict: 'no_action',
        confidence: 'low',
        reasoning: 'Database profile unavailable',
        metadata: { dbQueriesError: metadata.dbQueriesError }
      });
    }

    const keyed = keyedReloads(profile);
    if (keyed.length > 0) {
      const factories = [...new Set(keyed.map(k => k.factory))];
      return createVerdict({
        agentName: this.name,
        verdict: 'db_required',
        confidence: 'high',
        reasoning: `Records created by ${factories.map(f => `:${f}`).join(', ')} are reloaded from the database (${keyed
          .map(k => k.event)
          .join(', ')})`,
        metadata: { keyedReloads: keyed, inserts: db.inserts }
      });
    }

    const reloads = reloadEvents(profile);
    if (db.inserts === 0 && reloads.length === 0) {
      return createVerdict({
        agentName: this.name,
        verdict: 'db_unnecessary',
        confidence: 'high',
        reasoning: `No inserts and no reloads observed (${db.selects} selects); persistence is not exercised`,
        metadata: { inserts: 0, selects: db.selects, totalQueries: db.totalQueries }
      });
    }

    const reasoning = reloads.length > 0
      ? `Reload events present (${reloads.map(e => e.name).join(', ')}) but not tied to a created factory`
      : `${db.inserts} inserts observed across ${createFactories(profile).length} create factories; persistence cannot be ruled out`;

    return createVerdict({
      agentName: this.name,
      verdict: 'no_action',
      confidence: 'low',
      reasoning,
      metadata: { inserts: db.inserts, reloadEvents: reloads.map(e => e.name) }
    });
  }
}
