/**
 * Factory Agent
 *
 * Looks for fixtures built with create that could be built with
 * build_stubbed instead.
 */

import { RuleBasedAgent } from './baseAgent';
import { createFactories, dominantFactory, keyedReloads, totalCount } from './signals';
import { createVerdict } from '../types/builders';
import type { Confidence, ProfileRecord, Verdict } from '../types';

export class FactoryAgent extends RuleBasedAgent {
  readonly concern = 'factory' as const;

  protected evaluate(profile: ProfileRecord): Verdict {
    const { db, metadata } = profile;

    if (metadata.factoryProfError !== undefined) {
      return createVerdict({
        agentName: this.name,
        verdict: 'no_action',
        confidence: 'low',
        reasoning: 'Factory profile unavailable',
        metadata: { factoryProfError: metadata.factoryProfError }
      });
    }

    const creates = createFactories(profile);
    const createCount = totalCount(creates);
    const dominant = dominantFactory(creates);

    if (!dominant) {
      return createVerdict({
        agentName: this.name,
        verdict: 'no_action',
        confidence: 'low',
        reasoning: 'No factories use the create strategy',
        metadata: { factoryCount: Object.keys(profile.factories).length }
      });
    }

    const keyed = keyedReloads(profile);
    if (keyed.length > 0) {
      return createVerdict({
        agentName: this.name,
        verdict: 'no_action',
        confidence: 'medium',
        reasoning: `Created records are reloaded (${keyed.map(k => `:${k.factory} via ${k.event}`).join(', ')}); create is required`,
        metadata: { createCount, keyedReloads: keyed }
      });
    }

    if (db.inserts > createCount) {
      return createVerdict({
        agentName: this.name,
        verdict: 'no_action',
        confidence: 'medium',
        reasoning: `${db.inserts} inserts exceed the ${createCount} records created by factories; the example writes beyond fixture setup`,
        metadata: { createCount, inserts: db.inserts }
      });
    }

    // every write is accounted for by fixture setup
    const confidence: Confidence = db.inserts > 0 ? 'high' : 'medium';

    const reasoning = creates
      .map(f => `create(:${f.name}) used ${f.usage.count} time${f.usage.count === 1 ? '' : 's'}; build_stubbed(:${f.name}) avoids the insert`)
      .join('; ');

    return createVerdict({
      agentName: this.name,
      verdict: 'prefer_build_stubbed',
      confidence,
      reasoning,
      suggestion: {
        factory: dominant.name,
        fromValue: `create(:${dominant.name})`,
        toValue: `build_stubbed(:${dominant.name})`
      },
      metadata: {
        createCount,
        inserts: db.inserts,
        factories: creates.map(f => f.name)
      }
    });
  }
}
