// Relationship inference: rebuilds the whole store from assets, rules and events

import type { Asset } from '../models/asset.js';
import type { RegulatoryEvent } from '../models/regulatory-event.js';
import {
  appendRelationship,
  compareIds,
  notifySkip,
  type RelationshipStore,
  type SkipHandler,
} from './relationship-store.js';
import { DEFAULT_RULES, RelationshipType, type RelationshipRule } from './rules.js';

export interface InferenceOptions {
  rules?: readonly RelationshipRule[];
  onSkip?: SkipHandler;
}

/**
 * Produce a fresh relationship store. Pairs are visited in ascending id order,
 * rules in list order, then events in insertion order; each source's edge
 * list keeps that evaluation order.
 */
export function inferRelationships(
  assets: ReadonlyMap<string, Asset>,
  events: readonly RegulatoryEvent[],
  options: InferenceOptions = {},
): RelationshipStore {
  const rules = options.rules ?? DEFAULT_RULES;
  const store: RelationshipStore = new Map();

  const add = (
    sourceId: string,
    targetId: string,
    relationshipType: string,
    strength: number,
    eventId?: string,
  ): void => {
    if (!appendRelationship(store, sourceId, { targetId, relationshipType, strength })) {
      notifySkip(options.onSkip, { reason: 'duplicate', sourceId, targetId, relationshipType, eventId });
    }
  };

  const ordered = [...assets.values()].sort((a, b) => compareIds(a.id, b.id));
  for (let i = 0; i < ordered.length; i++) {
    for (let j = i + 1; j < ordered.length; j++) {
      for (const rule of rules) {
        const match = rule.evaluate(ordered[i], ordered[j]);
        if (!match) continue;
        add(match.sourceId, match.targetId, match.relationshipType, match.strength);
        if (match.bidirectional) {
          add(match.targetId, match.sourceId, match.relationshipType, match.strength);
        }
      }
    }
  }

  for (const event of events) {
    const sourceKnown = assets.has(event.assetId);
    for (const targetId of event.relatedAssets) {
      if (!sourceKnown) {
        notifySkip(options.onSkip, {
          reason: 'unknown_event_source',
          sourceId: event.assetId,
          targetId,
          relationshipType: RelationshipType.EventImpact,
          eventId: event.id,
        });
        continue;
      }
      if (!assets.has(targetId)) {
        notifySkip(options.onSkip, {
          reason: 'unknown_event_target',
          sourceId: event.assetId,
          targetId,
          relationshipType: RelationshipType.EventImpact,
          eventId: event.id,
        });
        continue;
      }
      add(event.assetId, targetId, RelationshipType.EventImpact, Math.abs(event.impactScore), event.id);
    }
  }

  return store;
}
