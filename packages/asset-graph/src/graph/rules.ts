// Pairwise relationship rules evaluated by the inference engine

import { UNKNOWN_SECTOR, isBond, type Asset } from '../models/asset.js';

export const RelationshipType = {
  SameSector: 'same_sector',
  CorporateLink: 'corporate_link',
  EventImpact: 'event_impact',
} as const;

export const SAME_SECTOR_STRENGTH = 0.7;
export const CORPORATE_LINK_STRENGTH = 0.9;

export interface RuleMatch {
  sourceId: string;
  targetId: string;
  relationshipType: string;
  strength: number;
  /** Also store the reverse edge with the same type and strength. */
  bidirectional: boolean;
}

/**
 * A rule inspects one unordered pair of distinct assets. `first` always sorts
 * before `second` by id; the rule decides the direction of any edge it emits.
 */
export interface RelationshipRule {
  readonly name: string;
  evaluate(first: Asset, second: Asset): RuleMatch | null;
}

export const sameSectorRule: RelationshipRule = {
  name: RelationshipType.SameSector,
  evaluate(first, second) {
    if (first.sector !== second.sector || first.sector === UNKNOWN_SECTOR) return null;
    return {
      sourceId: first.id,
      targetId: second.id,
      relationshipType: RelationshipType.SameSector,
      strength: SAME_SECTOR_STRENGTH,
      bidirectional: true,
    };
  },
};

export const corporateLinkRule: RelationshipRule = {
  name: RelationshipType.CorporateLink,
  evaluate(first, second) {
    let bond: Asset | null = null;
    let issuer: Asset | null = null;
    if (isBond(first) && first.issuerId === second.id) {
      bond = first;
      issuer = second;
    } else if (isBond(second) && second.issuerId === first.id) {
      bond = second;
      issuer = first;
    }
    if (!bond || !issuer) return null;
    return {
      sourceId: bond.id,
      targetId: issuer.id,
      relationshipType: RelationshipType.CorporateLink,
      strength: CORPORATE_LINK_STRENGTH,
      bidirectional: false,
    };
  },
};

export const DEFAULT_RULES: readonly RelationshipRule[] = [sameSectorRule, corporateLinkRule];
