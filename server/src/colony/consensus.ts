// ============================================
// Leadership Consensus
// Settles which co-located ant lays a marker this tick
// ============================================

import { tileKey, type EntityId } from '#shared';
import type { DepositClaim } from './Ant';

export interface Leadership {
  // One claim per (tile, scent): the lowest entity id
  granted: DepositClaim[];
  denied: DepositClaim[];
}

function claimKey(claim: DepositClaim): string {
  return `${tileKey(claim.spawn.location)}|${claim.spawn.scent}`;
}

/**
 * Group deposit claims by tile and scent and grant each group to its lowest id.
 * The outcome does not depend on the order claims arrive in.
 */
export function resolveLeadership(claims: readonly DepositClaim[]): Leadership {
  const winners = new Map<string, DepositClaim>();
  for (const claim of claims) {
    const key = claimKey(claim);
    const current = winners.get(key);
    if (!current || claim.entity < current.entity) {
      winners.set(key, claim);
    }
  }

  const grantedIds = new Set<EntityId>([...winners.values()].map((claim) => claim.entity));
  const byId = (a: DepositClaim, b: DepositClaim) => a.entity - b.entity;

  return {
    granted: claims.filter((claim) => grantedIds.has(claim.entity)).sort(byId),
    denied: claims.filter((claim) => !grantedIds.has(claim.entity)).sort(byId),
  };
}
