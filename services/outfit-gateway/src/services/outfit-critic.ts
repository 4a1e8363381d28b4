/**
 * Outfit Critic
 *
 * Optional post-filter that runs after scoring. A critic can veto outfits but
 * cannot reorder them: the scorer's ranking of the kept outfits stands.
 * Outfits the critic returns no verdict for are kept.
 */

import { ContextDirective, ScoredOutfit } from '../types/outfit-recommendation';

const LOG_PREFIX = '[outfit-critic]';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export type CriticDecision = 'keep' | 'reject';

export interface CriticVerdict {
  outfit_id: string;
  decision: CriticDecision;
  reason?: string;
}

export interface OutfitCritic {
  readonly name: string;
  review(directive: ContextDirective, outfits: readonly ScoredOutfit[]): Promise<CriticVerdict[]>;
}

export interface RejectedOutfit {
  outfit_id: string;
  reason: string;
}

export interface CriticOutcome {
  critic: string;
  outfits: ScoredOutfit[];
  rejected: RejectedOutfit[];
}

export const passthroughCritic: OutfitCritic = {
  name: 'passthrough',
  review: async (_directive, outfits) =>
    outfits.map((outfit): CriticVerdict => ({ outfit_id: outfit.id, decision: 'keep' }))
};

/**
 * Calendar days from the day an item was worn to the target date.
 */
function daysSinceWorn(wornAt: string, targetDate: string): number {
  const worn = Date.parse(`${wornAt.slice(0, 10)}T00:00:00Z`);
  const target = Date.parse(`${targetDate}T00:00:00Z`);
  return Math.round((target - worn) / MS_PER_DAY);
}

/**
 * Rejects outfits repeating a core item (anything but accessories) worn in
 * the minDays days before the effective date. Wearing the same item again on
 * the day it was worn is allowed.
 */
export function createRecentlyWornCritic(minDays: number): OutfitCritic {
  return {
    name: 'recently_worn',
    review: async (directive, outfits) =>
      outfits.map((outfit): CriticVerdict => {
        for (const item of outfit.items) {
          if (item.category === 'accessory' || !item.last_worn_at) continue;
          const days = daysSinceWorn(item.last_worn_at, directive.effective_date);
          if (days >= 1 && days <= minDays) {
            return {
              outfit_id: outfit.id,
              decision: 'reject',
              reason: `${item.id} was worn ${days} day(s) ago`
            };
          }
        }
        return { outfit_id: outfit.id, decision: 'keep' };
      })
  };
}

/**
 * Run a critic and drop the outfits it rejects, preserving order.
 */
export async function applyCritic(
  critic: OutfitCritic,
  directive: ContextDirective,
  outfits: readonly ScoredOutfit[]
): Promise<CriticOutcome> {
  const verdicts = await critic.review(directive, outfits);
  const rejections = new Map<string, string>();
  for (const verdict of verdicts) {
    if (verdict.decision === 'reject') {
      rejections.set(verdict.outfit_id, verdict.reason ?? 'rejected');
    }
  }

  const kept = outfits.filter(outfit => !rejections.has(outfit.id));
  const rejected = outfits
    .filter(outfit => rejections.has(outfit.id))
    .map(outfit => ({ outfit_id: outfit.id, reason: rejections.get(outfit.id) ?? 'rejected' }));

  if (rejected.length > 0) {
    console.log(`${LOG_PREFIX} ${critic.name} rejected ${rejected.length}/${outfits.length} outfits`);
  }

  return { critic: critic.name, outfits: kept, rejected };
}
