/**
 * Voting Engine Constants
 *
 * Fixed vote weights. Tunable weights live in src/config.
 */

import { VoteCategory } from '../../types';

export const ENGINE_VERSION = 'v1.0';

/**
 * Points per scored category. `veto` is deliberately absent: it is a
 * disqualification flag and never takes part in a sum.
 */
export const VOTE_POINTS = {
  super_like: 2,
  like: 1,
  ok: 0,
  /** Soft veto: outweighs any realistic number of positive votes */
  dislike: -100,
} as const satisfies Record<Exclude<VoteCategory, 'veto'>, number>;

export const POSITIVE_CATEGORIES: readonly VoteCategory[] = ['super_like', 'like'];

/** Cuisine key used for variety tracking when a candidate has none */
export const UNKNOWN_CUISINE = 'unknown';
