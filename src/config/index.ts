/**
 * Engine configuration
 *
 * Defaults reproduce the reference behavior exactly. Hosts may override
 * them per call or load overrides from the environment.
 */

import { z } from 'zod';
import { InvalidConfigError } from '../utils/errors';

export const VarietyModeEnum = z.enum(['track', 'weighted']);
export type VarietyMode = z.infer<typeof VarietyModeEnum>;

export const EngineConfigSchema = z.object({
  recommendation: z.object({
    /** Weight of the normalized score in recommendation strength */
    scoreWeight: z.number().min(0).max(1),
    consensusWeight: z.number().min(0).max(1),
    positiveWeight: z.number().min(0).max(1),
    /** Score at which the normalized score reaches 100 */
    normalizationCap: z.number().positive(),
  }),
  /** Default threshold for filterByMinimumConsensus, in percent */
  minimumConsensus: z.number().min(0).max(100),
  variety: z.object({
    /**
     * 'track' walks candidates in score order and only records bonuses.
     * 'weighted' lets the bonus pick the next candidate.
     */
    mode: VarietyModeEnum,
    unseenCuisineBonus: z.number().min(0),
    unseenDifficultyBonus: z.number().min(0),
  }),
  /** Candidate count above which the orchestrator warns about Schulze cost */
  schulzeWarnAt: z.number().int().positive(),
  /** Share of the budget above which a selection is "near limit" */
  nearLimitRatio: z.number().gt(0).max(1),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  recommendation: {
    scoreWeight: 0.4,
    consensusWeight: 0.3,
    positiveWeight: 0.3,
    normalizationCap: 20,
  },
  minimumConsensus: 60,
  variety: {
    mode: 'track',
    unseenCuisineBonus: 10,
    unseenDifficultyBonus: 5,
  },
  schulzeWarnAt: 50,
  nearLimitRatio: 0.9,
};

export interface EngineConfigOverrides {
  recommendation?: Partial<EngineConfig['recommendation']>;
  minimumConsensus?: number;
  variety?: Partial<EngineConfig['variety']>;
  schulzeWarnAt?: number;
  nearLimitRatio?: number;
}

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws InvalidConfigError when the merged config is out of range
 */
export function resolveEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const merged = {
    ...DEFAULT_ENGINE_CONFIG,
    ...overrides,
    recommendation: { ...DEFAULT_ENGINE_CONFIG.recommendation, ...overrides.recommendation },
    variety: { ...DEFAULT_ENGINE_CONFIG.variety, ...overrides.variety },
  };

  const result = EngineConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new InvalidConfigError('Engine configuration is invalid', {
      issues: result.error.issues,
    });
  }

  return result.data;
}

/**
 * Load overrides from environment variables.
 *
 * CONSENSUS_VARIETY_MODE     track | weighted
 * CONSENSUS_MIN_CONSENSUS    percent, e.g. 60
 * CONSENSUS_SCHULZE_WARN_AT  candidate count
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const overrides: EngineConfigOverrides = {};

  if (env.CONSENSUS_VARIETY_MODE) {
    const mode = VarietyModeEnum.safeParse(env.CONSENSUS_VARIETY_MODE);
    if (!mode.success) {
      throw new InvalidConfigError(
        `CONSENSUS_VARIETY_MODE must be one of ${VarietyModeEnum.options.join(', ')}`,
        { value: env.CONSENSUS_VARIETY_MODE }
      );
    }
    overrides.variety = { mode: mode.data };
  }

  if (env.CONSENSUS_MIN_CONSENSUS) {
    overrides.minimumConsensus = parseFloat(env.CONSENSUS_MIN_CONSENSUS);
  }

  if (env.CONSENSUS_SCHULZE_WARN_AT) {
    overrides.schulzeWarnAt = parseInt(env.CONSENSUS_SCHULZE_WARN_AT, 10);
  }

  const config = resolveEngineConfig(overrides);

  if (config.variety.mode === 'weighted') {
    console.warn('[Config] Weighted variety selection enabled; selections may differ from score order.');
  }

  return config;
}
