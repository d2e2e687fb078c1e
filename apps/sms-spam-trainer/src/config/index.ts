/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadTrainerConfig,
    loadTrainerConfigWithFallback,
    applyEnvOverrides,
    getDefaultConfig,
    ENV_OVERRIDES,
    MAX_SEED,
    type TrainerConfig,
} from "./loadConfig.js";
