export {
  EngineConfigSchema,
  CarrierConfigSchema,
  StrategyStepSchema,
  ClassifierConfigSchema,
  STRATEGY_KINDS,
  DEFAULT_ANTI_BOT_KEYWORDS,
} from './schema.js';
export type { EngineConfig, EngineConfigInput, CarrierConfig, ClassifierConfig, StrategyStepConfig } from './schema.js';
export { parseEngineConfig, loadEngineConfig, applyEnvOverrides } from './loader.js';
export { compileCarriers } from './profiles.js';
export type { CompiledCarriers } from './profiles.js';
