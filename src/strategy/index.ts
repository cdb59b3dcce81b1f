export { StrategyEngine } from './StrategyEngine.js';
export { evaluateBar, isExtreme, isInsideRange, counterKey } from './stateMachine.js';
export { validateStrategyConfig, StrategyConfigSchema } from './validation.js';
export { FLAT_POSITION_STATE } from './types.js';
export type {
  StrategyConfig,
  StrategyConfigInput,
  EnabledModes,
  PositionState,
  BarContext,
  StepResult,
  DecisionConfig,
  EngineSnapshot,
} from './types.js';
