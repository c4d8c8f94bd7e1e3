export { StrategyLadder, type LadderState, type LadderTransition, type StrategyLadderOptions } from './strategy-ladder.js';
