/**
 * Paper Execution Module
 *
 * Sizes and fills trade intents for replays.
 */

// Types
export type {
  PositionSizerConfig,
  PaperBrokerConfig,
  PositionSizeResult,
  BookKey,
  Books,
  Fill,
  PaperBrokerEvents,
} from './types.js';

// Classes
export { PositionSizer } from './PositionSizer.js';
export { PaperBroker, bookKey } from './PaperBroker.js';
