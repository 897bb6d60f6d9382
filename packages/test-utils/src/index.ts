/**
 * @tacticforge/test-utils
 *
 * Shared test utilities for the puzzle extractor test suites
 */

// Fixture loading
export { getFixturePath } from './fixtures/loader.js';

// Mock services
export {
  createMockEngine,
  positionKey,
  type MockEngine,
  type MockEngineConfig,
  type ScriptedAnswer,
  type ScriptedLine,
} from './mocks/mock-engine.js';

// Builders
export { GameBuilder, gameBuilder, playMoves } from './builders/game-builder.js';
export { buildCandidate } from './builders/candidate-builder.js';
