// =============================================================================
// KLOTSKI ENGINE - PUBLIC API
// =============================================================================
// Consumers (renderers, editors, the Node explorer service) should only
// import from this file.
//
// - PURE: no logging and no I/O; boards are cloned, never shared
// - SYNCHRONOUS: buildGraph runs to completion in one call
// =============================================================================

export type {
  MoveDirection,
  DirectionVector,
  BlockConfig,
  BoardConfig,
  BoardConfigValidationResult,
  KlotskiPiece,
  KlotskiNode,
  KlotskiEdge,
  KlotskiMetadata,
  KlotskiStateSpace,
} from '../types/klotski';
export { MOVE_DIRECTIONS, NO_WINNING_BLOCK } from '../types/klotski';

// Board model
export { Block } from './Block';
export { Board } from './Board';
export type { BoardWinCondition, PossibleMove } from './Board';
export { boardFromConfigUnchecked, createBoardFromConfig } from './boardFactory';

// Graph
export { GraphNode } from './GraphNode';
export type { GraphEdge } from './GraphNode';
export { DecisionGraphBuilder } from './DecisionGraphBuilder';
export type { BuildProgress, DecisionGraphBuilderOptions } from './DecisionGraphBuilder';
export { collectGraph, summarizeGraph } from './graphTraversal';
export type { CollectedGraph, GraphEdgeRecord, GraphSummary } from './graphTraversal';
export { toStateSpace } from './stateSpaceExport';

// Move labels
export {
  UNKNOWN_MOVE,
  describeMove,
  directionFromDelta,
  formatMoveDescription,
  parseMoveDescription,
  reverseDirection,
} from './moveNotation';
export type { ParsedMove } from './moveNotation';

// Validation
export {
  BoardConfigSchema,
  BlockConfigSchema,
  parseBoardConfig,
  validateBoardConfig,
  getWinningBlockId,
} from '../validation/boardConfigSchema';
export type { BoardConfigInput } from '../validation/boardConfigSchema';

// Errors
export {
  EngineErrorCode,
  KlotskiError,
  BoardConfigError,
  InvalidBoardState,
  isKlotskiError,
  isBoardConfigError,
  isInvalidBoardState,
  wrapKlotskiError,
} from './errors';
export type { KlotskiErrorJSON } from './errors';
