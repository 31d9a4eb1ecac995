/**
 * Shared Klotski types.
 *
 * The board configuration records mirror what the board editor hands to
 * the engine; the state-space records are the plain, JSON-safe projection
 * of a built graph consumed by renderers.
 */

export type MoveDirection = 'left' | 'right' | 'up' | 'down';

export const MOVE_DIRECTIONS: readonly MoveDirection[] = ['left', 'right', 'up', 'down'];

/**
 * Unit step offered by Board.getPossibleMoves, in the order candidates are
 * tested: left, right, up, down.
 */
export interface DirectionVector {
  dx: number;
  dy: number;
}

// ============================================================================
// Board configuration (input)
// ============================================================================

export interface BlockConfig {
  id: number;
  width: number;
  height: number;
  x: number;
  y: number;
}

/**
 * Input record for a puzzle. `winningBlockId` of -1 is treated the same as
 * an absent value (the editor's "no winning block" sentinel).
 */
export interface BoardConfig {
  rows: number;
  columns: number;
  pinsEnabled: boolean;
  winningBlockId?: number | undefined;
  winningX?: number | undefined;
  winningY?: number | undefined;
  exitWidth: number;
  blocks: BlockConfig[];
}

export const NO_WINNING_BLOCK = -1;

export interface BoardConfigValidationResult {
  valid: boolean;
  errors: string[];
}

// ============================================================================
// State space (output projection)
// ============================================================================

export interface KlotskiPiece {
  id: number;
  width: number;
  height: number;
}

export interface KlotskiNode {
  id: string;
  positions: number[][];
  is_winning: boolean;
  is_starting: boolean;
}

export interface KlotskiEdge {
  source: string;
  target: string;
  piece_id: number;
  direction: MoveDirection;
}

export interface KlotskiMetadata {
  total_nodes: number;
  total_edges: number;
  board_width: number;
  board_height: number;
}

export interface KlotskiStateSpace {
  metadata: KlotskiMetadata;
  pieces: KlotskiPiece[];
  nodes: KlotskiNode[];
  edges: KlotskiEdge[];
}
