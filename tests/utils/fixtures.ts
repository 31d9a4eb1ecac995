/**
 * Test Fixtures and Utilities
 * Common boards and helpers for Klotski engine tests
 */

import { Block } from '../../src/shared/engine/Block';
import { Board, type BoardWinCondition } from '../../src/shared/engine/Board';
import type { BlockConfig, BoardConfig } from '../../src/shared/types/klotski';

/**
 * Block spec helper: [id, width, height, x, y]
 */
export type BlockSpec = [id: number, width: number, height: number, x: number, y: number];

/**
 * Creates a Board with the given blocks added in order.
 */
export function createTestBoard(
  rows: number,
  columns: number,
  blocks: BlockSpec[],
  options: { pinsEnabled?: boolean } & BoardWinCondition = {}
): Board {
  const { pinsEnabled = false, ...win } = options;
  const board = new Board(rows, columns, pinsEnabled, win);
  for (const [id, width, height, x, y] of blocks) {
    board.addBlock(new Block(id, width, height, x, y));
  }
  return board;
}

/**
 * Creates a minimal BoardConfig for testing
 */
export function createTestConfig(overrides: Partial<BoardConfig> = {}): BoardConfig {
  return {
    rows: 2,
    columns: 3,
    pinsEnabled: false,
    exitWidth: 1,
    blocks: [block(1, 1, 1, 0, 0)],
    ...overrides,
  };
}

export function block(id: number, width: number, height: number, x: number, y: number): BlockConfig {
  return { id, width, height, x, y };
}

/**
 * Positions of every block, keyed by id, for compact assertions.
 */
export function positionsById(board: Board): Record<number, [number, number]> {
  const result: Record<number, [number, number]> = {};
  for (const b of board.blocks) {
    result[b.id] = [b.x, b.y];
  }
  return result;
}
