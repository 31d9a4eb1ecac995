import { MOVE_DIRECTIONS, type MoveDirection } from '../types/klotski';
import type { Board } from './Board';

/**
 * Human-readable move labels attached to graph edges.
 *
 * Labels take the form `Block {id} moved {direction}`; a pair of boards that
 * differ in no block position is labelled `Unknown move`.
 */

export const UNKNOWN_MOVE = 'Unknown move';

const MOVE_LABEL_PATTERN = /^Block (-?\d+) moved (left|right|up|down)$/;

const REVERSE_DIRECTION: Record<MoveDirection, MoveDirection> = {
  left: 'right',
  right: 'left',
  up: 'down',
  down: 'up',
};

export interface ParsedMove {
  blockId: number;
  direction: MoveDirection;
}

/**
 * Direction of a displacement. Horizontal movement wins over vertical;
 * a zero vector falls through to 'down'.
 */
export function directionFromDelta(dx: number, dy: number): MoveDirection {
  if (dx < 0) return 'left';
  if (dx > 0) return 'right';
  if (dy < 0) return 'up';
  return 'down';
}

export function reverseDirection(direction: MoveDirection): MoveDirection {
  return REVERSE_DIRECTION[direction];
}

export function formatMoveDescription(blockId: number, direction: MoveDirection): string {
  return `Block ${blockId} moved ${direction}`;
}

/**
 * Describe the move that turns `prev` into `next`.
 *
 * Blocks are compared by index, which relies on Board.clone() preserving
 * insertion order; the first index whose position differs names the moved
 * block.
 */
export function describeMove(prev: Board, next: Board): string {
  const prevBlocks = prev.blocks;
  const nextBlocks = next.blocks;

  for (let i = 0; i < prevBlocks.length; i++) {
    const before = prevBlocks[i];
    const after = nextBlocks[i];
    if (!after) break;

    if (before.x !== after.x || before.y !== after.y) {
      const direction = directionFromDelta(after.x - before.x, after.y - before.y);
      return formatMoveDescription(before.id, direction);
    }
  }

  return UNKNOWN_MOVE;
}

/**
 * Inverse of {@link formatMoveDescription}. Returns null for
 * `Unknown move` and any label not produced by this module.
 */
export function parseMoveDescription(label: string): ParsedMove | null {
  const match = MOVE_LABEL_PATTERN.exec(label);
  if (!match) {
    return null;
  }
  const direction = match[2];
  if (!isMoveDirection(direction)) {
    return null;
  }
  return { blockId: Number(match[1]), direction };
}

function isMoveDirection(value: string | undefined): value is MoveDirection {
  return MOVE_DIRECTIONS.some((direction) => direction === value);
}
