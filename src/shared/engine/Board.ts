import type { DirectionVector } from '../types/klotski';
import { Block } from './Block';
import { EngineErrorCode, InvalidBoardState } from './errors';

/**
 * Winning / exit metadata carried unchanged by every clone of a Board.
 */
export interface BoardWinCondition {
  winningBlockId?: number | undefined;
  winningX?: number | undefined;
  winningY?: number | undefined;
  /** Width of the exit opening in columns. Defaults to 1. */
  exitWidth?: number | undefined;
}

/**
 * A single unit step for one block, as produced by
 * {@link Board.getPossibleMoves}.
 */
export interface PossibleMove {
  block: Block;
  dx: number;
  dy: number;
}

const HORIZONTAL: readonly DirectionVector[] = [
  { dx: -1, dy: 0 },
  { dx: 1, dy: 0 },
];

const VERTICAL: readonly DirectionVector[] = [
  { dx: 0, dy: -1 },
  { dx: 0, dy: 1 },
];

const ALL_DIRECTIONS: readonly DirectionVector[] = [...HORIZONTAL, ...VERTICAL];

/**
 * A complete puzzle configuration.
 *
 * Boards follow a clone-on-write discipline: successor generation always
 * clones and then shifts one block of the clone, so a Board that has been
 * handed to a GraphNode is never mutated again.
 *
 * Structural invariants (no overlaps, blocks within bounds, winning block
 * present) are not checked here; see createBoardFromConfig for the
 * validating entry point.
 */
export class Board {
  readonly rows: number;
  readonly columns: number;
  readonly pinsEnabled: boolean;
  readonly winningBlockId: number | undefined;
  readonly winningX: number | undefined;
  readonly winningY: number | undefined;
  readonly exitWidth: number;

  private readonly _blocks: Block[] = [];

  constructor(rows: number, columns: number, pinsEnabled: boolean, win: BoardWinCondition = {}) {
    this.rows = rows;
    this.columns = columns;
    this.pinsEnabled = pinsEnabled;
    this.winningBlockId = win.winningBlockId;
    this.winningX = win.winningX;
    this.winningY = win.winningY;
    this.exitWidth = win.exitWidth ?? 1;
  }

  /** Blocks in insertion order. */
  get blocks(): readonly Block[] {
    return this._blocks;
  }

  addBlock(block: Block): void {
    this._blocks.push(block);
  }

  getBlock(id: number): Block | undefined {
    return this._blocks.find((b) => b.id === id);
  }

  /**
   * Deep copy: same dimensions and win metadata, every block cloned in
   * original order.
   */
  clone(): Board {
    const board = new Board(this.rows, this.columns, this.pinsEnabled, {
      winningBlockId: this.winningBlockId,
      winningX: this.winningX,
      winningY: this.winningY,
      exitWidth: this.exitWidth,
    });
    for (const block of this._blocks) {
      board.addBlock(block.clone());
    }
    return board;
  }

  /**
   * Canonical signature: blocks sorted by id, each rendered as
   * `{id}:{x},{y};`. Independent of insertion order.
   */
  getHash(): string {
    return [...this._blocks]
      .sort((a, b) => a.id - b.id)
      .map((b) => `${b.id}:${b.x},${b.y};`)
      .join('');
  }

  isWinning(): boolean {
    if (this.winningBlockId === undefined || this.winningX === undefined || this.winningY === undefined) {
      return false;
    }
    const winningBlock = this.getBlock(this.winningBlockId);
    if (!winningBlock) {
      return false;
    }
    return winningBlock.x === this.winningX && winningBlock.y === this.winningY;
  }

  /**
   * Whether a width×height rectangle at (x, y) can be occupied by
   * movingBlock.
   *
   * The winning block may protrude past the right edge when parked exactly
   * on the exit coordinates, and past the bottom edge whenever its row is
   * the exit row. exitWidth is not consulted here; it only gates exit
   * moves in {@link getPossibleMoves}.
   */
  isAreaFree(x: number, y: number, width: number, height: number, movingBlock: Block): boolean {
    const isWinningBlock = movingBlock.id === this.winningBlockId;

    if (x < 0 || y < 0) {
      return false;
    }
    if (x + width > this.columns && !(x === this.winningX && y === this.winningY && isWinningBlock)) {
      return false;
    }
    if (y + height > this.rows && !(y === this.winningY && isWinningBlock)) {
      return false;
    }

    for (const block of this._blocks) {
      if (block.id === movingBlock.id) continue;
      if (block.overlaps(x, y, width, height)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Candidate directions for a block. With pins enabled a wide block slides
   * only horizontally and a tall block only vertically; square blocks and
   * unpinned boards get all four.
   */
  getCandidateDirections(block: Block): readonly DirectionVector[] {
    if (!this.pinsEnabled) {
      return ALL_DIRECTIONS;
    }
    if (block.width > block.height) {
      return HORIZONTAL;
    }
    if (block.height > block.width) {
      return VERTICAL;
    }
    return ALL_DIRECTIONS;
  }

  /**
   * Exit move: the winning block landing exactly on the exit coordinates
   * through an opening at least as wide as the block.
   */
  isExitMove(block: Block, newX: number, newY: number): boolean {
    return (
      block.id === this.winningBlockId &&
      newX === this.winningX &&
      newY === this.winningY &&
      this.exitWidth >= block.width
    );
  }

  private isInsideBoard(x: number, y: number, width: number, height: number): boolean {
    return x >= 0 && y >= 0 && x + width <= this.columns && y + height <= this.rows;
  }

  /**
   * Legal unit steps for one block. Free placements outside the board are
   * yielded only when they are exit moves.
   */
  *getPossibleMoves(block: Block): Generator<PossibleMove> {
    for (const { dx, dy } of this.getCandidateDirections(block)) {
      const newX = block.x + dx;
      const newY = block.y + dy;

      if (!this.isAreaFree(newX, newY, block.width, block.height, block)) {
        continue;
      }

      if (this.isExitMove(block, newX, newY) || this.isInsideBoard(newX, newY, block.width, block.height)) {
        yield { block, dx, dy };
      }
    }
  }

  /**
   * Every successor Board reachable by one legal move, enumerated block by
   * block in insertion order. Each successor is an independent clone with
   * exactly one block shifted by one cell.
   */
  *getNextStates(): Generator<Board> {
    for (const block of this._blocks) {
      for (const { block: moving, dx, dy } of this.getPossibleMoves(block)) {
        const next = this.clone();
        const target = next.getBlock(moving.id);
        if (!target) {
          throw new InvalidBoardState(
            EngineErrorCode.STATE_BLOCK_NOT_FOUND,
            `Block ${moving.id} missing from cloned board`,
            { blockId: moving.id }
          );
        }
        target.x += dx;
        target.y += dy;
        yield next;
      }
    }
  }
}
