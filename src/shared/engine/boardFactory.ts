import type { BoardConfig } from '../types/klotski';
import { getWinningBlockId, validateBoardConfig } from '../validation/boardConfigSchema';
import { Block } from './Block';
import { Board } from './Board';
import { BoardConfigError, EngineErrorCode } from './errors';

/**
 * Build a Board from a configuration without validating it. Blocks are added
 * in configuration order, which becomes the board's insertion order.
 */
export function boardFromConfigUnchecked(config: BoardConfig): Board {
  const board = new Board(config.rows, config.columns, config.pinsEnabled, {
    winningBlockId: getWinningBlockId(config),
    winningX: config.winningX,
    winningY: config.winningY,
    exitWidth: config.exitWidth,
  });

  for (const b of config.blocks) {
    board.addBlock(new Block(b.id, b.width, b.height, b.x, b.y));
  }

  return board;
}

/**
 * Validating entry point for the engine: rejects overlapping, out-of-bounds
 * or otherwise impossible configurations before any search runs.
 *
 * @throws BoardConfigError with code CONFIG_VALIDATION_FAILED; the
 *   individual messages are available as `error.errors`.
 */
export function createBoardFromConfig(config: BoardConfig): Board {
  const { valid, errors } = validateBoardConfig(config);
  if (!valid) {
    throw new BoardConfigError(EngineErrorCode.CONFIG_VALIDATION_FAILED, 'Board configuration errors', {
      errors,
    });
  }
  return boardFromConfigUnchecked(config);
}
