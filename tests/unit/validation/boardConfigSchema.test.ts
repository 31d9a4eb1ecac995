/**
 * Test suite for src/shared/validation/boardConfigSchema.ts and the
 * validating board factory built on it.
 */

import { createBoardFromConfig, boardFromConfigUnchecked } from '../../../src/shared/engine/boardFactory';
import { BoardConfigError, EngineErrorCode } from '../../../src/shared/engine/errors';
import {
  getWinningBlockId,
  parseBoardConfig,
  validateBoardConfig,
} from '../../../src/shared/validation/boardConfigSchema';
import { block, createTestConfig } from '../../utils/fixtures';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('boardConfigSchema', () => {
  describe('parseBoardConfig', () => {
    it('fills defaults for pins and exit width', () => {
      expect(parseBoardConfig({ rows: 2, columns: 3, blocks: [] })).toEqual({
        rows: 2,
        columns: 3,
        pinsEnabled: false,
        exitWidth: 1,
        blocks: [],
      });
    });

    it('keeps optional winning metadata', () => {
      const parsed = parseBoardConfig({
        rows: 4,
        columns: 4,
        pinsEnabled: true,
        winningBlockId: 1,
        winningX: 2,
        winningY: 3,
        exitWidth: 2,
        blocks: [block(1, 2, 1, 0, 0)],
      });
      expect(parsed.winningBlockId).toBe(1);
      expect(parsed.winningX).toBe(2);
      expect(parsed.winningY).toBe(3);
      expect(parsed.exitWidth).toBe(2);
      expect(parsed.blocks).toEqual([block(1, 2, 1, 0, 0)]);
    });

    it('reports every structural problem with its path', () => {
      const error = catchError(() => parseBoardConfig({ rows: 0, columns: 'three', blocks: [] }));

      expect(error).toBeInstanceOf(BoardConfigError);
      if (!(error instanceof BoardConfigError)) return;
      expect(error.code).toBe(EngineErrorCode.CONFIG_INVALID_SHAPE);
      expect(error.errors.map((e) => e.split(':')[0])).toEqual(['rows', 'columns']);
    });

    it('reports nested block paths', () => {
      const error = catchError(() =>
        parseBoardConfig({ rows: 2, columns: 2, blocks: [{ id: 1, width: 1, height: 1, x: 0.5, y: 0 }] })
      );

      expect(error).toBeInstanceOf(BoardConfigError);
      if (!(error instanceof BoardConfigError)) return;
      expect(error.errors.map((e) => e.split(':')[0])).toEqual(['blocks.0.x']);
    });

    it('reports a non-object at the root', () => {
      const error = catchError(() => parseBoardConfig(null));

      expect(error).toBeInstanceOf(BoardConfigError);
      if (!(error instanceof BoardConfigError)) return;
      expect(error.errors).toHaveLength(1);
      expect(error.errors[0].startsWith('root: ')).toBe(true);
    });
  });

  describe('getWinningBlockId', () => {
    it('treats -1 and absence as no winning block', () => {
      expect(getWinningBlockId(createTestConfig())).toBeUndefined();
      expect(getWinningBlockId(createTestConfig({ winningBlockId: -1 }))).toBeUndefined();
      expect(getWinningBlockId(createTestConfig({ winningBlockId: 0 }))).toBe(0);
    });
  });

  describe('validateBoardConfig', () => {
    it('accepts a valid board', () => {
      expect(validateBoardConfig(createTestConfig())).toEqual({ valid: true, errors: [] });
    });

    it('rejects blocks without area', () => {
      const result = validateBoardConfig(createTestConfig({ blocks: [block(1, 0, 1, 0, 0)] }));
      expect(result).toEqual({ valid: false, errors: ['Block 1 has invalid size (0x1).'] });
    });

    it('rejects negative positions', () => {
      const result = validateBoardConfig(createTestConfig({ blocks: [block(2, 1, 1, -1, 0)] }));
      expect(result.errors).toEqual(['Block 2 has negative position (-1, 0).']);
    });

    it('rejects blocks that stick out of the board', () => {
      const result = validateBoardConfig(createTestConfig({ blocks: [block(3, 2, 1, 2, 0)] }));
      expect(result.errors).toEqual(['Block 3 does not fit inside the board (pos 2,0, size 2x1).']);
    });

    it('rejects overlapping blocks', () => {
      const result = validateBoardConfig(
        createTestConfig({ rows: 2, columns: 2, blocks: [block(1, 2, 1, 0, 0), block(2, 1, 1, 1, 0)] })
      );
      expect(result.errors).toEqual(['Blocks 1 and 2 overlap!']);
    });

    it('rejects duplicate ids', () => {
      const result = validateBoardConfig(createTestConfig({ blocks: [block(1, 1, 1, 0, 0), block(1, 1, 1, 2, 0)] }));
      expect(result.errors).toEqual(['Block id 1 is used by more than one block.']);
    });

    it('rejects a winning block that does not exist', () => {
      const result = validateBoardConfig(createTestConfig({ winningBlockId: 9, winningX: 0, winningY: 0 }));
      expect(result.errors).toEqual(['Winning block ID 9 does not exist.']);
    });

    it('ignores the -1 sentinel', () => {
      expect(validateBoardConfig(createTestConfig({ winningBlockId: -1 })).valid).toBe(true);
    });

    it('requires an exit position for a winning block', () => {
      const result = validateBoardConfig(createTestConfig({ winningBlockId: 1 }));
      expect(result.errors).toEqual(['Winning block ID 1 has no exit position.']);
    });

    it('rejects an exit wider than the remaining columns', () => {
      const result = validateBoardConfig(
        createTestConfig({ winningBlockId: 1, winningX: 2, winningY: 0, exitWidth: 2 })
      );
      expect(result.errors).toEqual(['Winning exit position is outside the board.']);
    });

    it('accepts an exit that ends on the right edge', () => {
      const result = validateBoardConfig(
        createTestConfig({ winningBlockId: 1, winningX: 1, winningY: 1, exitWidth: 2 })
      );
      expect(result.valid).toBe(true);
    });

    it('collects every problem in order', () => {
      const result = validateBoardConfig(
        createTestConfig({
          blocks: [block(1, 1, 1, 0, 0), block(2, 2, 2, 0, 0)],
          winningBlockId: 7,
        })
      );
      expect(result.errors).toEqual(['Blocks 1 and 2 overlap!', 'Winning block ID 7 does not exist.']);
    });
  });

  describe('createBoardFromConfig', () => {
    it('builds a board with blocks in configuration order', () => {
      const board = createBoardFromConfig(
        createTestConfig({
          pinsEnabled: true,
          blocks: [block(5, 1, 1, 2, 1), block(1, 1, 1, 0, 0)],
          winningBlockId: 1,
          winningX: 2,
          winningY: 0,
        })
      );

      expect(board.rows).toBe(2);
      expect(board.columns).toBe(3);
      expect(board.pinsEnabled).toBe(true);
      expect(board.blocks.map((b) => b.id)).toEqual([5, 1]);
      expect(board.winningBlockId).toBe(1);
      expect(board.getHash()).toBe('1:0,0;5:2,1;');
    });

    it('drops the -1 sentinel', () => {
      const board = createBoardFromConfig(createTestConfig({ winningBlockId: -1, winningX: 0, winningY: 0 }));
      expect(board.winningBlockId).toBeUndefined();
      expect(board.isWinning()).toBe(false);
    });

    it('throws with the full error list for an invalid board', () => {
      const error = catchError(() =>
        createBoardFromConfig(createTestConfig({ blocks: [block(1, 1, 1, 0, 0), block(2, 1, 1, 0, 0)] }))
      );

      expect(error).toBeInstanceOf(BoardConfigError);
      if (!(error instanceof BoardConfigError)) return;
      expect(error.code).toBe(EngineErrorCode.CONFIG_VALIDATION_FAILED);
      expect(error.errors).toEqual(['Blocks 1 and 2 overlap!']);
    });

    it('can skip validation for trusted input', () => {
      const board = boardFromConfigUnchecked(
        createTestConfig({ blocks: [block(1, 1, 1, 0, 0), block(2, 1, 1, 0, 0)] })
      );
      expect(board.blocks).toHaveLength(2);
    });
  });
});
