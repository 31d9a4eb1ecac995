import { z } from 'zod';
import {
  NO_WINNING_BLOCK,
  type BlockConfig,
  type BoardConfig,
  type BoardConfigValidationResult,
} from '../types/klotski';
import { BoardConfigError, EngineErrorCode } from '../engine/errors';

// Block validation
// NOTE: width/height positivity is checked by validateBoardConfig rather
// than here so that size problems are reported alongside overlap and bounds
// problems in a single list.
export const BlockConfigSchema = z.object({
  id: z.number().int(),
  width: z.number().int(),
  height: z.number().int(),
  x: z.number().int(),
  y: z.number().int(),
});

export const BoardConfigSchema = z.object({
  rows: z.number().int().min(1),
  columns: z.number().int().min(1),
  pinsEnabled: z.boolean().default(false),
  winningBlockId: z.number().int().optional(),
  winningX: z.number().int().optional(),
  winningY: z.number().int().optional(),
  exitWidth: z.number().int().min(1).default(1),
  blocks: z.array(BlockConfigSchema),
});

export type BoardConfigInput = z.input<typeof BoardConfigSchema>;

/**
 * Parse an untrusted value into a BoardConfig. Structural problems are
 * reported as a single CONFIG_INVALID_SHAPE error listing every issue as
 * `path: message`.
 */
export function parseBoardConfig(raw: unknown): BoardConfig {
  const result = BoardConfigSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
    throw new BoardConfigError(EngineErrorCode.CONFIG_INVALID_SHAPE, 'Board configuration has an invalid shape', {
      errors,
    });
  }
  return result.data;
}

/**
 * The designated winning block id, or undefined when none is set (absent or
 * the -1 sentinel).
 */
export function getWinningBlockId(config: BoardConfig): number | undefined {
  const id = config.winningBlockId;
  return id === undefined || id === NO_WINNING_BLOCK ? undefined : id;
}

function rectanglesOverlap(a: BlockConfig, b: BlockConfig): boolean {
  return a.x < b.x + b.width && a.x + a.width > b.x && a.y < b.y + b.height && a.y + a.height > b.y;
}

/**
 * Semantic validation of a board configuration. Collects every problem
 * rather than stopping at the first one.
 */
export function validateBoardConfig(config: BoardConfig): BoardConfigValidationResult {
  const errors: string[] = [];
  const { rows, columns, blocks } = config;

  for (const block of blocks) {
    if (block.width < 1 || block.height < 1) {
      errors.push(`Block ${block.id} has invalid size (${block.width}x${block.height}).`);
    }
    if (block.x < 0 || block.y < 0) {
      errors.push(`Block ${block.id} has negative position (${block.x}, ${block.y}).`);
    }
    if (block.x + block.width > columns || block.y + block.height > rows) {
      errors.push(
        `Block ${block.id} does not fit inside the board (pos ${block.x},${block.y}, size ${block.width}x${block.height}).`
      );
    }
  }

  for (let i = 0; i < blocks.length; i++) {
    for (let j = i + 1; j < blocks.length; j++) {
      const a = blocks[i];
      const b = blocks[j];
      if (rectanglesOverlap(a, b)) {
        errors.push(`Blocks ${a.id} and ${b.id} overlap!`);
      }
    }
  }

  const seen = new Set<number>();
  const duplicates = new Set<number>();
  for (const block of blocks) {
    if (seen.has(block.id)) {
      duplicates.add(block.id);
    }
    seen.add(block.id);
  }
  for (const id of duplicates) {
    errors.push(`Block id ${id} is used by more than one block.`);
  }

  const winningBlockId = getWinningBlockId(config);
  if (winningBlockId !== undefined) {
    if (!seen.has(winningBlockId)) {
      errors.push(`Winning block ID ${winningBlockId} does not exist.`);
    } else if (config.winningX === undefined || config.winningY === undefined) {
      errors.push(`Winning block ID ${winningBlockId} has no exit position.`);
    } else if (config.winningX < 0 || config.winningY < 0 || config.winningX + config.exitWidth > columns) {
      errors.push('Winning exit position is outside the board.');
    }
  }

  return { valid: errors.length === 0, errors };
}
