import fs from 'fs';
import { randomUUID } from 'crypto';
import { config } from '../config';
import { logger, runWithContext } from '../utils/logger';
import {
  BoardConfigError,
  DecisionGraphBuilder,
  EngineErrorCode,
  boardFromConfigUnchecked,
  parseBoardConfig,
  summarizeGraph,
  validateBoardConfig,
  type BoardConfig,
  type BuildProgress,
  type GraphNode,
  type GraphSummary,
} from '../../shared/engine';

// ============================================================================
// Types
// ============================================================================

export interface ExplorerOptions {
  /** Expanded states between progress log lines; 0 disables them. */
  progressInterval: number;
}

/**
 * Outcome of one exploration run.
 */
export interface ExplorationReport {
  runId: string;
  root: GraphNode;
  /** Signature → node map for every discovered state. */
  nodes: ReadonlyMap<string, GraphNode>;
  summary: GraphSummary;
  /** Wall-clock duration of the graph build in milliseconds */
  durationMs: number;
}

export const DEFAULT_EXPLORER_OPTIONS: ExplorerOptions = {
  progressInterval: config.exploration.progressInterval,
};

// ============================================================================
// Service
// ============================================================================

/**
 * Node-side facade over the engine: validates a configuration, builds the
 * reachable-state graph and logs the outcome. The engine stays free of
 * logging; everything observable happens here.
 */
export class BoardExplorerService {
  private options: ExplorerOptions;

  constructor(options?: Partial<ExplorerOptions>) {
    this.options = { ...DEFAULT_EXPLORER_OPTIONS, ...options };
  }

  /**
   * Read and structurally validate a board configuration JSON file.
   *
   * @throws BoardConfigError CONFIG_UNREADABLE when the file cannot be read
   *   or is not JSON, CONFIG_INVALID_SHAPE when the JSON has the wrong shape
   */
  loadConfigFile(filePath: string): BoardConfig {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new BoardConfigError(EngineErrorCode.CONFIG_UNREADABLE, `Cannot read board configuration: ${filePath}`, {
        filePath,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    return parseBoardConfig(raw);
  }

  /**
   * Validate the configuration and build its full reachable-state graph.
   *
   * @param source label attached to every log line of this run (e.g. a file
   *   path)
   * @throws BoardConfigError CONFIG_VALIDATION_FAILED when the board is
   *   physically impossible
   */
  explore(boardConfig: BoardConfig, source?: string): ExplorationReport {
    const runId = randomUUID();
    return runWithContext({ runId, ...(source ? { source } : {}) }, () => this.runExploration(runId, boardConfig));
  }

  private runExploration(runId: string, boardConfig: BoardConfig): ExplorationReport {
    const validation = validateBoardConfig(boardConfig);
    if (!validation.valid) {
      logger.warn('Board configuration rejected', { errors: validation.errors });
      throw new BoardConfigError(EngineErrorCode.CONFIG_VALIDATION_FAILED, 'Board configuration errors', {
        errors: validation.errors,
      });
    }

    const board = boardFromConfigUnchecked(boardConfig);
    logger.info('Starting state-space exploration', {
      rows: board.rows,
      columns: board.columns,
      blocks: board.blocks.length,
      pinsEnabled: board.pinsEnabled,
    });

    const builder = new DecisionGraphBuilder({
      progressInterval: this.options.progressInterval,
      onProgress: (progress: BuildProgress) => {
        logger.debug('Exploration progress', { ...progress });
      },
    });

    const startTime = Date.now();
    const root = builder.buildGraph(board);
    const durationMs = Date.now() - startTime;

    const summary = summarizeGraph(root);
    logger.info('State-space exploration complete', { ...summary, durationMs });

    return { runId, root, nodes: builder.getNodes(), summary, durationMs };
  }
}
