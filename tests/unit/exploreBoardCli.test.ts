/**
 * Argument parsing and output for scripts/explore-board.ts
 */

import path from 'path';
import { parseArgs, run } from '../../scripts/explore-board';
import { logger } from '../../src/node/utils/logger';
import type { KlotskiStateSpace } from '../../src/shared/types/klotski';

const fixture = (name: string): string => path.join(__dirname, '../fixtures/boards', name);

describe('explore-board parseArgs', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('takes the configuration path as the positional argument', () => {
    expect(parseArgs(['node', 'explore-board.ts', 'boards/a.json'])).toEqual({
      configPath: 'boards/a.json',
      json: false,
    });
  });

  it('reads --json and a spaced --progress-interval', () => {
    expect(
      parseArgs(['node', 'explore-board.ts', '--json', 'boards/a.json', '--progress-interval', '500'])
    ).toEqual({ configPath: 'boards/a.json', json: true, progressInterval: 500 });
  });

  it('reads --progress-interval=<n>', () => {
    expect(parseArgs(['node', 'explore-board.ts', 'a.json', '--progress-interval=0'])).toEqual({
      configPath: 'a.json',
      json: false,
      progressInterval: 0,
    });
  });

  it('rejects a bad progress interval', () => {
    expect(parseArgs(['node', 'explore-board.ts', 'a.json', '--progress-interval', 'often'])).toBeNull();
    expect(parseArgs(['node', 'explore-board.ts', 'a.json', '--progress-interval=-3'])).toBeNull();
    expect(parseArgs(['node', 'explore-board.ts', 'a.json', '--progress-interval'])).toBeNull();
  });

  it('rejects missing paths, extra paths and unknown flags', () => {
    expect(parseArgs(['node', 'explore-board.ts'])).toBeNull();
    expect(parseArgs(['node', 'explore-board.ts', 'a.json', 'b.json'])).toBeNull();
    expect(parseArgs(['node', 'explore-board.ts', 'a.json', '--verbose'])).toBeNull();
    expect(console.error).toHaveBeenCalledWith('Unknown flag: --verbose');
  });
});

describe('explore-board run', () => {
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(logger, 'warn').mockImplementation(() => logger);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('prints a one-line summary', () => {
    const configPath = fixture('single-block-2x3.json');

    expect(run({ configPath, json: false })).toBe(0);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(
      /^\[explore-board\] .*single-block-2x3\.json: 6 state\(s\), 14 edge\(s\), 0 winning state\(s\) in \d+ms$/
    );
    expect(error).not.toHaveBeenCalled();
  });

  it('prints the state space as JSON with --json', () => {
    expect(run({ configPath: fixture('single-block-2x3.json'), json: true })).toBe(0);
    expect(log).toHaveBeenCalledTimes(1);

    const stateSpace: KlotskiStateSpace = JSON.parse(String(log.mock.calls[0][0]));
    expect(stateSpace.metadata).toEqual({ total_nodes: 6, total_edges: 14, board_width: 3, board_height: 2 });
    expect(stateSpace.pieces).toEqual([{ id: 1, width: 1, height: 1 }]);
    expect(stateSpace.nodes[0]).toEqual({ id: '1:0,0;', positions: [[0, 0]], is_winning: false, is_starting: true });
  });

  it('lists validation messages and fails for an impossible board', () => {
    expect(run({ configPath: fixture('overlapping.json'), json: false })).toBe(1);
    expect(log).not.toHaveBeenCalled();
    expect(error.mock.calls).toEqual([
      ['[explore-board] Board configuration errors:'],
      ['  - Blocks 1 and 2 overlap!'],
    ]);
  });

  it('reports an unreadable file and fails', () => {
    const configPath = fixture('truncated.json');

    expect(run({ configPath, json: true })).toBe(1);
    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(2);
    expect(error.mock.calls[0]).toEqual([`[explore-board] Cannot read board configuration: ${configPath}:`]);
  });
});
