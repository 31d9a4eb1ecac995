import type { Board } from './Board';

export interface GraphEdge {
  readonly child: GraphNode;
  readonly moveDescription: string;
}

/**
 * One canonical board state in the reachable-state graph.
 *
 * The signature and win status are computed once from the owned Board.
 * Children are kept in discovery order.
 */
export class GraphNode {
  readonly stateHash: string;
  readonly board: Board;
  readonly isWinning: boolean;
  isStarting = false;

  private readonly _children: GraphEdge[] = [];

  constructor(board: Board) {
    this.board = board;
    this.stateHash = board.getHash();
    this.isWinning = board.isWinning();
  }

  get children(): readonly GraphEdge[] {
    return this._children;
  }

  addChild(child: GraphNode, moveDescription: string): void {
    this._children.push(Object.freeze({ child, moveDescription }));
  }
}
