import type { KlotskiEdge, KlotskiNode, KlotskiPiece, KlotskiStateSpace } from '../types/klotski';
import { collectGraph } from './graphTraversal';
import type { GraphNode } from './GraphNode';
import { parseMoveDescription } from './moveNotation';

/**
 * Project a built graph into the plain state-space record consumed by
 * renderers. Node ids are canonical hashes; piece positions follow the
 * root board's block order. Edges whose label cannot be parsed back into a
 * block move are left out.
 */
export function toStateSpace(root: GraphNode): KlotskiStateSpace {
  const { nodes, edges } = collectGraph(root);
  const board = root.board;

  const pieces: KlotskiPiece[] = board.blocks.map((b) => ({
    id: b.id,
    width: b.width,
    height: b.height,
  }));

  const stateNodes: KlotskiNode[] = nodes.map((node) => ({
    id: node.stateHash,
    positions: node.board.blocks.map((b) => [b.x, b.y]),
    is_winning: node.isWinning,
    is_starting: node.isStarting,
  }));

  const stateEdges: KlotskiEdge[] = [];
  for (const edge of edges) {
    const move = parseMoveDescription(edge.moveDescription);
    if (!move) continue;
    stateEdges.push({
      source: edge.from.stateHash,
      target: edge.to.stateHash,
      piece_id: move.blockId,
      direction: move.direction,
    });
  }

  return {
    metadata: {
      total_nodes: stateNodes.length,
      total_edges: stateEdges.length,
      board_width: board.columns,
      board_height: board.rows,
    },
    pieces,
    nodes: stateNodes,
    edges: stateEdges,
  };
}
