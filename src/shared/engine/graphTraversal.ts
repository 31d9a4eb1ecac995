import type { GraphNode } from './GraphNode';

/**
 * Read-only walks over a built graph, for consumers that want flat node and
 * edge lists instead of following children from the root.
 */

export interface GraphEdgeRecord {
  from: GraphNode;
  to: GraphNode;
  moveDescription: string;
}

export interface CollectedGraph {
  /** Nodes in breadth-first first-visit order, root first. */
  nodes: GraphNode[];
  /** Edges grouped by source node (in `nodes` order), then in edge order. */
  edges: GraphEdgeRecord[];
}

export interface GraphSummary {
  nodeCount: number;
  edgeCount: number;
  winningNodeCount: number;
  startingHash: string;
}

export function collectGraph(root: GraphNode): CollectedGraph {
  const nodes: GraphNode[] = [root];
  const edges: GraphEdgeRecord[] = [];
  const visited = new Set<string>([root.stateHash]);

  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i];
    for (const { child, moveDescription } of node.children) {
      edges.push({ from: node, to: child, moveDescription });
      if (!visited.has(child.stateHash)) {
        visited.add(child.stateHash);
        nodes.push(child);
      }
    }
  }

  return { nodes, edges };
}

export function summarizeGraph(root: GraphNode): GraphSummary {
  const { nodes, edges } = collectGraph(root);
  return {
    nodeCount: nodes.length,
    edgeCount: edges.length,
    winningNodeCount: nodes.filter((n) => n.isWinning).length,
    startingHash: root.stateHash,
  };
}
