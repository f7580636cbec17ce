import { isMovementAction } from "./location.js";

/**
 * Map of explored locations. Each location keeps a set of edge descriptions
 * of the form `"<action> -> <destination>"`. The graph only grows.
 */
export class ExplorationGraph {
  private edges = new Map<string, Set<string>>();

  /**
   * Records the result of an action issued from `from`. Non-movement actions
   * are ignored. A movement action always registers `from` as explored; an
   * edge is added only when the location actually changed.
   *
   * @returns true when a new edge was inserted
   */
  record(from: string, action: string, to: string): boolean {
    if (!isMovementAction(action)) return false;
    let exits = this.edges.get(from);
    if (!exits) {
      exits = new Set();
      this.edges.set(from, exits);
    }
    if (to === from) return false;
    const edge = `${action.trim()} -> ${to}`;
    if (exits.has(edge)) return false;
    exits.add(edge);
    return true;
  }

  isEmpty(): boolean {
    return this.edges.size === 0;
  }

  get size(): number {
    return this.edges.size;
  }

  /** Locations in lexical order, each with its edges in lexical order. */
  entries(): Array<[location: string, edges: string[]]> {
    return [...this.edges.keys()]
      .sort()
      .map((location) => [location, [...(this.edges.get(location) ?? [])].sort()]);
  }
}
