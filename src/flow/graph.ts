/**
 * Capacitated directed graph
 *
 * Adjacency is `node -> (node -> capacity)`. Every endpoint of every edge owns
 * an outer entry, even with no outgoing edges, so traversals can look up any
 * node they reach. Iteration follows insertion order.
 */

import { InvalidCapacityError } from './errors.js';

export type NodeId = string;

/** Non-negative integer capacity. Only produced by `toCapacity`. */
export type Capacity = number & { readonly __capacity: unique symbol };

export interface Edge {
    from: NodeId;
    to: NodeId;
    capacity: number;
}

export type Adjacency<V = number> = Map<NodeId, Map<NodeId, V>>;

export function isCapacity(value: number): value is Capacity {
    return Number.isSafeInteger(value) && value >= 0;
}

export function toCapacity(from: NodeId, to: NodeId, value: number): Capacity {
    if (!isCapacity(value)) {
        throw new InvalidCapacityError(from, to, value);
    }
    return value;
}

export class CapacitatedGraph {
    private readonly adj: Adjacency<Capacity> = new Map();

    static fromEdges(edges: Iterable<Edge>): CapacitatedGraph {
        const graph = new CapacitatedGraph();
        graph.addEdges(edges);
        return graph;
    }

    /**
     * Register or accumulate a directed edge. Re-adding an existing pair sums
     * the capacities.
     */
    addEdge(from: NodeId, to: NodeId, capacity: number): void {
        const total = toCapacity(from, to, this.getCapacity(from, to) + toCapacity(from, to, capacity));
        this.insert(from, to, total);
    }

    /**
     * Add a batch of edges. Every capacity is validated before the first edge
     * is applied, so a rejected batch leaves the graph untouched.
     */
    addEdges(edges: Iterable<Edge>): void {
        const totals = new Map<string, [NodeId, NodeId, Capacity]>();
        for (const e of edges) {
            const key = `${e.from}\u0000${e.to}`;
            const added = toCapacity(e.from, e.to, e.capacity);
            const current = totals.get(key)?.[2] ?? this.getCapacity(e.from, e.to);
            totals.set(key, [e.from, e.to, toCapacity(e.from, e.to, current + added)]);
        }
        for (const [from, to, total] of totals.values()) {
            this.insert(from, to, total);
        }
    }

    hasNode(node: NodeId): boolean {
        return this.adj.has(node);
    }

    hasEdge(from: NodeId, to: NodeId): boolean {
        return this.adj.get(from)?.has(to) ?? false;
    }

    /** Capacity of `from -> to`, 0 when the edge does not exist */
    getCapacity(from: NodeId, to: NodeId): number {
        return this.adj.get(from)?.get(to) ?? 0;
    }

    successors(node: NodeId): ReadonlyMap<NodeId, number> {
        return this.adj.get(node) ?? new Map<NodeId, number>();
    }

    nodes(): NodeId[] {
        return [...this.adj.keys()];
    }

    *edges(): IterableIterator<Edge> {
        for (const [from, targets] of this.adj) {
            for (const [to, capacity] of targets) {
                yield { from, to, capacity };
            }
        }
    }

    get nodeCount(): number {
        return this.adj.size;
    }

    get edgeCount(): number {
        let count = 0;
        for (const targets of this.adj.values()) count += targets.size;
        return count;
    }

    /** Sum of capacities leaving `node` */
    outgoingCapacity(node: NodeId): number {
        let total = 0;
        for (const cap of this.successors(node).values()) total += cap;
        return total;
    }

    clone(): CapacitatedGraph {
        const copy = new CapacitatedGraph();
        for (const [node, targets] of this.adj) {
            copy.adj.set(node, new Map(targets));
        }
        return copy;
    }

    /** Store the accumulated capacity of `from -> to` */
    private insert(from: NodeId, to: NodeId, total: Capacity): void {
        let targets = this.adj.get(from);
        if (!targets) {
            targets = new Map();
            this.adj.set(from, targets);
        }
        targets.set(to, total);

        if (!this.adj.has(to)) {
            this.adj.set(to, new Map());
        }
    }
}
