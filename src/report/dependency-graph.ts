// src/report/dependency-graph.ts
import { DependencyGraph } from '../analyzer/types.js';

export type NodeColor = 'lightgrey' | 'skyblue' | 'salmon';

/** Leaf callers are grey, light callers blue, heavy callers (more than two callees) red. */
export function nodeColor(distinctCallees: number): NodeColor {
    if (distinctCallees === 0) return 'lightgrey';
    return distinctCallees <= 2 ? 'skyblue' : 'salmon';
}

function quote(name: string): string {
    return `"${name.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Renders the call graph as Graphviz DOT. Callees that are not declared in
 * the file still get a node. Repeated calls collapse into one edge labelled
 * with the call count.
 */
export function toDot(graph: DependencyGraph, title = 'dependencies'): string {
    const edges = new Map<string, Map<string, number>>();
    const nodes: string[] = [];
    const addNode = (name: string): void => {
        if (!edges.has(name)) {
            edges.set(name, new Map());
            nodes.push(name);
        }
    };

    for (const [caller, callees] of Object.entries(graph)) {
        addNode(caller);
        for (const callee of callees) {
            addNode(callee);
            const counts = edges.get(caller);
            counts?.set(callee, (counts.get(callee) ?? 0) + 1);
        }
    }

    const lines = [`digraph ${quote(title)} {`, '    rankdir=LR;', '    node [shape=box, style=filled];'];
    for (const name of nodes) {
        lines.push(`    ${quote(name)} [fillcolor=${nodeColor(edges.get(name)?.size ?? 0)}];`);
    }
    for (const [caller, counts] of edges) {
        for (const [callee, count] of counts) {
            const label = count > 1 ? ` [label="x${count}"]` : '';
            lines.push(`    ${quote(caller)} -> ${quote(callee)}${label};`);
        }
    }
    lines.push('}');
    return `${lines.join('\n')}\n`;
}
