import { createProcessingError } from '../types/errors.js';

/**
 * Computes the transitive closure of a parent relation for every node.
 *
 * Ancestors come out in breadth-first order (direct parents first). Parents
 * that are not themselves nodes are kept but not expanded. A node that can
 * reach itself makes the closure infinite and raises a ProcessingError
 * naming the cycle.
 */
export function transitiveClosure(
    parents: ReadonlyMap<string, readonly string[]>,
    what: string
): Map<string, string[]> {
    detectCycle(parents, what);

    const closure = new Map<string, string[]>();
    for (const node of parents.keys()) {
        const seen = new Set<string>();
        const queue = [...(parents.get(node) ?? [])];
        while (queue.length > 0) {
            const next = queue.shift();
            if (next === undefined || seen.has(next)) continue;
            seen.add(next);
            queue.push(...(parents.get(next) ?? []));
        }
        closure.set(node, [...seen]);
    }
    return closure;
}

/**
 * Inverts a closure or parent map: node -> nodes that list it
 */
export function invert(relation: ReadonlyMap<string, readonly string[]>): Map<string, string[]> {
    const inverse = new Map<string, string[]>();
    for (const [node, targets] of relation) {
        for (const target of targets) {
            const list = inverse.get(target);
            if (list) {
                list.push(node);
            } else {
                inverse.set(target, [node]);
            }
        }
    }
    return inverse;
}

function detectCycle(parents: ReadonlyMap<string, readonly string[]>, what: string): void {
    const state = new Map<string, 'visiting' | 'done'>();
    const path: string[] = [];

    const visit = (node: string): void => {
        const current = state.get(node);
        if (current === 'done') return;
        if (current === 'visiting') {
            const cycle = [...path.slice(path.indexOf(node)), node];
            throw createProcessingError(
                `Cyclic ${what} hierarchy: ${cycle.join(' -> ')}`,
                { cycle }
            );
        }

        state.set(node, 'visiting');
        path.push(node);
        for (const parent of parents.get(node) ?? []) {
            visit(parent);
        }
        path.pop();
        state.set(node, 'done');
    };

    for (const node of parents.keys()) {
        visit(node);
    }
}
