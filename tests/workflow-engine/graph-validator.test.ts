/**
 * Graph Validator Unit Tests
 */

import {
    CycleError,
    END,
    EntryNodeError,
    FieldOwnershipConflictError,
    GraphDefinition,
    NodeDefinition,
    NodeRegistry,
    UnknownNodeError,
    UnreachableNodeError,
    UnreachableTerminalError,
    assertValidGraph,
    validateGraph,
} from '../../src/workflow-engine';
import { TestState } from './helpers';

const noop = () => ({});

function diamond(): NodeRegistry<TestState> {
    return new NodeRegistry<TestState>()
        .register('A', noop)
        .register('B', noop, ['A'])
        .register('C', noop, ['A'])
        .register('D', noop, ['B', 'C'])
        .addEdge('D', END)
        .setEntry('A');
}

function errorOf(graph: GraphDefinition<TestState>) {
    const result = validateGraph(graph);
    return result.ok ? null : result.error;
}

describe('validateGraph', () => {

    it('should accept a diamond', () => {
        expect(validateGraph(diamond().toGraph())).toEqual({ ok: true });
    });

    it('should report a dependency on an unknown node', () => {
        const graph = new NodeRegistry<TestState>()
            .register('A', noop)
            .register('B', noop, ['Z'])
            .setEntry('A')
            .toGraph();

        const error = errorOf(graph);
        expect(error).toBeInstanceOf(UnknownNodeError);
        expect(error?.message).toBe("Node 'B' references unknown node 'Z'");
    });

    it('should require an entry node', () => {
        const graph = new NodeRegistry<TestState>().register('A', noop).addEdge('A', END).toGraph();

        const error = errorOf(graph);
        expect(error).toBeInstanceOf(EntryNodeError);
        expect(error?.message).toBe('Entry node is not set');
    });

    it('should report a two-node cycle in traversal order', () => {
        const graph = new NodeRegistry<TestState>()
            .register('A', noop, ['B'])
            .register('B', noop, ['A'])
            .setEntry('A')
            .toGraph();

        const error = errorOf(graph);
        expect(error).toBeInstanceOf(CycleError);
        if (error instanceof CycleError) {
            expect(error.involvedNodes).toEqual(['A', 'B']);
            expect(error.message).toBe('Cycle detected: A -> B -> A');
        }
    });

    it('should report a cycle built from edges', () => {
        const graph = new NodeRegistry<TestState>()
            .register('A', noop)
            .register('B', noop)
            .register('C', noop)
            .addEdge('A', 'B')
            .addEdge('B', 'C')
            .addEdge('C', 'B')
            .addEdge('C', END)
            .setEntry('A')
            .toGraph();

        const error = errorOf(graph);
        expect(error).toBeInstanceOf(CycleError);
        if (error instanceof CycleError) {
            expect(error.involvedNodes).toEqual(['B', 'C']);
        }
    });

    it('should report a node with no path to the terminal', () => {
        const graph = diamond().register('E', noop, ['A']).toGraph();

        const error = errorOf(graph);
        expect(error).toBeInstanceOf(UnreachableTerminalError);
        expect(error?.message).toBe(`Node 'E' has no path to '${END}'`);
    });

    it('should reject an entry node with dependencies', () => {
        const graph = diamond().setEntry('B').toGraph();

        const error = errorOf(graph);
        expect(error).toBeInstanceOf(EntryNodeError);
        expect(error?.message).toBe("Entry node 'B' must not depend on other nodes (depends on A)");
    });

    it('should report a node that cannot be reached from the entry', () => {
        const graph = diamond().register('E', noop).addEdge('E', END).toGraph();

        const error = errorOf(graph);
        expect(error).toBeInstanceOf(UnreachableNodeError);
        expect(error?.message).toBe("Node 'E' is not reachable from entry node 'A'");
    });

    it('should report two nodes declaring the same output field', () => {
        const graph = new NodeRegistry<TestState>()
            .register('A', noop)
            .register('B', noop, ['A'], { writes: ['y'] })
            .register('C', noop, ['A'], { writes: ['y', 'z'] })
            .register('D', noop, ['B', 'C'])
            .addEdge('D', END)
            .setEntry('A')
            .toGraph();

        const error = errorOf(graph);
        expect(error).toBeInstanceOf(FieldOwnershipConflictError);
        if (error instanceof FieldOwnershipConflictError) {
            expect(error.field).toBe('y');
            expect(error.nodes).toEqual(['B', 'C']);
        }
        expect(validateGraph(graph, { checkFieldOwnership: false })).toEqual({ ok: true });
    });

    it('should return the same result for repeated validation', () => {
        const graph = new NodeRegistry<TestState>()
            .register('A', noop, ['B'])
            .register('B', noop, ['A'])
            .setEntry('A')
            .toGraph();

        const first = validateGraph(graph);
        const second = validateGraph(graph);

        expect(second).toBe(first);
        expect(second).toEqual(first);
    });

    it('should check a hand-built graph again after its nodes change', () => {
        const node = (name: string, dependsOn: string[] = []): NodeDefinition<TestState> => ({
            name,
            run: noop,
            dependsOn: new Set(dependsOn),
            reads: [],
            writes: null,
        });
        const nodes = new Map<string, NodeDefinition<TestState>>([['A', node('A')]]);
        const graph: GraphDefinition<TestState> = {
            nodes,
            edges: [{ from: 'A', to: END }],
            entry: 'A',
            terminal: END,
            schema: null,
        };

        expect(validateGraph(graph)).toEqual({ ok: true });

        nodes.set('B', node('B', ['A']));

        const error = errorOf(graph);
        expect(error).toBeInstanceOf(UnreachableTerminalError);
        expect(error?.message).toBe(`Node 'B' has no path to '${END}'`);
    });

    it('should throw the graph error from assertValidGraph and compile', () => {
        const registry = new NodeRegistry<TestState>()
            .register('A', noop, ['B'])
            .register('B', noop, ['A'])
            .setEntry('A');

        expect(() => assertValidGraph(registry.toGraph())).toThrow(CycleError);
        expect(() => registry.compile()).toThrow(CycleError);
    });
});
