import { describe, expect, test } from 'vitest';
import { hasCycles, validateSnapshot } from '../../src/validator.js';
import { NodeFactory } from '../../src/registry.js';
import { Pipeline } from '../../src/pipeline.js';
import { PrintNode, TrueNode } from '../../src/nodes/index.js';
import type { PipelineSnapshot } from '../../src/graph.js';

function snapshot(overrides: Partial<PipelineSnapshot> = {}): PipelineSnapshot {
    return {
        name: 'test',
        nodes: [
            { id: 'n1', type: 'data' },
            { id: 'n2', type: 'math_add' },
        ],
        connections: [{ id: 'c1', sourceNode: 'n1', sourcePort: 'output', targetNode: 'n2', targetPort: 'a' }],
        ...overrides,
    };
}

describe('validateSnapshot', () => {
    test('accepts a well-formed snapshot', () => {
        expect(validateSnapshot(snapshot(), new NodeFactory())).toEqual({ valid: true, errors: [] });
    });

    test('reports schema problems with their paths', () => {
        const result = validateSnapshot({ name: 'x', nodes: [{ id: 'n1' }], connections: [] });
        expect(result.valid).toBe(false);
        expect(result.errors.map((e) => e.path)).toEqual(['nodes.0.type']);
    });

    test('reports duplicate ids and dangling endpoints', () => {
        const result = validateSnapshot(
            snapshot({
                nodes: [
                    { id: 'n1', type: 'data' },
                    { id: 'n1', type: 'print' },
                ],
                connections: [
                    { id: 'c1', sourceNode: 'n1', sourcePort: 'output', targetNode: 'gone', targetPort: 'a' },
                    { id: 'c1', sourceNode: 'n1', sourcePort: 'output', targetNode: 'n1', targetPort: 'data' },
                ],
            }),
        );

        expect(result.errors).toEqual([
            { path: 'nodes[1].id', message: 'Duplicate node id: "n1"' },
            { path: 'connections[0].targetNode', message: 'References non-existent node: "gone"' },
            { path: 'connections[1].id', message: 'Duplicate connection id: "c1"' },
        ]);
    });

    test('reports an input linked twice', () => {
        const result = validateSnapshot(
            snapshot({
                connections: [
                    { id: 'c1', sourceNode: 'n1', sourcePort: 'output', targetNode: 'n2', targetPort: 'a' },
                    { id: 'c2', sourceNode: 'n1', sourcePort: 'output', targetNode: 'n2', targetPort: 'a' },
                ],
            }),
        );

        expect(result.errors).toEqual([
            { path: 'connections[1]', message: 'Input "n2.a" is already linked by connection "c1"; ports hold one link' },
        ]);
    });

    test('checks types and ports against the factory', () => {
        const result = validateSnapshot(
            snapshot({
                nodes: [
                    { id: 'n1', type: 'true' },
                    { id: 'n2', type: 'aggregate_sum' },
                    { id: 'n3', type: 'teleporter' },
                ],
                connections: [
                    { id: 'c1', sourceNode: 'n1', sourcePort: 'output', targetNode: 'n2', targetPort: 'data' },
                    { id: 'c2', sourceNode: 'n2', sourcePort: 'total', targetNode: 'n2', targetPort: 'missing' },
                ],
            }),
            new NodeFactory(),
        );

        expect(result.errors).toEqual([
            { path: 'nodes[2].type', message: 'Unknown node type: "teleporter"' },
            { path: 'connections[0]', message: 'Type mismatch: output "output" (boolean) -> input "data" (array)' },
            { path: 'connections[1].sourcePort', message: 'Unknown source output port: "total" on node "n2"' },
            { path: 'connections[1].targetPort', message: 'Unknown target input port: "missing" on node "n2"' },
        ]);
    });
});

describe('hasCycles', () => {
    test('detects a loop in the connection ledger', () => {
        const pipeline = new Pipeline();
        const a = new PrintNode();
        const b = new PrintNode();
        pipeline.addNode(a);
        pipeline.addNode(b);
        pipeline.connect(a.id, 'data', b.id, 'data');
        expect(hasCycles(pipeline)).toBe(false);

        pipeline.connect(b.id, 'data', a.id, 'data');
        expect(hasCycles(pipeline)).toBe(true);
    });

    test('an unconnected pipeline has no cycles', () => {
        const pipeline = new Pipeline();
        pipeline.addNode(new TrueNode());
        expect(hasCycles(pipeline)).toBe(false);
    });
});
