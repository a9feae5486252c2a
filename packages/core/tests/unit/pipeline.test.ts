import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, test, vi } from 'vitest';
import { Pipeline, loadPipelineFile, savePipelineFile } from '../../src/pipeline.js';
import { NodeFactory } from '../../src/registry.js';
import { Node } from '../../src/node.js';
import {
    AggregateNode,
    ArithmeticNode,
    ArrayNode,
    DataNode,
    FilterNode,
    PrintNode,
    TrueNode,
} from '../../src/nodes/index.js';
import { createDynamicNode, FunctionNode } from '../../src/nodes/dynamic/index.js';
import { ProgressState, SnapshotError, type ProgressEvent } from '../../src/types.js';

class ExplodingNode extends Node {
    process(): boolean {
        throw new Error('kaboom');
    }
}

function arithmeticPipeline(operation: 'add' | 'divide', a: number, b: number) {
    const pipeline = new Pipeline();
    // Added before its producers so the scheduler has to wait for them
    const op = new ArithmeticNode(operation);
    const left = new DataNode({ data: a });
    const right = new DataNode({ data: b });
    pipeline.addNode(op);
    pipeline.addNode(left);
    pipeline.addNode(right);
    pipeline.connect(left.id, 'output', op.id, 'a');
    pipeline.connect(right.id, 'output', op.id, 'b');
    return { pipeline, op, left, right };
}

describe('Pipeline execution', () => {
    test('add(10, 3) = 13 with producers running first', () => {
        const { pipeline, op, left, right } = arithmeticPipeline('add', 10, 3);
        const report = pipeline.execute();

        expect(report.complete).toBe(true);
        expect(report.order).toEqual([left.id, right.id, op.id]);
        expect(report.results[op.id]).toEqual({ success: true, outputs: { result: 13 } });
    });

    test('divide(10, 0) = 0', () => {
        const { pipeline, op } = arithmeticPipeline('divide', 10, 0);
        expect(pipeline.execute().results[op.id]?.outputs.result).toBe(0);
    });

    test('mean over a list skips non-numeric items', () => {
        const pipeline = new Pipeline();
        const data = new ArrayNode({ data: [1, 2, 3, 'x', 4] });
        const mean = new AggregateNode('mean');
        pipeline.addNode(data);
        pipeline.addNode(mean);
        pipeline.connect(data.id, 'output', mean.id, 'data');

        expect(pipeline.execute().results[mean.id]?.outputs.result).toBe(2.5);
    });

    test('filter even feeds a print tap', () => {
        const pipeline = new Pipeline();
        const data = new ArrayNode({ data: '1,2,3,4,5,6' });
        const filter = new FilterNode({ properties: { condition: 'even' } });
        const print = new PrintNode();
        [print, filter, data].forEach((n) => pipeline.addNode(n));
        pipeline.connect(data.id, 'output', filter.id, 'data');
        pipeline.connect(filter.id, 'filtered_data', print.id, 'data');

        const report = pipeline.execute();

        expect(report.order).toEqual([data.id, filter.id, print.id]);
        expect(print.getOutputValue('data')).toEqual([2, 4, 6]);
    });

    test('a cycle leaves its nodes unexecuted', () => {
        const pipeline = new Pipeline();
        const first = new PrintNode();
        const second = new PrintNode();
        const free = new TrueNode();
        [first, second, free].forEach((n) => pipeline.addNode(n));
        pipeline.connect(first.id, 'data', second.id, 'data');
        pipeline.connect(second.id, 'data', first.id, 'data');

        const report = pipeline.execute();

        expect(report.complete).toBe(false);
        expect(report.order).toEqual([free.id]);
        expect(Object.keys(report.results)).toEqual([free.id]);
        expect(pipeline.getExecutionOrder()).toEqual([free.id]);
    });

    test('a node missing a required input never runs', () => {
        const pipeline = new Pipeline();
        const op = new ArithmeticNode('add');
        op.setInputValue('a', 1);
        pipeline.addNode(op);

        expect(pipeline.execute()).toEqual({ complete: false, results: {}, order: [] });
    });

    test('failed and throwing nodes are recorded without stopping the pass', () => {
        const pipeline = new Pipeline();
        const bad = new ArithmeticNode('add');
        bad.setInputValue('a', 'x');
        bad.setInputValue('b', 1);
        const exploding = new ExplodingNode();
        const ok = new TrueNode();
        [bad, exploding, ok].forEach((n) => pipeline.addNode(n));

        const events: ProgressEvent[] = [];
        pipeline.setProgressCallback((event) => events.push(event));
        const report = pipeline.execute();

        expect(report.complete).toBe(true);
        expect(report.results[bad.id]).toEqual({ success: false, outputs: { result: null } });
        expect(report.results[exploding.id]).toEqual({ success: false, error: 'kaboom', outputs: {} });
        expect(report.results[ok.id]?.success).toBe(true);
        expect(events).toEqual([
            { nodeId: bad.id, state: ProgressState.START },
            { nodeId: bad.id, state: ProgressState.ERROR },
            { nodeId: exploding.id, state: ProgressState.START },
            { nodeId: exploding.id, state: ProgressState.ERROR, text: 'kaboom' },
            { nodeId: ok.id, state: ProgressState.START },
            { nodeId: ok.id, state: ProgressState.DONE },
        ]);
    });
});

describe('Pipeline connections', () => {
    test('reconnecting an input drops the replaced ledger entry', () => {
        const { pipeline, op, left, right } = arithmeticPipeline('add', 1, 2);
        const replacement = pipeline.connect(right.id, 'output', op.id, 'a');

        const connections = pipeline.listConnections();
        expect(connections).toHaveLength(1);
        expect(connections[0]).toEqual({
            id: replacement,
            sourceNodeId: right.id,
            sourcePort: 'output',
            targetNodeId: op.id,
            targetPort: 'a',
        });
        expect(left.getOutputPort('output')?.isLinked).toBe(false);
    });

    test('connecting an already-linked pair keeps a single ledger entry', () => {
        const { pipeline, op, left } = arithmeticPipeline('add', 1, 2);
        const first = pipeline.listConnections().find((c) => c.targetPort === 'a')?.id;

        expect(pipeline.connect(left.id, 'output', op.id, 'a')).toBe(first);
        expect(pipeline.connect(op.id, 'a', left.id, 'output')).toBe(first);
        expect(pipeline.listConnections()).toHaveLength(2);

        expect(pipeline.disconnect(first ?? '')).toBe(true);
        expect(op.getInputPort('a')?.isLinked).toBe(false);
        expect(pipeline.listConnections().filter((c) => c.targetPort === 'a')).toEqual([]);
        expect(pipeline.toSnapshot().connections).toHaveLength(1);
    });

    test('connect returns null for missing nodes, missing ports and same-direction pairs', () => {
        const { pipeline, op, left, right } = arithmeticPipeline('add', 1, 2);

        expect(pipeline.connect('ghost', 'output', op.id, 'a')).toBeNull();
        expect(pipeline.connect(left.id, 'nope', op.id, 'a')).toBeNull();
        expect(pipeline.connect(left.id, 'output', right.id, 'output')).toBeNull();
        expect(pipeline.listConnections()).toHaveLength(2);
    });

    test('input-to-output requests are recorded as output -> input', () => {
        const pipeline = new Pipeline();
        const source = new DataNode({ data: 1 });
        const op = new ArithmeticNode('add');
        pipeline.addNode(source);
        pipeline.addNode(op);

        const id = pipeline.connect(op.id, 'a', source.id, 'output');

        expect(id).not.toBeNull();
        expect(pipeline.listConnections()[0]).toMatchObject({
            sourceNodeId: source.id,
            sourcePort: 'output',
            targetNodeId: op.id,
            targetPort: 'a',
        });
    });

    test('removeNode removes its connections and unlinks the ports', () => {
        const { pipeline, op, left } = arithmeticPipeline('add', 1, 2);

        expect(pipeline.removeNode(op.id)).toBe(true);
        expect(pipeline.removeNode(op.id)).toBe(false);
        expect(pipeline.listConnections()).toEqual([]);
        expect(left.getOutputPort('output')?.isLinked).toBe(false);
    });

    test('disconnect unlinks once', () => {
        const { pipeline, op } = arithmeticPipeline('add', 1, 2);
        const [first] = pipeline.listConnections();
        if (!first) throw new Error('expected a connection');

        expect(pipeline.disconnect(first.id)).toBe(true);
        expect(pipeline.disconnect(first.id)).toBe(false);
        expect(op.getInputPort('a')?.isLinked).toBe(false);
    });

    test('adding the same node twice is an error', () => {
        const pipeline = new Pipeline();
        const node = new TrueNode();
        pipeline.addNode(node);
        expect(() => pipeline.addNode(node)).toThrow(/already in the pipeline/);
    });
});

describe('Pipeline redefinition', () => {
    function scalePipeline() {
        const pipeline = new Pipeline();
        const value = new DataNode({ data: 6 });
        const factor = new DataNode({ data: 7 });
        const scale = createDynamicNode({
            name: 'scale',
            inputs: ['value', 'factor'],
            outputs: ['result'],
            logic: 'result = value * factor',
        });
        const print = new PrintNode();
        [value, factor, scale, print].forEach((n) => pipeline.addNode(n));
        pipeline.connect(value.id, 'output', scale.id, 'value');
        pipeline.connect(factor.id, 'output', scale.id, 'factor');
        pipeline.connect(scale.id, 'result', print.id, 'data');
        return { pipeline, scale, print };
    }

    test('restores connections whose ports survive', () => {
        const { pipeline, scale, print } = scalePipeline();
        expect(pipeline.execute().results[print.id]?.outputs.data).toBe(42);

        const restored = pipeline.redefineNode(scale.id, {
            name: 'scale',
            inputs: ['value'],
            outputs: ['result'],
            logic: 'result = value * 10',
        });

        expect(restored).toHaveLength(2);
        expect(pipeline.listConnections()).toHaveLength(2);
        expect(pipeline.execute().results[print.id]?.outputs.data).toBe(60);
    });

    test('a form change replaces the node under the same id', () => {
        const { pipeline, scale, print } = scalePipeline();

        pipeline.redefineNode(scale.id, {
            name: 'scale',
            inputs: ['value', 'factor'],
            outputs: ['result'],
            logic: 'function execute(inputs) { return { result: inputs.value + inputs.factor }; }',
        });

        expect(pipeline.getNode(scale.id)).toBeInstanceOf(FunctionNode);
        expect(pipeline.listConnections()).toHaveLength(3);
        expect(pipeline.execute().results[print.id]?.outputs.data).toBe(13);
    });

    test('only dynamic nodes can be redefined', () => {
        const pipeline = new Pipeline();
        const node = new TrueNode();
        pipeline.addNode(node);
        expect(() => pipeline.redefineNode(node.id, { name: 'x', logic: 'y = 1' })).toThrow(/not a dynamic node/);
    });
});

describe('Pipeline snapshots', () => {
    function buildPipeline(factory: NodeFactory): Pipeline {
        const pipeline = new Pipeline({ name: 'evens' });
        const data = factory.create('array', { properties: { data: '1,2,3,4' }, position: [5, 5] });
        const filter = factory.create('filter', { properties: { condition: 'even' } });
        const print = factory.create('print', { name: 'Out' });
        [data, filter, print].forEach((n) => pipeline.addNode(n));
        pipeline.connect(data.id, 'output', filter.id, 'data');
        pipeline.connect(filter.id, 'filtered_data', print.id, 'data');
        return pipeline;
    }

    test('round-trips through a snapshot with fresh ids', () => {
        const factory = new NodeFactory();
        const original = buildPipeline(factory);
        const snapshot = original.toSnapshot();

        const { pipeline, idMap } = Pipeline.fromSnapshot(snapshot, factory);

        expect(pipeline.name).toBe('evens');
        expect(pipeline.nodeCount).toBe(3);
        expect(pipeline.listConnections()).toHaveLength(2);
        expect(snapshot.nodes[0]).toMatchObject({ type: 'array', data: '1,2,3,4', position: [5, 5] });

        const printId = idMap.get(snapshot.nodes[2]?.id ?? '');
        expect(printId).toBeDefined();
        expect(printId).not.toBe(snapshot.nodes[2]?.id);

        const report = pipeline.execute();
        expect(report.results[printId ?? '']?.outputs.data).toEqual([2, 4]);
        expect(pipeline.getNode(printId ?? '')?.name).toBe('Out');
    });

    test('drops connections that refer to unknown nodes', () => {
        const factory = new NodeFactory();
        const { pipeline } = Pipeline.fromSnapshot(
            {
                name: 'partial',
                nodes: [{ id: 'n1', type: 'true' }],
                connections: [{ id: 'c1', sourceNode: 'n1', sourcePort: 'output', targetNode: 'ghost', targetPort: 'data' }],
            },
            factory,
        );

        expect(pipeline.nodeCount).toBe(1);
        expect(pipeline.listConnections()).toEqual([]);
    });

    test('rejects malformed snapshots', () => {
        expect(() => Pipeline.fromSnapshot({ name: 'x', nodes: [{ id: 1 }] }, new NodeFactory())).toThrow(SnapshotError);
    });

    test('saves to and loads from a file', async () => {
        const dir = await mkdtemp(join(tmpdir(), 'nodeflow-pipeline-'));
        try {
            const factory = new NodeFactory();
            const path = join(dir, 'pipeline.json');
            await savePipelineFile(path, buildPipeline(factory));

            const { pipeline } = await loadPipelineFile(path, factory);
            expect(pipeline.listNodes().map((n) => n.type)).toEqual(['array', 'filter', 'print']);
            expect(pipeline.execute().complete).toBe(true);
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });

    test('progress callback can be cleared', () => {
        const { pipeline } = arithmeticPipeline('add', 1, 1);
        const callback = vi.fn();
        pipeline.setProgressCallback(callback);
        pipeline.setProgressCallback(null);
        pipeline.execute();
        expect(callback).not.toHaveBeenCalled();
    });
});
