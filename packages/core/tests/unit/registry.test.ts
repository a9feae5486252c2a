import { describe, expect, test } from 'vitest';
import { NodeFactory, type NodeConstructor } from '../../src/registry.js';
import { DefinitionRegistry } from '../../src/definitions.js';
import { ArithmeticNode, JoinNode, SyntheticDataNode } from '../../src/nodes/index.js';
import { ExpressionNode } from '../../src/nodes/dynamic/index.js';
import { NodeCategory, PortDirection, UnknownNodeTypeError } from '../../src/types.js';

describe('NodeFactory', () => {
    test('creates built-in nodes under their catalog names', () => {
        const factory = new NodeFactory();
        const node = factory.create('math_multiply', { id: 'm1', position: [10, 20] });

        expect(node).toBeInstanceOf(ArithmeticNode);
        expect(node.id).toBe('m1');
        expect(node.type).toBe('math_multiply');
        expect(node.position).toEqual([10, 20]);
        expect(factory.create('synthetic_email')).toBeInstanceOf(SyntheticDataNode);
    });

    test('unknown types raise UnknownNodeTypeError', () => {
        const factory = new NodeFactory();
        expect(() => factory.create('nope')).toThrow(UnknownNodeTypeError);
        expect(() => factory.create('nope')).toThrow('Unknown node type: nope');
    });

    test('registered constructors are found after built-ins and cannot shadow them', () => {
        const factory = new NodeFactory();
        factory.register('merge', (options) => new JoinNode(options));

        expect(factory.create('merge')).toBeInstanceOf(JoinNode);
        expect(factory.types()).toContain('merge');
        expect(() => factory.register('join', (options) => new JoinNode(options))).toThrow(
            'Cannot replace built-in node type: join',
        );
        expect(factory.unregister('merge')).toBe(true);
        expect(factory.has('merge')).toBe(false);
    });

    test('dynamic types follow the definitions registry', () => {
        const definitions = new DefinitionRegistry();
        const factory = new NodeFactory({ definitions });
        expect(factory.has('custom_triple')).toBe(false);

        definitions.upsert({ name: 'triple', inputs: ['x'], outputs: ['y'], logic: 'y = x * 3' });
        const node = factory.create('custom_triple');
        node.setInputValue('x', 5);
        node.process();

        expect(node).toBeInstanceOf(ExpressionNode);
        expect(node.type).toBe('custom_triple');
        expect(node.getOutputValue('y')).toBe(15);
    });

    test('describe reports ports and category', () => {
        const factory = new NodeFactory();
        const meta = factory.describe('split');

        expect(meta?.category).toBe(NodeCategory.SEQUENCE);
        expect(meta?.dynamic).toBe(false);
        expect(meta?.inputs.map((p) => p.name)).toEqual(['data', 'split_index']);
        expect(meta?.outputs).toEqual([
            { name: 'data1', type: 'array', direction: PortDirection.OUTPUT, optional: false, linked: false },
            { name: 'data2', type: 'array', direction: PortDirection.OUTPUT, optional: false, linked: false },
        ]);
        expect(factory.describe('missing')).toBeUndefined();
    });

    test('describe marks dynamic types and uses their description', () => {
        const definitions = new DefinitionRegistry();
        definitions.upsert({ name: 'inc', inputs: ['x'], outputs: ['y'], logic: 'y = x + 1', description: 'Adds one' });
        const factory = new NodeFactory({ definitions });

        expect(factory.describe('inc')).toMatchObject({
            type: 'inc',
            category: NodeCategory.DYNAMIC,
            description: 'Adds one',
            dynamic: true,
        });
    });

    test('describeAll covers every type', () => {
        const factory = new NodeFactory({ builtins: new Map<string, NodeConstructor>([['join', (o) => new JoinNode(o)]]) });
        expect(Object.keys(factory.describeAll())).toEqual(['join']);
    });
});
