/**
 * State Store Unit Tests
 */

import { z } from 'zod';
import {
    MissingStateFieldError,
    StateSchema,
    StateStore,
    StateValidationError,
    requireField,
} from '../../src/workflow-engine';
import { TestState } from './helpers';

const TestStateSchema = z.object({
    x: z.number(),
    y: z.number(),
    z: z.number(),
    sum: z.number(),
    seenY: z.boolean(),
}).partial().strict();

const schema: StateSchema<TestState> = {
    parse: fields => TestStateSchema.parse(fields),
};

describe('StateStore', () => {

    it('should start from the initial state', () => {
        const store = new StateStore<TestState>({ x: 1 });

        expect(store.snapshot()).toEqual({ x: 1 });
        expect(store.version).toBe(0);
        expect(store.has('x')).toBe(true);
        expect(store.has('y')).toBe(false);
    });

    it('should keep earlier snapshots unchanged after a merge', () => {
        const store = new StateStore<TestState>({ x: 1 });
        const before = store.snapshot();

        const version = store.merge({ y: 2 }, 'B');

        expect(version).toBe(1);
        expect(before).toEqual({ x: 1 });
        expect(store.snapshot()).toEqual({ x: 1, y: 2 });
        expect(Object.isFrozen(store.snapshot())).toBe(true);
    });

    it('should ignore fields set to undefined', () => {
        const store = new StateStore<TestState>({ x: 1 });

        store.merge({ x: undefined, y: 2 }, 'B');

        expect(store.snapshot()).toEqual({ x: 1, y: 2 });
    });

    it('should overwrite existing fields with the latest value', () => {
        const store = new StateStore<TestState>({ x: 1 });

        store.merge({ x: 5 }, 'B');

        expect(store.snapshot().x).toBe(5);
    });

    it('should freeze nested values of seeds and deltas', () => {
        const series = [1, 2, 3];
        const store = new StateStore<{ x: number; series: number[]; meta: { tags: string[] } }>({ x: 1 });

        store.merge({ series, meta: { tags: ['daily'] } }, 'B');
        const snapshot = store.snapshot();

        expect(Object.isFrozen(series)).toBe(true);
        expect(Object.isFrozen(snapshot.meta?.tags)).toBe(true);
        expect(() => series.push(4)).toThrow(TypeError);
        expect(snapshot.series).toEqual([1, 2, 3]);
    });

    it('should build from a typed empty base when no seed is given', () => {
        const store = new StateStore<TestState>();

        expect(store.snapshot()).toEqual({});
        expect(Object.isFrozen(store.snapshot())).toBe(true);
    });

    it('should build snapshots from the given sources only', () => {
        const store = new StateStore<TestState>({ x: 1 });
        store.merge({ y: 2 }, 'B');
        store.merge({ z: 3 }, 'C');

        expect(store.snapshotOf(new Set(['C']))).toEqual({ x: 1, z: 3 });
        expect(store.snapshotOf(new Set())).toEqual({ x: 1 });
        expect(store.snapshotOf(new Set(['B', 'C']))).toEqual({ x: 1, y: 2, z: 3 });
    });

    it('should reject a delta that is not a plain object', () => {
        const store = new StateStore<TestState>();

        expect(() => store.merge([1, 2], 'B')).toThrow(StateValidationError);
        expect(() => store.merge(null, 'B')).toThrow("Invalid delta from 'B': expected a plain object");
        expect(() => new StateStore<TestState>('x')).toThrow('Invalid initial state: expected a plain object');
    });

    it('should validate seeds and deltas with the schema', () => {
        const store = new StateStore<TestState>({ x: 1 }, schema);

        expect(() => store.merge({ y: 'two' }, 'B')).toThrow(StateValidationError);
        expect(() => store.merge({ unknown: 1 }, 'B')).toThrow(/^Invalid delta from 'B': /);
        expect(() => new StateStore<TestState>({ x: 'one' }, schema)).toThrow(StateValidationError);
        expect(store.version).toBe(0);
        expect(store.snapshot()).toEqual({ x: 1 });
    });
});

describe('requireField', () => {

    it('should return a present field', () => {
        expect(requireField<TestState, 'x'>({ x: 0 }, 'x')).toBe(0);
    });

    it('should throw for a missing field', () => {
        expect(() => requireField<TestState, 'y'>({ x: 1 }, 'y')).toThrow(MissingStateFieldError);
        expect(() => requireField<TestState, 'y'>({ x: 1 }, 'y')).toThrow("State field 'y' is not set");
    });
});
