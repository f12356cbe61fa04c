// Workflow Engine - State Store
// Copy-on-write holder of the shared state for a single run

import { StateValidationError, MissingStateFieldError, describeError } from './errors';
import type { StateDelta, StateSchema, StateSnapshot } from './types';

interface MergedDelta<S> {
  source: string;
  delta: Readonly<StateDelta<S>>;
}

/**
 * Shared state of one run.
 *
 * Every merge replaces the frozen state object, so a snapshot handed to a node
 * never changes under it. Seeds and deltas are frozen deeply when they enter
 * the store: a node gives up the objects it returns and must not modify them
 * afterwards. Merges are synchronous and run to completion on the event loop,
 * which makes them mutually exclusive without a lock.
 */
export class StateStore<S> {
  private readonly initial: StateSnapshot<S>;
  private current: StateSnapshot<S>;
  private readonly merged: MergedDelta<S>[] = [];

  constructor(
    initialState: unknown = {},
    private readonly schema: StateSchema<S> | null = null
  ) {
    const empty: StateDelta<S> = {};
    this.initial = Object.freeze(this.apply(empty, deepFreeze(this.validate(initialState, 'initial state'))));
    this.current = this.initial;
  }

  snapshot(): StateSnapshot<S> {
    return this.current;
  }

  /**
   * State as seen by a node whose ancestors are `sources`: the seed plus the
   * deltas those nodes merged, in merge order. Deltas from unrelated branches
   * are left out.
   */
  snapshotOf(sources: ReadonlySet<string>): StateSnapshot<S> {
    let state: StateDelta<S> = { ...this.initial };
    for (const entry of this.merged) {
      if (sources.has(entry.source)) {
        state = this.apply(state, entry.delta);
      }
    }
    return Object.freeze(state);
  }

  /**
   * Apply every field of the delta in one step and return the new version.
   * Fields set to undefined are skipped: a delta never deletes.
   */
  merge(delta: unknown, source = 'caller'): number {
    const parsed = deepFreeze(this.validate(delta, `delta from '${source}'`));
    this.current = Object.freeze(this.apply(this.current, parsed));
    this.merged.push({ source, delta: parsed });
    return this.merged.length;
  }

  has(field: keyof S): boolean {
    return this.current[field] !== undefined;
  }

  /** Number of deltas merged so far */
  get version(): number {
    return this.merged.length;
  }

  private apply(base: StateSnapshot<S>, delta: Readonly<StateDelta<S>>): StateDelta<S> {
    const next: StateDelta<S> = { ...base };
    for (const field in delta) {
      const value = delta[field];
      if (value !== undefined) {
        next[field] = value;
      }
    }
    return next;
  }

  private validate(fields: unknown, source: string): StateDelta<S> {
    if (this.schema) {
      try {
        return this.schema.parse(fields);
      } catch (error) {
        throw new StateValidationError(`Invalid ${source}: ${describeError(error)}`, error);
      }
    }
    if (!isStateDelta<S>(fields)) {
      throw new StateValidationError(`Invalid ${source}: expected a plain object`, fields);
    }
    return fields;
  }
}

/** Freeze a value and everything reachable from it; typed arrays cannot be frozen and are left alone */
function deepFreeze<T>(value: T, seen = new WeakSet<object>()): T {
  if (typeof value !== 'object' || value === null || seen.has(value) || ArrayBuffer.isView(value)) {
    return value;
  }
  seen.add(value);
  Object.freeze(value);
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    deepFreeze(child, seen);
  }
  return value;
}

function isStateDelta<S>(value: unknown): value is StateDelta<S> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a field a node depends on, failing the node when it is absent.
 */
export function requireField<S, K extends keyof S>(
  state: StateSnapshot<S>,
  field: K
): NonNullable<StateSnapshot<S>[K]> {
  const value = state[field];
  if (value === undefined || value === null) {
    throw new MissingStateFieldError(String(field));
  }
  return value;
}
