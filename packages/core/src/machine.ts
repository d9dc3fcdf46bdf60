/**
 * tagstate Machine
 *
 * The `Machine` namespace provides the API for defining state machines:
 * - `Machine.define<E>()(config)` - declare a machine over event union E
 * - `definition.make(...states)` - build one with chosen initial state data
 * - `definition.makeDefault()` - build one from zero-argument constructors
 *
 * @example
 * ```ts
 * import { Machine, handlers, noOp, transitionTo, when } from "@tagstate/core";
 * import { Data, Match } from "effect";
 *
 * class Lock extends Data.TaggedClass("Lock")<{ readonly newKey: number }> {}
 * class Unlock extends Data.TaggedClass("Unlock")<{ readonly key: number }> {}
 * type DoorEvent = Lock | Unlock;
 *
 * const { on, byDefault, merge } = handlers<DoorEvent>();
 *
 * class ClosedState {
 *   readonly _tag = "Closed";
 *   readonly handle = merge(byDefault(noOp), on("Lock", () => transitionTo("Locked")));
 * }
 *
 * class LockedState {
 *   readonly _tag = "Locked";
 *   constructor(public key: number) {}
 *
 *   handle(event: DoorEvent) {
 *     return Match.value(event).pipe(
 *       Match.tag("Unlock", ({ key }) => when(key === this.key, () => transitionTo("Closed"))),
 *       Match.orElse(() => noOp),
 *     );
 *   }
 * }
 *
 * const Door = Machine.define<DoorEvent>()({ id: "door", states: [ClosedState, LockedState] });
 *
 * const door = Door.make(new ClosedState(), new LockedState(0x11));
 * door.handle(new Lock({ newKey: 1234 }));
 * ```
 */

import { copyState } from "./clone.js";
import {
  DuplicateStateError,
  IncompatibleMachineError,
  StateMismatchError,
  UnknownStateError,
} from "./errors.js";
import { makeMachineLog, type MachineLog } from "./logging.js";
import type {
  AnyMachineDefinition,
  DefaultConstructibleCheck,
  MachineConfig,
  MachineEvent,
  MachineRef,
  MachineSnapshot,
  MachineState,
  SnapshotObserver,
  StateByTag,
  StateClass,
  StateOf,
  StatesOf,
  StateTag,
  TargetsCheck,
} from "./types.js";

// ============================================================================
// Helpers
// ============================================================================

function hasTag<S extends MachineState<never>, K extends S["_tag"]>(
  state: S,
  tag: K,
): state is StateByTag<S, K> {
  return state._tag === tag;
}

function sameClass<S extends object>(original: S, copy: object): copy is S {
  return Object.getPrototypeOf(copy) === Object.getPrototypeOf(original);
}

/**
 * An independent copy of one owned state: its own `clone` when it has
 * one, a deep copy otherwise
 */
function cloneState<S extends MachineState<never>>(
  state: S,
  index: number,
  id: string,
  seen: Map<object, unknown>,
): S {
  if (state.clone === undefined) return copyState(state, seen);

  const copy = state.clone();
  if (copy === state || !sameClass(state, copy)) {
    throw new StateMismatchError({
      message: `Machine "${id}": clone of state "${state._tag}" at position ${index} is not a new ${state.constructor.name}`,
      index,
      expected: state.constructor.name,
      received: copy._tag,
    });
  }
  return copy;
}

function indexTags(id: string, owned: ReadonlyArray<MachineState<never>>): ReadonlyMap<string, number> {
  const indexByTag = new Map<string, number>();
  owned.forEach((state, index) => {
    if (indexByTag.has(state._tag)) {
      throw new DuplicateStateError({
        message: `Machine "${id}" has more than one state tagged "${state._tag}"`,
        tag: state._tag,
      });
    }
    indexByTag.set(state._tag, index);
  });
  return indexByTag;
}

interface Pending<E extends MachineEvent> {
  readonly event: E;
  readonly machine: MachineRef<E>;
}

/**
 * Builds machines for `define`; set once `StateMachine` is declared
 */
let construct: <S extends MachineState<E>, E extends MachineEvent>(
  definition: AnyMachineDefinition,
  owned: ReadonlyArray<S>,
) => StateMachine<S, E>;

// ============================================================================
// StateMachine
// ============================================================================

/**
 * A running machine: the owned states and which one is current.
 *
 * Built through {@link MachineDefinition.make} or
 * {@link MachineDefinition.makeDefault}.
 */
export class StateMachine<S extends MachineState<E>, E extends MachineEvent> {
  static {
    construct = <S extends MachineState<E>, E extends MachineEvent>(
      definition: AnyMachineDefinition,
      owned: ReadonlyArray<S>,
    ) => new StateMachine<S, E>(definition, owned, 0);
  }

  private indexByTag: ReadonlyMap<string, number>;
  private readonly log: MachineLog;
  private readonly observers = new Set<SnapshotObserver<S, E>>();
  private readonly pending: Array<Pending<E>> = [];
  private readonly ref: MachineRef<E>;

  private lastEvent: E | null = null;
  private dispatching = false;
  private transitioned = false;

  private constructor(
    readonly definition: AnyMachineDefinition,
    private owned: ReadonlyArray<S>,
    private current: number,
  ) {
    this.indexByTag = indexTags(definition.id, owned);
    this.log = makeMachineLog(definition.config);
    this.ref = { transitionTo: (tag) => this.enter(tag) };
  }

  get id(): string {
    return this.definition.id;
  }

  /**
   * The current state
   */
  get state(): S {
    return this.owned[this.current];
  }

  /**
   * Position of the current state in the definition's state list
   */
  get index(): number {
    return this.current;
  }

  /**
   * Whether the machine owns a state with this tag
   */
  has(tag: string): tag is StateTag<S> {
    return this.indexByTag.has(tag);
  }

  is<K extends StateTag<S>>(tag: K): boolean {
    return this.owned[this.current]._tag === tag;
  }

  /**
   * The owned instance of a state, current or not
   */
  stateOf<K extends StateTag<S>>(tag: K): StateByTag<S, K> {
    const index = this.indexByTag.get(tag);
    const state = index === undefined ? undefined : this.owned[index];
    if (state === undefined || !hasTag(state, tag)) {
      throw new UnknownStateError({
        message: `Machine "${this.id}" has no state tagged "${tag}"`,
        tag,
      });
    }
    return state;
  }

  getSnapshot(): MachineSnapshot<S, E> {
    return { state: this.state, index: this.current, event: this.lastEvent };
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  /**
   * Hand an event to the current state and execute the action it returns.
   *
   * Runs to completion: an event handed in while another is being
   * handled (from a hook, handler or action) waits until that one is done.
   * If anything throws, the error reaches the outer caller and waiting
   * events are dropped.
   */
  handle(event: E): void {
    this.handleBy(event, this.ref);
  }

  /**
   * Like {@link handle}, but the action executes against `machine`
   * instead of this machine. A wrapper that adds behaviour to
   * transitions passes itself here and forwards to this machine.
   */
  handleBy(event: E, machine: MachineRef<E>): void {
    if (this.dispatching) {
      this.pending.push({ event, machine });
      return;
    }

    this.dispatching = true;
    try {
      let next: Pending<E> | undefined = { event, machine };
      while (next !== undefined) {
        this.dispatch(next.event, next.machine);
        next = this.pending.shift();
      }
    } finally {
      this.dispatching = false;
      this.pending.length = 0;
    }
  }

  private dispatch(event: E, machine: MachineRef<E>): void {
    const source = this.owned[this.current];
    this.lastEvent = event;
    this.transitioned = false;

    const action = source.handle(event);
    action.execute(machine, source, event);

    if (this.transitioned) {
      this.log.debug(`${source._tag} -> ${this.state._tag}`, { event: event._tag, action: action._tag });
      this.notify();
    } else {
      this.log.debug(`${source._tag} stays`, { event: event._tag, action: action._tag });
    }
  }

  /**
   * Make the owned state with this tag current and return it.
   * Bookkeeping only: no hooks run.
   */
  transitionTo<K extends StateTag<S>>(tag: K): StateByTag<S, K> {
    const state = this.stateOf(tag);
    this.enter(tag);
    return state;
  }

  private enter(tag: string): S {
    const index = this.indexByTag.get(tag);
    if (index === undefined) {
      throw new UnknownStateError({
        message: `Machine "${this.id}" has no state tagged "${tag}"`,
        tag,
      });
    }
    this.current = index;
    this.transitioned = true;
    return this.owned[index];
  }

  // ==========================================================================
  // Copy
  // ==========================================================================

  /**
   * An independent machine with copies of every owned state. Its current
   * state is the copy at the same position as this machine's current one.
   * Observers are not copied.
   */
  copy(): StateMachine<S, E> {
    return new StateMachine<S, E>(this.definition, this.cloneStates(), this.current);
  }

  /**
   * Replace every owned state with a copy of `other`'s state at the same
   * position and adopt `other`'s current position. Observers stay.
   */
  assign(other: StateMachine<S, E>): void {
    if (other === this) return;
    if (other.definition !== this.definition) {
      throw new IncompatibleMachineError({
        message: `Cannot assign machine "${other.id}" to machine "${this.id}"`,
        expected: this.id,
        received: other.id,
      });
    }
    const owned = other.cloneStates();
    this.indexByTag = indexTags(this.id, owned);
    this.owned = owned;
    this.current = other.current;
    this.lastEvent = other.lastEvent;
  }

  private cloneStates(): ReadonlyArray<S> {
    const seen = new Map<object, unknown>();
    return this.owned.map((state, index) => cloneState(state, index, this.id, seen));
  }

  // ==========================================================================
  // Observers
  // ==========================================================================

  subscribe(observer: SnapshotObserver<S, E>): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  private notify(): void {
    const snapshot = this.getSnapshot();
    for (const observer of this.observers) {
      try {
        observer(snapshot);
      } catch (error) {
        this.log.error(`Observer of machine "${this.id}" failed`, error);
      }
    }
  }
}

// ============================================================================
// Machine Definition
// ============================================================================

/**
 * Machine definition - the result of Machine.define()
 */
export interface MachineDefinition<C extends ReadonlyArray<StateClass<E>>, E extends MachineEvent>
  extends AnyMachineDefinition {
  readonly config: MachineConfig<C, E>;

  /**
   * Build a machine from one instance per state class, in declaration
   * order. The first one is current.
   */
  readonly make: (...states: StatesOf<C, E>) => StateMachine<StateOf<C[number], E>, E>;

  /**
   * Build a machine from each state class's zero-argument constructor.
   * Does not compile unless every state class has one.
   */
  readonly makeDefault: (...check: DefaultConstructibleCheck<C>) => StateMachine<StateOf<C[number], E>, E>;
}

/**
 * Define a state machine over the event union `E`.
 *
 * Compilation fails when a state's `handle` does not accept every event
 * of `E` or when a handler transitions to a tag no listed state carries.
 *
 * @example
 * ```ts
 * const Door = Machine.define<DoorEvent>()({
 *   id: "door",
 *   states: [ClosedState, OpenState, LockedState],
 * });
 * ```
 */
export function define<E extends MachineEvent>() {
  return <const C extends ReadonlyArray<StateClass<E>>>(
    config: MachineConfig<C, E>,
    ..._targets: TargetsCheck<C>
  ): MachineDefinition<C, E> => {
    type S = StateOf<C[number], E>;

    const declares = (state: MachineState<E> | undefined, index: number): state is S => {
      const State = config.states[index];
      return State !== undefined && state instanceof State;
    };

    const adopt = (states: ReadonlyArray<MachineState<E> | undefined>): S[] =>
      config.states.map((State, index) => {
        const state = states[index];
        if (!declares(state, index)) {
          throw new StateMismatchError({
            message: `Machine "${config.id}" expects an instance of ${State.name} at position ${index}`,
            index,
            expected: State.name,
            received: state === undefined ? "nothing" : state._tag,
          });
        }
        return state;
      });

    const definition: MachineDefinition<C, E> = {
      _tag: "MachineDefinition",
      id: config.id,
      config,
      make: (...states) => construct<S, E>(definition, adopt(config.states.map((_, index) => states[index]))),
      makeDefault: () => construct<S, E>(definition, adopt(config.states.map((State) => new State()))),
    };

    return definition;
  };
}

// ============================================================================
// Machine Namespace
// ============================================================================

/**
 * Machine namespace - main API for defining state machines.
 */
export const Machine = {
  /**
   * Define a state machine.
   *
   * @see {@link define}
   */
  define,
} as const;
