/**
 * tagstate Core Types
 *
 * This module defines the foundational types:
 * - Tagged events (immutable values, usually `Data.TaggedClass`)
 * - States as classes with a literal `_tag` and a `handle` function
 * - The action protocol every handler result satisfies
 * - Type-level checks that make an incomplete machine fail to compile
 */

import type { Logger } from "effect";

// ============================================================================
// Event Types
// ============================================================================

/**
 * A machine event - must have a _tag discriminator.
 * Use Data.TaggedClass for event definitions.
 *
 * @example
 * ```ts
 * class Lock extends Data.TaggedClass("Lock")<{ readonly newKey: number }> {}
 * class Unlock extends Data.TaggedClass("Unlock")<{ readonly key: number }> {}
 * type DoorEvent = Lock | Unlock;
 * ```
 */
export interface MachineEvent {
  readonly _tag: string;
}

/**
 * Get a specific event variant by tag
 */
export type EventByTag<E extends MachineEvent, T extends E["_tag"]> = Extract<E, { readonly _tag: T }>;

// ============================================================================
// Action Protocol
// ============================================================================

/**
 * What an action sees of the machine executing it.
 */
export interface MachineRef<E extends MachineEvent> {
  /**
   * Make the owned state with this tag current and return it.
   * Runs no hooks.
   */
  readonly transitionTo: (tag: string) => MachineState<E>;
}

/**
 * The result of handling one event.
 *
 * The engine calls `execute` right after the current state's handler
 * returned it, with the state that produced it still current.
 */
export interface Action {
  readonly _tag: string;
  execute<E extends MachineEvent>(machine: MachineRef<E>, source: MachineState<E>, event: E): void;
}

// ============================================================================
// State Types
// ============================================================================

/**
 * A state of the machine: one mode of the system and whatever data that
 * mode keeps.
 *
 * `handle` must accept every event of the machine and is called with the
 * state as `this`. `onEnter` and `onLeave` are optional; a state without
 * them is entered and left silently. `clone` is optional too; see
 * {@link MachineState.clone}.
 *
 * @example
 * ```ts
 * class LockedState {
 *   readonly _tag = "Locked";
 *   constructor(public key: number) {}
 *
 *   onEnter(event: DoorEvent): void {
 *     if (event._tag === "Lock") this.key = event.newKey;
 *   }
 *
 *   handle(event: DoorEvent) {
 *     return event._tag === "Unlock" && event.key === this.key
 *       ? transitionTo("Closed")
 *       : noOp;
 *   }
 * }
 * ```
 */
export interface MachineState<E extends MachineEvent = MachineEvent> {
  readonly _tag: string;
  // Declared as properties (not methods) so parameters are checked strictly:
  // a state whose handle only takes some of E is rejected.
  readonly handle: (this: this, event: E) => Action;
  readonly onEnter?: (event: E) => void;
  readonly onLeave?: (event: E) => void;

  /**
   * An independent copy of this state, of the same class, used by `copy`
   * and `assign`. Without it the machine copies the state's own
   * properties deeply and keeps every prototype. States with `#private`
   * fields must provide it.
   */
  readonly clone?: () => MachineState<E>;
}

/**
 * Constructor of a state class. Constructor arguments are the state's
 * initial data.
 */
export type StateClass<E extends MachineEvent, S extends MachineState<E> = MachineState<E>> =
  new (...args: never[]) => S;

/**
 * Extract the tag (state name) from a state type
 */
export type StateTag<S extends MachineState<never>> = S["_tag"];

/**
 * Get a specific state variant by tag
 */
export type StateByTag<S extends MachineState<never>, T extends S["_tag"]> = Extract<S, { readonly _tag: T }>;

/**
 * Instance type of one state class
 */
export type StateOf<C, E extends MachineEvent = never> =
  C extends new (...args: never[]) => (infer S extends MachineState<E>) ? S : never;

/**
 * Instance tuple matching a tuple of state classes, position by position
 */
export type StatesOf<C extends ReadonlyArray<StateClass<E>>, E extends MachineEvent> = {
  readonly [K in keyof C]: StateOf<C[K], E>;
};

// ============================================================================
// Compile-time Checks
// ============================================================================

/**
 * Tags of every state an action may transition to
 */
export type ActionTargets<A> =
  A extends { readonly _tag: "TransitionTo"; readonly target: infer T extends string }
    ? T
    : A extends { readonly _tag: "OneOf"; readonly action: infer Inner }
      ? ActionTargets<Inner>
      : never;

/**
 * Union of the actions a state's handler can return
 */
export type HandlerActions<S> = S extends { readonly handle: (event: never) => infer A } ? A : never;

/**
 * Transition targets named by some state class that no state class carries
 */
export type UnknownTargets<C extends ReadonlyArray<StateClass<never>>> = Exclude<
  ActionTargets<HandlerActions<StateOf<C[number]>>>,
  StateOf<C[number]>["_tag"]
>;

/**
 * Extra arguments `define` demands when a handler targets an unowned
 * state. Empty when the machine is well-formed, so a bad machine reports
 * "Expected 2 arguments" at the definition.
 */
export type TargetsCheck<C extends ReadonlyArray<StateClass<never>>> =
  [UnknownTargets<C>] extends [never]
    ? []
    : [unknownTransitionTargets: UnknownTargets<C>];

/**
 * Extra arguments `makeDefault` demands unless every state class can be
 * built without arguments.
 */
export type DefaultConstructibleCheck<C extends ReadonlyArray<StateClass<never>>> =
  C extends ReadonlyArray<new () => MachineState<never>>
    ? []
    : [stateNeedsConstructorArguments: never];

// ============================================================================
// Machine Definition Types
// ============================================================================

/**
 * Settings shared by every machine built from one definition
 */
export interface MachineOptions {
  /**
   * Name used in log annotations
   */
  readonly id: string;

  /**
   * Log every dispatch at debug level
   */
  readonly debug?: boolean;

  /**
   * Replaces effect's default logger for this machine
   */
  readonly logger?: Logger.Logger<unknown, void>;
}

/**
 * Full machine configuration
 */
export interface MachineConfig<C extends ReadonlyArray<StateClass<E>>, E extends MachineEvent>
  extends MachineOptions {
  /**
   * State classes in order. The first one is the initial state.
   */
  readonly states: C;
}

/**
 * Type-erased machine definition
 */
export interface AnyMachineDefinition {
  readonly _tag: "MachineDefinition";
  readonly id: string;
  readonly config: MachineOptions;
}

// ============================================================================
// Snapshot Types
// ============================================================================

/**
 * Machine snapshot - current state and how the machine got there
 */
export interface MachineSnapshot<S extends MachineState<E>, E extends MachineEvent> {
  readonly state: S;
  readonly index: number;
  readonly event: E | null;
}

/**
 * Called after every dispatched event that performed a transition
 */
export type SnapshotObserver<S extends MachineState<E>, E extends MachineEvent> = (
  snapshot: MachineSnapshot<S, E>,
) => void;
