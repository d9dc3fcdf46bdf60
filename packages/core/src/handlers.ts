/**
 * State-authoring helpers
 *
 * Fragments describe part of a state's event handling; `merge` turns a
 * list of them into the single `handle` function a state exposes:
 * - `byDefault(action)` - answer any event nobody else claims
 * - `on(tag, handler)` - answer exactly one event tag
 * - `merge(...fragments)` - one handler covering every fragment
 *
 * A fragment handler receives the event and the state handling it, so a
 * merged handler keeps working on copies of the state.
 *
 * @example
 * ```ts
 * const { on, byDefault, merge } = handlers<AlarmEvent>();
 *
 * class ArmedState {
 *   readonly _tag = "Armed";
 *   constructor(public code: number) {}
 *
 *   readonly handle = merge(
 *     byDefault(noOp),
 *     on("Disarm", ({ code }, state: ArmedState) => when(code === state.code, () => transitionTo("Idle"))),
 *   );
 * }
 * ```
 */

import { UnhandledEventError } from "./errors.js";
import type { Action, EventByTag, MachineEvent } from "./types.js";

// ============================================================================
// Fragment Types
// ============================================================================

/**
 * Fallback answer for any event not matched by another fragment
 */
export interface DefaultHandler<A extends Action> {
  readonly _tag: "DefaultHandler";
  readonly action: A;
}

/**
 * Answer for exactly one event tag. `S` is the state the handler expects
 * to be called for.
 */
export interface SingleEventHandler<K extends string, A extends Action, S = unknown> {
  readonly _tag: "SingleEventHandler";
  readonly event: K;
  /**
   * Runs the handler when the event carries this fragment's tag
   */
  readonly apply: (event: MachineEvent, state: S) => A | undefined;
}

export type HandlerFragment =
  | DefaultHandler<Action>
  | SingleEventHandler<string, Action, never>;

/**
 * Events a list of fragments answers: every event of E when one of them
 * is a default, otherwise the events tagged by the single-event fragments
 */
export type FragmentEvents<E extends MachineEvent, F extends HandlerFragment> =
  [Extract<F, DefaultHandler<Action>>] extends [never]
    ? EventByTag<E, Extract<F, SingleEventHandler<string, Action, never>>["event"] & E["_tag"]>
    : E;

/**
 * Union of the actions a list of fragments can produce
 */
export type FragmentActions<F extends HandlerFragment> =
  F extends DefaultHandler<infer A extends Action>
    ? A
    : F extends SingleEventHandler<string, infer A extends Action, never>
      ? A
      : never;

/**
 * The state every fragment of a list accepts: the intersection of what
 * each single-event fragment expects
 */
export type FragmentState<F extends HandlerFragment> =
  (F extends SingleEventHandler<string, Action, infer S> ? (state: S) => void : (state: unknown) => void) extends (
    state: infer I,
  ) => void
    ? I
    : never;

/**
 * A state's `handle` as produced by `merge`
 */
export type MergedHandler<TEvent, A, S = unknown> = (this: S, event: TEvent) => A;

// ============================================================================
// Fragment Builders
// ============================================================================

/**
 * Create a default fragment.
 *
 * Merged alone it makes a state that answers every event the same way:
 * `merge(byDefault(noOp))` ignores everything.
 */
export function byDefault<A extends Action>(action: A): DefaultHandler<A> {
  return { _tag: "DefaultHandler", action };
}

function isTagged<E extends MachineEvent, K extends E["_tag"]>(
  event: MachineEvent,
  tag: K,
): event is EventByTag<E, K> {
  return event._tag === tag;
}

/**
 * Create a single-event fragment.
 * Prefer the typed `on` from {@link handlers}, which infers the event.
 */
export function on<E extends MachineEvent, K extends E["_tag"], A extends Action, S = unknown>(
  tag: K,
  handler: (event: EventByTag<E, K>, state: S) => A,
): SingleEventHandler<K, A, S> {
  return {
    _tag: "SingleEventHandler",
    event: tag,
    apply: (event, state) => (isTagged<E, K>(event, tag) ? handler(event, state) : undefined),
  };
}

// ============================================================================
// Merge
// ============================================================================

/**
 * Combine fragments into one handler. The merged handler passes its
 * `this` (the state it is called on) to every fragment.
 *
 * Single-event fragments take precedence over the default; among
 * single-event fragments for the same tag the first one listed wins.
 */
export function merge<E extends MachineEvent, const F extends ReadonlyArray<HandlerFragment>>(
  ...fragments: F
): MergedHandler<FragmentEvents<E, F[number]>, FragmentActions<F[number]>, FragmentState<F[number]>>;
export function merge<S>(
  ...fragments: ReadonlyArray<DefaultHandler<Action> | SingleEventHandler<string, Action, S>>
): MergedHandler<MachineEvent, Action, S> {
  const byTag = new Map<string, (event: MachineEvent, state: S) => Action | undefined>();
  let fallback: Action | undefined;

  for (const fragment of fragments) {
    if (fragment._tag === "DefaultHandler") {
      fallback ??= fragment.action;
    } else if (!byTag.has(fragment.event)) {
      byTag.set(fragment.event, fragment.apply);
    }
  }

  return function (this: S, event: MachineEvent) {
    const result = byTag.get(event._tag)?.(event, this) ?? fallback;
    if (result === undefined) {
      throw new UnhandledEventError({
        message: `No handler for event "${event._tag}"`,
        event: event._tag,
      });
    }
    return result;
  };
}

// ============================================================================
// Typed Builders Factory
// ============================================================================

/**
 * Fragment builders typed to one event union.
 */
export interface Handlers<E extends MachineEvent> {
  on<K extends E["_tag"], A extends Action, S = unknown>(
    tag: K,
    handler: (event: EventByTag<E, K>, state: S) => A,
  ): SingleEventHandler<K, A, S>;

  byDefault<A extends Action>(action: A): DefaultHandler<A>;

  merge<const F extends ReadonlyArray<HandlerFragment>>(
    ...fragments: F
  ): MergedHandler<FragmentEvents<E, F[number]>, FragmentActions<F[number]>, FragmentState<F[number]>>;
}

/**
 * Create fragment builders for a machine's event union.
 *
 * @example
 * ```ts
 * const { on, byDefault, merge } = handlers<DoorEvent>();
 * ```
 */
export function handlers<E extends MachineEvent>(): Handlers<E> {
  return {
    on: <K extends E["_tag"], A extends Action, S = unknown>(
      tag: K,
      handler: (event: EventByTag<E, K>, state: S) => A,
    ) => on<E, K, A, S>(tag, handler),
    byDefault,
    merge: <const F extends ReadonlyArray<HandlerFragment>>(...fragments: F) => merge<E, F>(...fragments),
  };
}
