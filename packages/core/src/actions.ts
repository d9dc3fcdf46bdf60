import { Data } from "effect";
import type { Action, MachineEvent, MachineRef, MachineState } from "./types.js";

// ============================================================================
// Leaf Actions
// ============================================================================

/**
 * Leaves the machine as it is.
 * Use when an event is legal but changes nothing.
 */
export class NoOp extends Data.TaggedClass("NoOp")<{}> implements Action {
  execute(): void {}
}

/**
 * Shared NoOp instance. Handlers return this rather than building new ones.
 */
export const noOp: NoOp = new NoOp();

/**
 * Moves the machine to the state tagged `target`.
 *
 * Order is fixed: the source's `onLeave` runs while the source is still
 * current, then the machine switches, then the target's `onEnter` runs
 * with the target already current.
 */
export class TransitionTo<T extends string> extends Data.TaggedClass("TransitionTo")<{
  readonly target: T;
}> implements Action {
  execute<E extends MachineEvent>(machine: MachineRef<E>, source: MachineState<E>, event: E): void {
    source.onLeave?.(event);
    const target = machine.transitionTo(this.target);
    target.onEnter?.(event);
  }
}

/**
 * Create a transition to the state with the given tag.
 *
 * @example
 * ```ts
 * on("Open", () => transitionTo("Open"))
 * ```
 */
export function transitionTo<T extends string>(target: T): TransitionTo<T> {
  return new TransitionTo({ target });
}

// ============================================================================
// Action Combinators
// ============================================================================

/**
 * Holds exactly one of several actions, chosen when it is built, and
 * executes that one.
 *
 * @example
 * ```ts
 * handle(event: PumpEvent): OneOf<TransitionTo<"Running"> | TransitionTo<"Fault">> {
 *   return oneOf(this.pressure > LIMIT ? transitionTo("Fault") : transitionTo("Running"));
 * }
 * ```
 */
export class OneOf<A extends Action> extends Data.TaggedClass("OneOf")<{
  readonly action: A;
}> implements Action {
  execute<E extends MachineEvent>(machine: MachineRef<E>, source: MachineState<E>, event: E): void {
    this.action.execute(machine, source, event);
  }
}

export function oneOf<A extends Action>(action: A): OneOf<A> {
  return new OneOf({ action });
}

/**
 * Either `A` happens or nothing does.
 */
export type Optional<A extends Action> = OneOf<A | NoOp>;

export function optional<A extends Action>(action: A | NoOp): Optional<A> {
  return new OneOf<A | NoOp>({ action });
}

/**
 * `action()` when `condition` holds, NoOp otherwise.
 *
 * @example
 * ```ts
 * when(event.key === this.key, () => transitionTo("Closed"))
 * ```
 */
export function when<A extends Action>(condition: boolean, action: () => A): Optional<A> {
  return optional(condition ? action() : noOp);
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if an action is a NoOp
 */
export function isNoOp(action: Action): action is NoOp {
  return action._tag === "NoOp";
}

/**
 * Check if an action is a transition
 */
export function isTransition(action: Action): action is TransitionTo<string> {
  return action instanceof TransitionTo;
}
