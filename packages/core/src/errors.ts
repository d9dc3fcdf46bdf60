import { Data } from "effect";

// ============================================================================
// Machine Error Types (Effect TaggedErrors)
// ============================================================================
//
// A machine built through the typed API raises only one of these: a
// `StateMismatchError` from a state whose `clone` returns something other
// than a new instance of its class. Every other mistake they describe is a
// compile error there. They guard callers that reach the engine with
// widened types or from plain JavaScript.

/**
 * Two states of one machine carry the same tag
 */
export class DuplicateStateError extends Data.TaggedError("DuplicateStateError")<{
  readonly message: string;
  readonly tag: string;
}> {}

/**
 * An instance handed to `make` is not of the state class declared at its
 * position, or a state's `clone` returned something other than a new
 * instance of its class
 */
export class StateMismatchError extends Data.TaggedError("StateMismatchError")<{
  readonly message: string;
  readonly index: number;
  readonly expected: string;
  readonly received: string;
}> {}

/**
 * A transition named a tag the machine owns no state for
 */
export class UnknownStateError extends Data.TaggedError("UnknownStateError")<{
  readonly message: string;
  readonly tag: string;
}> {}

/**
 * A merged handler without a default received an event none of its
 * fragments covers
 */
export class UnhandledEventError extends Data.TaggedError("UnhandledEventError")<{
  readonly message: string;
  readonly event: string;
}> {}

/**
 * `assign` was given a machine built from another definition
 */
export class IncompatibleMachineError extends Data.TaggedError("IncompatibleMachineError")<{
  readonly message: string;
  readonly expected: string;
  readonly received: string;
}> {}
