/**
 * tagstate
 *
 * A typed finite-state-machine engine:
 * - A closed set of state classes, one owned instance each
 * - The current state tracked as a position, swapped in O(1)
 * - Every state handles every event, or the machine does not compile
 * - Actions (NoOp, TransitionTo, OneOf, Optional) carry out the result
 *
 * @packageDocumentation
 */

// ============================================================================
// Machine Definition
// ============================================================================

export { Machine, define, StateMachine } from "./machine.js";
export type { MachineDefinition } from "./machine.js";

// ============================================================================
// Actions
// ============================================================================

export {
  NoOp,
  noOp,
  TransitionTo,
  transitionTo,
  OneOf,
  oneOf,
  optional,
  when,
  isNoOp,
  isTransition,
} from "./actions.js";
export type { Optional } from "./actions.js";

// ============================================================================
// State-authoring Helpers
// ============================================================================

export { byDefault, on, merge, handlers } from "./handlers.js";
export type {
  DefaultHandler,
  SingleEventHandler,
  HandlerFragment,
  FragmentEvents,
  FragmentActions,
  FragmentState,
  MergedHandler,
  Handlers,
} from "./handlers.js";
export { copyState } from "./clone.js";

// ============================================================================
// Errors
// ============================================================================

export {
  DuplicateStateError,
  StateMismatchError,
  UnknownStateError,
  UnhandledEventError,
  IncompatibleMachineError,
} from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export type {
  // Event types
  MachineEvent,
  EventByTag,

  // Action protocol
  Action,
  MachineRef,

  // State types
  MachineState,
  StateClass,
  StateTag,
  StateByTag,
  StateOf,
  StatesOf,

  // Compile-time checks
  ActionTargets,
  HandlerActions,
  UnknownTargets,
  TargetsCheck,
  DefaultConstructibleCheck,

  // Machine types
  MachineOptions,
  MachineConfig,
  AnyMachineDefinition,

  // Snapshot types
  MachineSnapshot,
  SnapshotObserver,
} from "./types.js";
