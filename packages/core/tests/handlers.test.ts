import { describe, it, expect } from "vitest";
import {
  UnhandledEventError,
  byDefault,
  handlers,
  merge,
  noOp,
  on,
  optional,
  transitionTo,
  type MachineEvent,
} from "../src/index.js";
import {
  ArmedState,
  Disarm,
  Go,
  Ping,
  catchError,
  type SignalEvent,
  type SignalTag,
} from "./test-utils.js";

const { on: onSignal, byDefault: otherwise, merge: mergeSignal } = handlers<SignalEvent>();

// ============================================================================
// Fragments
// ============================================================================

describe("byDefault", () => {
  it("wraps the action it answers with", () => {
    const fragment = byDefault(noOp);

    expect(fragment._tag).toBe("DefaultHandler");
    expect(fragment.action).toBe(noOp);
  });
});

describe("on", () => {
  it("runs the handler only for its own tag", () => {
    const fragment = onSignal("Go", ({ to }) => transitionTo(to));

    expect(fragment._tag).toBe("SingleEventHandler");
    expect(fragment.event).toBe("Go");
    expect(fragment.apply(new Go({ to: "Stopped" }), undefined)).toEqual(transitionTo("Stopped"));
    expect(fragment.apply(new Ping(), undefined)).toBeUndefined();
  });

  it("hands the state to the handler", () => {
    const fragment = onSignal("Go", ({ to }, state: { readonly home: SignalTag }) =>
      transitionTo(to === "Idle" ? state.home : to),
    );

    expect(fragment.apply(new Go({ to: "Idle" }), { home: "Stopped" })).toEqual(transitionTo("Stopped"));
  });
});

// ============================================================================
// merge
// ============================================================================

describe("merge", () => {
  it("answers a matched tag with its fragment", () => {
    const handle = mergeSignal(otherwise(noOp), onSignal("Go", ({ to }) => transitionTo(to)));

    expect(handle(new Go({ to: "Running" }))).toEqual(transitionTo("Running"));
  });

  it("falls back to the default for other tags", () => {
    const handle = mergeSignal(otherwise(noOp), onSignal("Go", ({ to }) => transitionTo(to)));

    expect(handle(new Ping())).toBe(noOp);
  });

  it("prefers a single-event fragment over the default wherever it is listed", () => {
    const handle = mergeSignal(onSignal("Ping", () => transitionTo("Idle")), otherwise(noOp));

    expect(handle(new Ping())).toEqual(transitionTo("Idle"));
  });

  it("uses the first fragment listed for a tag", () => {
    const handle = mergeSignal(
      onSignal("Ping", () => transitionTo("Running")),
      onSignal("Ping", () => transitionTo("Stopped")),
    );

    expect(handle(new Ping())).toEqual(transitionTo("Running"));
  });

  it("uses the first default listed", () => {
    const handle = mergeSignal(otherwise(noOp), otherwise(transitionTo("Idle")));

    expect(handle(new Ping())).toBe(noOp);
  });

  it("passes the event to the handler", () => {
    const seen: SignalEvent[] = [];
    const go = new Go({ to: "Idle" });
    const handle = mergeSignal(
      onSignal("Go", (event) => {
        seen.push(event);
        return noOp;
      }),
      onSignal("Ping", () => noOp),
    );

    handle(go);

    expect(seen).toEqual([go]);
  });

  it("runs fragments against the state it is called on", () => {
    const first = new ArmedState(1);
    const second = new ArmedState(2);

    expect(first.handle(new Disarm({ code: 2 }))).toEqual(optional(noOp));
    expect(second.handle(new Disarm({ code: 2 }))).toEqual(optional(transitionTo("Disarmed")));
    expect(first.handle.call(second, new Disarm({ code: 2 }))).toEqual(optional(transitionTo("Disarmed")));
  });

  it("throws for an event no fragment answers", () => {
    const handle = merge(on<MachineEvent, string, typeof noOp>("Go", () => noOp));

    const error = catchError(() => handle(new Ping()), UnhandledEventError);

    expect(error.event).toBe("Ping");
    expect(error.message).toBe('No handler for event "Ping"');
  });
});
