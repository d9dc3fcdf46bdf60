import { describe, it, expect } from "vitest";
import { Array as Arr, Cause, HashMap, Logger } from "effect";
import { Machine } from "../src/index.js";
import {
  ClosedState,
  Lock,
  LockedState,
  OpenDoor,
  OpenState,
  type DoorEvent,
} from "./test-utils.js";

// ============================================================================
// Capturing Logger
// ============================================================================

interface Line {
  readonly level: string;
  readonly message: string;
  readonly annotations: Record<string, unknown>;
  readonly cause: unknown;
}

const capture = () => {
  const lines: Line[] = [];
  const logger = Logger.make(({ logLevel, message, annotations, cause }) => {
    const record: Record<string, unknown> = {};
    for (const [key, value] of HashMap.toEntries(annotations)) record[key] = value;
    lines.push({
      level: logLevel.label,
      message: Arr.ensure(message).map(String).join(" "),
      annotations: record,
      cause: Cause.isEmpty(cause) ? undefined : Cause.squash(cause),
    });
  });
  return { lines, logger };
};

const defineDoor = (options: { readonly debug: boolean; readonly logger: Logger.Logger<unknown, void> }) =>
  Machine.define<DoorEvent>()({
    id: "front-door",
    states: [ClosedState, OpenState, LockedState],
    ...options,
  });

const build = (debug: boolean) => {
  const { lines, logger } = capture();
  const door = defineDoor({ debug, logger }).make(new ClosedState(), new OpenState(), new LockedState(1));
  return { door, lines };
};

// ============================================================================
// Dispatch Logging
// ============================================================================

describe("dispatch logging", () => {
  it("logs each transition at debug level", () => {
    const { door, lines } = build(true);

    door.handle(new OpenDoor());

    expect(lines).toEqual([
      {
        level: "DEBUG",
        message: "Closed -> Open",
        annotations: { machine: "front-door", event: "OpenDoor", action: "TransitionTo" },
        cause: undefined,
      },
    ]);
  });

  it("logs events that leave the state in place", () => {
    const { door, lines } = build(true);

    door.handle(new OpenDoor());
    door.handle(new Lock({ newKey: 2 }));

    expect(lines[1]).toEqual({
      level: "DEBUG",
      message: "Open stays",
      annotations: { machine: "front-door", event: "Lock", action: "NoOp" },
      cause: undefined,
    });
  });

  it("stays silent unless debug is on", () => {
    const { door, lines } = build(false);

    door.handle(new OpenDoor());
    door.handle(new Lock({ newKey: 2 }));

    expect(lines).toEqual([]);
  });
});

// ============================================================================
// Observer Failures
// ============================================================================

describe("observer failures", () => {
  it("logs the error and keeps notifying the other observers", () => {
    const { door, lines } = build(false);
    const failure = new Error("observer failed");
    const seen: string[] = [];
    door.subscribe(() => {
      throw failure;
    });
    door.subscribe(({ state }) => seen.push(state._tag));

    door.handle(new OpenDoor());

    expect(seen).toEqual(["Open"]);
    expect(door.is("Open")).toBe(true);
    expect(lines).toHaveLength(1);
    expect(lines[0]?.level).toBe("ERROR");
    expect(lines[0]?.message).toBe('Observer of machine "front-door" failed');
    expect(lines[0]?.annotations).toEqual({ machine: "front-door" });
    expect(lines[0]?.cause).toBe(failure);
  });
});

describe("annotations", () => {
  it("annotates copies with the definition's id", () => {
    const { door, lines } = build(true);

    door.copy().handle(new OpenDoor());

    expect(lines.map((line) => line.annotations["machine"])).toEqual(["front-door"]);
  });
});
