import { describe, it, expect } from "vitest";
import { CloseDoor, Lock, LockedState, OpenDoor, Unlock, makeDoor } from "./test-utils.js";

// ============================================================================
// Door Scenario
// ============================================================================

describe("door", () => {
  it("locks with a new key and opens only with that key", () => {
    const door = makeDoor(0x11);

    door.handle(new Lock({ newKey: 1234 }));
    expect(door.is("Locked")).toBe(true);
    expect(door.stateOf("Locked").key).toBe(1234);

    door.handle(new Unlock({ key: 2 }));
    expect(door.is("Locked")).toBe(true);

    door.handle(new Unlock({ key: 1234 }));
    expect(door.is("Closed")).toBe(true);
  });

  it("keeps the key after unlocking", () => {
    const door = makeDoor();

    door.handle(new Lock({ newKey: 1234 }));
    door.handle(new Unlock({ key: 1234 }));

    expect(door.stateOf("Locked")).toBeInstanceOf(LockedState);
    expect(door.stateOf("Locked").key).toBe(1234);
  });

  it("opens and closes", () => {
    const door = makeDoor();

    door.handle(new OpenDoor());
    expect(door.is("Open")).toBe(true);

    door.handle(new CloseDoor());
    expect(door.is("Closed")).toBe(true);
  });

  it("cannot be locked while open", () => {
    const door = makeDoor(0x11);

    door.handle(new OpenDoor());
    door.handle(new Lock({ newKey: 1234 }));

    expect(door.is("Open")).toBe(true);
    expect(door.stateOf("Locked").key).toBe(0x11);
  });

  it("ignores events that do not apply to the current state", () => {
    const door = makeDoor();

    door.handle(new Unlock({ key: 0x11 }));
    door.handle(new CloseDoor());
    expect(door.is("Closed")).toBe(true);

    door.handle(new Lock({ newKey: 5 }));
    door.handle(new OpenDoor());
    door.handle(new Lock({ newKey: 6 }));
    expect(door.is("Locked")).toBe(true);
    expect(door.stateOf("Locked").key).toBe(5);
  });
});
