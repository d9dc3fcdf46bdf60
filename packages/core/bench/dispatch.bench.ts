import { Bench } from "tinybench";
import { Data, Match } from "effect";
import { Machine, handlers, noOp, transitionTo, when } from "../src/index.js";

// ============================================================================
// Machine Definition
// ============================================================================

class OpenDoor extends Data.TaggedClass("OpenDoor")<{}> {}
class CloseDoor extends Data.TaggedClass("CloseDoor")<{}> {}
class Lock extends Data.TaggedClass("Lock")<{ readonly newKey: number }> {}
class Unlock extends Data.TaggedClass("Unlock")<{ readonly key: number }> {}

type DoorEvent = OpenDoor | CloseDoor | Lock | Unlock;

const { on, byDefault, merge } = handlers<DoorEvent>();

class ClosedState {
  readonly _tag = "Closed";
  readonly handle = merge(
    byDefault(noOp),
    on("Lock", () => transitionTo("Locked")),
    on("OpenDoor", () => transitionTo("Open")),
  );
}

class OpenState {
  readonly _tag = "Open";
  readonly handle = merge(byDefault(noOp), on("CloseDoor", () => transitionTo("Closed")));
}

class LockedState {
  readonly _tag = "Locked";

  constructor(public key: number) {}

  onEnter(event: DoorEvent): void {
    if (event._tag === "Lock") this.key = event.newKey;
  }

  handle(event: DoorEvent) {
    return Match.value(event).pipe(
      Match.tag("Unlock", ({ key }) => when(key === this.key, () => transitionTo("Closed"))),
      Match.orElse(() => noOp),
    );
  }
}

const Door = Machine.define<DoorEvent>()({
  id: "door",
  states: [ClosedState, OpenState, LockedState],
});

const makeDoor = () => Door.make(new ClosedState(), new OpenState(), new LockedState(0));

// Pre-create events
const openEvent = new OpenDoor();
const closeEvent = new CloseDoor();
const lockEvent = new Lock({ newKey: 1234 });
const wrongKeyEvent = new Unlock({ key: 1 });
const unlockEvent = new Unlock({ key: 1234 });

// ============================================================================
// Verification
// ============================================================================

function verify() {
  const door = makeDoor();
  door.handle(lockEvent);
  door.handle(wrongKeyEvent);
  const stillLocked = door.is("Locked");
  door.handle(unlockEvent);

  console.log(`  ✓ Lock / wrong key / right key: locked=${stillLocked}, closed=${door.is("Closed")}\n`);
}

// ============================================================================
// Run Benchmarks
// ============================================================================

async function main() {
  console.log("\n" + "═".repeat(70));
  console.log("  DISPATCH BENCHMARK");
  console.log("═".repeat(70) + "\n");

  verify();

  // -------------------------------------------------------------------------
  // Construction
  // -------------------------------------------------------------------------
  console.log("📦 CONSTRUCTION\n");

  const creationBench = new Bench({ time: 200, warmupTime: 50 });

  creationBench.add("make", () => {
    makeDoor();
  });

  creationBench.add("copy", () => {
    makeDoor().copy();
  });

  await creationBench.run();
  console.table(creationBench.table());

  // -------------------------------------------------------------------------
  // Event Handling
  // -------------------------------------------------------------------------
  console.log("\n📨 EVENT HANDLING (1000 events)\n");

  const eventBench = new Bench({ time: 200, warmupTime: 50 });

  eventBench.add("open / close", () => {
    const door = makeDoor();
    for (let i = 0; i < 500; i++) {
      door.handle(openEvent);
      door.handle(closeEvent);
    }
  });

  eventBench.add("lock / wrong key / right key", () => {
    const door = makeDoor();
    for (let i = 0; i < 333; i++) {
      door.handle(lockEvent);
      door.handle(wrongKeyEvent);
      door.handle(unlockEvent);
    }
  });

  eventBench.add("ignored events", () => {
    const door = makeDoor();
    for (let i = 0; i < 1000; i++) {
      door.handle(closeEvent);
    }
  });

  await eventBench.run();
  console.table(eventBench.table());

  // -------------------------------------------------------------------------
  // With Subscribers
  // -------------------------------------------------------------------------
  console.log("\n👀 WITH SUBSCRIBERS (5 subscribers, 100 events)\n");

  const subscriberBench = new Bench({ time: 200, warmupTime: 50 });

  subscriberBench.add("with 5 subscribers", () => {
    const door = makeDoor();
    const unsubs: Array<() => void> = [];
    for (let i = 0; i < 5; i++) {
      unsubs.push(door.subscribe(() => undefined));
    }
    for (let i = 0; i < 50; i++) {
      door.handle(openEvent);
      door.handle(closeEvent);
    }
    unsubs.forEach((unsub) => unsub());
  });

  await subscriberBench.run();
  console.table(subscriberBench.table());
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
