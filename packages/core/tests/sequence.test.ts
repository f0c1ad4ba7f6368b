import { describe, it, expect, beforeEach } from "vitest";
import {
  EmptySequenceError,
  lerpNumber,
  Sequence,
  Tween,
  UnsupportedOperationError,
} from "../src/tween/index.js";

function linearTween(from: number, to: number, duration = 1): Tween<number> {
  return new Tween(lerpNumber).start(from, to, duration);
}

describe("Sequence", () => {
  let first: Tween<number>;
  let second: Tween<number>;
  let seq: Sequence;

  beforeEach(() => {
    first = linearTween(0, 50);
    second = linearTween(50, 100);
    seq = new Sequence().append(first).append(second);
  });

  // =========================================================================
  // Playback
  // =========================================================================

  describe("playback", () => {
    it("carries leftover time into the next member", () => {
      seq.start();
      seq.update(1.5);

      expect(seq.currentIndex).toBe(1);
      expect(first.isComplete).toBe(true);
      expect(second.currentValue).toBe(75);
      expect(seq.state).toBe("running");
    });

    it("plays members strictly one at a time", () => {
      seq.start();
      seq.update(0.5);

      expect(first.currentValue).toBe(25);
      expect(second.elapsedTime).toBe(0);
      expect(second.currentValue).toBe(50);
    });

    it("completes when the last member completes", () => {
      let completions = 0;
      seq.onComplete(() => completions++);
      seq.start();

      seq.update(1);
      expect(seq.currentIndex).toBe(1);
      expect(second.elapsedTime).toBe(0);

      seq.update(1);
      expect(seq.state).toBe("stopped");
      expect(seq.currentIndex).toBe(seq.length);
      expect(seq.isComplete).toBe(true);
      expect(completions).toBe(1);

      seq.update(1);
      expect(completions).toBe(1);
    });

    it("returns the time left over after its last member", () => {
      seq.start();
      expect(seq.update(0.5)).toBe(0);
      expect(seq.update(5)).toBeCloseTo(3.5, 10);
      expect(seq.isComplete).toBe(true);
    });

    it("skips members that were already complete when reached", () => {
      first.stop("forceComplete");
      seq.start();
      seq.update(0.5);

      expect(seq.currentIndex).toBe(1);
      expect(second.currentValue).toBe(75);
    });

    it("ignores updates before start", () => {
      seq.update(1);
      expect(first.elapsedTime).toBe(0);
      expect(seq.currentIndex).toBe(0);
    });

    it("fires its start notification on start", () => {
      const events: string[] = [];
      seq.onStart(() => events.push("start"));
      seq.start();
      expect(events).toEqual(["start"]);
    });
  });

  // =========================================================================
  // Failures
  // =========================================================================

  describe("failures", () => {
    it("refuses to start with no members", () => {
      const empty = new Sequence();
      expect(() => empty.start()).toThrow(EmptySequenceError);
      expect(empty.state).toBe("stopped");
      expect(empty.isComplete).toBe(false);
    });

    it("refuses to reverse and changes nothing", () => {
      seq.start();
      seq.update(0.5);

      expect(() => seq.reverse()).toThrow(UnsupportedOperationError);
      try {
        seq.reverse();
      } catch (error) {
        expect(error).toBeInstanceOf(UnsupportedOperationError);
        if (error instanceof UnsupportedOperationError) {
          expect(error.operation).toBe("reverse");
          expect(error.code).toBe("UNSUPPORTED_OPERATION");
        }
      }
      expect(first.startValue).toBe(0);
      expect(first.elapsedTime).toBe(0.5);
      expect(seq.state).toBe("running");
    });
  });

  // =========================================================================
  // Stop / pause / restart
  // =========================================================================

  describe("stop", () => {
    it("asIs freezes in place without completing", () => {
      seq.start();
      seq.update(0.5);
      seq.stop("asIs");
      seq.update(1);

      expect(seq.state).toBe("stopped");
      expect(seq.isComplete).toBe(false);
      expect(first.currentValue).toBe(25);
    });

    it("forceComplete finishes every member in order, then itself", () => {
      const order: string[] = [];
      first.onComplete(() => order.push("first"));
      second.onComplete(() => order.push("second"));
      seq.onComplete(() => order.push("sequence"));

      seq.start();
      seq.update(0.5);
      seq.stop("forceComplete");
      seq.stop("forceComplete");

      expect(order).toEqual(["first", "second", "sequence"]);
      expect(first.currentValue).toBe(50);
      expect(second.currentValue).toBe(100);
      expect(seq.currentIndex).toBe(2);
      expect(seq.isComplete).toBe(true);
    });
  });

  describe("pause and resume", () => {
    it("only touches the active member", () => {
      seq.start();
      seq.pause();

      expect(seq.state).toBe("paused");
      expect(first.state).toBe("paused");
      expect(second.state).toBe("running");

      seq.update(1);
      expect(first.elapsedTime).toBe(0);

      seq.resume();
      expect(seq.state).toBe("running");
      expect(first.state).toBe("running");
      seq.update(0.5);
      expect(first.currentValue).toBe(25);
    });
  });

  describe("restart", () => {
    it("restarts every member and plays from the first", () => {
      let starts = 0;
      seq.onStart(() => starts++);
      seq.start();
      seq.update(2);
      expect(seq.isComplete).toBe(true);

      seq.restart();

      expect(seq.state).toBe("running");
      expect(seq.currentIndex).toBe(0);
      expect(first.state).toBe("running");
      expect(first.currentValue).toBe(0);
      expect(second.currentValue).toBe(50);
      expect(starts).toBe(2);
    });

    it("can be restarted from its own completion notification", () => {
      let restarted = false;
      seq.onComplete(() => {
        if (!restarted) {
          restarted = true;
          seq.restart();
        }
      });
      seq.start();
      seq.update(2);

      expect(seq.state).toBe("running");
      expect(seq.currentIndex).toBe(0);
      expect(first.elapsedTime).toBe(0);
    });

    it("is a no-op when empty", () => {
      const empty = new Sequence();
      empty.restart();
      expect(empty.state).toBe("stopped");
    });
  });

  // =========================================================================
  // Time scale and progress
  // =========================================================================

  describe("time scale", () => {
    it("propagates to members on assignment and on append", () => {
      seq.timeScale = 2;
      expect(first.timeScale).toBe(2);
      expect(second.timeScale).toBe(2);

      const third = linearTween(100, 0);
      seq.append(third);
      expect(third.timeScale).toBe(2);

      seq.start();
      seq.update(0.25);
      expect(first.currentValue).toBe(25);
    });

    it("does not rebind members after their own scale changes", () => {
      seq.timeScale = 2;
      first.timeScale = 1;
      expect(seq.timeScale).toBe(2);
      expect(first.timeScale).toBe(1);
    });
  });

  describe("progress", () => {
    it("averages member progress over the member count", () => {
      seq.start();
      expect(seq.progress).toBe(0);
      seq.update(1.5);
      expect(seq.progress).toBe(0.75);
      seq.update(1);
      expect(seq.progress).toBe(1);
    });

    it("is zero for an empty sequence", () => {
      expect(new Sequence().progress).toBe(0);
    });

    it("seeks only the owning member", () => {
      seq.start();
      seq.progress = 0.75;

      expect(seq.currentIndex).toBe(1);
      expect(second.currentValue).toBe(75);
      // Skipped members are not fast-forwarded.
      expect(first.elapsedTime).toBe(0);
      expect(first.currentValue).toBe(0);
    });

    it("waits on a finished member seeked back into until it is restarted", () => {
      seq.start();
      seq.update(1.5);
      seq.progress = 0.25;

      expect(seq.currentIndex).toBe(0);
      expect(first.state).toBe("stopped");
      expect(first.currentValue).toBe(25);

      seq.update(1);
      expect(seq.currentIndex).toBe(0);
      expect(seq.state).toBe("running");
      expect(first.currentValue).toBe(25);

      first.restart();
      seq.update(1);
      expect(first.isComplete).toBe(true);
      expect(seq.currentIndex).toBe(1);
    });

    it("maps full progress onto the end of the last member", () => {
      seq.start();
      seq.progress = 1;
      expect(seq.currentIndex).toBe(1);
      expect(second.currentValue).toBe(100);
    });
  });

  // =========================================================================
  // Nesting
  // =========================================================================

  describe("nesting", () => {
    it("plays a nested sequence as a single member", () => {
      const tail = linearTween(0, 10);
      const outer = new Sequence().append(seq).append(tail);
      seq.start();
      outer.start();

      outer.update(2.5);

      expect(seq.isComplete).toBe(true);
      expect(outer.currentIndex).toBe(1);
      expect(tail.currentValue).toBe(5);

      outer.update(0.5);
      expect(outer.isComplete).toBe(true);
    });

    it("propagates time scale through nested sequences", () => {
      const outer = new Sequence().append(seq);
      outer.timeScale = 0.5;
      expect(first.timeScale).toBe(0.5);
      expect(second.timeScale).toBe(0.5);
    });
  });
});
