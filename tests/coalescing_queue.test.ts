import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readdir, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { CoalescingQueue } from "../src/scaling/coalescing_queue.js";
import type { Notifier, ScaleSignal } from "../src/scaling/notifier.js";
import type { AppliedFactorProbe, Rethemer } from "../src/scaling/splash.js";
import { ValidationError } from "../src/errors.js";

// Rethemer whose calls stay in flight until the test finishes them.
class ManualRethemer implements Rethemer {
  calls: number[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private waiting: Array<{ resolve: () => void; reject: (e: Error) => void }> = [];

  apply(factor: number): Promise<void> {
    this.calls.push(factor);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    return new Promise<void>((resolve, reject) => {
      this.waiting.push({
        resolve: () => {
          this.inFlight--;
          resolve();
        },
        reject: (e) => {
          this.inFlight--;
          reject(e);
        },
      });
    });
  }

  finishNext(): void {
    const next = this.waiting.shift();
    if (!next) throw new Error("no rethemer call in flight");
    next.resolve();
  }

  failNext(message: string): void {
    const next = this.waiting.shift();
    if (!next) throw new Error("no rethemer call in flight");
    next.reject(new Error(message));
  }
}

// Rethemer that completes on its own after a timer tick.
class TimedRethemer implements Rethemer {
  calls: number[] = [];
  inFlight = 0;
  maxInFlight = 0;

  async apply(factor: number): Promise<void> {
    this.calls.push(factor);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await new Promise((resolve) => setTimeout(resolve, 1));
    this.inFlight--;
  }
}

class RecordingNotifier implements Notifier {
  signals: ScaleSignal[] = [];
  emit(signal: ScaleSignal): void {
    this.signals.push(signal);
  }
}

const neverApplied: AppliedFactorProbe = { currentFactor: async () => 0 };

const PAIR: ScaleSignal[] = ["SetScaleFactorStarted", "SetScaleFactorDone"];

describe("CoalescingQueue", () => {
  let notifier: RecordingNotifier;

  beforeEach(() => {
    notifier = new RecordingNotifier();
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs the first request and collapses the backlog to the latest one", async () => {
    const rethemer = new ManualRethemer();
    const queue = new CoalescingQueue({ rethemer, notifier, probe: neverApplied, maxFactor: 3 });

    await queue.submit(1);
    await queue.submit(2);
    await queue.submit(3);

    await vi.waitFor(() => expect(rethemer.calls).toEqual([1]));
    expect(queue.snapshot()).toEqual({ active: true, pending: { factor: 3, notify: true } });
    expect(notifier.signals).toEqual(["SetScaleFactorStarted"]);

    rethemer.finishNext();
    await vi.waitFor(() => expect(rethemer.calls).toEqual([1, 3]));

    rethemer.finishNext();
    await queue.onIdle();

    expect(rethemer.calls).toEqual([1, 3]);
    expect(notifier.signals).toEqual([...PAIR, ...PAIR]);
    expect(queue.snapshot()).toEqual({ active: false, pending: null });
    expect(queue.lastApplied).toBe(3);
  });

  it("returns from submit before the rethemer finishes", async () => {
    const rethemer = new ManualRethemer();
    const queue = new CoalescingQueue({ rethemer, notifier, probe: neverApplied });

    await queue.submit(2);
    await vi.waitFor(() => expect(rethemer.calls).toEqual([2]));

    expect(rethemer.inFlight).toBe(1);
    expect(queue.snapshot().active).toBe(true);

    rethemer.finishNext();
    await queue.onIdle();
    expect(queue.snapshot().active).toBe(false);
  });

  it("skips signals for an unnotified request but notifies for drained work", async () => {
    const rethemer = new ManualRethemer();
    const queue = new CoalescingQueue({ rethemer, notifier, probe: neverApplied });

    await queue.submit(1, false);
    await queue.submit(2, false);
    await vi.waitFor(() => expect(rethemer.calls).toEqual([1]));
    expect(notifier.signals).toEqual([]);

    rethemer.finishNext();
    await vi.waitFor(() => expect(rethemer.calls).toEqual([1, 2]));
    rethemer.finishNext();
    await queue.onIdle();

    expect(notifier.signals).toEqual(PAIR);
  });

  it("clamps factors into the configured bounds", async () => {
    const rethemer = new ManualRethemer();
    const queue = new CoalescingQueue({ rethemer, notifier, probe: neverApplied, minFactor: 1, maxFactor: 2 });

    await queue.submit(0);
    await vi.waitFor(() => expect(rethemer.calls).toEqual([1]));
    rethemer.finishNext();
    await queue.onIdle();

    await queue.submit(10);
    await vi.waitFor(() => expect(rethemer.calls).toEqual([1, 2]));
    rethemer.finishNext();
    await queue.onIdle();

    expect(queue.clamp(-4)).toBe(1);
    expect(queue.clamp(7)).toBe(2);
  });

  it("rejects non-integer factors synchronously without starting a worker", () => {
    const rethemer = new ManualRethemer();
    const queue = new CoalescingQueue({ rethemer, notifier, probe: neverApplied });

    expect(() => queue.submit(1.5)).toThrow(ValidationError);
    expect(() => queue.submit(Number.NaN)).toThrow(ValidationError);
    expect(() => queue.submit(Number.POSITIVE_INFINITY)).toThrow(ValidationError);
    expect(queue.snapshot()).toEqual({ active: false, pending: null });
    expect(rethemer.calls).toEqual([]);
  });

  it("rejects inverted bounds", () => {
    const rethemer = new ManualRethemer();
    expect(() => new CoalescingQueue({ rethemer, notifier, minFactor: 3, maxFactor: 2 })).toThrow(ValidationError);
  });

  it("skips the rethemer when the splash is already at the target factor", async () => {
    const rethemer = new ManualRethemer();
    const probe: AppliedFactorProbe = { currentFactor: async () => 2 };
    const queue = new CoalescingQueue({ rethemer, notifier, probe });

    await queue.submit(2);
    await queue.onIdle();

    expect(rethemer.calls).toEqual([]);
    expect(notifier.signals).toEqual(PAIR);
  });

  it("falls back to the last applied factor when there is no probe", async () => {
    const rethemer = new ManualRethemer();
    const queue = new CoalescingQueue({ rethemer, notifier });

    await queue.submit(1);
    await vi.waitFor(() => expect(rethemer.calls).toEqual([1]));
    rethemer.finishNext();
    await queue.onIdle();

    await queue.submit(1);
    await queue.onIdle();

    expect(rethemer.calls).toEqual([1]);
    expect(notifier.signals).toEqual([...PAIR, ...PAIR]);
  });

  it("treats a failing probe as unknown and still rethemes", async () => {
    const rethemer = new ManualRethemer();
    const probe: AppliedFactorProbe = {
      currentFactor: async () => {
        throw new Error("config unreadable");
      },
    };
    const queue = new CoalescingQueue({ rethemer, notifier, probe });

    await queue.submit(2);
    await vi.waitFor(() => expect(rethemer.calls).toEqual([2]));
    rethemer.finishNext();
    await queue.onIdle();

    expect(notifier.signals).toEqual(PAIR);
  });

  it("emits done and goes idle when the rethemer fails", async () => {
    const rethemer = new ManualRethemer();
    const queue = new CoalescingQueue({ rethemer, notifier, probe: neverApplied });

    await queue.submit(2);
    await vi.waitFor(() => expect(rethemer.calls).toEqual([2]));
    rethemer.failNext("daemon unavailable");
    await queue.onIdle();

    expect(notifier.signals).toEqual(PAIR);
    expect(queue.snapshot()).toEqual({ active: false, pending: null });
    expect(queue.lastApplied).toBeUndefined();
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining("[ScaleQueue]"),
      "Retheme to factor 2 failed (daemon unavailable)"
    );
  });

  it("drains the backlog after a failed call", async () => {
    const rethemer = new ManualRethemer();
    const queue = new CoalescingQueue({ rethemer, notifier, probe: neverApplied });

    await queue.submit(1);
    await queue.submit(2);
    await vi.waitFor(() => expect(rethemer.calls).toEqual([1]));

    rethemer.failNext("boom");
    await vi.waitFor(() => expect(rethemer.calls).toEqual([1, 2]));
    rethemer.finishNext();
    await queue.onIdle();

    expect(queue.lastApplied).toBe(2);
    expect(notifier.signals).toEqual([...PAIR, ...PAIR]);
  });

  it("keeps working when the notifier throws", async () => {
    const rethemer = new ManualRethemer();
    const broken: Notifier = {
      emit: () => {
        throw new Error("bus gone");
      },
    };
    const queue = new CoalescingQueue({ rethemer, notifier: broken, probe: neverApplied });

    await queue.submit(2);
    await vi.waitFor(() => expect(rethemer.calls).toEqual([2]));
    rethemer.finishNext();
    await queue.onIdle();

    expect(queue.lastApplied).toBe(2);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringContaining("[ScaleQueue]"),
      "Failed to emit SetScaleFactorDone (bus gone)"
    );
  });

  it("never runs two rethemer calls at once under concurrent submits", async () => {
    const rethemer = new TimedRethemer();
    const queue = new CoalescingQueue({ rethemer, notifier, probe: neverApplied });
    const factors = Array.from({ length: 20 }, (_, i) => (i % 2) + 1);

    await Promise.all(factors.map((f) => queue.submit(f)));
    await queue.onIdle();

    expect(rethemer.maxInFlight).toBe(1);
    expect(rethemer.calls[0]).toBe(1);
    expect(rethemer.calls.at(-1)).toBe(2);
    expect(queue.snapshot()).toEqual({ active: false, pending: null });
    // one start/done pair per worker run, in order
    expect(notifier.signals).toEqual(rethemer.calls.flatMap(() => PAIR));
  });

  it("resolves onIdle immediately when nothing is running", async () => {
    const queue = new CoalescingQueue({ rethemer: new ManualRethemer(), notifier });
    await expect(queue.onIdle()).resolves.toBeUndefined();
  });

  it("does not resolve onIdle while a worker started after the drain is running", async () => {
    const busyAtIdle: number[] = [];

    for (let offset = 0; offset < 40; offset++) {
      const rethemer = new ManualRethemer();
      const queue = new CoalescingQueue({ rethemer, notifier, probe: neverApplied });

      await queue.submit(1);
      await vi.waitFor(() => expect(rethemer.calls).toEqual([1]));
      const idle = queue.onIdle().then(() => queue.snapshot().active);

      rethemer.finishNext();
      for (let i = 0; i < offset; i++) await Promise.resolve();
      await queue.submit(2);

      // factor 2 either drained by the first worker or run by a new one
      await vi.waitFor(() => expect(rethemer.calls).toEqual([1, 2]));
      rethemer.finishNext();
      if (await idle) busyAtIdle.push(offset);
      await queue.onIdle();
      expect(queue.snapshot().active).toBe(false);
    }

    expect(busyAtIdle).toEqual([]);
  });

  describe("metrics", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "scale-metrics-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("records rethemer latency when a metrics directory is set", async () => {
      const rethemer = new TimedRethemer();
      const queue = new CoalescingQueue({ rethemer, notifier, probe: neverApplied, metricsDir: dir });

      await queue.submit(2);
      await queue.onIdle();

      const files = await readdir(dir);
      expect(files).toHaveLength(1);
      const [line] = (await readFile(join(dir, files[0]), "utf-8")).trim().split("\n");
      const entry = JSON.parse(line);
      expect(entry.source).toBe("queue");
      expect(entry.metric).toBe("retheme_latency_ms");
      expect(entry.tags).toEqual({ factor: 2 });
      expect(typeof entry.value).toBe("number");
    });
  });
});
