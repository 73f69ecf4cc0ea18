import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { EnhancementLoop, type EnhancementLoopOptions } from "../../src/watcher/enhancement-loop.js";
import { WriteError } from "../../src/core/errors.js";
import { fingerprint } from "../../src/core/fingerprint.js";
import type { LoopEvents } from "../../src/watcher/events.js";
import type { EditEventCallback, TargetWatcher } from "../../src/watcher/file-watcher.js";
import type { EditEventKind, EnhancementResult, WatchTarget } from "../../src/watcher/types.js";

vi.mock("../../src/core/logger.js", () => ({
  log: {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

type EnhanceFn = (sourceText: string, signal?: AbortSignal) => Promise<EnhancementResult>;

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function nextEvent<K extends keyof LoopEvents>(loop: EnhancementLoop, event: K): Promise<LoopEvents[K]> {
  return new Promise((resolve) => {
    loop.events.once(event, (...args: LoopEvents[K]) => resolve(args));
  });
}

const enhanced = (enhancedText: string): EnhancementResult => ({ status: "enhanced", enhancedText });
const timedOut: EnhancementResult = {
  status: "failed",
  failure: "transient",
  message: "no response within 60000ms",
  retryable: true,
};

describe("EnhancementLoop", () => {
  let testDir: string;
  let target: WatchTarget;
  let emitEdit: EditEventCallback;
  let watcherStopped: boolean;
  let enhance: Mock<EnhanceFn>;
  let loop: EnhancementLoop | null;

  const createWatcher = (_target: WatchTarget, onEvent: EditEventCallback): TargetWatcher => {
    emitEdit = onEvent;
    let running = false;
    return {
      start: async () => {
        running = true;
      },
      stop: async () => {
        running = false;
        watcherStopped = true;
      },
      isRunning: () => running,
    };
  };

  function edit(kind: EditEventKind = "modified"): void {
    emitEdit({ timestamp: Date.now(), kind });
  }

  function writeNotes(content: string): void {
    fs.writeFileSync(target.absolutePath, content);
  }

  function readNotes(): string {
    return fs.readFileSync(target.absolutePath, "utf-8");
  }

  async function startLoop(overrides: Partial<EnhancementLoopOptions> = {}): Promise<EnhancementLoop> {
    const created = new EnhancementLoop({
      target,
      client: { enhance },
      debounceMs: 10,
      createWatcher,
      sleep: async () => {},
      ...overrides,
    });
    loop = created;
    await created.start();
    return created;
  }

  beforeEach(() => {
    testDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "polisher-loop-test-")));
    target = { absolutePath: path.join(testDir, "notes.md"), parentDirectory: testDir };
    fs.writeFileSync(target.absolutePath, "");
    emitEdit = () => {
      throw new Error("watcher not started");
    };
    watcherStopped = false;
    enhance = vi.fn<EnhanceFn>();
    loop = null;
  });

  afterEach(async () => {
    await loop?.stop();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it("enhances a settled edit and writes the result back", async () => {
    enhance.mockResolvedValue(enhanced("- Buy milk\n- Fix bug"));
    const running = await startLoop();

    const applied = nextEvent(running, "enhancement:applied");
    writeNotes("buy milk\nfix bug");
    edit();

    const [payload] = await applied;
    expect(payload).toEqual({ path: target.absolutePath, fingerprint: fingerprint("- Buy milk\n- Fix bug") });
    expect(readNotes()).toBe("- Buy milk\n- Fix bug");
    expect(enhance).toHaveBeenCalledTimes(1);
    expect(enhance.mock.calls[0]?.[0]).toBe("buy milk\nfix bug");
    expect(running.getGuard().lastSelfWrite()).toBe(fingerprint("- Buy milk\n- Fix bug"));
  });

  it("ignores the change event caused by its own write", async () => {
    enhance.mockResolvedValue(enhanced("- Buy milk\n- Fix bug"));
    const running = await startLoop();

    const applied = nextEvent(running, "enhancement:applied");
    writeNotes("buy milk\nfix bug");
    edit();
    await applied;

    const skipped = nextEvent(running, "cycle:skipped");
    edit();
    expect(await skipped).toEqual([{ reason: "self-write" }]);
    expect(enhance).toHaveBeenCalledTimes(1);
  });

  it("treats a return to the written text after a user edit as the user's change", async () => {
    enhance
      .mockResolvedValueOnce(enhanced("- Buy milk\n- Fix bug"))
      .mockResolvedValueOnce(enhanced("- Buy milk\n- Fix bug"));
    const running = await startLoop();

    const applied = nextEvent(running, "enhancement:applied");
    writeNotes("buy milk\nfix bug");
    edit();
    await applied;

    const belowThreshold = nextEvent(running, "cycle:skipped");
    writeNotes("- Buy milk");
    edit();
    expect(await belowThreshold).toEqual([{ reason: "below-threshold" }]);
    await running.whenIdle();

    const undone = nextEvent(running, "cycle:skipped");
    writeNotes("- Buy milk\n- Fix bug");
    edit();

    expect(await undone).toEqual([{ reason: "already-enhanced" }]);
    expect(enhance).toHaveBeenCalledTimes(2);
    expect(enhance.mock.calls[1]?.[0]).toBe("- Buy milk\n- Fix bug");
  });

  it("does not report an undo after a failed call as its own write", async () => {
    enhance.mockResolvedValueOnce(enhanced("- Buy milk")).mockResolvedValueOnce({
      status: "failed",
      failure: "authentication",
      message: "ANTHROPIC_API_KEY is not set",
      retryable: false,
    });
    const running = await startLoop();

    const applied = nextEvent(running, "enhancement:applied");
    writeNotes("buy milk");
    edit();
    await applied;

    const failed = nextEvent(running, "enhancement:failed");
    writeNotes("- Buy milk\n- call mom");
    edit();
    await failed;
    await running.whenIdle();

    const skipped = nextEvent(running, "cycle:skipped");
    writeNotes("- Buy milk");
    edit();

    expect(await skipped).toEqual([{ reason: "unchanged" }]);
    expect(running.getGuard().lastSelfWrite()).toBeNull();
  });

  it("reports unexpected cycle errors and keeps watching", async () => {
    enhance.mockResolvedValue(enhanced("- Buy milk"));
    let writes = 0;
    const running = await startLoop({
      writer: {
        write: async (file, content) => {
          writes++;
          if (writes === 1) throw new Error("boom");
          fs.writeFileSync(file, content);
        },
      },
    });

    const cycleFailed = nextEvent(running, "cycle:failed");
    writeNotes("buy milk");
    edit();
    expect(await cycleFailed).toEqual([{ message: "boom" }]);
    await running.whenIdle();

    const applied = nextEvent(running, "enhancement:applied");
    edit();
    await applied;
    expect(readNotes()).toBe("- Buy milk");
  });

  it("skips a settle when the content did not change", async () => {
    writeNotes("already here");
    const running = await startLoop();

    const skipped = nextEvent(running, "cycle:skipped");
    edit();

    expect(await skipped).toEqual([{ reason: "unchanged" }]);
    expect(enhance).not.toHaveBeenCalled();
  });

  it("coalesces an edit made during an in-flight call into one follow-up call", async () => {
    const first = deferred<EnhancementResult>();
    const second = deferred<EnhancementResult>();
    enhance.mockReturnValueOnce(first.promise).mockReturnValueOnce(second.promise);
    const running = await startLoop();

    const detected = nextEvent(running, "edit:detected");
    writeNotes("buy milk\nfix bug");
    edit();
    await detected;
    expect(running.isInFlight()).toBe(true);

    const superseded = nextEvent(running, "cycle:skipped");
    writeNotes("buy milk\nfix bug\ncall mom");
    edit();
    edit();
    // Let the debounce settle while the first call is still out.
    await new Promise((resolve) => setTimeout(resolve, 40));
    expect(enhance).toHaveBeenCalledTimes(1);

    first.resolve(enhanced("- Buy milk\n- Fix bug"));
    expect(await superseded).toEqual([{ reason: "superseded" }]);

    const applied = nextEvent(running, "enhancement:applied");
    second.resolve(enhanced("- Buy milk\n- Fix bug\n- Call mom"));
    await applied;
    await running.whenIdle();

    expect(enhance).toHaveBeenCalledTimes(2);
    expect(enhance.mock.calls[1]?.[0]).toBe("buy milk\nfix bug\ncall mom");
    expect(readNotes()).toBe("- Buy milk\n- Fix bug\n- Call mom");
  });

  it("retries timeouts with backoff and applies the eventual success", async () => {
    const delays: number[] = [];
    enhance
      .mockResolvedValueOnce(timedOut)
      .mockResolvedValueOnce(timedOut)
      .mockResolvedValueOnce(enhanced("- Buy milk"));
    const running = await startLoop({
      retryPolicy: { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 8000 },
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    const applied = nextEvent(running, "enhancement:applied");
    writeNotes("buy milk");
    edit();
    await applied;

    expect(enhance).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
    expect(readNotes()).toBe("- Buy milk");
  });

  it("leaves the file untouched on an authentication failure", async () => {
    enhance.mockResolvedValue({
      status: "failed",
      failure: "authentication",
      message: "ANTHROPIC_API_KEY is not set",
      retryable: false,
    });
    const running = await startLoop();

    const failed = nextEvent(running, "enhancement:failed");
    writeNotes("buy milk");
    edit();

    expect(await failed).toEqual([{ failure: "authentication", message: "ANTHROPIC_API_KEY is not set" }]);
    expect(enhance).toHaveBeenCalledTimes(1);
    expect(readNotes()).toBe("buy milk");
  });

  it("retries a failed document on the next save", async () => {
    enhance
      .mockResolvedValueOnce({ status: "failed", failure: "malformed-response", message: "bad", retryable: false })
      .mockResolvedValueOnce(enhanced("- Buy milk"));
    const running = await startLoop();

    const failed = nextEvent(running, "enhancement:failed");
    writeNotes("buy milk");
    edit();
    await failed;
    await running.whenIdle();

    const applied = nextEvent(running, "enhancement:applied");
    edit();
    await applied;

    expect(enhance).toHaveBeenCalledTimes(2);
    expect(readNotes()).toBe("- Buy milk");
  });

  it("reports write failures without touching the file", async () => {
    enhance.mockResolvedValue(enhanced("- Buy milk"));
    const running = await startLoop({
      writer: {
        write: async (file) => {
          throw new WriteError(file, `Could not write ${file}: disk full`);
        },
      },
    });

    const failed = nextEvent(running, "enhancement:failed");
    writeNotes("buy milk");
    edit();

    expect(await failed).toEqual([{ failure: "write", message: `Could not write ${target.absolutePath}: disk full` }]);
    expect(readNotes()).toBe("buy milk");
    expect(running.getGuard().lastSelfWrite()).toBeNull();
  });

  it("skips edits that add fewer lines than the threshold", async () => {
    writeNotes("a\nb");
    const running = await startLoop({ minChangedLines: 2 });

    const skipped = nextEvent(running, "cycle:skipped");
    writeNotes("a\nb\nc");
    edit();

    expect(await skipped).toEqual([{ reason: "below-threshold" }]);
    expect(enhance).not.toHaveBeenCalled();
  });

  it("does not write when the response equals the current text", async () => {
    enhance.mockResolvedValue(enhanced("- Buy milk"));
    const running = await startLoop();

    const skipped = nextEvent(running, "cycle:skipped");
    writeNotes("- Buy milk");
    edit();

    expect(await skipped).toEqual([{ reason: "already-enhanced" }]);
    expect(running.getGuard().lastSelfWrite()).toBeNull();
  });

  it("stops with target-lost when the file is deleted", async () => {
    const running = await startLoop();

    const lost = nextEvent(running, "target:lost");
    edit("deleted");

    expect(await lost).toEqual([{ path: target.absolutePath, kind: "deleted" }]);
    expect(await running.finished).toEqual({ reason: "target-lost" });
    expect(watcherStopped).toBe(true);
    expect(enhance).not.toHaveBeenCalled();
  });

  it("stops with target-lost when the file vanished before the cycle read it", async () => {
    const running = await startLoop();

    const lost = nextEvent(running, "target:lost");
    fs.rmSync(target.absolutePath);
    edit("modified");

    expect(await lost).toEqual([{ path: target.absolutePath, kind: "missing" }]);
    expect(await running.finished).toEqual({ reason: "target-lost" });
  });

  it("does not write a response that arrives after shutdown", async () => {
    const pending = deferred<EnhancementResult>();
    enhance.mockReturnValue(pending.promise);
    const running = await startLoop();

    const detected = nextEvent(running, "edit:detected");
    writeNotes("buy milk");
    edit();
    await detected;

    const skipped = nextEvent(running, "cycle:skipped");
    const stopping = running.stop();
    pending.resolve(enhanced("- Buy milk"));

    expect(await skipped).toEqual([{ reason: "stopped" }]);
    expect(await stopping).toEqual({ reason: "shutdown" });
    expect(readNotes()).toBe("buy milk");
  });

  it("passes the shutdown signal to the client", async () => {
    enhance.mockImplementation(
      (_text, signal) =>
        new Promise((resolve) => {
          signal?.addEventListener("abort", () =>
            resolve({ status: "failed", failure: "cancelled", message: "enhancement abandoned on shutdown", retryable: false }),
          );
        }),
    );
    const running = await startLoop();

    const detected = nextEvent(running, "edit:detected");
    writeNotes("buy milk");
    edit();
    await detected;

    expect(await running.stop()).toEqual({ reason: "shutdown" });
    expect(await running.finished).toEqual({ reason: "shutdown" });
    expect(readNotes()).toBe("buy milk");
  });

  it("ignores edits after it has stopped", async () => {
    const running = await startLoop();
    await running.stop();

    edit();
    await new Promise((resolve) => setTimeout(resolve, 30));
    expect(enhance).not.toHaveBeenCalled();
  });
});
