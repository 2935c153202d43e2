import {
  JobRegistry,
  NewJobEntry,
  RECENT_LINE_LIMIT,
  RenderJobEntry,
  generateJobId,
} from "../src/infrastructure/registry/JobRegistry.js";
import { FakeRenderProcess } from "./helpers/fakes.js";

function jobInit(overrides: Partial<NewJobEntry> = {}): NewJobEntry {
  return {
    id: generateJobId(),
    totalFrames: 10,
    workspace: "/work/ws-1",
    primaryOutputPath: "/work/ws-1/turntable_base.mp4",
    finalOutputPath: "/work/ws-1/turntable.mp4",
    format: "mp4",
    filename: "bracket.stl",
    downloadName: "bracket_turntable.mp4",
    mimeType: "video/mp4",
    axis: "Z",
    offset: 0,
    message: "Launching renderer (Standard, auto orientation)…",
    process: new FakeRenderProcess(),
    ...overrides,
  };
}

function recordFrames(entry: RenderJobEntry, lastFrame: number): void {
  for (let frame = 0; frame <= lastFrame; frame++) {
    entry.recordFrame(frame, frame * 1000);
  }
}

describe("JobRegistry", () => {
  let registry: JobRegistry;

  beforeEach(() => {
    registry = new JobRegistry();
  });

  describe("Job IDs", () => {
    test("should generate 32 hex characters", () => {
      expect(generateJobId()).toMatch(/^[0-9a-f]{32}$/);
    });

    test("should not repeat", () => {
      const ids = new Set(Array.from({ length: 50 }, () => generateJobId()));
      expect(ids.size).toBe(50);
    });

    test("should reject a duplicate registration", () => {
      const init = jobInit();
      registry.register(init);
      expect(() => registry.register(init)).toThrow(`Job ${init.id} is already registered`);
    });
  });

  describe("Progress Tracking", () => {
    test("should derive progress and message from the frame index", () => {
      const entry = registry.register(jobInit());
      entry.recordFrame(3, 0);

      expect(entry.view(0)).toEqual({
        state: "running",
        message: "Rendering frame 3 of 10 (axis Z)",
        progress: 30,
        etaSeconds: null,
      });
    });

    test("should ignore frame indices lower than the last one", () => {
      const entry = registry.register(jobInit());
      entry.recordFrame(5, 0);

      expect(entry.recordFrame(3, 1000)).toBe(false);
      expect(entry.currentProgress).toBe(50);
      expect(entry.currentMessage).toBe("Rendering frame 5 of 10 (axis Z)");
    });

    test("should cap progress at 100", () => {
      const entry = registry.register(jobInit());
      entry.recordFrame(12, 0);
      expect(entry.currentProgress).toBe(100);
    });

    test("should use the axis reported by auto-orientation", () => {
      const entry = registry.register(jobInit());
      entry.recordOrientation("[AUTO] axis=X offset=45", "X", 45);
      entry.recordFrame(1, 0);

      expect(entry.currentMessage).toBe("Rendering frame 1 of 10 (axis X)");
      expect(entry.snapshot().offset).toBe(45);
    });

    test("should keep only the last status lines", () => {
      const entry = registry.register(jobInit());
      for (let i = 1; i <= 12; i++) {
        entry.recordStatus(`line ${i}`);
      }

      expect(entry.recentOutput).toHaveLength(RECENT_LINE_LIMIT);
      expect(entry.recentOutput[0]).toBe("line 3");
      expect(entry.lastRecentLine).toBe("line 12");
      expect(entry.currentMessage).toBe("line 12");
    });
  });

  describe("ETA", () => {
    test("should stay null until five durations are known", () => {
      const entry = registry.register(jobInit());
      recordFrames(entry, 4);
      expect(entry.view(4000).etaSeconds).toBeNull();
    });

    test("should estimate once warm", () => {
      const entry = registry.register(jobInit());
      recordFrames(entry, 5);
      expect(entry.view(5000).etaSeconds).toBe(6.25);
    });

    test("should not add a sample for a repeated index", () => {
      const entry = registry.register(jobInit());
      recordFrames(entry, 5);
      entry.recordFrame(5, 6000);

      const snapshot = entry.snapshot();
      expect(snapshot.frameDurations).toEqual([1, 1, 1, 1, 1]);
      // (5 remaining + 1s on the current frame) * 1.25
      expect(snapshot.etaSeconds).toBe(7.5);
    });

    test("should inflate the estimate when the current frame stalls", () => {
      const entry = registry.register(jobInit());
      recordFrames(entry, 5);
      // 3s on the current frame: 6.25 + (3 - 1) * 0.5
      expect(entry.view(8000).etaSeconds).toBe(7.25);
    });
  });

  describe("Terminal transitions", () => {
    test("should let only the first transition win", () => {
      const entry = registry.register(jobInit());

      expect(entry.transition("cancelled", { message: "Render cancelled by user." })).toBe(true);
      expect(entry.transition("finished", { message: "Render complete (axis Z)." })).toBe(false);
      expect(entry.view()).toEqual({
        state: "cancelled",
        message: "Render cancelled by user.",
        progress: 0,
        etaSeconds: null,
      });
    });

    test("should set progress to 100 and eta to 0 when finished", () => {
      const entry = registry.register(jobInit());
      recordFrames(entry, 5);
      entry.transition("finished", { message: "Render complete (axis Z)." });

      expect(entry.view(9000)).toEqual({
        state: "finished",
        message: "Render complete (axis Z).",
        progress: 100,
        etaSeconds: 0,
      });
    });

    test("should ignore progress after a terminal state", () => {
      const entry = registry.register(jobInit());
      entry.transition("error", { message: "boom", failureCode: "RENDER_FAILURE" });

      expect(entry.recordFrame(4, 0)).toBe(false);
      expect(entry.recordStatus("late line")).toBe(false);
      expect(entry.currentMessage).toBe("boom");
      expect(entry.snapshot().failureCode).toBe("RENDER_FAILURE");
    });

    test("should hand out one-time claims exactly once", () => {
      const entry = registry.register(jobInit());

      expect(entry.claimWorkspaceRelease()).toBe(true);
      expect(entry.claimWorkspaceRelease()).toBe(false);
      expect(entry.claimDownload()).toBe(true);
      expect(entry.claimDownload()).toBe(false);
      expect(entry.releaseProcess()).not.toBeNull();
      expect(entry.releaseProcess()).toBeNull();
      expect(entry.snapshot().hasProcess).toBe(false);
    });
  });

  describe("Statistics", () => {
    test("should count running jobs per owner", () => {
      registry.register(jobInit({ ownerId: "owner-a" }));
      registry.register(jobInit({ ownerId: "owner-a" }));
      const done = registry.register(jobInit({ ownerId: "owner-a" }));
      registry.register(jobInit({ ownerId: "owner-b" }));
      registry.register(jobInit());
      done.transition("finished", { message: "Render complete (axis Z)." });

      expect(registry.countRunning("owner-a")).toBe(2);
      expect(registry.countRunning("owner-b")).toBe(1);
      expect(registry.countRunning()).toBe(4);
      expect(registry.getStatistics()).toEqual({
        total: 5,
        running: 4,
        finished: 1,
        error: 0,
        cancelled: 0,
      });
    });

    test("should list terminal jobs completed before a cutoff", () => {
      const running = registry.register(jobInit());
      const failed = registry.register(jobInit());
      failed.transition("error", { message: "boom" });

      const future = new Date(Date.now() + 60_000);
      expect(registry.completedBefore(future).map((job) => job.id)).toEqual([failed.id]);
      expect(registry.completedBefore(new Date(0))).toEqual([]);
      expect(registry.get(running.id)).toBe(running);
    });

    test("should remove entries", () => {
      const entry = registry.register(jobInit());
      expect(registry.remove(entry.id)).toBe(true);
      expect(registry.get(entry.id)).toBeUndefined();
      expect(registry.remove(entry.id)).toBe(false);
    });
  });
});
