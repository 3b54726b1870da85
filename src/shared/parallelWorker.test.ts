import { describe, expect, it, vi } from "vitest";
import { parallelProcess } from "./parallelWorker.js";

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe("parallelWorker", () => {
  describe("parallelProcess", () => {
    it("processes all tasks", async () => {
      const tasks = ["task1", "task2", "task3", "task4"];
      const processor = vi.fn(async (task: string): Promise<string> => `result-${task}`);

      const result = await parallelProcess(tasks, processor, { concurrency: 2 });

      expect(result.slots).toEqual([
        "result-task1",
        "result-task2",
        "result-task3",
        "result-task4",
      ]);
      expect(result.errors).toHaveLength(0);
      expect(result.stoppedBy).toBeUndefined();
    });

    it("maintains result order regardless of completion order", async () => {
      const delays = [30, 5, 15, 0];

      const result = await parallelProcess(
        delays,
        async (delay, index) => {
          await sleep(delay);
          return index;
        },
        { concurrency: 4 }
      );

      expect(result.slots).toEqual([0, 1, 2, 3]);
    });

    it("never runs more tasks at once than the concurrency", async () => {
      let active = 0;
      let peak = 0;

      await parallelProcess(
        Array.from({ length: 10 }, (_, i) => i),
        async () => {
          active++;
          peak = Math.max(peak, active);
          await sleep(5);
          active--;
        },
        { concurrency: 3 }
      );

      expect(peak).toBe(3);
    });

    it("collects errors with task indices and leaves the slot empty", async () => {
      const tasks = ["good", "bad", "good2"];

      const result = await parallelProcess(
        tasks,
        async (task: string): Promise<string> => {
          if (task === "bad") {
            throw new Error("Task failed");
          }
          return `result-${task}`;
        },
        { concurrency: 1 }
      );

      expect(result.slots).toEqual(["result-good", undefined, "result-good2"]);
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]?.index).toBe(1);
      expect(result.errors[0]?.error).toBeInstanceOf(Error);
    });

    it("calls onError callback when a task fails", async () => {
      const onError = vi.fn();
      const processor = vi.fn().mockRejectedValue(new Error("Boom"));

      await parallelProcess(["fail"], processor, { concurrency: 1, onError });

      expect(onError).toHaveBeenCalledWith(expect.any(Error), 0);
    });

    it("stops picking up tasks after a fatal error", async () => {
      const seen: number[] = [];

      const result = await parallelProcess(
        [1, 2, 3, 4, 5],
        async (task: number) => {
          seen.push(task);
          if (task === 2) throw new Error("fatal");
          return task;
        },
        { concurrency: 1, isFatal: () => true }
      );

      expect(seen).toEqual([1, 2]);
      expect(result.stoppedBy?.index).toBe(1);
      expect(result.slots).toEqual([1, undefined, undefined, undefined, undefined]);
    });

    it("respects shouldContinue and stops early", async () => {
      const processed: number[] = [];
      const processor = async (task: number): Promise<number> => {
        processed.push(task);
        return task;
      };

      await parallelProcess([1, 2, 3, 4, 5], processor, {
        concurrency: 1,
        shouldContinue: () => processed.length < 2,
      });

      expect(processed).toEqual([1, 2]);
    });

    it("handles empty task list", async () => {
      const processor = vi.fn();

      const result = await parallelProcess([], processor, { concurrency: 4 });

      expect(result.slots).toHaveLength(0);
      expect(result.errors).toHaveLength(0);
      expect(processor).not.toHaveBeenCalled();
    });
  });
});
