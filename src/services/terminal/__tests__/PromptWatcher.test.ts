import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { PromptDetectionResult } from "../../../../shared/types/terminal.js";
import { PromptWatcher } from "../PromptWatcher.js";

describe("PromptWatcher", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should classify the buffer after the debounce period", () => {
    const results: PromptDetectionResult[] = [];
    const watcher = new PromptWatcher({ onDetect: (result) => results.push(result) });

    watcher.push("Continue? (y/n)");
    vi.advanceTimersByTime(499);
    expect(results).toEqual([]);
    vi.advanceTimersByTime(1);

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ waiting: true, responseType: "affirm", confidence: "high" });
  });

  it("should keep only the most recent output", () => {
    const watcher = new PromptWatcher({ bufferLimit: 10, onDetect: () => {} });

    watcher.push("0123456789");
    watcher.push("abcde");

    expect(watcher.getBuffer()).toBe("56789abcde");
  });

  it("should forget output and cancel the timer on clear", () => {
    const onDetect = vi.fn();
    const watcher = new PromptWatcher({ onDetect });

    watcher.push("Continue? (y/n)");
    watcher.clear();
    vi.advanceTimersByTime(1000);

    expect(watcher.getBuffer()).toBe("");
    expect(watcher.isPending()).toBe(false);
    expect(onDetect).not.toHaveBeenCalled();
  });

  it("should ignore empty chunks", () => {
    const watcher = new PromptWatcher({ onDetect: () => {} });
    watcher.push("");
    expect(watcher.isPending()).toBe(false);
  });

  it("should honor a custom debounce", () => {
    const onDetect = vi.fn();
    const watcher = new PromptWatcher({ debounceMs: 50, onDetect });

    watcher.push("hello there");
    vi.advanceTimersByTime(50);

    expect(onDetect).toHaveBeenCalledWith(
      expect.objectContaining({ waiting: false, confidence: "none" })
    );
  });
});
