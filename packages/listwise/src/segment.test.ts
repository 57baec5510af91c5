/**
 * Tests for segment.ts - chunked, chunkedBy, windowed
 */
import { describe, it, expect, vi } from "vitest";
import { chunked, tryChunked, chunkedBy, windowed, tryWindowed } from "./segment";
import { InvalidArgumentError } from "./errors";

const range = (from: number, to: number): number[] =>
  Array.from({ length: to - from + 1 }, (_, i) => from + i);

describe("Segmentation", () => {
  describe("chunked()", () => {
    it("should split into runs of size with the remainder last", () => {
      expect(chunked(range(1, 9), 2)).toEqual([[1, 2], [3, 4], [5, 6], [7, 8], [9]]);
    });

    it("should produce equal runs when size divides the length", () => {
      expect(chunked(["a", "b", "c", "d"], 2)).toEqual([
        ["a", "b"],
        ["c", "d"],
      ]);
    });

    it("should return a single run when size exceeds the length", () => {
      expect(chunked([1, 2, 3], 10)).toEqual([[1, 2, 3]]);
    });

    it("should return no chunks for empty input", () => {
      expect(chunked([], 3)).toEqual([]);
    });

    it("should reconstruct the input when flattened", () => {
      const input = range(1, 23);
      for (const size of [1, 2, 5, 7, 23, 30]) {
        const chunks = chunked(input, size);
        expect(chunks.flat()).toEqual(input);
        for (const chunk of chunks.slice(0, -1)) {
          expect(chunk).toHaveLength(size);
        }
      }
    });

    it("should not alias the input array", () => {
      const input = [1, 2, 3];
      const [chunk] = chunked(input, 3);
      chunk.push(4);
      expect(input).toEqual([1, 2, 3]);
    });

    it("should throw InvalidArgumentError for size 0", () => {
      expect(() => chunked([1, 2], 0)).toThrow(InvalidArgumentError);
      expect(() => chunked([1, 2], 0)).toThrow(
        "InvalidArgumentError: chunked requires size to be a positive integer, got 0"
      );
    });

    it("should reject negative and fractional sizes even for empty input", () => {
      expect(() => chunked([], -1)).toThrow(InvalidArgumentError);
      expect(() => chunked([1, 2, 3], 1.5)).toThrow(InvalidArgumentError);
    });
  });

  describe("tryChunked()", () => {
    it("should return Ok with the chunks", () => {
      expect(tryChunked([1, 2, 3], 2)).toEqual({ ok: true, value: [[1, 2], [3]] });
    });

    it("should return Err instead of throwing", () => {
      const result = tryChunked([1, 2, 3], 0);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error._tag).toBe("InvalidArgumentError");
        expect(result.error.props).toEqual({ operation: "chunked", argument: "size", value: 0 });
      }
    });
  });

  describe("chunkedBy()", () => {
    it("should start a new run whenever the predicate fails", () => {
      const input = [10, 20, 30, 40, 31, 31, 33, 34, 21, 22, 23, 24, 11, 12, 13, 14];
      expect(chunkedBy(input, (a, b) => a < b)).toEqual([
        [10, 20, 30, 40],
        [31],
        [31, 33, 34],
        [21, 22, 23, 24],
        [11, 12, 13, 14],
      ]);
    });

    it("should compare the last element of the run with the next element", () => {
      const calls: Array<[number, number]> = [];
      chunkedBy([1, 2, 5, 6], (last, next) => {
        calls.push([last, next]);
        return next === last + 1;
      });
      expect(calls).toEqual([
        [1, 2],
        [2, 5],
        [5, 6],
      ]);
    });

    it("should return one run for a single element without calling the predicate", () => {
      const predicate = vi.fn(() => true);
      expect(chunkedBy(["only"], predicate)).toEqual([["only"]]);
      expect(predicate).not.toHaveBeenCalled();
    });

    it("should return no runs for empty input", () => {
      expect(chunkedBy([], () => true)).toEqual([]);
    });

    it("should put every element in its own run when the predicate is always false", () => {
      expect(chunkedBy([1, 1, 1], () => false)).toEqual([[1], [1], [1]]);
    });
  });

  describe("windowed()", () => {
    it("should slide by step and shorten trailing windows", () => {
      expect(windowed(range(1, 10), 5, 3)).toEqual([
        [1, 2, 3, 4, 5],
        [4, 5, 6, 7, 8],
        [7, 8, 9, 10],
        [10],
      ]);
    });

    it("should default step to 1", () => {
      expect(windowed([1, 2, 3], 2)).toEqual([[1, 2], [2, 3], [3]]);
    });

    it("should skip elements when step exceeds size", () => {
      expect(windowed(range(1, 7), 2, 3)).toEqual([[1, 2], [4, 5], [7]]);
    });

    it("should return no windows for empty input", () => {
      expect(windowed([], 3, 1)).toEqual([]);
    });

    it("should emit one window per step start below the length", () => {
      for (const [length, size, step] of [
        [10, 5, 3],
        [7, 3, 2],
        [4, 10, 1],
        [9, 1, 4],
      ]) {
        const windows = windowed(range(1, length), size, step);
        expect(windows).toHaveLength(Math.ceil(length / step));
        windows.forEach((window, i) => {
          expect(window).toHaveLength(Math.min(size, length - i * step));
        });
      }
    });

    it("should throw InvalidArgumentError for non-positive size or step", () => {
      expect(() => windowed([1, 2], 0, 1)).toThrow(
        "InvalidArgumentError: windowed requires size to be a positive integer, got 0"
      );
      expect(() => windowed([1, 2], 2, -1)).toThrow(
        "InvalidArgumentError: windowed requires step to be a positive integer, got -1"
      );
      expect(() => windowed([], 0, 1)).toThrow(InvalidArgumentError);
    });
  });

  describe("tryWindowed()", () => {
    it("should report the offending argument", () => {
      const result = tryWindowed([1, 2, 3], 2, 0);
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.props.argument).toBe("step");
      }
    });

    it("should return Ok with the windows", () => {
      expect(tryWindowed([1, 2, 3], 3, 3)).toEqual({ ok: true, value: [[1, 2, 3]] });
    });
  });
});
