/**
 * Tests for slicing.ts - takeWhile, dropWhile and friends
 */
import { describe, it, expect } from "vitest";
import { takeWhile, dropWhile, takeLastWhile, dropLastWhile, reverse } from "./slicing";

const isSmall = (n: number) => n < 3;

describe("Slicing", () => {
  it("takeWhile() should return the matching prefix", () => {
    expect(takeWhile([1, 2, 3, 1], isSmall)).toEqual([1, 2]);
    expect(takeWhile([5, 1], isSmall)).toEqual([]);
    expect(takeWhile([1, 2], isSmall)).toEqual([1, 2]);
  });

  it("dropWhile() should return what follows the matching prefix", () => {
    expect(dropWhile([1, 2, 3, 1], isSmall)).toEqual([3, 1]);
    expect(dropWhile([1, 2], isSmall)).toEqual([]);
  });

  it("takeLastWhile() should return the matching suffix", () => {
    expect(takeLastWhile([1, 5, 2, 1], isSmall)).toEqual([2, 1]);
    expect(takeLastWhile([1, 5], isSmall)).toEqual([]);
  });

  it("dropLastWhile() should return what precedes the matching suffix", () => {
    expect(dropLastWhile([1, 5, 2, 1], isSmall)).toEqual([1, 5]);
    expect(dropLastWhile([1, 2], isSmall)).toEqual([]);
  });

  it("should return fresh arrays", () => {
    const input = [1, 2];
    const prefix = takeWhile(input, isSmall);
    expect(prefix).not.toBe(input);
    prefix.push(9);
    expect(input).toEqual([1, 2]);
  });

  it("should handle empty input", () => {
    expect(takeWhile([], isSmall)).toEqual([]);
    expect(dropWhile([], isSmall)).toEqual([]);
    expect(takeLastWhile([], isSmall)).toEqual([]);
    expect(dropLastWhile([], isSmall)).toEqual([]);
  });

  describe("reverse()", () => {
    it("should reverse in place and return the same array", () => {
      const input = [1, 2, 3, 4, 5];
      const result = reverse(input);
      expect(result).toBe(input);
      expect(input).toEqual([5, 4, 3, 2, 1]);
    });

    it("should handle even lengths and empty arrays", () => {
      expect(reverse(["a", "b"])).toEqual(["b", "a"]);
      expect(reverse([])).toEqual([]);
    });
  });
});
