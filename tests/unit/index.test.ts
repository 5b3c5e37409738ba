/**
 * Unit tests for main CLI entry point
 *
 * Tests the main entry point module including Oclif initialization,
 * error handling, and proper CLI execution flow.
 */

import { beforeEach, describe, expect, it, vi } from "vitest";

// Mock @oclif/core dependencies before importing the main module
const mockExecute = vi.fn();
const mockHandle = vi.fn();

vi.mock("@oclif/core", () => ({
  execute: mockExecute,
}));

vi.mock("@oclif/core/handle", () => ({
  handle: mockHandle,
}));

describe("CLI Entry Point", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.resetModules();
  });

  describe("successful execution", () => {
    it("should call execute with the module URL", async () => {
      mockExecute.mockResolvedValue(undefined);

      await import("../../src/index.js");

      expect(mockExecute).toHaveBeenCalledWith({
        dir: expect.stringContaining("index.ts"),
      });
      expect(mockExecute).toHaveBeenCalledTimes(1);
    });

    it("should not call handle when execution succeeds", async () => {
      mockExecute.mockResolvedValue(undefined);

      await import("../../src/index.js");

      expect(mockHandle).not.toHaveBeenCalled();
    });
  });

  describe("error handling", () => {
    it("should pass Error instances to handle unchanged", async () => {
      const testError = new Error("Test execution error");
      mockExecute.mockRejectedValue(testError);

      await import("../../src/index.js");

      expect(mockHandle).toHaveBeenCalledWith(testError);
    });

    it("should wrap non-Error rejections in an Error", async () => {
      mockExecute.mockRejectedValue("String error");

      await import("../../src/index.js");

      expect(mockHandle).toHaveBeenCalledTimes(1);
      const [handled] = mockHandle.mock.calls[0] ?? [];
      expect(handled).toBeInstanceOf(Error);
      expect(handled).toHaveProperty("message", "String error");
    });

    it("should wrap null rejections", async () => {
      mockExecute.mockRejectedValue(null);

      await import("../../src/index.js");

      const [handled] = mockHandle.mock.calls[0] ?? [];
      expect(handled).toHaveProperty("message", "null");
    });
  });
});
