/**
 * Unit tests for ops CLI argument parsing
 */

import { describe, it, expect } from "vitest";
import { OpsUsageError, parseOpsArgs } from "@/ops/opsCommands";

describe("parseOpsArgs", () => {
  it("parses commands without arguments", () => {
    expect(parseOpsArgs(["migrate"])).toEqual({ command: "migrate" });
    expect(parseOpsArgs(["cache-purge"])).toEqual({ command: "cache-purge" });
    expect(parseOpsArgs(["cache-clear"])).toEqual({ command: "cache-clear" });
  });

  it("parses runs with an optional limit", () => {
    expect(parseOpsArgs(["runs"])).toEqual({ command: "runs", limit: 20 });
    expect(parseOpsArgs(["runs", "5"])).toEqual({ command: "runs", limit: 5 });
    expect(() => parseOpsArgs(["runs", "zero"])).toThrow(
      "runs limit must be a positive integer, got zero",
    );
  });

  it("requires a run id for status and cancel", () => {
    expect(parseOpsArgs(["status", "run-1"])).toEqual({ command: "status", runId: "run-1" });
    expect(parseOpsArgs(["cancel", "run-1"])).toEqual({ command: "cancel", runId: "run-1" });
    expect(parseOpsArgs(["unlock", "run-1"])).toEqual({ command: "unlock", runId: "run-1" });
    expect(() => parseOpsArgs(["unlock"])).toThrow("unlock requires a run id");
    expect(() => parseOpsArgs(["status"])).toThrow("status requires a run id");
  });

  it("rejects missing and unknown commands with usage", () => {
    expect(() => parseOpsArgs([])).toThrow(OpsUsageError);
    expect(() => parseOpsArgs(["explode"])).toThrow("Unknown command: explode");
    expect(() => parseOpsArgs(["explode"])).toThrow("Usage: opsMain <command> [args]");
  });
});
