import { describe, expect, test } from "vitest";
import {
  type Diagnostic,
  isUnknownLocation,
  location,
  Severity,
  UNKNOWN_LOCATION,
} from "../../src/errors/diagnostic.ts";
import { CollectingSink, DiagnosticLogger } from "../../src/errors/logger.ts";

const here = location("main.src", 3, 4, 17);

describe("DiagnosticLogger", () => {
  test("counts diagnostics per severity", () => {
    const logger = new DiagnosticLogger();
    logger.error("bad", here);
    logger.error("worse", here);
    logger.warning("careful", here);
    logger.info("fyi", here);
    expect(logger.errorCount).toBe(2);
    expect(logger.warningCount).toBe(1);
    expect(logger.infoCount).toBe(1);
    expect(logger.fatalCount).toBe(0);
    expect(logger.hasErrors()).toBe(true);
  });

  test("warnings alone are not errors", () => {
    const logger = new DiagnosticLogger();
    logger.warning("careful", here);
    expect(logger.hasErrors()).toBe(false);
  });

  test("fatal diagnostics count as errors", () => {
    const logger = new DiagnosticLogger();
    logger.fatal("out of memory", UNKNOWN_LOCATION);
    expect(logger.fatalCount).toBe(1);
    expect(logger.hasErrors()).toBe(true);
  });

  test("keeps diagnostics in report order with their notes", () => {
    const logger = new DiagnosticLogger();
    const note = { message: "declared here", location: location("main.src", 1, 1) };
    logger.error("first", here, [note]);
    logger.warning("second", here);
    expect(logger.diagnostics).toEqual([
      { severity: Severity.Error, message: "first", location: here, notes: [note] },
      { severity: Severity.Warning, message: "second", location: here, notes: [] },
    ]);
  });

  test("forwards every diagnostic to its sinks", () => {
    const sink = new CollectingSink();
    const late: Diagnostic[] = [];
    const logger = new DiagnosticLogger([sink]);
    logger.error("one", here);
    logger.addSink({ report: (d) => late.push(d) });
    logger.warning("two", here);
    expect(sink.diagnostics.map((d) => d.message)).toEqual(["one", "two"]);
    expect(late.map((d) => d.message)).toEqual(["two"]);
  });

  test("report accepts a prepared diagnostic", () => {
    const logger = new DiagnosticLogger();
    logger.report({ severity: Severity.Note, message: "see also", location: here, notes: [] });
    expect(logger.diagnostics.length).toBe(1);
    expect(logger.errorCount + logger.warningCount + logger.infoCount).toBe(0);
  });

  test("clear resets diagnostics and counts", () => {
    const logger = new DiagnosticLogger();
    logger.error("bad", here);
    logger.clear();
    expect(logger.diagnostics).toEqual([]);
    expect(logger.errorCount).toBe(0);
    expect(logger.hasErrors()).toBe(false);
  });
});

describe("CollectingSink", () => {
  test("clear drops collected diagnostics", () => {
    const sink = new CollectingSink();
    sink.report({ severity: Severity.Info, message: "x", location: here, notes: [] });
    sink.clear();
    expect(sink.diagnostics).toEqual([]);
  });
});

describe("locations", () => {
  test("unknown location is recognised", () => {
    expect(isUnknownLocation(UNKNOWN_LOCATION)).toBe(true);
    expect(isUnknownLocation(here)).toBe(false);
    expect(location("a.src", 2, 3)).toEqual({ file: "a.src", line: 2, column: 3, offset: 0 });
  });
});
