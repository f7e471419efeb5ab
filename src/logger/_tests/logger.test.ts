import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { logger, setLogLevel, getLogLevel, parseLogLevel, scopedLogger } from "../../logger";

describe("logger", () => {
  const origLevel = getLogLevel();
  beforeEach(() => {
    setLogLevel("trace");
  });
  afterEach(() => {
    setLogLevel(origLevel);
    vi.restoreAllMocks();
  });

  it("respects log levels and formats output", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => { /* no-op */ });
    logger.info("hello", 123);
    expect(spy).toHaveBeenCalledTimes(1);
    const line = String(spy.mock.calls[0][0]);
    expect(line).toContain("[INFO]");
    expect(line).toContain("hello 123");
  });

  it("can silence lower levels", () => {
    setLogLevel("error");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => { /* no-op */ });
    const errSpy = vi.spyOn(console, "error").mockImplementation(() => { /* no-op */ });
    logger.debug("nope");
    logger.error("boom");
    expect(logSpy).not.toHaveBeenCalled();
    expect(errSpy).toHaveBeenCalledTimes(1);
  });

  it("scoped loggers tag their lines and share the global level", () => {
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => { /* no-op */ });
    const log = scopedLogger("midi-out");
    log.warn("no port");
    expect(String(warnSpy.mock.calls[0][0])).toContain("[WARN] [midi-out] no port");
    setLogLevel("error");
    log.warn("hidden");
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it("parseLogLevel accepts known names only", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel(" warn ")).toBe("warn");
    expect(parseLogLevel("verbose")).toBeNull();
    expect(parseLogLevel(undefined)).toBeNull();
  });
});
