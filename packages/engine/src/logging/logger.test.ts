import { describe, expect, it, vi } from "vitest";
import {
  filteredLogger,
  type Logger,
  peerLabel,
  prefixedLogger,
} from "./logger.js";

function recordingLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

describe("prefixedLogger", () => {
  it("prefixes the message and passes extra arguments through", () => {
    const base = recordingLogger();
    const err = new Error("boom");

    prefixedLogger("127.0.0.1:5000", base).error("failed:", err);

    expect(base.error).toHaveBeenCalledWith("[127.0.0.1:5000] failed:", err);
  });
});

describe("filteredLogger", () => {
  it("drops messages below the threshold", () => {
    const base = recordingLogger();
    const logger = filteredLogger("warn", base);

    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(base.debug).not.toHaveBeenCalled();
    expect(base.info).not.toHaveBeenCalled();
    expect(base.warn).toHaveBeenCalledWith("w");
    expect(base.error).toHaveBeenCalledWith("e");
  });
});

describe("peerLabel", () => {
  it("joins address and port", () => {
    expect(peerLabel("::1", 5000)).toBe("::1:5000");
    expect(peerLabel("10.0.0.1")).toBe("10.0.0.1");
    expect(peerLabel(undefined, 5000)).toBe("unknown peer");
  });
});
