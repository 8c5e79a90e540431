import { afterEach, describe, expect, it, vi } from "vitest";

import { createLogger } from "./logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below its level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const logger = createLogger("warn");

    logger.info("quiet");
    logger.warn("loud");

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("Warning: loud");
  });

  it("prefixes the scope", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    createLogger("debug", "terrain").info("done", 3);
    expect(log).toHaveBeenCalledWith("[terrain] done", 3);
  });

  it("prints nothing when silent", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("silent").warn("ignored");
    expect(warn).not.toHaveBeenCalled();
  });
});
