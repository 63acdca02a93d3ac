import { describe, it, expect, vi } from "vitest";
import { createConsoleLogger } from "../../src/logging/logger";

describe("createConsoleLogger", () => {
  it("prefixes lines with the scope", () => {
    const out = { error: vi.fn() };
    const logger = createConsoleLogger({ console: out });

    logger.info("ready");
    logger.child("Pipeline").warn("orphan note-off");

    expect(out.error.mock.calls).toEqual([["[progcheck] ready"], ["[Pipeline] warn: orphan note-off"]]);
  });

  it("drops messages below the level", () => {
    const out = { error: vi.fn() };
    const logger = createConsoleLogger({ level: "warn", console: out });

    logger.debug("chord 0");
    logger.info("ready");
    logger.error("device lost");

    expect(out.error).toHaveBeenCalledOnce();
    expect(out.error).toHaveBeenCalledWith("[progcheck] error: device lost");
  });
});
