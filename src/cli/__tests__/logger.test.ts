import { describe, expect, it } from "vitest";
import { Logger, createLogger } from "../logger.js";

function collect(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = [];
  return { lines, write: (line) => lines.push(line) };
}

describe("Logger", () => {
  it("drops messages below its level", () => {
    const { lines, write } = collect();
    const logger = new Logger({ level: "warn", write });
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    expect(lines).toEqual(["[warn] w"]);
  });

  it("prints context and structured data", () => {
    const { lines, write } = collect();
    const logger = createLogger("convert", { level: "debug", write });
    logger.info("Encoding canonical index...", { terms: 2, docs: 3 });
    logger.debug("done");
    expect(lines).toEqual([
      '[info] (convert) Encoding canonical index... {"terms":2,"docs":3}',
      "[debug] (convert) done",
    ]);
  });

  it("keeps warnings out at the error level", () => {
    const { lines, write } = collect();
    const logger = new Logger({ level: "error", write });
    logger.warn("nope");
    expect(lines).toEqual([]);
  });
});
