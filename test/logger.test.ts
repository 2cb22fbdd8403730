import { describe, it, expect, afterEach } from "vitest";
import { createLogger } from "../src/logger.js";

describe("createLogger", () => {
  const savedEnv: Record<string, string | undefined> = {};

  function setEnv(key: string, value: string): void {
    savedEnv[key] = process.env[key];
    process.env[key] = value;
  }

  afterEach(() => {
    for (const [key, value] of Object.entries(savedEnv)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  function collect() {
    const lines: string[] = [];
    return { lines, destination: { write: (line: string) => void lines.push(line) } };
  }

  it("writes JSON lines tagged with the harness name", () => {
    const { lines, destination } = collect();
    const logger = createLogger({ level: "info", destination });

    logger.warn({ metric: "cache_loading" }, "metric not reported by run");

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      level: 40,
      name: "cachebench",
      metric: "cache_loading",
      msg: "metric not reported by run",
    });
  });

  it("CACHEBENCH_LOG_LEVEL sets the level", () => {
    setEnv("CACHEBENCH_LOG_LEVEL", "error");
    const logger = createLogger({ destination: collect().destination });
    expect(logger.level).toBe("error");
  });

  it("ignores an unknown CACHEBENCH_LOG_LEVEL", () => {
    setEnv("CACHEBENCH_LOG_LEVEL", "loud");
    const logger = createLogger({ destination: collect().destination });
    expect(logger.level).toBe("info");
  });

  it("CACHEBENCH_LOGGER=false disables logging", () => {
    setEnv("CACHEBENCH_LOGGER", "false");
    const { lines, destination } = collect();
    const logger = createLogger({ destination });

    logger.error("nothing to see");
    expect(lines).toEqual([]);
  });
});
