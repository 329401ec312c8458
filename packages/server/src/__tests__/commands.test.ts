import { describe, it, expect } from "vitest";
import { pino } from "pino";
import { buildProgram } from "../commands.js";

const logger = pino({ level: "silent" });

describe("keyturn keys:generate", () => {
  it("prints one key by default", async () => {
    const lines: string[] = [];
    await buildProgram({ logger, write: (line) => lines.push(line) }).parseAsync(["keys:generate"], { from: "user" });

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^[A-Z0-9]{32}$/);
  });

  it("prints the requested number of distinct keys", async () => {
    const lines: string[] = [];
    await buildProgram({ logger, write: (line) => lines.push(line) }).parseAsync(["keys:generate", "--count", "3"], {
      from: "user",
    });

    expect(lines).toHaveLength(3);
    expect(new Set(lines).size).toBe(3);
  });
});
