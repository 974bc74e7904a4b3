import { describe, it, expect, vi } from "vitest";
import { DEFAULT_INSTRUCTIONS, buildInstructions, loadConfig, readContextFile } from "./index";

const baseEnv = { OPENAI_API_KEY: "test-secret", NODE_ENV: "test" };

describe("loadConfig", () => {
  it("applies defaults for every optional setting", () => {
    const config = loadConfig(baseEnv, () => null);

    expect(config.server.port).toBe(8765);
    expect(config.realtime.model).toBe("gpt-4o-realtime-preview-2024-10-01");
    expect(config.realtime.url).toBe("wss://api.openai.com/v1/realtime");
    expect(config.realtime.instructions).toBe(DEFAULT_INSTRUCTIONS);
    expect(config.realtime.modalities).toEqual(["text"]);
    expect(config.realtime.turnDetection.type).toBe("none");
    expect(config.session.activityThreshold).toBe(10);
    expect(config.session.cooldownMs).toBe(10000);
    expect(config.session.maxApiCalls).toBe(-1);
    expect(config.session.captureWhileAwaiting).toBe("buffer");
    expect(config.audio.maxQueuedFrames).toBe(250);
    expect(config.logging.console.enabled).toBe(false);
  });

  it("converts numeric and list settings", () => {
    const config = loadConfig(
      {
        ...baseEnv,
        PORT: "9000",
        REALTIME_MODALITIES: "text, audio",
        COOLDOWN_MS: "2500",
        CORS_ORIGIN: "http://a.test,http://b.test",
      },
      () => null
    );
    expect(config.server.port).toBe(9000);
    expect(config.realtime.modalities).toEqual(["text", "audio"]);
    expect(config.session.cooldownMs).toBe(2500);
    expect(config.security.cors.origin).toEqual(["http://a.test", "http://b.test"]);
  });

  it("reports every invalid variable at once", () => {
    expect(() => loadConfig({ NODE_ENV: "test", FLUSH_MODE: "sometimes" }, () => null)).toThrow(
      /OPENAI_API_KEY.*FLUSH_MODE|FLUSH_MODE.*OPENAI_API_KEY/
    );
  });

  it("folds context files into the instructions", () => {
    const readContext = vi.fn((path: string) => (path === "bg.txt" ? "  Team of four.\n" : "Ship the demo."));
    const config = loadConfig(
      {
        ...baseEnv,
        REALTIME_INSTRUCTIONS: "Be brief.",
        BACKGROUND_CONTEXT_FILE: "bg.txt",
        TASK_CONTEXT_FILE: "task.txt",
      },
      readContext
    );
    expect(config.realtime.instructions).toBe(
      "Be brief.\n\nBACKGROUND CONTEXT:\nTeam of four.\n\nCURRENT TASK/OBJECTIVE:\nShip the demo."
    );
    expect(readContext).toHaveBeenCalledTimes(2);
  });

  it("returns a frozen configuration", () => {
    const config = loadConfig(baseEnv, () => null);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.session)).toBe(true);
    expect(Object.isFrozen(config.realtime.turnDetection)).toBe(true);
  });
});

describe("buildInstructions", () => {
  it("skips blank context", () => {
    expect(buildInstructions("Base ", "   ", null)).toBe("Base");
  });
});

describe("readContextFile", () => {
  it("returns null for a missing file", () => {
    expect(readContextFile("/nonexistent/context.txt")).toBeNull();
  });
});
