import { describe, it, expect } from "vitest";
import { ActivityGate } from "./activityGate";
import { constantFrame, silenceFrame, speechFrame } from "../../test/fakes";

const newGate = (): ActivityGate =>
  new ActivityGate({ activityThreshold: 10, speechThresholdMs: 100, frameDurationMs: 20 });

describe("ActivityGate", () => {
  it("requires the configured speech duration in consecutive frames", () => {
    const gate = newGate();
    expect(gate.requiredSpeechFrames).toBe(5);
    for (let i = 0; i < 4; i++) {
      expect(gate.classify(speechFrame(i))).toBe("speech");
      expect(gate.sustained).toBe(false);
    }
    gate.classify(speechFrame(4));
    expect(gate.sustained).toBe(true);
  });

  it("restarts the speech run on silence", () => {
    const gate = newGate();
    for (let i = 0; i < 4; i++) gate.classify(speechFrame(i));
    expect(gate.classify(silenceFrame(4))).toBe("silence");
    expect(gate.speechRunFrames).toBe(0);
    expect(gate.silenceRunFrames).toBe(1);
    gate.classify(speechFrame(5));
    expect(gate.sustained).toBe(false);
  });

  it("ignores frames below the activity threshold", () => {
    const gate = newGate();
    // level 6
    expect(gate.classify(constantFrame(0, 100))).toBe("silence");
  });

  it("demands speech to clear the adapted noise floor", () => {
    const gate = newGate();
    // level 9 seeds the floor, so level 11 no longer counts
    expect(gate.classify(constantFrame(0, 250))).toBe("silence");
    expect(gate.classify(constantFrame(1, 400))).toBe("silence");
    expect(gate.classify(speechFrame(2))).toBe("speech");
  });

  it("behaves like a fresh gate after reset", () => {
    const used = newGate();
    used.classify(constantFrame(0, 250));
    for (let i = 1; i < 4; i++) used.classify(speechFrame(i));
    used.reset();

    const fresh = newGate();
    const sequence = [silenceFrame(0), speechFrame(1), speechFrame(2), speechFrame(3), speechFrame(4), speechFrame(5)];
    for (const frame of sequence) {
      expect(used.classify(frame)).toBe(fresh.classify(frame));
      expect(used.sustained).toBe(fresh.sustained);
      expect(used.speechRunFrames).toBe(fresh.speechRunFrames);
    }
    expect(used.sustained).toBe(true);
  });
});
