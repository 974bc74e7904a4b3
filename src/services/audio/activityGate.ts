/**
 * Activity Gate
 *
 * Classifies frames as speech or silence and tracks how long the current run has
 * lasted, so the orchestrator can flush once speech has been sustained long enough.
 */

import { Activity, Frame } from "../../types/index";
import { computeLevel } from "./frame";

export interface ActivityGateOptions {
  /** Minimum level (0..100) a frame must reach to count as speech */
  activityThreshold: number;
  speechThresholdMs: number;
  frameDurationMs: number;
  /** Speech must also exceed the tracked noise floor by this factor */
  noiseFloorRatio?: number;
  /** Smoothing factor of the noise floor average, applied on silent frames */
  noiseFloorAlpha?: number;
}

/**
 * Energy detector with an adaptive noise floor. Owns all detector state, so a fresh
 * instance is a fully reset detector.
 */
class EnergyDetector {
  private noiseFloor = 0;
  private framesSeen = 0;

  constructor(
    private readonly threshold: number,
    private readonly ratio: number,
    private readonly alpha: number
  ) {}

  isSpeech(level: number): boolean {
    this.framesSeen++;
    const speech = level >= this.threshold && level >= this.noiseFloor * this.ratio;
    if (!speech) {
      this.noiseFloor =
        this.framesSeen === 1 ? level : this.noiseFloor + (level - this.noiseFloor) * this.alpha;
    }
    return speech;
  }
}

export class ActivityGate {
  private detector: EnergyDetector;
  private speechRun = 0;
  private silenceRun = 0;
  private readonly speechFramesRequired: number;

  constructor(private readonly options: ActivityGateOptions) {
    this.speechFramesRequired = Math.max(
      1,
      Math.ceil(options.speechThresholdMs / options.frameDurationMs)
    );
    this.detector = this.createDetector();
  }

  classify(frame: Frame): Activity {
    const speech = this.detector.isSpeech(computeLevel(frame.samples));
    if (speech) {
      this.speechRun++;
      this.silenceRun = 0;
      return "speech";
    }
    this.silenceRun++;
    this.speechRun = 0;
    return "silence";
  }

  /**
   * True once consecutive speech has lasted at least the configured threshold
   */
  get sustained(): boolean {
    return this.speechRun >= this.speechFramesRequired;
  }

  get speechRunFrames(): number {
    return this.speechRun;
  }

  get silenceRunFrames(): number {
    return this.silenceRun;
  }

  get requiredSpeechFrames(): number {
    return this.speechFramesRequired;
  }

  /**
   * Replaces the detector and zeroes the run counters
   */
  reset(): void {
    this.detector = this.createDetector();
    this.speechRun = 0;
    this.silenceRun = 0;
  }

  private createDetector(): EnergyDetector {
    return new EnergyDetector(
      this.options.activityThreshold,
      this.options.noiseFloorRatio ?? 2,
      this.options.noiseFloorAlpha ?? 0.05
    );
  }
}
