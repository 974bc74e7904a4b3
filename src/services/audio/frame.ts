/**
 * PCM16 frame helpers: construction, level metering, concatenation, resampling and
 * base64 encoding for the realtime API.
 */

import { AudioConfig, Frame } from "../../types/index";
import { clamp } from "../../utils/index";

const INT16_MAX = 32767;

export function samplesPerFrame(audio: Pick<AudioConfig, "sampleRate" | "frameDurationMs" | "channels">): number {
  return Math.round((audio.sampleRate * audio.frameDurationMs) / 1000) * audio.channels;
}

export function bytesPerFrame(audio: Pick<AudioConfig, "sampleRate" | "frameDurationMs" | "channels">): number {
  return samplesPerFrame(audio) * 2;
}

export function createFrame(
  sequence: number,
  samples: Int16Array,
  sampleRate: number,
  durationMs: number,
  capturedAt: number = Date.now()
): Frame {
  return Object.freeze({ sequence, samples, sampleRate, durationMs, capturedAt });
}

/**
 * Copies little-endian PCM16 bytes into a fresh Int16Array
 */
export function pcmFromBytes(bytes: Buffer): Int16Array {
  const samples = new Int16Array(Math.floor(bytes.length / 2));
  for (let i = 0; i < samples.length; i++) {
    samples[i] = bytes.readInt16LE(i * 2);
  }
  return samples;
}

export function rms(samples: Int16Array): number {
  if (samples.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < samples.length; i++) {
    const s = samples[i] ?? 0;
    sum += s * s;
  }
  return Math.sqrt(sum / samples.length);
}

/**
 * Normalized amplitude in 0..100. The square root keeps quiet speech visible on the meter.
 */
export function computeLevel(samples: Int16Array): number {
  const normalized = clamp(rms(samples) / INT16_MAX, 0, 1);
  return Math.round(Math.sqrt(normalized) * 100);
}

export function concatFrames(frames: readonly Frame[]): Int16Array {
  const total = frames.reduce((n, frame) => n + frame.samples.length, 0);
  const out = new Int16Array(total);
  let offset = 0;
  for (const frame of frames) {
    out.set(frame.samples, offset);
    offset += frame.samples.length;
  }
  return out;
}

/**
 * Linear-interpolation resampler for mono PCM16
 */
export function resample(samples: Int16Array, fromRate: number, toRate: number): Int16Array {
  if (fromRate === toRate || samples.length === 0) {
    return samples;
  }
  const outLength = Math.max(1, Math.round((samples.length * toRate) / fromRate));
  const out = new Int16Array(outLength);
  const step = fromRate / toRate;
  for (let i = 0; i < outLength; i++) {
    const pos = i * step;
    const left = Math.floor(pos);
    const right = Math.min(left + 1, samples.length - 1);
    const frac = pos - left;
    const a = samples[Math.min(left, samples.length - 1)] ?? 0;
    const b = samples[right] ?? 0;
    out[i] = Math.round(a + (b - a) * frac);
  }
  return out;
}

export function toBase64(samples: Int16Array): string {
  return Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength).toString("base64");
}
