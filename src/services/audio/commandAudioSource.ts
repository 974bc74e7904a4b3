// Command-line recorder audio source
// Spawns arecord or sox, reads raw PCM16 from stdout and slices it into frames

import { spawn as spawnChild, execFile, ChildProcess } from "child_process";
import { promisify } from "util";
import { AudioConfig, AudioDevice, DeviceSelector, Frame } from "../../types/index";
import { AsyncQueue } from "../../utils/concurrency";
import { DeviceError, errorMessage } from "../../utils/errors";
import { Logger } from "../../utils/logger";
import { AudioSource, resolveDevice } from "./audioSource";
import { bytesPerFrame, createFrame, pcmFromBytes } from "./frame";

const execFileAsync = promisify(execFile);
const STOP_GRACE_MS = 2000;

export type SpawnProcess = (
  command: string,
  args: string[],
  options: { stdio: ["ignore", "pipe", "pipe"]; env: NodeJS.ProcessEnv }
) => ChildProcess;

export interface CommandAudioSourceOptions {
  spawnProcess?: SpawnProcess;
  listDevices?: () => Promise<AudioDevice[]>;
  now?: () => number;
  logger?: Logger;
}

/**
 * Parses `arecord -L` output: device names start at column 0, descriptions are
 * indented underneath.
 */
export function parseArecordDevices(output: string): AudioDevice[] {
  const devices: AudioDevice[] = [];
  const lines = output.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? "";
    if (!line.trim() || /^\s/.test(line)) continue;
    const id = line.trim();
    const description = (lines[i + 1] ?? "").trim();
    devices.push({
      id,
      name: description && /^\s/.test(lines[i + 1] ?? "") ? description : id,
      isDefault: id === "default",
    });
  }
  return devices;
}

export async function listCaptureDevices(command: AudioConfig["captureCommand"]): Promise<AudioDevice[]> {
  if (command === "sox") {
    return [{ id: "default", name: "System default input", isDefault: true }];
  }
  try {
    const { stdout } = await execFileAsync("arecord", ["-L"]);
    return parseArecordDevices(stdout);
  } catch (error) {
    throw new DeviceError(`Failed to list capture devices: ${errorMessage(error)}`);
  }
}

export function recorderArgs(audio: AudioConfig, deviceId: string): string[] {
  if (audio.captureCommand === "sox") {
    return [
      "-q",
      "-d",
      "-t", "raw",
      "-b", "16",
      "-e", "signed-integer",
      "-L",
      "-c", String(audio.channels),
      "-r", String(audio.sampleRate),
      "-",
    ];
  }
  return [
    "-q",
    "-D", deviceId,
    "-f", "S16_LE",
    "-r", String(audio.sampleRate),
    "-c", String(audio.channels),
    "-t", "raw",
  ];
}

export class CommandAudioSource implements AudioSource {
  private readonly logger: Logger;
  private readonly spawnProcess: SpawnProcess;
  private readonly listDevices: () => Promise<AudioDevice[]>;
  private readonly now: () => number;
  private readonly frameBytes: number;

  private device: AudioDevice | null = null;
  private child: ChildProcess | null = null;
  private queue = new AsyncQueue<Frame>();
  private pending: Buffer = Buffer.alloc(0);
  private sequence = 0;
  private suspended = false;
  private closing = false;
  private droppedFrames = 0;

  constructor(
    private readonly audio: AudioConfig,
    options: CommandAudioSourceOptions = {}
  ) {
    this.logger = options.logger ?? new Logger("AudioSource");
    this.spawnProcess = options.spawnProcess ?? spawnChild;
    this.listDevices = options.listDevices ?? (() => listCaptureDevices(audio.captureCommand));
    this.now = options.now ?? Date.now;
    this.frameBytes = bytesPerFrame(audio);
  }

  get isOpen(): boolean {
    return this.child !== null && !this.closing;
  }

  async selectDevice(selectDevice: DeviceSelector): Promise<AudioDevice> {
    if (!this.device) {
      const devices = await this.listDevices();
      this.device = await resolveDevice(devices, selectDevice, this.audio.device, this.logger);
    }
    return this.device;
  }

  async open(selectDevice: DeviceSelector): Promise<AudioDevice> {
    if (this.isOpen && this.device) {
      return this.device;
    }
    const device = await this.selectDevice(selectDevice);

    this.queue = new AsyncQueue<Frame>();
    this.pending = Buffer.alloc(0);
    this.sequence = 0;
    this.suspended = false;
    this.closing = false;

    const command = this.audio.captureCommand;
    const args = recorderArgs(this.audio, device.id);
    this.logger.info("Starting audio capture", { command, device: device.id, sampleRate: this.audio.sampleRate });

    const env: NodeJS.ProcessEnv =
      command === "sox" && device.id !== "default" ? { ...process.env, AUDIODEV: device.id } : process.env;
    const child = this.spawnProcess(command, args, { stdio: ["ignore", "pipe", "pipe"], env });
    if (!child.stdout || !child.stderr) {
      child.kill("SIGKILL");
      throw new DeviceError(`Failed to spawn ${command} with stdout/stderr pipes`);
    }
    this.child = child;
    const queue = this.queue;

    child.stdout.on("data", (chunk: Buffer) => this.onData(chunk, queue));

    child.stderr.on("data", (data: Buffer) => {
      const msg = data.toString().trim();
      if (msg) this.logger.warn(`${command}: ${msg}`);
    });

    child.on("error", (error: Error) => {
      this.logger.error("Audio recorder failed", error);
      queue.fail(new DeviceError(`Audio recorder failed: ${error.message}`));
    });

    child.on("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      if (this.child === child) this.child = null;
      if (this.closing) {
        queue.close();
        return;
      }
      this.logger.error("Audio recorder exited unexpectedly", undefined, { code, signal });
      queue.fail(new DeviceError(`Audio recorder exited (code=${code}, signal=${signal})`));
    });

    return device;
  }

  readFrame(): Promise<Frame | null> {
    return this.queue.next();
  }

  suspend(): void {
    this.suspended = true;
    this.queue.clear();
    this.pending = Buffer.alloc(0);
  }

  resume(): void {
    this.suspended = false;
  }

  async close(): Promise<void> {
    this.closing = true;
    this.queue.close();
    const child = this.child;
    if (!child) return;

    await new Promise<void>((resolve) => {
      const timeout = setTimeout(() => {
        this.logger.warn("Audio recorder ignored SIGINT, sending SIGKILL");
        child.kill("SIGKILL");
        resolve();
      }, STOP_GRACE_MS);

      child.once("exit", () => {
        clearTimeout(timeout);
        resolve();
      });

      if (!child.kill("SIGINT")) {
        clearTimeout(timeout);
        resolve();
      }
    });

    this.child = null;
    this.logger.info("Audio capture stopped", { frames: this.sequence, dropped: this.droppedFrames });
  }

  private onData(chunk: Buffer, queue: AsyncQueue<Frame>): void {
    if (this.suspended || queue.isClosed) {
      return;
    }
    this.pending = this.pending.length ? Buffer.concat([this.pending, chunk]) : chunk;

    while (this.pending.length >= this.frameBytes) {
      const bytes = this.pending.subarray(0, this.frameBytes);
      this.pending = this.pending.subarray(this.frameBytes);
      const frame = createFrame(
        this.sequence++,
        pcmFromBytes(bytes),
        this.audio.sampleRate,
        this.audio.frameDurationMs,
        this.now()
      );
      queue.push(frame);

      if (queue.size > this.audio.maxQueuedFrames) {
        queue.shift();
        this.droppedFrames++;
        if (this.droppedFrames % 50 === 1) {
          this.logger.warn("Capture queue overflow, dropping oldest frames", {
            dropped: this.droppedFrames,
          });
        }
      }
    }
  }
}
