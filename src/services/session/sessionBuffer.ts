/**
 * Session Buffer
 *
 * Ordered frames awaiting transmission. Every read or mutation holds the buffer's
 * lock for its whole critical section: the capture loop appends while the
 * transmission path drains and the control path clears.
 */

import { Frame } from "../../types/index";
import { AsyncLock } from "../../utils/concurrency";

export class SessionBuffer {
  private frames: Frame[] = [];
  private readonly lock = new AsyncLock();

  /**
   * Frame count at the time of the call
   */
  get size(): number {
    return this.frames.length;
  }

  /**
   * Appends a frame. `accept` is evaluated inside the critical section; when it
   * returns false the frame is dropped and `false` is returned.
   */
  append(frame: Frame, accept?: () => boolean): Promise<boolean> {
    return this.lock.runExclusive(() => {
      if (accept && !accept()) {
        return false;
      }
      this.frames.push(frame);
      return true;
    });
  }

  /**
   * Returns the buffered frames and empties the buffer in one critical section
   */
  drain(): Promise<Frame[]> {
    return this.lock.runExclusive(() => {
      const drained = this.frames;
      this.frames = [];
      return drained;
    });
  }

  /**
   * Discards buffered frames, returning how many were dropped
   */
  clear(): Promise<number> {
    return this.lock.runExclusive(() => {
      const dropped = this.frames.length;
      this.frames = [];
      return dropped;
    });
  }
}
