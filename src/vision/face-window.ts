/**
 * Face presence debounce. A fixed-size window of recent face/no-face results per session;
 * the visitor counts as gone only when the whole window is false.
 */

export class FaceDetectionWindow {
  private readonly samples: boolean[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError("FaceDetectionWindow capacity must be a positive integer");
    }
  }

  push(faceDetected: boolean): void {
    this.samples.push(faceDetected);
    if (this.samples.length > this.capacity) this.samples.shift();
  }

  values(): boolean[] {
    return [...this.samples];
  }

  get length(): number {
    return this.samples.length;
  }

  isFull(): boolean {
    return this.samples.length === this.capacity;
  }

  /** Full and no face in any sample. */
  isAllFalse(): boolean {
    return this.isFull() && this.samples.every((s) => !s);
  }

  clear(): void {
    this.samples.length = 0;
  }
}

export type PresenceEdge = "arrived" | "departed";

/**
 * Turns window contents into presence edges. "departed" fires once per all-false run;
 * the next face re-arms it and fires "arrived".
 */
export class PresenceTracker {
  private readonly window: FaceDetectionWindow;
  /** Undefined until the first edge. */
  private present: boolean | undefined;

  constructor(windowSize: number) {
    this.window = new FaceDetectionWindow(windowSize);
  }

  observe(faceDetected: boolean): PresenceEdge | undefined {
    this.window.push(faceDetected);
    if (faceDetected) {
      if (this.present === true) return undefined;
      this.present = true;
      return "arrived";
    }
    if (this.window.isAllFalse() && this.present !== false) {
      this.present = false;
      return "departed";
    }
    return undefined;
  }

  get windowValues(): boolean[] {
    return this.window.values();
  }
}
