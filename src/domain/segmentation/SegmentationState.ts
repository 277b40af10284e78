export type SegmentationStateValue = "IDLE" | "DRAINING";

export class SegmentationState {
  private current: SegmentationStateValue = "IDLE";

  get value(): SegmentationStateValue {
    return this.current;
  }

  toIdle() {
    this.current = "IDLE";
  }

  toDraining() {
    this.current = "DRAINING";
  }
}
