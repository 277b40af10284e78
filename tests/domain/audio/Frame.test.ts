import { amplitudeGate, createFrame, meanAbsoluteAmplitude } from '../../../src/domain/audio/Frame';
import { frameOf } from '../../helpers/fakes';

describe('Frame helpers', () => {
  test('meanAbsoluteAmplitude averages magnitudes of positive and negative samples', () => {
    expect(meanAbsoluteAmplitude(Int16Array.from([100, -300, 200, -400]))).toBe(250);
    expect(meanAbsoluteAmplitude(new Int16Array(0))).toBe(0);
  });

  test('createFrame tags samples with amplitude and capture time and freezes the frame', () => {
    const frame = createFrame(Int16Array.from([-10, 30]), 1234);
    expect(frame.meanAmplitude).toBe(20);
    expect(frame.capturedAt).toBe(1234);
    expect(Object.isFrozen(frame)).toBe(true);
  });

  test('amplitudeGate keeps only frames strictly above the threshold', () => {
    const gate = amplitudeGate(300);
    expect(gate(frameOf(301))).toBe(true);
    expect(gate(frameOf(-500))).toBe(true);
    expect(gate(frameOf(300))).toBe(false);
    expect(gate(frameOf(0))).toBe(false);
  });

  test('amplitudeGate rejects negative or non-finite thresholds', () => {
    expect(() => amplitudeGate(-1)).toThrow(RangeError);
    expect(() => amplitudeGate(Number.NaN)).toThrow(RangeError);
  });
});
