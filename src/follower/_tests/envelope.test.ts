import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { applyEnvelopeParams, createEnvelopeState, processSample, quantizeToCc } from "../envelope";

describe("follower/envelope", () => {
  it("starts from documented defaults", () => {
    const s = createEnvelopeState();
    expect(s).toEqual({
      threshold: 0.1,
      gain: 1,
      smoothing: 0.8,
      ccNumber: 1,
      midiChannel: 1,
      clampInput: false,
      smoothedAmplitude: 0,
      ccValue: 0,
      isActive: false,
    });
  });

  it("smooths, gates, scales and quantizes each sample", () => {
    const s = createEnvelopeState({ smoothing: 0.5, threshold: 0.1, gain: 1 });
    s.isActive = true;
    expect(processSample(s, 1)).toEqual({ type: "controlChange", controller: 1, value: 51, channel: 0 });
    expect(s.smoothedAmplitude).toBe(0.5);
    expect(processSample(s, 1)).toEqual({ type: "controlChange", controller: 1, value: 83, channel: 0 });
    expect(s.smoothedAmplitude).toBe(0.75);
    expect(s.ccValue).toBe(83);
  });

  it("uses the configured controller and channel", () => {
    const s = createEnvelopeState({ smoothing: 0, threshold: 0, ccNumber: 11, midiChannel: 3 });
    s.isActive = true;
    expect(processSample(s, 1)).toEqual({ type: "controlChange", controller: 11, value: 127, channel: 2 });
  });

  it("gates everything at or below the threshold", () => {
    const s = createEnvelopeState({ smoothing: 0, threshold: 0.2, gain: 1 });
    s.isActive = true;
    expect(processSample(s, 0.2)?.value).toBe(0);
    expect(processSample(s, 0.15)?.value).toBe(0);
    expect(s.ccValue).toBe(0);
  });

  it("saturates overdriven values at 127", () => {
    const s = createEnvelopeState({ smoothing: 0, threshold: 0, gain: 10 });
    processSample(s, 0.5);
    expect(s.ccValue).toBe(127);
    expect(quantizeToCc(3.2)).toBe(127);
    expect(quantizeToCc(0)).toBe(0);
  });

  it("updates ccValue but emits nothing while inactive", () => {
    const s = createEnvelopeState({ smoothing: 0, threshold: 0, gain: 1 });
    expect(processSample(s, 0.5)).toBeNull();
    expect(s.ccValue).toBe(64);
    s.isActive = true;
    expect(processSample(s, 0.5)).toEqual({ type: "controlChange", controller: 1, value: 64, channel: 0 });
  });

  it("keeps unclamped input unless clampInput is set", () => {
    const loose = createEnvelopeState({ smoothing: 0, threshold: 0 });
    processSample(loose, 2);
    expect(loose.smoothedAmplitude).toBe(2);
    expect(loose.ccValue).toBe(127);

    const strict = createEnvelopeState({ smoothing: 0, threshold: 0, clampInput: true });
    processSample(strict, 2);
    expect(strict.smoothedAmplitude).toBe(1);
    processSample(strict, -1);
    expect(strict.smoothedAmplitude).toBe(0);
  });

  it("treats NaN samples as silence", () => {
    const s = createEnvelopeState({ smoothing: 0.5, threshold: 0 });
    processSample(s, 1);
    processSample(s, Number.NaN);
    expect(s.smoothedAmplitude).toBe(0.25);
  });

  it("treats infinite samples as silence so the envelope stays finite", () => {
    const instant = createEnvelopeState({ smoothing: 0, threshold: 0 });
    processSample(instant, Infinity);
    expect(instant.smoothedAmplitude).toBe(0);
    expect(instant.ccValue).toBe(0);
    processSample(instant, 0.5);
    expect(instant.ccValue).toBe(64);

    const damped = createEnvelopeState({ smoothing: 0.5, threshold: 0 });
    for (const a of [-Infinity, Infinity, 0.3]) {
      processSample(damped, a);
      expect(Number.isFinite(damped.smoothedAmplitude)).toBe(true);
      expect(Number.isInteger(damped.ccValue)).toBe(true);
      expect(damped.ccValue).toBeGreaterThanOrEqual(0);
      expect(damped.ccValue).toBeLessThanOrEqual(127);
    }
    expect(damped.smoothedAmplitude).toBe(0.15);
    expect(damped.ccValue).toBe(19);
  });

  it("quantizes NaN to 0", () => {
    expect(quantizeToCc(Number.NaN)).toBe(0);
  });

  it("clamps parameters to their ranges", () => {
    const s = createEnvelopeState();
    applyEnvelopeParams(s, { threshold: -1, gain: 50, smoothing: 1, ccNumber: 300, midiChannel: 0 });
    expect([s.threshold, s.gain, s.smoothing, s.ccNumber, s.midiChannel]).toEqual([0, 10, 0.99, 127, 1]);
    applyEnvelopeParams(s, { threshold: 0.7, gain: 0, midiChannel: 20, ccNumber: 7.9 });
    expect([s.threshold, s.gain, s.midiChannel, s.ccNumber]).toEqual([0.5, 0.1, 16, 7]);
  });

  it("converges monotonically toward a constant input without overshooting", () => {
    fc.assert(
      fc.property(
        fc.double({ min: 0, max: 1, noNaN: true }),
        fc.double({ min: 0, max: 0.99, noNaN: true }),
        fc.double({ min: 0, max: 1, noNaN: true }),
        (a, k, start) => {
          const s = createEnvelopeState({ smoothing: k });
          s.smoothedAmplitude = start;
          let prev = start - a;
          for (let i = 0; i < 50; i += 1) {
            processSample(s, a);
            const d = s.smoothedAmplitude - a;
            if (Math.abs(d) > Math.abs(prev) + 1e-12) return false;
            if (d * prev < 0 && Math.abs(d) > 1e-12) return false;
            if (s.smoothedAmplitude < -1e-12 || s.smoothedAmplitude > 1 + 1e-12) return false;
            prev = d;
          }
          return true;
        }
      )
    );
  });

  it("always yields an integer ccValue within 0..127", () => {
    fc.assert(
      fc.property(
        fc.array(fc.double({ min: 0, max: 1, noNaN: true }), { minLength: 1, maxLength: 64 }),
        fc.double({ min: 0.1, max: 10, noNaN: true }),
        fc.double({ min: 0, max: 0.5, noNaN: true }),
        (samples, gain, threshold) => {
          const s = createEnvelopeState({ gain, threshold });
          for (const a of samples) {
            processSample(s, a);
            if (!Number.isInteger(s.ccValue) || s.ccValue < 0 || s.ccValue > 127) return false;
          }
          return true;
        }
      )
    );
  });
});
