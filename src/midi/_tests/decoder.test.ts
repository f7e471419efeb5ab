import { describe, it, expect } from "vitest";
import { decodeRawMidi, decodeRawMidiDetailed, formatEvent } from "../decoder";

describe("midi/decoder", () => {
  it("decodes control change with 0-based channel", () => {
    expect(decodeRawMidi([0xb0, 10, 64])).toEqual({ type: "controlChange", controller: 10, value: 64, channel: 0 });
    expect(decodeRawMidi([0xbf, 7, 1])).toEqual({ type: "controlChange", controller: 7, value: 1, channel: 15 });
  });

  it("decodes note on/off and keeps zero-velocity note-on as note-on", () => {
    expect(decodeRawMidi([0x90, 60, 127])).toEqual({ type: "noteOn", note: 60, velocity: 127, channel: 0 });
    expect(decodeRawMidi([0x93, 60, 0])).toEqual({ type: "noteOn", note: 60, velocity: 0, channel: 3 });
    expect(decodeRawMidi([0x80, 0x5e, 0])).toEqual({ type: "noteOff", note: 0x5e, velocity: 0, channel: 0 });
  });

  it("masks data bytes to 7 bits", () => {
    expect(decodeRawMidi([0xb2, 0xff, 0x80])).toEqual({ type: "controlChange", controller: 127, value: 0, channel: 2 });
  });

  it("passes SysEx buffers through untouched", () => {
    const raw = [0xf0, 0x00, 0x00, 0x66, 0x14, 0x12, 0xf7];
    const evt = decodeRawMidi(raw);
    expect(evt).toEqual({ type: "systemExclusive", data: raw });
    expect(evt?.type === "systemExclusive" && evt.data !== raw).toBe(true);
  });

  it("returns null for unsupported or short frames without throwing", () => {
    expect(decodeRawMidi([])).toBeNull();
    expect(decodeRawMidi([0xb0, 10])).toBeNull();
    expect(decodeRawMidi([0xe0, 0x00, 0x40])).toBeNull();
    expect(decodeRawMidi([0xc0, 5, 0])).toBeNull();
    expect(decodeRawMidi([0xf8, 0, 0])).toBeNull();
  });

  it("explains why a frame was skipped", () => {
    expect(decodeRawMidiDetailed([])).toEqual({ ok: false, reason: "empty" });
    expect(decodeRawMidiDetailed([0x90, 1])).toEqual({ ok: false, reason: "tooShort", status: 0x90 });
    expect(decodeRawMidiDetailed([0xe1, 0, 0])).toEqual({ ok: false, reason: "unsupported", status: 0xe1 });
  });

  it("formats events with 1-based channels", () => {
    expect(formatEvent({ type: "controlChange", controller: 1, value: 64, channel: 0 })).toBe("CC ch=1 cc=1 val=64");
    expect(formatEvent({ type: "noteOn", note: 36, velocity: 100, channel: 9 })).toBe("NoteOn ch=10 note=36 vel=100");
    expect(formatEvent({ type: "systemExclusive", data: [0xf0, 0xf7] })).toBe("SysEx len=2");
  });
});
