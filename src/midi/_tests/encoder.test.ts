import { describe, it, expect } from "vitest";
import { channelNibble, encodeCc, encodeNoteOff, encodeNoteOn, encodeSysEx, toRawBytes } from "../encoder";

describe("midi/encoder", () => {
  it("masks CC number, value and channel instead of clamping", () => {
    expect(encodeCc(200, 300, 17)).toEqual({ type: "controlChange", controller: 72, value: 44, channel: 0 });
    expect(encodeCc(1, 127, 16)).toEqual({ type: "controlChange", controller: 1, value: 127, channel: 15 });
  });

  it("converts 1-based channels to the status nibble", () => {
    expect(channelNibble(1)).toBe(0);
    expect(channelNibble(10)).toBe(9);
    expect(channelNibble(0)).toBe(15);
  });

  it("builds note on/off events", () => {
    expect(encodeNoteOn(60, 100, 10)).toEqual({ type: "noteOn", note: 60, velocity: 100, channel: 9 });
    expect(encodeNoteOff(60)).toEqual({ type: "noteOff", note: 60, velocity: 0, channel: 0 });
  });

  it("serialises events to wire bytes", () => {
    expect(toRawBytes(encodeCc(7, 100, 1))).toEqual([0xb0, 7, 100]);
    expect(toRawBytes(encodeNoteOn(0x5e, 127, 1))).toEqual([0x90, 0x5e, 0x7f]);
    expect(toRawBytes(encodeNoteOff(0x5e, 0, 2))).toEqual([0x81, 0x5e, 0x00]);
    expect(toRawBytes(encodeSysEx([0xf0, 0x7e, 0xf7]))).toEqual([0xf0, 0x7e, 0xf7]);
  });

  it("copies SysEx payloads", () => {
    const payload = [0xf0, 1, 2, 0xf7];
    const evt = encodeSysEx(payload);
    payload[1] = 9;
    expect(evt.data).toEqual([0xf0, 1, 2, 0xf7]);
  });
});
