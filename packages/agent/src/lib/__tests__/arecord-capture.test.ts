import { describe, test, expect } from "vitest";
import { ArecordCapture, buildArecordArgs, parseArecordList } from "../audio/arecord-capture.js";

const LISTING = [
  "**** List of CAPTURE Hardware Devices ****",
  "card 0: PCH [HDA Intel PCH], device 0: ALC3246 Analog [ALC3246 Analog]",
  "  Subdevices: 1/1",
  "  Subdevice #0: subdevice #0",
  "card 2: Device [USB Audio Device], device 0: USB Audio [USB Audio]",
  "  Subdevices: 1/1",
  "  Subdevice #0: subdevice #0",
  "",
].join("\n");

describe("parseArecordList", () => {
  test("numbers capture devices in listing order", () => {
    expect(parseArecordList(LISTING)).toEqual([
      { index: 0, card: 0, device: 0, name: "HDA Intel PCH: ALC3246 Analog (hw:0,0)" },
      { index: 1, card: 2, device: 0, name: "USB Audio Device: USB Audio (hw:2,0)" },
    ]);
  });

  test("returns nothing for a machine without capture hardware", () => {
    expect(parseArecordList("")).toEqual([]);
  });
});

describe("buildArecordArgs", () => {
  test("maps the request onto arecord flags", () => {
    const args = buildArecordArgs(
      { path: "/rec/a.wav", duration: 2.5, channels: 2, sample_rate: 48000, device_index: 1, bit_depth: 24 },
      "plughw:2,0",
    );
    expect(args).toEqual([
      "-D", "plughw:2,0",
      "-f", "S24_3LE",
      "-c", "2",
      "-r", "48000",
      "-d", "3",
      "-t", "wav",
      "-q",
      "/rec/a.wav",
    ]);
  });

  test("rejects bit depths arecord cannot write to WAV", () => {
    expect(() =>
      buildArecordArgs({ path: "/rec/b.wav", duration: 1, channels: 1, sample_rate: 16000, device_index: 0, bit_depth: 12 }, "default"),
    ).toThrow("Unsupported bit depth: 12");
  });
});

describe("ArecordCapture", () => {
  test("surfaces a missing arecord binary as a listing error", async () => {
    const capture = new ArecordCapture({ command: "/nonexistent/arecord" });
    await expect(capture.listDevices()).rejects.toThrow("/nonexistent/arecord -l failed");
  });
});
