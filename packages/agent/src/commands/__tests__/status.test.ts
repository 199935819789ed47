import { describe, test, expect, afterEach } from "vitest";
import { createServer, type Server } from "node:http";
import * as os from "node:os";
import * as path from "node:path";
import { fetchStatus, formatStatus, type StatusData } from "../status.js";
import { formatDevices } from "../devices.js";
import { buildConfig } from "../../lib/config.js";
import { stripAnsi } from "../../lib/formatters.js";

const CAPTURE = { backend: "arecord", channels: 1, sample_rate: 16000, bit_depth: 16, device_index: 0 };

describe("formatStatus", () => {
  test("renders a reachable server", () => {
    const data: StatusData = {
      config_path: "/home/pi/.edge-agent/config.yaml",
      device: { id: "dev-1", name: "rooftop" },
      server: {
        url: "http://fleet.test:3000",
        reachable: true,
        latencyMs: 12,
        httpStatus: 200,
        health: { status: "ok", version: "0.1.0" },
      },
      capture: CAPTURE,
      recordings: { dir: "/data/rec", awaiting_upload: 2 },
    };

    expect(stripAnsi(formatStatus(data)).split("\n")).toEqual([
      "edge-agent status",
      "",
      "  Device:     rooftop (dev-1)",
      "  Server:     ✓ http://fleet.test:3000 · ok · 12ms",
      "  Capture:    arecord · device 0 · 1ch · 16000 Hz · 16-bit",
      "  Spool:      2 awaiting upload (/data/rec)",
    ]);
  });

  test("renders an unregistered node with an unreachable server", () => {
    const data: StatusData = {
      config_path: "/home/pi/.edge-agent/config.yaml",
      device: { id: null, name: "rooftop" },
      server: { url: "http://fleet.test:3000", reachable: false, error: "timed out" },
      capture: CAPTURE,
      recordings: { dir: "/data/rec", awaiting_upload: 0 },
    };

    const lines = stripAnsi(formatStatus(data)).split("\n");
    expect(lines[2]).toBe("  Device:     rooftop (not yet registered)");
    expect(lines[3]).toBe("  Server:     ✗ http://fleet.test:3000 · unreachable (timed out)");
  });
});

describe("fetchStatus", () => {
  let server: Server | null = null;

  afterEach(async () => {
    await new Promise<void>((resolve) => (server ? server.close(() => resolve()) : resolve()));
    server = null;
  });

  test("checks /api/health and counts spooled recordings", async () => {
    const requested: string[] = [];
    server = createServer((req, res) => {
      requested.push(req.url ?? "");
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ status: "ok", version: "0.1.0" }));
    });
    await new Promise<void>((resolve) => server?.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    const port = typeof address === "object" && address ? address.port : 0;

    const config = buildConfig({
      server: { url: `http://127.0.0.1:${port}` },
      device: { id: "dev-1", name: "bench" },
      recordings_dir: path.join(os.tmpdir(), "edge-agent-status-missing-dir"),
    });
    const data = await fetchStatus(config, "/cfg/config.yaml");

    expect(requested).toEqual(["/api/health"]);
    expect(data.server).toMatchObject({ reachable: true, httpStatus: 200, health: { status: "ok", version: "0.1.0" } });
    expect(data.recordings.awaiting_upload).toBe(0);
    expect(data.capture).toEqual(CAPTURE);
  });
});

describe("formatDevices", () => {
  test("renders an aligned table", () => {
    const table = formatDevices([
      { index: 0, name: "silence", max_input_channels: 2, max_output_channels: 0, default_sample_rate: 48000 },
    ]);
    expect(stripAnsi(table).split("\n")).toEqual([
      "INDEX  NAME     INPUTS   RATE",
      "    0  silence       2  48000",
    ]);
  });

  test("says so when there is nothing to list", () => {
    expect(formatDevices([])).toBe("No capture devices found.");
  });
});
