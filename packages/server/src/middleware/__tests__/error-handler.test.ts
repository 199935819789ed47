/**
 * Tests for the global error handler: status mapping by error code and the
 * response bodies for validation, malformed JSON and unexpected errors.
 */

import { describe, test, expect, beforeAll, afterAll } from "vitest";
import express from "express";
import type { Server } from "node:http";
import { z } from "zod";
import {
  CommandRejectedError,
  ConfigError,
  NetworkError,
  NotFoundError,
  StorageError,
  ValidationError,
} from "@edge-fleet/shared";
import { errorHandler, statusForErrorCode } from "../error-handler.js";

describe("statusForErrorCode", () => {
  test.each([
    ["VALIDATION_BAD_BODY", 400],
    ["NOT_FOUND_DEVICE", 404],
    ["COMMAND_DEVICE_BUSY", 409],
    ["COMMAND_DEVICE_OFFLINE", 409],
    ["NETWORK_TIMEOUT", 504],
    ["NETWORK_SOCKET_CLOSED", 502],
    ["STORAGE_DEVICE_SAVE", 503],
    ["CONFIG_INVALID", 500],
  ])("%s -> %i", (code, status) => {
    expect(statusForErrorCode(code)).toBe(status);
  });
});

describe("errorHandler", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    const app = express();
    app.use(express.json());
    app.post("/echo", (req, res) => {
      res.json(z.object({ name: z.string() }).parse(req.body));
    });
    app.get("/missing", () => {
      throw new NotFoundError("Device not found: x", "NOT_FOUND_DEVICE", { device_id: "x" });
    });
    app.get("/busy", () => {
      throw new CommandRejectedError("Device is already recording", "COMMAND_DEVICE_BUSY");
    });
    app.get("/timeout", () => {
      throw new NetworkError("Device did not answer", "NETWORK_TIMEOUT");
    });
    app.get("/storage", () => {
      throw new StorageError("Failed to save device", "STORAGE_DEVICE_SAVE");
    });
    app.get("/invalid", () => {
      throw new ValidationError("Bad input", "VALIDATION_BAD_INPUT");
    });
    app.get("/config", () => {
      throw new ConfigError("Broken", "CONFIG_INVALID");
    });
    app.get("/boom", () => {
      throw new Error("kaboom");
    });
    app.use(errorHandler);

    server = app.listen(0, "127.0.0.1");
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  async function request(path: string, init?: RequestInit): Promise<{ status: number; body: unknown }> {
    const res = await fetch(`${baseUrl}${path}`, init);
    const body: unknown = await res.json();
    return { status: res.status, body };
  }

  test("ZodError is a 400 with issue details", async () => {
    const res = await request("/echo", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ name: 7 }),
    });

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      error: "Validation failed",
      details: [{ path: ["name"], code: "invalid_type" }],
    });
  });

  test("a malformed JSON body is a 400", async () => {
    const res = await request("/echo", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{oops",
    });

    expect(res).toEqual({ status: 400, body: { error: "Malformed JSON body" } });
  });

  test.each([
    ["/missing", 404, "NOT_FOUND_DEVICE", "Device not found: x"],
    ["/busy", 409, "COMMAND_DEVICE_BUSY", "Device is already recording"],
    ["/timeout", 504, "NETWORK_TIMEOUT", "Device did not answer"],
    ["/storage", 503, "STORAGE_DEVICE_SAVE", "Failed to save device"],
    ["/invalid", 400, "VALIDATION_BAD_INPUT", "Bad input"],
    ["/config", 500, "CONFIG_INVALID", "Broken"],
  ])("GET %s maps to %i", async (path, status, code, error) => {
    const res = await request(path);

    expect(res.status).toBe(status);
    expect(res.body).toMatchObject({ error, code });
  });

  test("error context is not sent to clients", async () => {
    const res = await request("/missing");
    expect(res.body).not.toHaveProperty("context");
  });

  test("unknown errors are a generic 500", async () => {
    const res = await request("/boom");

    expect(res.status).toBe(500);
    expect(res.body).toMatchObject({ error: "Internal server error" });
  });
});
