/**
 * Best-effort check of the fleet server's `GET /api/health`.
 */

import { z } from "zod";
import { errorMessage } from "@edge-fleet/shared";

const healthResponseSchema = z.object({
  status: z.string(),
  version: z.string().optional(),
  fleet: z
    .object({
      total_devices: z.number(),
      online_devices: z.number(),
      recording_devices: z.number(),
    })
    .optional(),
});

export type HealthResponse = z.infer<typeof healthResponseSchema>;

export type HealthCheck =
  | { reachable: true; latencyMs: number; httpStatus: number; health: HealthResponse | null }
  | { reachable: false; error: string };

export function healthUrl(serverUrl: string): string {
  return `${serverUrl.replace(/\/+$/, "")}/api/health`;
}

export async function checkHealth(serverUrl: string, timeoutMs = 5_000): Promise<HealthCheck> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  const startedAt = Date.now();
  try {
    const response = await fetch(healthUrl(serverUrl), { signal: controller.signal });
    const body: unknown = await response.json().catch(() => null);
    const parsed = healthResponseSchema.safeParse(body);
    return {
      reachable: true,
      latencyMs: Date.now() - startedAt,
      httpStatus: response.status,
      health: parsed.success ? parsed.data : null,
    };
  } catch (err) {
    return { reachable: false, error: controller.signal.aborted ? "timed out" : errorMessage(err) };
  } finally {
    clearTimeout(timeout);
  }
}
