/**
 * Zod schema for messages observers send on `/api/ws`.
 */

import { z } from "zod";

export const observerClientMessageSchema = z.union([
  z.object({ type: z.literal("subscribe"), scope: z.literal("all") }),
  z.object({ type: z.literal("subscribe"), device_id: z.string().min(1) }),
  z.object({ type: z.literal("unsubscribe"), device_id: z.string().min(1).optional() }),
  z.object({ type: z.literal("pong") }),
]);
