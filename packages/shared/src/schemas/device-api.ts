/**
 * Zod schemas for the HTTP command API request bodies.
 *
 * Capture parameters reuse the wire-protocol bounds so the server never
 * forwards a value a device would reject.
 */

import { z } from "zod";
import { audioConfigPatchSchema, recordingParametersSchema } from "./edge-messages.js";

/** "HH:MM", 24-hour clock */
export const timeOfDaySchema = z
  .string()
  .regex(/^([01]\d|2[0-3]):([0-5]\d)$/, "expected HH:MM (24-hour)");

/** Body of POST /api/devices/:id/record; omitted parameters fall back to the device's audio_config */
export const recordRequestSchema = recordingParametersSchema
  .partial()
  .required({ duration: true })
  .strict();

/** Body of POST /api/devices/:id/stop */
export const stopRequestSchema = z
  .object({ recording_uuid: z.string().min(1).optional() })
  .strict();

/** Body of PATCH /api/devices/:id/config */
export const configPatchSchema = z
  .object({
    device_name: z.string().min(1).max(200).optional(),
    audio_config: audioConfigPatchSchema.omit({ available_devices: true }).strict().optional(),
  })
  .strict()
  .refine((patch) => patch.device_name !== undefined || patch.audio_config !== undefined, {
    message: "at least one of device_name or audio_config is required",
  });

/** Body of PUT /api/devices/:id/schedule */
export const scheduleConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    interval_seconds: z.number().int().min(1),
    duration_seconds: z.number().positive().max(86_400),
    start_time: timeOfDaySchema.nullable().default(null),
    end_time: timeOfDaySchema.nullable().default(null),
    max_success_count: z.number().int().positive().nullable().default(null),
  })
  .strict();

export type RecordRequestBody = z.infer<typeof recordRequestSchema>;
export type ConfigPatchBody = z.infer<typeof configPatchSchema>;
export type ScheduleConfigBody = z.infer<typeof scheduleConfigSchema>;
