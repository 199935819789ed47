/**
 * Recording session types.
 *
 * A recording session tracks one `edge.record` command from the moment the
 * dispatcher issues it until the device reports a terminal outcome.
 *
 * State diagram:
 *   issued -> started -> in_progress(n) -> completed
 *      \         \            \
 *       +---------+------------+-> failed
 *
 *   completed, failed -> (terminal)
 */

import type { BitDepth } from "../schemas/edge-messages.js";

/** Capture parameters carried by `edge.record` */
export interface RecordingParameters {
  /** Seconds */
  duration: number;
  channels: number;
  sample_rate: number;
  device_index: number;
  bit_depth: BitDepth;
}

/** What the device reports once the file is written */
export interface RecordingResult {
  filename: string;
  file_size: number;
  file_hash: string;
  /** Seconds actually captured (shorter than requested after an early stop) */
  actual_duration: number;
}

export type RecordingState =
  | { phase: "issued" }
  | { phase: "started" }
  | { phase: "in_progress"; percent: number }
  | ({ phase: "completed" } & RecordingResult)
  | { phase: "failed"; error: string };

export type RecordingPhase = RecordingState["phase"];

export interface RecordingSession {
  recording_uuid: string;
  device_id: string;
  parameters: RecordingParameters;
  state: RecordingState;
  /** ISO-8601 */
  issued_at: string;
  /** ISO-8601, updated on every transition */
  updated_at: string;
}
