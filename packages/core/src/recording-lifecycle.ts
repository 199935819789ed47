/**
 * Recording session state machine.
 *
 * Formalizes the states one recording command moves through and the allowed
 * transitions between them. Transitions are driven only by events from the
 * device the command targeted (plus the dispatcher's acknowledgement timeout).
 *
 * State diagram:
 *   issued -> started -> in_progress(n) -> completed
 *               started -----------------> completed   (no progress reported)
 *   issued | started | in_progress -----> failed
 *
 *   completed, failed -> (terminal and immutable)
 *
 * RecordingTracker holds the live sessions, at most one non-terminal session
 * per device, plus a bounded history of finished ones so late duplicates can
 * be told apart from ids that were never issued.
 */

import type {
  RecordingParameters,
  RecordingPhase,
  RecordingResult,
  RecordingSession,
  RecordingState,
} from "@edge-fleet/shared";

// ---------------------------------------------------------------------------
// Transition map
// ---------------------------------------------------------------------------

/**
 * Allowed transitions for each phase.
 *
 *   issued      -> [started, failed]
 *   started     -> [in_progress, completed, failed]
 *   in_progress -> [in_progress, completed, failed]
 *   completed   -> []   (terminal)
 *   failed      -> []   (terminal)
 */
export const TRANSITIONS: Record<RecordingPhase, RecordingPhase[]> = {
  issued: ["started", "failed"],
  started: ["in_progress", "completed", "failed"],
  in_progress: ["in_progress", "completed", "failed"],
  completed: [],
  failed: [],
};

export function isValidTransition(from: RecordingPhase, to: RecordingPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(phase: RecordingPhase): boolean {
  return TRANSITIONS[phase].length === 0;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

/** A device-originated (or timeout-originated) change to one recording */
export type RecordingEvent =
  | { kind: "started" }
  | { kind: "progress"; percent: number }
  | ({ kind: "completed" } & RecordingResult)
  | { kind: "failed"; error: string };

export type TransitionResult =
  | { ok: true; previous: RecordingState; session: RecordingSession }
  | { ok: false; reason: string };

function targetPhase(event: RecordingEvent): RecordingPhase {
  switch (event.kind) {
    case "started":
      return "started";
    case "progress":
      return "in_progress";
    case "completed":
      return "completed";
    case "failed":
      return "failed";
  }
}

function nextState(event: RecordingEvent): RecordingState {
  switch (event.kind) {
    case "started":
      return { phase: "started" };
    case "progress":
      return { phase: "in_progress", percent: event.percent };
    case "completed":
      return {
        phase: "completed",
        filename: event.filename,
        file_size: event.file_size,
        file_hash: event.file_hash,
        actual_duration: event.actual_duration,
      };
    case "failed":
      return { phase: "failed", error: event.error };
  }
}

/**
 * Compute the session that results from applying `event`, without mutating
 * the input. Rejects illegal phase moves, out-of-range progress and progress
 * that goes backwards.
 */
export function applyRecordingEvent(
  session: RecordingSession,
  event: RecordingEvent,
  now: Date,
): TransitionResult {
  const from = session.state.phase;
  const to = targetPhase(event);

  if (!isValidTransition(from, to)) {
    return { ok: false, reason: `Invalid transition: ${from} -> ${to}` };
  }

  if (event.kind === "progress") {
    const { percent } = event;
    if (!Number.isFinite(percent) || percent < 0 || percent > 100) {
      return { ok: false, reason: `progress_percent out of range: ${percent}` };
    }
    const previous = session.state.phase === "in_progress" ? session.state.percent : 0;
    if (percent < previous) {
      return { ok: false, reason: `progress_percent decreased: ${previous} -> ${percent}` };
    }
  }

  return {
    ok: true,
    previous: session.state,
    session: { ...session, state: nextState(event), updated_at: now.toISOString() },
  };
}

// ---------------------------------------------------------------------------
// Tracker
// ---------------------------------------------------------------------------

const DEFAULT_HISTORY_LIMIT = 1000;

export class RecordingTracker {
  private active = new Map<string, RecordingSession>();
  private activeByDevice = new Map<string, string>();
  /** Insertion-ordered, oldest evicted first */
  private finished = new Map<string, RecordingSession>();

  constructor(private readonly historyLimit: number = DEFAULT_HISTORY_LIMIT) {}

  /**
   * Create an ISSUED session. Throws if the device already has a
   * non-terminal session; callers check `activeFor` under the device lock.
   */
  create(
    recordingUuid: string,
    deviceId: string,
    parameters: RecordingParameters,
    now: Date,
  ): RecordingSession {
    const existing = this.activeByDevice.get(deviceId);
    if (existing !== undefined) {
      throw new Error(`Device ${deviceId} already has active recording ${existing}`);
    }
    if (this.active.has(recordingUuid) || this.finished.has(recordingUuid)) {
      throw new Error(`Recording ${recordingUuid} already exists`);
    }

    const iso = now.toISOString();
    const session: RecordingSession = {
      recording_uuid: recordingUuid,
      device_id: deviceId,
      parameters,
      state: { phase: "issued" },
      issued_at: iso,
      updated_at: iso,
    };
    this.active.set(recordingUuid, session);
    this.activeByDevice.set(deviceId, recordingUuid);
    return session;
  }

  get(recordingUuid: string): RecordingSession | undefined {
    return this.active.get(recordingUuid) ?? this.finished.get(recordingUuid);
  }

  /** The device's non-terminal session, if any */
  activeFor(deviceId: string): RecordingSession | undefined {
    const uuid = this.activeByDevice.get(deviceId);
    return uuid === undefined ? undefined : this.active.get(uuid);
  }

  /** Apply an event to a tracked session, moving it to history when terminal */
  apply(recordingUuid: string, event: RecordingEvent, now: Date): TransitionResult {
    const session = this.active.get(recordingUuid);
    if (!session) {
      return this.finished.has(recordingUuid)
        ? { ok: false, reason: "recording already terminal" }
        : { ok: false, reason: "unknown recording" };
    }

    const result = applyRecordingEvent(session, event, now);
    if (!result.ok) return result;

    if (isTerminal(result.session.state.phase)) {
      this.active.delete(recordingUuid);
      this.activeByDevice.delete(session.device_id);
      this.remember(result.session);
    } else {
      this.active.set(recordingUuid, result.session);
    }
    return result;
  }

  /** Forget a session whose command never reached the device */
  discard(recordingUuid: string): void {
    const session = this.active.get(recordingUuid);
    if (!session) return;
    this.active.delete(recordingUuid);
    if (this.activeByDevice.get(session.device_id) === recordingUuid) {
      this.activeByDevice.delete(session.device_id);
    }
  }

  get activeCount(): number {
    return this.active.size;
  }

  private remember(session: RecordingSession): void {
    this.finished.set(session.recording_uuid, session);
    while (this.finished.size > this.historyLimit) {
      const oldest = this.finished.keys().next();
      if (oldest.done) break;
      this.finished.delete(oldest.value);
    }
  }
}
