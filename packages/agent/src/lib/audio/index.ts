import type { CaptureBackendName } from "../config.js";
import { ArecordCapture } from "./arecord-capture.js";
import type { CaptureBackend } from "./capture.js";
import { SilenceCapture } from "./silence-capture.js";

export type { CaptureBackend, CaptureRequest } from "./capture.js";

export function createCaptureBackend(name: CaptureBackendName): CaptureBackend {
  switch (name) {
    case "arecord":
      return new ArecordCapture();
    case "silence":
      return new SilenceCapture();
  }
}
