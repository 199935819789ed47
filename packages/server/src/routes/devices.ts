/**
 * Device command endpoints.
 *
 *   POST   /devices/:id/record                 issue edge.record
 *   POST   /devices/:id/stop                   issue edge.stop (best effort)
 *   POST   /devices/:id/audio-devices/query    ask the device for its inputs
 *   PATCH  /devices/:id/config                 rename / change capture defaults
 *   PUT    /devices/:id/schedule               set an interval recording schedule
 *   DELETE /devices/:id/schedule               remove the schedule
 *
 * Precondition failures (offline, busy, not recording) come back from the
 * dispatcher as CommandRejectedError and leave as 409 through the error
 * handler; unknown devices as 404.
 */

import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import type { Logger } from "pino";
import type { CommandDispatcher, DeviceRegistry, RecordingScheduler } from "@edge-fleet/core";
import {
  configPatchSchema,
  recordRequestSchema,
  scheduleConfigSchema,
  stopRequestSchema,
} from "@edge-fleet/shared";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DevicesRouterDeps {
  dispatcher: Pick<CommandDispatcher, "record" | "stop" | "queryAudioDevices" | "updateConfig">;
  registry: Pick<DeviceRegistry, "setSchedule">;
  scheduler: Pick<RecordingScheduler, "reset">;
  logger: Logger;
}

type Handler = (req: Request, res: Response) => Promise<void>;

/** Forward rejections to the error handler */
function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

// ---------------------------------------------------------------------------
// Router factory
// ---------------------------------------------------------------------------

export function createDevicesRouter(deps: DevicesRouterDeps): Router {
  const { dispatcher, registry, scheduler } = deps;
  const logger = deps.logger.child({ component: "devices-api" });
  const router = Router();

  router.post(
    "/devices/:id/record",
    route(async (req, res) => {
      const body = recordRequestSchema.parse(req.body ?? {});
      const session = await dispatcher.record(req.params.id, body);
      res.status(202).json({
        recording_uuid: session.recording_uuid,
        device_id: session.device_id,
        parameters: session.parameters,
        state: session.state,
        issued_at: session.issued_at,
      });
    }),
  );

  router.post(
    "/devices/:id/stop",
    route(async (req, res) => {
      const body = stopRequestSchema.parse(req.body ?? {});
      const result = await dispatcher.stop(req.params.id, body.recording_uuid);
      res.status(202).json({ device_id: req.params.id, recording_uuid: result.recording_uuid });
    }),
  );

  router.post(
    "/devices/:id/audio-devices/query",
    route(async (req, res) => {
      const devices = await dispatcher.queryAudioDevices(req.params.id);
      res.json({ device_id: req.params.id, devices });
    }),
  );

  router.patch(
    "/devices/:id/config",
    route(async (req, res) => {
      const patch = configPatchSchema.parse(req.body);
      const result = await dispatcher.updateConfig(req.params.id, patch);
      logger.info({ device_id: req.params.id, delivered: result.delivered }, "Device config updated");
      res.json({ device: result.device, delivered: result.delivered });
    }),
  );

  router.put(
    "/devices/:id/schedule",
    route(async (req, res) => {
      const schedule = scheduleConfigSchema.parse(req.body);
      const device = await registry.setSchedule(req.params.id, schedule);
      scheduler.reset(req.params.id);
      logger.info({ device_id: req.params.id, schedule }, "Schedule set");
      res.json({ device });
    }),
  );

  router.delete(
    "/devices/:id/schedule",
    route(async (req, res) => {
      const device = await registry.setSchedule(req.params.id, null);
      scheduler.reset(req.params.id);
      logger.info({ device_id: req.params.id }, "Schedule removed");
      res.json({ device });
    }),
  );

  return router;
}
