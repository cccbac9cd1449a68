import { Request, RequestHandler, Response } from "express";
import type { ObservableSink } from "../models/record.model";
import { sessionRecordSchema } from "../models/record.schema";
import { errorMessage, InvalidRecordError } from "../utils/errors";
import logger from "../utils/logger";

export function postEvent(sink: ObservableSink): RequestHandler {
  return async (req: Request, res: Response): Promise<void> => {
    const { error, value } = sessionRecordSchema.validate(req.body);
    if (error) {
      res
        .status(400)
        .json({ error: "Invalid record", details: error.message });
      return;
    }

    try {
      await sink.write(value);
      res.status(202).json({ ok: true });
    } catch (writeError) {
      if (writeError instanceof InvalidRecordError) {
        logger.warn(writeError.message);
        res
          .status(400)
          .json({ error: "Invalid record", details: writeError.message });
        return;
      }
      logger.error(`Error writing ${value.eventid} record:`, writeError);
      res.status(502).json({
        error: "Failed to store record",
        details: errorMessage(writeError),
      });
    }
  };
}

export function getStats(sink: ObservableSink): RequestHandler {
  return (req: Request, res: Response): void => {
    res.status(200).json(sink.stats());
  };
}

export function healthCheck(req: Request, res: Response): void {
  res
    .status(200)
    .json({ status: "healthy", timestamp: new Date().toISOString() });
}
