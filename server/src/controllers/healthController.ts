import type { RequestHandler } from "express";
import type { AppContext } from "../types/AppContext";
import { describeStoreError } from "../store/types";

export function healthController({ store }: AppContext) {
  const health: RequestHandler = (_req, res) => {
    res.json({ ok: true });
  };

  const dbHealth: RequestHandler = async (_req, res, next) => {
    try {
      const r = await store.ping();
      if (!r.ok) {
        const error = describeStoreError(r.error);
        console.error("[DB] ping failed:", error);
        return res.status(500).json({ ok: false, error });
      }
      return res.json({ ok: true, now: r.value.toISOString() });
    } catch (err) {
      next(err);
    }
  };

  return { health, dbHealth };
}
