import { Router } from "express";
import { describeError } from "../services/errors.js";
import type { ServiceRuntime } from "../app.js";
import { readProvisionRequest } from "./requests.js";

export function createProvisionRouter(runtime: ServiceRuntime): Router {
  const router = Router();

  router.post("/provision", (req, res) => {
    try {
      const { label, excessWorkload } = readProvisionRequest(req.body);
      const planned = runtime.clouds.provision(label, excessWorkload);
      return res.status(202).json({
        requested: excessWorkload,
        planned: planned.map((unit) => ({ cloud: unit.cloud, displayName: unit.displayName, numExecutors: unit.numExecutors }))
      });
    } catch (error) {
      return res.status(400).json({ error: describeError(error) });
    }
  });

  return router;
}
