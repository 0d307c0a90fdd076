import { Router } from "express";
import { parseCloudDefinition } from "../cloud/cloudSet.js";
import { discoverProjects, listRegionOptions } from "../cloud/discovery.js";
import type { CodeBuildCloud } from "../cloud/provisioner.js";
import { describeError } from "../services/errors.js";
import type { ServiceRuntime } from "../app.js";
import { queryString, readProvisionRequest } from "./requests.js";

function describeCloud(cloud: CodeBuildCloud): Record<string, unknown> {
  return { name: cloud.name, description: cloud.toString(), config: cloud.config.toJSON() };
}

export function createCloudRouter(runtime: ServiceRuntime): Router {
  const router = Router();

  router.get("/clouds", (_req, res) => {
    res.json(runtime.clouds.list().map(describeCloud));
  });

  router.post("/clouds", async (req, res) => {
    try {
      const cloud = await runtime.clouds.create(parseCloudDefinition(req.body));
      return res.status(201).json(describeCloud(cloud));
    } catch (error) {
      return res.status(400).json({ error: describeError(error) });
    }
  });

  router.get("/clouds/projects", async (req, res) => {
    const projects = await discoverProjects(
      { credentialsId: queryString(req.query.credentialsId), region: queryString(req.query.region) },
      runtime.discovery
    );
    res.json({ projects });
  });

  router.get("/clouds/regions", async (_req, res) => {
    res.json({ regions: await listRegionOptions(runtime.discovery.resolveRegion) });
  });

  router.get("/clouds/:cloud/can-provision", (req, res) => {
    const cloud = runtime.clouds.get(req.params.cloud);
    if (!cloud) {
      return res.status(404).json({ error: `Cloud not found: ${req.params.cloud}` });
    }
    const label = queryString(req.query.label) ?? null;
    return res.json({ cloud: cloud.name, label, canProvision: cloud.canProvision(label) });
  });

  router.post("/clouds/:cloud/provision", (req, res) => {
    const cloud = runtime.clouds.get(req.params.cloud);
    if (!cloud) {
      return res.status(404).json({ error: `Cloud not found: ${req.params.cloud}` });
    }

    try {
      const { label, excessWorkload } = readProvisionRequest(req.body);
      const planned = cloud.provision(label, excessWorkload);
      return res.status(202).json({
        planned: planned.map((unit) => ({ cloud: cloud.name, displayName: unit.displayName, numExecutors: unit.numExecutors }))
      });
    } catch (error) {
      return res.status(400).json({ error: describeError(error) });
    }
  });

  return router;
}
