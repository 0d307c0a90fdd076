import { Router, type Response } from "express";
import { describeBuildLink, announceBuild, TextLogSink } from "../logs/buildLink.js";
import { CodeBuildComputer } from "../nodes/computer.js";
import { countAgentEvents, readAgentEvents } from "../nodes/eventStore.js";
import type { RuntimeComputer } from "../nodes/types.js";
import { describeError } from "../services/errors.js";
import type { ServiceRuntime } from "../app.js";
import { readAgentSecret, readLimit, readTaskSignal } from "./requests.js";

function agentNotFound(res: Response, name: string) {
  return res.status(404).json({ error: `Agent not found: ${name}` });
}

export function createAgentRouter(runtime: ServiceRuntime): Router {
  const router = Router();
  const { registry, connectSecrets } = runtime;

  /** Resolves the computer only when the caller holds that agent's connect secret. */
  function authorizeAgent(name: string, body: unknown, header: string | undefined): RuntimeComputer | "unknown" | "denied" {
    const computer = registry.getComputer(name);
    if (!computer) return "unknown";
    const secret = readAgentSecret(body, header);
    if (!secret || !connectSecrets.verify(name, secret)) return "denied";
    return computer;
  }

  router.get("/agents", (_req, res) => {
    res.json({
      agents: registry.list().map(({ node, computer }) => ({ ...node.toJSON(), computer: computer.toJSON() }))
    });
  });

  router.get("/agents/:agent", (req, res) => {
    const node = registry.get(req.params.agent);
    const computer = registry.getComputer(req.params.agent);
    if (!node || !computer) return agentNotFound(res, req.params.agent);
    return res.json({ ...node.toJSON(), computer: computer.toJSON() });
  });

  router.get("/agents/:agent/build", (req, res) => {
    const computer = registry.getComputer(req.params.agent);
    if (!(computer instanceof CodeBuildComputer)) return agentNotFound(res, req.params.agent);

    const link = describeBuildLink(computer);
    if (!link) {
      return res.status(404).json({ error: `No build is bound to agent ${req.params.agent}` });
    }
    const sink = new TextLogSink();
    announceBuild(computer, sink);
    return res.json({ ...link, log: sink.toLines() });
  });

  router.get("/agents/:agent/events", (req, res) => {
    const name = req.params.agent;
    if (!registry.has(name) && countAgentEvents(name) === 0) return agentNotFound(res, name);
    return res.json({ events: readAgentEvents(name, readLimit(req.query.limit, 50)) });
  });

  router.post("/agents/:agent/connect", (req, res) => {
    const computer = authorizeAgent(req.params.agent, req.body, req.header("x-agent-secret"));
    if (computer === "unknown") return agentNotFound(res, req.params.agent);
    if (computer === "denied") return res.status(401).json({ error: "Invalid agent secret" });

    computer.connect();
    return res.json({ agent: computer.name, online: computer.isOnline() });
  });

  router.post("/agents/:agent/disconnect", (req, res) => {
    const computer = authorizeAgent(req.params.agent, req.body, req.header("x-agent-secret"));
    if (computer === "unknown") return agentNotFound(res, req.params.agent);
    if (computer === "denied") return res.status(401).json({ error: "Invalid agent secret" });

    computer.disconnect();
    return res.json({ agent: computer.name, online: computer.isOnline() });
  });

  router.post("/agents/:agent/tasks/accepted", (req, res) => {
    const computer = registry.getComputer(req.params.agent);
    if (!computer) return agentNotFound(res, req.params.agent);

    try {
      const signal = readTaskSignal(req.body);
      computer.onTaskAccepted({ name: signal.task, durationMs: signal.durationMs });
      return res.status(202).json({ agent: computer.name, accepted: signal.task });
    } catch (error) {
      return res.status(400).json({ error: describeError(error) });
    }
  });

  router.post("/agents/:agent/tasks/completed", (req, res) => {
    const computer = registry.getComputer(req.params.agent);
    if (!computer) return agentNotFound(res, req.params.agent);

    try {
      const signal = readTaskSignal(req.body);
      const task = { name: signal.task, durationMs: signal.durationMs };
      if (signal.problems) {
        computer.onTaskCompletedWithProblems(task, signal.problems);
      } else {
        computer.onTaskCompleted(task);
      }
      return res.status(202).json({ agent: computer.name, completed: signal.task, acceptingTasks: computer.isAcceptingTasks() });
    } catch (error) {
      return res.status(400).json({ error: describeError(error) });
    }
  });

  return router;
}
