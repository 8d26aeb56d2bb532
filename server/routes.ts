import type { Express, NextFunction, Request, RequestHandler, Response } from "express";
import { z } from "zod";
import {
  createSiteRequestSchema,
  day1DomainSchema,
  deploymentProfileRequestSchema,
  intentStepIdSchema,
  lifecycleRequestSchema,
  registerPlanRequestSchema,
  registerTemplateRequestSchema,
  rotateVariableRequestSchema,
  stepIdSchema,
} from "@shared/schema";
import { StateStoreError } from "../platform/state";
import { ProvisioningError } from "./errors";
import { logError } from "./log";
import type { ProvisioningService } from "./services/provisioningService";

const createSiteBodySchema = createSiteRequestSchema.extend({
  plan: registerPlanRequestSchema.optional(),
});
const day1BodySchema = z.object({ domains: z.array(day1DomainSchema).min(1).optional() });
const provisionBodySchema = z.object({ siteIds: z.array(z.string().min(1)).min(1) });
const assignTemplateBodySchema = z.object({ templateId: z.string().uuid() });

// Express 4 does not forward rejected promises to the error handler.
function handle(fn: (req: Request, res: Response) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function registerRoutes(app: Express, service: ProvisioningService): void {
  // Organizations
  app.get(
    "/api/orgs/:orgId/reachability",
    handle(async (req, res) => {
      res.json(await service.checkReachability(req.params.orgId));
    }),
  );

  app.put(
    "/api/orgs/:orgId/plan",
    handle(async (req, res) => {
      const parsed = registerPlanRequestSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
      res.json(await service.registerPlan(req.params.orgId, parsed.data));
    }),
  );

  app.get(
    "/api/orgs/:orgId/plan",
    handle(async (req, res) => {
      res.json(await service.getPlan(req.params.orgId));
    }),
  );

  app.post(
    "/api/orgs/:orgId/sites",
    handle(async (req, res) => {
      const parsed = createSiteBodySchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
      const { plan, ...site } = parsed.data;
      res.status(201).json(await service.createSite(req.params.orgId, site, plan));
    }),
  );

  app.post(
    "/api/orgs/:orgId/provision",
    handle(async (req, res) => {
      const parsed = provisionBodySchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
      res.json(await service.provisionSites(req.params.orgId, parsed.data.siteIds));
    }),
  );

  // Templates
  app.post(
    "/api/templates",
    handle(async (req, res) => {
      const parsed = registerTemplateRequestSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
      res.status(201).json(await service.registerTemplate(parsed.data));
    }),
  );

  app.get(
    "/api/templates/:templateId",
    handle(async (req, res) => {
      res.json(await service.getTemplate(req.params.templateId));
    }),
  );

  app.put(
    "/api/orgs/:orgId/templates/:stepId",
    handle(async (req, res) => {
      const step = intentStepIdSchema.safeParse(req.params.stepId);
      if (!step.success) return res.status(400).json({ message: `Unknown intent step "${req.params.stepId}"` });
      const parsed = assignTemplateBodySchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
      res.json(await service.assignTemplate(req.params.orgId, step.data, parsed.data.templateId));
    }),
  );

  app.post(
    "/api/orgs/:orgId/templates/seed",
    handle(async (req, res) => {
      res.json(await service.seedDefaultTemplates(req.params.orgId));
    }),
  );

  // Sites
  app.put(
    "/api/sites/:siteId/devices",
    handle(async (req, res) => {
      const parsed = deploymentProfileRequestSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
      res.json(await service.claimDevices(req.params.siteId, parsed.data));
    }),
  );

  app.post(
    "/api/sites/:siteId/day1",
    handle(async (req, res) => {
      const parsed = day1BodySchema.safeParse(req.body ?? {});
      if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
      res.json(await service.applyDay1(req.params.siteId, parsed.data.domains));
    }),
  );

  app.get(
    "/api/sites/:siteId/run",
    handle(async (req, res) => {
      res.json(await service.getRunStatus(req.params.siteId));
    }),
  );

  app.post(
    "/api/sites/:siteId/run/cancel",
    handle(async (req, res) => {
      res.json(await service.cancelRun(req.params.siteId));
    }),
  );

  app.post(
    "/api/sites/:siteId/steps/:stepId/retry",
    handle(async (req, res) => {
      const step = stepIdSchema.safeParse(req.params.stepId);
      if (!step.success) return res.status(400).json({ message: `Unknown step "${req.params.stepId}"` });
      res.json(await service.retryStep(req.params.siteId, step.data));
    }),
  );

  app.put(
    "/api/sites/:siteId/variables/:name",
    handle(async (req, res) => {
      const parsed = rotateVariableRequestSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
      res.json(await service.rotateVariable(req.params.siteId, req.params.name, parsed.data.value));
    }),
  );

  // Assurance & lifecycle
  app.post(
    "/api/sites/:siteId/assurance",
    handle(async (req, res) => {
      res.json(await service.queryAssurance(req.params.siteId));
    }),
  );

  app.get(
    "/api/sites/:siteId/assurance",
    handle(async (req, res) => {
      const report = await service.getAssuranceReport(req.params.siteId);
      if (!report) return res.status(404).json({ message: "No assurance report for this site" });
      res.json(report);
    }),
  );

  app.post(
    "/api/sites/:siteId/lifecycle",
    handle(async (req, res) => {
      const parsed = lifecycleRequestSchema.safeParse(req.body);
      if (!parsed.success) return res.status(400).json({ message: parsed.error.message });
      res.json(await service.triggerLifecycle(req.params.siteId, parsed.data));
    }),
  );

  app.get(
    "/api/sites/:siteId/canary",
    handle(async (req, res) => {
      res.json(await service.getCanary(req.params.siteId));
    }),
  );

  app.post(
    "/api/sites/:siteId/canary/resume",
    handle(async (req, res) => {
      res.json(await service.resumeCanary(req.params.siteId));
    }),
  );
}

export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  if (err instanceof ProvisioningError) {
    res.status(err.statusCode).json({ message: err.message, code: err.code, retryable: err.retryable });
    return;
  }
  if (err instanceof StateStoreError) {
    logError("state", err.message);
    res.status(500).json({ message: err.message, code: err.code });
    return;
  }

  logError("express", "Internal Server Error", err);
  res.status(500).json({ message: "Internal Server Error" });
}
