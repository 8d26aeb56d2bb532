import type { StepId } from "@shared/schema";

export const stateKeys = {
  step: (siteId: string, stepId: StepId) => `step:${siteId}:${stepId}`,
  stepPrefix: (siteId: string) => `step:${siteId}:`,
  run: (siteId: string) => `run:${siteId}`,
  allocation: (siteId: string) => `alloc:${siteId}`,
  allocationPrefix: () => "alloc:",
  canary: (siteId: string) => `canary:${siteId}`,
  site: (siteId: string) => `site:${siteId}`,
  variables: (siteId: string) => `vars:${siteId}`,
  profile: (siteId: string) => `profile:${siteId}`,
  assurance: (siteId: string) => `assurance:${siteId}`,
  plan: (orgId: string) => `plan:${orgId}`,
  template: (templateId: string) => `template:${templateId}`,
  assignments: (orgId: string) => `assignments:${orgId}`,
} as const;
