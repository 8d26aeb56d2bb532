import type { RecordedError, StepId } from "@shared/schema";

export class ProvisioningError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly retryable: boolean;

  constructor(code: string, message: string, opts: { statusCode?: number; retryable?: boolean } = {}) {
    super(message);
    this.name = "ProvisioningError";
    this.code = code;
    this.statusCode = opts.statusCode ?? 400;
    this.retryable = opts.retryable ?? false;
  }
}

// --- Vendor platform ---

export class ConnectivityError extends ProvisioningError {
  constructor(message: string) {
    super("VENDOR_UNREACHABLE", message, { statusCode: 502, retryable: true });
    this.name = "ConnectivityError";
  }
}

export class AuthorizationError extends ProvisioningError {
  constructor(message: string) {
    super("VENDOR_UNAUTHORIZED", message, { statusCode: 502 });
    this.name = "AuthorizationError";
  }
}

export class TimeoutError extends ProvisioningError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super("VENDOR_TIMEOUT", `Operation timed out after ${timeoutMs}ms: ${operation}`, {
      statusCode: 504,
      retryable: true,
    });
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class VendorRequestError extends ProvisioningError {
  public readonly httpStatus: number;

  constructor(httpStatus: number, message: string) {
    super("VENDOR_REQUEST_FAILED", message, { statusCode: 502, retryable: httpStatus >= 500 });
    this.name = "VendorRequestError";
    this.httpStatus = httpStatus;
  }
}

// --- Address planning ---

export class AddressFormatError extends ProvisioningError {
  constructor(message: string) {
    super("INVALID_ADDRESS_BLOCK", message);
    this.name = "AddressFormatError";
  }
}

export class AllocationExhaustedError extends ProvisioningError {
  constructor(zoneBlock: string, ordinal: number, siteBlockSize: number) {
    super(
      "ALLOCATION_EXHAUSTED",
      `Zone ${zoneBlock} cannot hold site ordinal ${ordinal} at ${siteBlockSize} addresses per site`,
      { statusCode: 409 },
    );
    this.name = "AllocationExhaustedError";
  }
}

export class AllocationConflictError extends ProvisioningError {
  public readonly siteId: string;
  public readonly conflictingSiteId: string;

  constructor(siteId: string, cidr: string, conflictingSiteId: string, conflictingCidr: string) {
    super(
      "ALLOCATION_CONFLICT",
      `Subnet ${cidr} of site "${siteId}" overlaps ${conflictingCidr} already allocated to site "${conflictingSiteId}"`,
      { statusCode: 409 },
    );
    this.name = "AllocationConflictError";
    this.siteId = siteId;
    this.conflictingSiteId = conflictingSiteId;
  }
}

export class PlanConflictError extends ProvisioningError {
  constructor(orgId: string) {
    super("PLAN_CONFLICT", `Organization "${orgId}" already has a different address plan`, { statusCode: 409 });
    this.name = "PlanConflictError";
  }
}

// --- Workflow ---

export class DependencyNotSatisfiedError extends ProvisioningError {
  public readonly stepId: StepId;
  public readonly unmet: readonly StepId[];

  constructor(stepId: StepId, unmet: readonly StepId[]) {
    super("DEPENDENCY_NOT_SATISFIED", `Step "${stepId}" is waiting on [${unmet.join(", ")}]`, { statusCode: 409 });
    this.name = "DependencyNotSatisfiedError";
    this.stepId = stepId;
    this.unmet = unmet;
  }
}

export class WorkflowNotFoundError extends ProvisioningError {
  constructor(siteId: string) {
    super("WORKFLOW_NOT_FOUND", `No workflow run exists for site "${siteId}"`, { statusCode: 404 });
    this.name = "WorkflowNotFoundError";
  }
}

export class SiteNotFoundError extends ProvisioningError {
  constructor(siteId: string) {
    super("SITE_NOT_FOUND", `Site "${siteId}" not found`, { statusCode: 404 });
    this.name = "SiteNotFoundError";
  }
}

export class OrganizationPlanNotFoundError extends ProvisioningError {
  constructor(orgId: string) {
    super("PLAN_NOT_FOUND", `Organization "${orgId}" has no address plan`, { statusCode: 404 });
    this.name = "OrganizationPlanNotFoundError";
  }
}

export class DeploymentProfileMissingError extends ProvisioningError {
  constructor(siteId: string) {
    super("PROFILE_NOT_FOUND", `Site "${siteId}" has no deployment profile`, { statusCode: 404 });
    this.name = "DeploymentProfileMissingError";
  }
}

export class InvalidTransitionError extends ProvisioningError {
  constructor(entity: string, from: string, to: string) {
    super("INVALID_TRANSITION", `Invalid ${entity} transition: "${from}" → "${to}"`, { statusCode: 409 });
    this.name = "InvalidTransitionError";
  }
}

// --- Templates & variables ---

export class MissingVariableError extends ProvisioningError {
  public readonly variableName: string;
  public readonly templateId: string;
  public readonly siteId: string;

  constructor(variableName: string, templateId: string, siteId: string) {
    super(
      "MISSING_VARIABLE",
      `Template ${templateId} references "${variableName}" which is not bound for site "${siteId}"`,
      { statusCode: 422 },
    );
    this.name = "MissingVariableError";
    this.variableName = variableName;
    this.templateId = templateId;
    this.siteId = siteId;
  }
}

export class VariableImmutableError extends ProvisioningError {
  constructor(siteId: string, name: string) {
    super(
      "VARIABLE_IMMUTABLE",
      `Variable "${name}" is already bound for site "${siteId}" with a different value; rotate it instead`,
      { statusCode: 409 },
    );
    this.name = "VariableImmutableError";
  }
}

export class VariableNotBoundError extends ProvisioningError {
  constructor(siteId: string, name: string) {
    super("VARIABLE_NOT_BOUND", `Variable "${name}" is not bound for site "${siteId}"`, { statusCode: 404 });
    this.name = "VariableNotBoundError";
  }
}

export class TemplateValidationError extends ProvisioningError {
  constructor(message: string) {
    super("TEMPLATE_INVALID", message, { statusCode: 422 });
    this.name = "TemplateValidationError";
  }
}

export class TemplateNotFoundError extends ProvisioningError {
  constructor(message: string) {
    super("TEMPLATE_NOT_FOUND", message, { statusCode: 404 });
    this.name = "TemplateNotFoundError";
  }
}

// --- Assurance ---

export class SLEThresholdBreach extends ProvisioningError {
  public readonly metric: string;
  public readonly value: number | null;
  public readonly threshold: number;

  constructor(metric: string, value: number | null, threshold: number) {
    super(
      "SLE_THRESHOLD_BREACH",
      `SLE "${metric}" scored ${value ?? "no data"} against threshold ${threshold}`,
      { statusCode: 409 },
    );
    this.name = "SLEThresholdBreach";
    this.metric = metric;
    this.value = value;
    this.threshold = threshold;
  }
}

export class CanaryInProgressError extends ProvisioningError {
  constructor(siteId: string, rolloutId: string) {
    super("CANARY_IN_PROGRESS", `Site "${siteId}" already has an active canary rollout (${rolloutId})`, {
      statusCode: 409,
    });
    this.name = "CanaryInProgressError";
  }
}

export class DeploymentIncompleteError extends ProvisioningError {
  constructor(siteId: string, pending: readonly string[]) {
    super("DEPLOYMENT_INCOMPLETE", `Site "${siteId}" has steps that have not succeeded: ${pending.join(", ")}`, {
      statusCode: 409,
    });
    this.name = "DeploymentIncompleteError";
  }
}

export class DeviceNotFoundError extends ProvisioningError {
  constructor(siteId: string, detail: string) {
    super("DEVICE_NOT_FOUND", `Site "${siteId}": ${detail}`, { statusCode: 404 });
    this.name = "DeviceNotFoundError";
  }
}

export class CanarySupersededError extends ProvisioningError {
  constructor(siteId: string, rolloutId: string) {
    super("CANARY_SUPERSEDED", `Canary rollout ${rolloutId} for site "${siteId}" was updated by another worker`, {
      statusCode: 409,
    });
    this.name = "CanarySupersededError";
  }
}

export class CanaryNotFoundError extends ProvisioningError {
  constructor(siteId: string) {
    super("CANARY_NOT_FOUND", `Site "${siteId}" has no canary rollout`, { statusCode: 404 });
    this.name = "CanaryNotFoundError";
  }
}

export function toRecordedError(err: unknown): RecordedError {
  if (err instanceof ProvisioningError) {
    return { code: err.code, message: err.message, retryable: err.retryable };
  }
  return {
    code: "INTERNAL",
    message: err instanceof Error ? err.message : String(err),
    retryable: false,
  };
}
