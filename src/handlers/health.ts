import type { LlmGateway } from "../ai.js";
import type { TemplateId } from "../lesson/templates.js";

export interface HealthPayload {
  status: "success";
  message: string;
  template: TemplateId;
  provider: string | null;
  ready: boolean;
}

export function health({ gateway, templateId }: { gateway: LlmGateway | null; templateId: TemplateId }): HealthPayload {
  return {
    status: "success",
    message: "Backend is Running! Connect to /generate",
    template: templateId,
    provider: gateway ? gateway.provider : null,
    ready: !!gateway,
  };
}
