import type { AgentTier, ResourceQuery, ResourceType, Task, TaskType } from "@agencyflow/core";

/** Catalogue entry for one agency agent */
export interface AgencyAgentDefinition {
  id: string;
  tier: AgentTier;
  description: string;
  capabilities: readonly TaskType[];
  maxConcurrent: number;
  system: string;
  /** Live data the agent wants for a task */
  resources?: (task: Readonly<Task>) => ResourceQuery[];
}

export function defineAgent(definition: AgencyAgentDefinition): AgencyAgentDefinition {
  return definition;
}

export function payloadString(task: Readonly<Task>, field: string): string | undefined {
  const value = task.payload[field];
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/** One query per resource type keyed by `payload.domain`; none when the task names no domain. */
export function domainResources(...types: ResourceType[]) {
  return (task: Readonly<Task>): ResourceQuery[] => {
    const domain = payloadString(task, "domain");
    return domain ? types.map((resourceType) => ({ resourceType, key: domain })) : [];
  };
}

/** Client record keyed by `payload.clientId`, falling back to the domain. */
export function clientResources(...types: ResourceType[]) {
  return (task: Readonly<Task>): ResourceQuery[] => {
    const key = payloadString(task, "clientId") ?? payloadString(task, "domain");
    return key ? types.map((resourceType) => ({ resourceType, key })) : [];
  };
}
