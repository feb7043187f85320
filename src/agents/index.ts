/**
 * Step agents.
 */

export type { Agent, AgentInput, AgentResult, AgentErrorPayload } from "./types.js";
export { AGENT_FACTORIES, registeredStepIds, type AgentFactory } from "./registry.js";
export { buildStepMeta, formatUtc } from "./step-meta.js";
export { IntakeAgent } from "./intake.js";
export { SourceRegistryAgent } from "./source-registry.js";
export { IdentityLegalAgent } from "./identity-legal.js";
export { CompanySizeAgent } from "./company-size.js";
export { LocationsAgent } from "./locations.js";
export { ResearchAgent } from "./research.js";
