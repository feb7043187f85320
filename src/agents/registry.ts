/**
 * Step → agent table.
 *
 * Every step the DAG may name is listed here; the plan check refuses to
 * start a run whose DAG names a step missing from this table.
 */

import { CompanySizeAgent } from "./company-size.js";
import { IdentityLegalAgent } from "./identity-legal.js";
import { IntakeAgent } from "./intake.js";
import { LocationsAgent } from "./locations.js";
import { ResearchAgent } from "./research.js";
import { SourceRegistryAgent } from "./source-registry.js";
import type { Agent } from "./types.js";

export type AgentFactory = () => Agent;

const RESEARCH_STEPS: ReadonlyArray<[stepId: string, agentName: string, topic: string]> = [
  ["AG-21", "ag21_financial_signals", "Financial signals"],
  ["AG-30", "ag30_portfolio", "Portfolio"],
  ["AG-31", "ag31_markets_focus", "Markets and focus"],
  ["AG-40", "ag40_target_customers", "Target customers"],
  ["AG-41", "ag41_peer_discovery", "Peer discovery"],
  ["AG-42", "ag42_customers_of_manufacturers", "Customers of manufacturers"],
  ["AG-50", "ag50_projects_tenders", "Projects and tenders"],
  ["AG-51", "ag51_strategic_changes", "Strategic changes"],
  ["AG-60", "ag60_industry_cycles", "Industry cycles"],
  ["AG-61", "ag61_surplus_stock_signals", "Surplus stock signals"],
  ["AG-62", "ag62_surplus_sales_channels", "Surplus sales channels"],
  ["AG-70", "ag70_supply_chain_tech", "Supply chain technology"],
  ["AG-71", "ag71_supply_chain_risks", "Supply chain risks"],
  ["AG-72", "ag72_sustainability_circular", "Sustainability and circularity"],
  ["AG-80", "ag80_market_position", "Market position"],
  ["AG-81", "ag81_industry_trends", "Industry trends"],
  ["AG-82", "ag82_trade_fairs_events", "Trade fairs and events"],
  ["AG-83", "ag83_associations_memberships", "Associations and memberships"],
  ["AG-90", "ag90_sales_playbook", "Sales playbook"],
];

export const AGENT_FACTORIES: ReadonlyMap<string, AgentFactory> = new Map<string, AgentFactory>([
  ["AG-00", () => new IntakeAgent()],
  ["AG-01", () => new SourceRegistryAgent()],
  ["AG-10", () => new IdentityLegalAgent()],
  ["AG-11", () => new CompanySizeAgent()],
  ["AG-12", () => new LocationsAgent()],
  ...RESEARCH_STEPS.map(
    ([stepId, agentName, topic]): [string, AgentFactory] => [
      stepId,
      () => new ResearchAgent(stepId, agentName, topic),
    ]
  ),
]);

export function registeredStepIds(
  factories: ReadonlyMap<string, AgentFactory> = AGENT_FACTORIES
): ReadonlySet<string> {
  return new Set(factories.keys());
}
