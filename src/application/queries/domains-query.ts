/**
 * Domains query — registered handlers in registration order.
 */

import type { HandlerSummary } from "../../domain/types.ts";
import type { DomainRegistry } from "../handlers/registry.ts";

export interface DomainsQueryResult {
  domains: HandlerSummary[];
  totalDomains: number;
}

export function domainsQuery(registry: DomainRegistry): DomainsQueryResult {
  const domains = registry.summaries();
  return { domains, totalDomains: domains.length };
}
