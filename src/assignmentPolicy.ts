import { config } from '../config/env';
import type { RoutingLookup } from '../config/routingTable';

export type AssignmentSource =
  | 'routing_table'
  | 'helpdesk_has_distributor'
  | 'office_no_distributor';

export type Assignment = {
  agentId: string;
  source: AssignmentSource;
  label: string;
};

function present(value: string | null): value is string {
  return !!value && value.trim().length > 0;
}

/**
 * Decide which operator a new conversation goes to.
 * 1. agent from the routing table
 * 2. no agent, distributor known -> help desk (it can forward to the distributor)
 * 3. neither -> general office
 */
export function resolveAssignment(routing: RoutingLookup): Assignment {
  if (present(routing.agentId)) {
    return { agentId: routing.agentId.trim(), source: 'routing_table', label: 'Routing table' };
  }
  if (present(routing.distributorEmail)) {
    return {
      agentId: config.agents.helpdesk,
      source: 'helpdesk_has_distributor',
      label: 'Help desk (has distributor)',
    };
  }
  return {
    agentId: config.agents.office,
    source: 'office_no_distributor',
    label: 'General office (no distributor)',
  };
}
