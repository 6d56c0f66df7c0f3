export interface AgentSummary {
  name: string
  description?: string
  version?: string
}

/**
 * Lookup seam for the agent registry. Definitions are loaded from
 * config.agentsDir once a registry implementation exists.
 */
export interface AgentRegistry {
  list(): Promise<AgentSummary[]>
}

export class EmptyAgentRegistry implements AgentRegistry {
  async list(): Promise<AgentSummary[]> {
    return []
  }
}
