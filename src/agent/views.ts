export interface AgentRunOptions {
  /** Outer budget granted by the orchestrator. */
  timeoutMs: number;
  /** Aborted by the orchestrator when the budget elapses. */
  signal: AbortSignal;
}

export interface AgentRunSummary {
  /** Local paths the agent reports having written; the orchestrator trusts the directory listing instead. */
  downloaded: string[];
  message?: string;
}

/**
 * External capability that populates a directory with documents found at a URL.
 * Resolving means the run completed; rejecting means it failed.
 */
export interface ExtractionAgent {
  runAgentExtraction(url: string, outputDirectory: string, options: AgentRunOptions): Promise<AgentRunSummary>;
}
