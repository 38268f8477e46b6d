/**
 * Transport Modes
 * 
 * - HTTP: Default mode. Calls the Tool Gateway directly over HTTP (local dev / docker-compose).
 * - AgentCore: Calls the Tool Gateway hosted runtime through Bedrock AgentCore InvokeAgentRuntime.
 */
export type TransportMode = 'http' | 'agentcore';

export const TRANSPORT_MODES = {
    HTTP: 'http',
    AGENTCORE: 'agentcore'
} as const satisfies Record<string, TransportMode>;

export const DEFAULT_TRANSPORT_MODE: TransportMode = TRANSPORT_MODES.HTTP;

