/**
 * Contract
 * 
 * Frozen handshake between the agent and the Tool Gateway. Both sides must agree
 * on the version before any envelope field is trusted.
 */
export const CONTRACT_VERSION = 'v1';

export type ToolName = 'search_kb';

export const TOOL_NAMES = {
    SEARCH_KB: 'search_kb'
} as const satisfies Record<string, ToolName>;

export const GATEWAY_INVOKE_PATH = '/tools/invoke';

export const HTTP_HEADERS = {
    CORRELATION_ID: 'X-Correlation-ID',
    TENANT_ID: 'X-Tenant-ID'
} as const;

// AgentCore rejects runtime session ids shorter than this.
export const MIN_RUNTIME_SESSION_ID_LENGTH = 33;
export const RUNTIME_SESSION_ID_PREFIX = 'session-';

export const DEFAULTS = {
    GATEWAY_URL: 'http://localhost:8080',
    QUALIFIER: 'DEFAULT',
    REGION: 'us-east-1',
    HTTP_TIMEOUT_MS: 20000,
    RUNTIME_TIMEOUT_MS: 60000,
    TOOL_FAILURE_MESSAGE: 'Tool call failed'
} as const;
