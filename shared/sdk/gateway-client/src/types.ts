import { TransportMode } from '@toolbridge/constants';

export type ToolInput = Record<string, unknown>;

export interface RequestEnvelope<I extends ToolInput = ToolInput> {
    contract_version: string;
    tool_name: string;
    input: I;
    tenant_id: string | null;
    user_id: string | null;
    correlation_id: string | null;
}

/**
 * What the gateway is expected to send back. Transports only guarantee a decoded
 * JSON object, so nothing here is trusted until the contract layer has checked it.
 */
export interface ResponseEnvelope {
    contract_version?: unknown;
    ok?: unknown;
    output?: unknown;
    error?: unknown;
}

export interface ToolErrorBody {
    message?: string;
    code?: string;
    details?: unknown;
}

/** Caller-supplied ids propagated into every request envelope. */
export interface InvocationContext {
    tenantId?: string | null;
    userId?: string | null;
    correlationId?: string | null;
}

export interface GatewayConfig {
    mode: TransportMode;
    gatewayUrl: string;
    runtimeArn?: string;
    qualifier: string;
    region: string;
    httpTimeoutMs: number;
    runtimeTimeoutMs: number;
}

export type KnowledgeBaseResult = Record<string, unknown>;

/** `output.results` of search_kb, passed through untouched. */
export type SearchKbResults = KnowledgeBaseResult[] | unknown;
