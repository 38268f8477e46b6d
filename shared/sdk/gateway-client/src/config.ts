import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import { DEFAULTS, DEFAULT_TRANSPORT_MODE, TRANSPORT_MODES } from '@toolbridge/constants';
import { ConfigurationError } from './errors';
import { GatewayConfig, InvocationContext } from './types';

export type Env = Record<string, string | undefined>;

const ajv = new Ajv({ allErrors: true });
addFormats(ajv);

const configSchema = {
    type: 'object',
    properties: {
        mode: { type: 'string', enum: Object.values(TRANSPORT_MODES) },
        gatewayUrl: { type: 'string', format: 'uri' },
        runtimeArn: { type: 'string', minLength: 1 },
        qualifier: { type: 'string', minLength: 1 },
        region: { type: 'string', minLength: 1 },
        httpTimeoutMs: { type: 'integer', minimum: 1 },
        runtimeTimeoutMs: { type: 'integer', minimum: 1 }
    },
    required: ['mode', 'gatewayUrl', 'qualifier', 'region', 'httpTimeoutMs', 'runtimeTimeoutMs'],
    additionalProperties: false
};

const validateConfig = ajv.compile<GatewayConfig>(configSchema);

// Empty strings count as unset, same as a missing variable.
const read = (env: Env, name: string): string | undefined => {
    const value = env[name]?.trim();
    return value ? value : undefined;
};

// Non-numeric input is passed through as a string so the schema rejects it.
const readNumber = (env: Env, name: string, fallback: number): number | string => {
    const raw = read(env, name);
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : raw;
};

export const assertGatewayConfig = (candidate: unknown): GatewayConfig => {
    if (!validateConfig(candidate)) {
        throw new ConfigurationError(`Invalid Tool Gateway configuration: ${ajv.errorsText(validateConfig.errors, { dataVar: 'config' })}`);
    }
    return candidate;
};

/**
 * Builds the gateway configuration from environment variables.
 *
 * The runtime ARN is optional here: AgentCore mode without it fails on the
 * first call, before anything goes over the wire.
 */
export const loadGatewayConfig = (env: Env = process.env): GatewayConfig => {
    const candidate: Record<string, unknown> = {
        mode: read(env, 'TOOL_GATEWAY_MODE')?.toLowerCase() ?? DEFAULT_TRANSPORT_MODE,
        gatewayUrl: read(env, 'TOOL_GATEWAY_URL') ?? DEFAULTS.GATEWAY_URL,
        qualifier: read(env, 'TOOL_GATEWAY_QUALIFIER') ?? DEFAULTS.QUALIFIER,
        region: read(env, 'AWS_REGION') ?? read(env, 'AWS_DEFAULT_REGION') ?? DEFAULTS.REGION,
        httpTimeoutMs: readNumber(env, 'TOOL_GATEWAY_TIMEOUT_MS', DEFAULTS.HTTP_TIMEOUT_MS),
        runtimeTimeoutMs: readNumber(env, 'TOOL_GATEWAY_RUNTIME_TIMEOUT_MS', DEFAULTS.RUNTIME_TIMEOUT_MS)
    };

    const runtimeArn = read(env, 'TOOL_GATEWAY_RUNTIME_ARN');
    if (runtimeArn) {
        candidate.runtimeArn = runtimeArn;
    }

    return assertGatewayConfig(candidate);
};

export const contextFromEnv = (env: Env = process.env): InvocationContext => ({
    tenantId: read(env, 'TENANT_ID') ?? null,
    userId: read(env, 'USER_ID') ?? null,
    correlationId: read(env, 'CORRELATION_ID') ?? null
});
