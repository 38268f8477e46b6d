import { CONTRACT_VERSION, DEFAULTS } from '@toolbridge/constants';
import { ContractMismatch, MalformedResponse, ToolFailure } from './errors';
import { InvocationContext, RequestEnvelope, ResponseEnvelope, ToolErrorBody, ToolInput } from './types';

export const isRecord = (value: unknown): value is Record<string, unknown> => {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
};

export const buildRequestEnvelope = <I extends ToolInput>(
    toolName: string,
    input: I,
    context: InvocationContext = {}
): RequestEnvelope<I> => ({
    contract_version: CONTRACT_VERSION,
    tool_name: toolName,
    input,
    tenant_id: context.tenantId ?? null,
    user_id: context.userId ?? null,
    correlation_id: context.correlationId ?? null
});

export const assertRequestContract = (envelope: RequestEnvelope): void => {
    if (envelope.contract_version !== CONTRACT_VERSION) {
        throw new ContractMismatch(CONTRACT_VERSION, envelope.contract_version);
    }
};

const readToolError = (error: unknown): ToolErrorBody => {
    if (!isRecord(error)) return {};
    return {
        message: typeof error.message === 'string' ? error.message : undefined,
        code: typeof error.code === 'string' ? error.code : undefined,
        details: error.details
    };
};

/**
 * Checks a decoded gateway response and returns `output[resultField]`.
 *
 * Order matters: the contract version is checked first because nothing else in
 * an envelope from an unknown contract can be trusted.
 */
export const unwrapResponse = (body: ResponseEnvelope, resultField: string): unknown => {
    if (body.contract_version !== CONTRACT_VERSION) {
        throw new ContractMismatch(CONTRACT_VERSION, body.contract_version);
    }

    if (body.ok !== true) {
        const error = readToolError(body.error);
        throw new ToolFailure(error.message ?? DEFAULTS.TOOL_FAILURE_MESSAGE, error.code, error.details);
    }

    const output = isRecord(body.output) ? body.output : {};
    const result = output[resultField];
    if (result === undefined || result === null) {
        throw new MalformedResponse(resultField);
    }

    return result;
};
