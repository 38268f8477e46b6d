import { ErrorCode, ERROR_CODES } from '@toolbridge/constants';

export interface ToolGatewayErrorOptions {
    /** The original error, if wrapping a lower-level failure. */
    cause?: unknown;
}

export class ToolGatewayError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options: ToolGatewayErrorOptions = {}) {
        super(message, { cause: options.cause });
        this.name = new.target.name;
        this.code = code;
    }
}

export class ConfigurationError extends ToolGatewayError {
    constructor(message: string, options?: ToolGatewayErrorOptions) {
        super(ERROR_CODES.CONFIGURATION_ERROR, message, options);
    }
}

export class TransportError extends ToolGatewayError {
    /** HTTP status, when the gateway answered with a non-2xx response. */
    readonly status?: number;

    constructor(message: string, options: ToolGatewayErrorOptions & { status?: number } = {}) {
        super(ERROR_CODES.TRANSPORT_ERROR, message, options);
        this.status = options.status;
    }
}

export class ContractMismatch extends ToolGatewayError {
    readonly expected: string;
    readonly received: unknown;

    constructor(expected: string, received: unknown) {
        const shown = received === undefined || received === null ? 'missing' : `'${String(received)}'`;
        super(ERROR_CODES.CONTRACT_MISMATCH, `Tool Gateway contract version mismatch: expected '${expected}', received ${shown}`);
        this.expected = expected;
        this.received = received;
    }
}

export class ToolFailure extends ToolGatewayError {
    /** Error code reported by the gateway, if any. */
    readonly toolCode?: string;
    readonly details?: unknown;

    constructor(message: string, toolCode?: string, details?: unknown) {
        super(ERROR_CODES.TOOL_FAILURE, message);
        this.toolCode = toolCode;
        this.details = details;
    }
}

export class MalformedResponse extends ToolGatewayError {
    readonly field: string;

    constructor(field: string, message = `Malformed tool response: missing '${field}'`) {
        super(ERROR_CODES.MALFORMED_RESPONSE, message);
        this.field = field;
    }
}

export const isToolGatewayError = (error: unknown): error is ToolGatewayError => {
    return error instanceof ToolGatewayError;
};
