import { TOOL_NAMES } from '@toolbridge/constants';
import { assertRequestContract, buildRequestEnvelope, unwrapResponse } from './contract';
import { isToolGatewayError } from './errors';
import { Logger, logger as defaultLogger } from './logger';
import { TransportDependencies, ToolTransport, createTransport } from './transports';
import { GatewayConfig, InvocationContext, SearchKbResults, ToolInput } from './types';

export interface ClientOptions extends TransportDependencies {
    context?: InvocationContext;
    logger?: Logger;
}

export class ToolGatewayClient {
    constructor(
        private readonly transport: ToolTransport,
        private readonly context: InvocationContext = {},
        private readonly logger: Logger = defaultLogger
    ) { }

    static async fromConfig(config: GatewayConfig, options: ClientOptions = {}): Promise<ToolGatewayClient> {
        const transport = await createTransport(config, options);
        return new ToolGatewayClient(transport, options.context, options.logger);
    }

    get mode() {
        return this.transport.mode;
    }

    /**
     * Calls a gateway tool and returns `output[resultField]` from a verified
     * response. Errors are logged and rethrown as-is; nothing is retried.
     */
    async invokeTool(toolName: string, input: ToolInput, resultField: string): Promise<unknown> {
        const envelope = buildRequestEnvelope(toolName, input, this.context);
        const meta = { tool_name: toolName, mode: this.transport.mode, correlation_id: envelope.correlation_id };
        const startedAt = Date.now();

        try {
            assertRequestContract(envelope);
            this.logger.debug('Dispatching tool call', meta);

            const body = await this.transport.send(envelope);
            const result = unwrapResponse(body, resultField);

            this.logger.info('Tool call completed', { ...meta, duration_ms: Date.now() - startedAt });
            return result;
        } catch (error) {
            this.logger.warn('Tool call failed', {
                ...meta,
                duration_ms: Date.now() - startedAt,
                code: isToolGatewayError(error) ? error.code : 'UNKNOWN',
                error: error instanceof Error ? error.message : String(error)
            });
            throw error;
        }
    }

    /**
     * Returns `output.results` exactly as the gateway sent it: normally an
     * ordered array of result records, but its shape is the gateway's to decide.
     */
    async searchKb(query: string): Promise<SearchKbResults> {
        return this.invokeTool(TOOL_NAMES.SEARCH_KB, { query }, 'results');
    }
}
