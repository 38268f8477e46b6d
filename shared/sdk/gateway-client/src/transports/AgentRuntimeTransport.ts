import { TRANSPORT_MODES } from '@toolbridge/constants';
import { ConfigurationError, TransportError, isToolGatewayError } from '../errors';
import { newRuntimeSessionId } from '../session';
import { RequestEnvelope, ResponseEnvelope } from '../types';
import { AgentRuntimeInvoker, BedrockAgentRuntimeInvoker, RuntimeInvocation, RuntimeResponseStream } from './bedrockInvoker';
import { decodeResponseEnvelope } from './decode';
import { ToolTransport } from './ToolTransport';

export interface AgentRuntimeTransportOptions {
    runtimeArn?: string;
    qualifier: string;
    region: string;
    timeoutMs: number;
}

const reasonOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Proxies the gateway invoke contract through Bedrock AgentCore InvokeAgentRuntime.
 * The tool-gateway container accepts the same JSON envelope on its /invocations mapping.
 */
export class AgentRuntimeTransport implements ToolTransport {
    readonly mode = TRANSPORT_MODES.AGENTCORE;
    private invoker?: AgentRuntimeInvoker;

    constructor(private readonly options: AgentRuntimeTransportOptions, invoker?: AgentRuntimeInvoker) {
        this.invoker = invoker;
    }

    async send(envelope: RequestEnvelope): Promise<ResponseEnvelope> {
        const { runtimeArn, qualifier, timeoutMs } = this.options;
        if (!runtimeArn) {
            throw new ConfigurationError('TOOL_GATEWAY_RUNTIME_ARN is required when TOOL_GATEWAY_MODE=agentcore');
        }

        const request: RuntimeInvocation = {
            agentRuntimeArn: runtimeArn,
            runtimeSessionId: newRuntimeSessionId(),
            payload: Buffer.from(JSON.stringify(envelope), 'utf8'),
            qualifier
        };

        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;
        const deadline = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                controller.abort();
                reject(new TransportError(`Agent runtime invocation timed out after ${timeoutMs}ms`));
            }, timeoutMs);
        });

        let raw: string;
        try {
            raw = await Promise.race([this.invokeAndRead(request, controller.signal), deadline]);
        } finally {
            clearTimeout(timer);
        }

        return decodeResponseEnvelope(raw, 'Agent runtime');
    }

    private async invokeAndRead(request: RuntimeInvocation, signal: AbortSignal): Promise<string> {
        let stream: RuntimeResponseStream;
        try {
            stream = await this.getInvoker().invoke(request, signal);
        } catch (error) {
            if (isToolGatewayError(error)) throw error;
            throw new TransportError(`Agent runtime invocation failed: ${reasonOf(error)}`, { cause: error });
        }

        try {
            return await stream.transformToString();
        } catch (error) {
            throw new TransportError(`Failed to read agent runtime response stream: ${reasonOf(error)}`, { cause: error });
        }
    }

    // The SDK client is only built once a call actually needs it.
    private getInvoker(): AgentRuntimeInvoker {
        if (!this.invoker) {
            this.invoker = new BedrockAgentRuntimeInvoker(this.options.region);
        }
        return this.invoker;
    }
}
