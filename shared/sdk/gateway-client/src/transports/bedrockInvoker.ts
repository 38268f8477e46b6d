import { BedrockAgentCoreClient, InvokeAgentRuntimeCommand } from '@aws-sdk/client-bedrock-agentcore';
import { TransportError } from '../errors';

export interface RuntimeInvocation {
    agentRuntimeArn: string;
    runtimeSessionId: string;
    payload: Uint8Array;
    qualifier: string;
}

/** The part of the SDK's streaming body the transport reads. */
export interface RuntimeResponseStream {
    transformToString(encoding?: string): Promise<string>;
}

export interface AgentRuntimeInvoker {
    invoke(request: RuntimeInvocation, signal: AbortSignal): Promise<RuntimeResponseStream>;
}

export class BedrockAgentRuntimeInvoker implements AgentRuntimeInvoker {
    private readonly client: BedrockAgentCoreClient;

    constructor(region: string) {
        this.client = new BedrockAgentCoreClient({ region });
    }

    async invoke(request: RuntimeInvocation, signal: AbortSignal): Promise<RuntimeResponseStream> {
        const output = await this.client.send(new InvokeAgentRuntimeCommand({
            agentRuntimeArn: request.agentRuntimeArn,
            runtimeSessionId: request.runtimeSessionId,
            payload: request.payload,
            qualifier: request.qualifier
        }), { abortSignal: signal });

        if (!output.response) {
            throw new TransportError('Agent runtime returned no response stream');
        }
        return output.response;
    }
}
