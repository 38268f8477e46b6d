import { AxiosInstance } from 'axios';
import { TRANSPORT_MODES } from '@toolbridge/constants';
import { GatewayConfig } from '../types';
import { HttpTransport } from './HttpTransport';
import { ToolTransport } from './ToolTransport';
import type { AgentRuntimeInvoker } from './bedrockInvoker';

export interface TransportDependencies {
    http?: AxiosInstance;
    runtimeInvoker?: AgentRuntimeInvoker;
}

export const createTransport = async (config: GatewayConfig, deps: TransportDependencies = {}): Promise<ToolTransport> => {
    switch (config.mode) {
        case TRANSPORT_MODES.AGENTCORE: {
            // Loaded on demand so HTTP users never pull in the AWS SDK.
            const { AgentRuntimeTransport } = await import('./AgentRuntimeTransport');
            return new AgentRuntimeTransport({
                runtimeArn: config.runtimeArn,
                qualifier: config.qualifier,
                region: config.region,
                timeoutMs: config.runtimeTimeoutMs
            }, deps.runtimeInvoker);
        }
        case TRANSPORT_MODES.HTTP:
            return new HttpTransport({
                gatewayUrl: config.gatewayUrl,
                timeoutMs: config.httpTimeoutMs
            }, deps.http);
    }
};

export * from './ToolTransport';
export * from './HttpTransport';
export type { AgentRuntimeInvoker, RuntimeInvocation, RuntimeResponseStream } from './bedrockInvoker';
