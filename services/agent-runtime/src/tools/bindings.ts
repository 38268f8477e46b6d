import { TOOL_NAMES, ToolName } from '@toolbridge/constants';
import {
    Env,
    SearchKbResults,
    ToolGatewayClient,
    TransportDependencies,
    contextFromEnv,
    loadGatewayConfig
} from '@toolbridge/gateway-client';

/**
 * Calls the Tool Gateway search_kb tool.
 * Works in two modes, picked by TOOL_GATEWAY_MODE:
 *   - http (local): POST {TOOL_GATEWAY_URL}/tools/invoke
 *   - agentcore: InvokeAgentRuntime -> Tool Gateway hosted runtime
 */
export const searchKb = async (
    query: string,
    env: Env = process.env,
    deps: TransportDependencies = {}
): Promise<SearchKbResults> => {
    const client = await ToolGatewayClient.fromConfig(loadGatewayConfig(env), {
        ...deps,
        context: contextFromEnv(env)
    });
    return client.searchKb(query);
};

export interface ToolBinding {
    name: ToolName;
    description: string;
    run(input: Record<string, unknown>, env?: Env): Promise<unknown>;
}

export const TOOL_BINDINGS: Record<ToolName, ToolBinding> = {
    search_kb: {
        name: TOOL_NAMES.SEARCH_KB,
        description: 'Search the knowledge base and return the matching documents in rank order.',
        run: async (input, env) => {
            if (typeof input.query !== 'string') {
                throw new TypeError(`${TOOL_NAMES.SEARCH_KB} requires a string 'query' argument`);
            }
            return searchKb(input.query, env);
        }
    }
};

export const getToolBinding = (name: string): ToolBinding | undefined => {
    return Object.values(TOOL_BINDINGS).find((binding) => binding.name === name);
};
