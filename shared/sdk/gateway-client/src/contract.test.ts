import { assertRequestContract, buildRequestEnvelope, unwrapResponse } from './contract';
import { ContractMismatch, MalformedResponse, ToolFailure } from './errors';

describe('buildRequestEnvelope', () => {
    test('stamps the contract version and carries the context ids', () => {
        const envelope = buildRequestEnvelope('search_kb', { query: 'refund policy' }, {
            tenantId: 'tenant-1',
            userId: 'user-1',
            correlationId: 'corr-1'
        });

        expect(envelope).toEqual({
            contract_version: 'v1',
            tool_name: 'search_kb',
            input: { query: 'refund policy' },
            tenant_id: 'tenant-1',
            user_id: 'user-1',
            correlation_id: 'corr-1'
        });
    });

    test('absent context ids become null', () => {
        const envelope = buildRequestEnvelope('search_kb', { query: 'q' });

        expect(envelope.tenant_id).toBeNull();
        expect(envelope.user_id).toBeNull();
        expect(envelope.correlation_id).toBeNull();
    });
});

describe('assertRequestContract', () => {
    test('rejects an outgoing envelope with a foreign version', () => {
        const envelope = { ...buildRequestEnvelope('search_kb', { query: 'q' }), contract_version: 'v0' };

        expect(() => assertRequestContract(envelope)).toThrow(ContractMismatch);
    });
});

describe('unwrapResponse', () => {
    test('returns the result field unchanged', () => {
        const results = [{ id: 'doc1' }, { id: 'doc2', score: 0.4 }];

        expect(unwrapResponse({ contract_version: 'v1', ok: true, output: { results } }, 'results')).toBe(results);
    });

    test('version mismatch wins over an otherwise valid success', () => {
        const body = { contract_version: 'v2', ok: true, output: { results: [{ id: 'doc1' }] } };

        expect(() => unwrapResponse(body, 'results')).toThrow(ContractMismatch);
        expect(() => unwrapResponse(body, 'results')).toThrow("Tool Gateway contract version mismatch: expected 'v1', received 'v2'");
    });

    test('version mismatch wins over a tool failure', () => {
        const body = { contract_version: 'v2', ok: false, error: { message: 'boom' } };

        expect(() => unwrapResponse(body, 'results')).toThrow(ContractMismatch);
    });

    test('missing version is a mismatch', () => {
        let caught: unknown;
        try {
            unwrapResponse({ ok: true, output: { results: [] } }, 'results');
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ContractMismatch);
        expect(caught).toMatchObject({ code: 'CONTRACT_MISMATCH', expected: 'v1', received: undefined });
        expect(caught).toMatchObject({ message: "Tool Gateway contract version mismatch: expected 'v1', received missing" });
    });

    test('ok=false carries the remote message and code', () => {
        let caught: unknown;
        try {
            unwrapResponse({ contract_version: 'v1', ok: false, error: { message: 'index offline', code: 'KB_UNAVAILABLE', details: { shard: 3 } } }, 'results');
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ToolFailure);
        expect(caught).toMatchObject({ message: 'index offline', toolCode: 'KB_UNAVAILABLE', details: { shard: 3 } });
    });

    test.each([
        ['error is absent', { contract_version: 'v1', ok: false }],
        ['error is null', { contract_version: 'v1', ok: false, error: null }],
        ['message is not a string', { contract_version: 'v1', ok: false, error: { message: 42 } }],
        ['ok is absent', { contract_version: 'v1', output: { results: [] } }]
    ])('falls back to the generic message when %s', (_label, body) => {
        expect(() => unwrapResponse(body, 'results')).toThrow(new ToolFailure('Tool call failed'));
    });

    test('a truthy ok that is not true is a tool failure', () => {
        const body = { contract_version: 'v1', ok: 1, output: { results: [{ id: 'doc1' }] } };

        expect(() => unwrapResponse(body, 'results')).toThrow(new ToolFailure('Tool call failed'));
    });

    test.each([
        ['output is absent', { contract_version: 'v1', ok: true }],
        ['output is null', { contract_version: 'v1', ok: true, output: null }],
        ['results is absent', { contract_version: 'v1', ok: true, output: { hits: [] } }],
        ['results is null', { contract_version: 'v1', ok: true, output: { results: null } }]
    ])('ok=true is malformed when %s', (_label, body) => {
        expect(() => unwrapResponse(body, 'results')).toThrow(MalformedResponse);
        expect(() => unwrapResponse(body, 'results')).toThrow("Malformed tool response: missing 'results'");
    });

    test('an empty result list is still a success', () => {
        expect(unwrapResponse({ contract_version: 'v1', ok: true, output: { results: [] } }, 'results')).toEqual([]);
    });
});
