import axios, { AxiosError, InternalAxiosRequestConfig } from 'axios';
import { buildRequestEnvelope } from '../contract';
import { TransportError } from '../errors';
import { HttpTransport } from './HttpTransport';

type Reply = { status: number; body: string } | Error;

const gatewayStub = (reply: Reply) => {
    const seen: InternalAxiosRequestConfig[] = [];
    const http = axios.create({
        adapter: async (config) => {
            seen.push(config);
            if (reply instanceof Error) throw reply;
            return { data: reply.body, status: reply.status, statusText: String(reply.status), headers: {}, config };
        }
    });
    return { http, seen };
};

const envelope = buildRequestEnvelope('search_kb', { query: 'refund policy' }, { tenantId: 'tenant-1', correlationId: 'corr-1' });
const options = { gatewayUrl: 'http://gateway.test:8080/', timeoutMs: 20000 };

describe('HttpTransport', () => {
    test('POSTs the envelope to /tools/invoke and decodes the body', async () => {
        const reply = { contract_version: 'v1', ok: true, output: { results: [{ id: 'doc1' }] } };
        const { http, seen } = gatewayStub({ status: 200, body: JSON.stringify(reply) });

        const body = await new HttpTransport(options, http).send(envelope);

        expect(body).toEqual(reply);
        expect(seen).toHaveLength(1);
        expect(seen[0].method).toBe('post');
        expect(seen[0].url).toBe('http://gateway.test:8080/tools/invoke');
        expect(seen[0].timeout).toBe(20000);
        expect(JSON.parse(seen[0].data)).toEqual(envelope);
        expect(seen[0].headers.get('X-Correlation-ID')).toBe('corr-1');
        expect(seen[0].headers.get('X-Tenant-ID')).toBe('tenant-1');
    });

    test('omits context headers the envelope does not carry', async () => {
        const { http, seen } = gatewayStub({ status: 200, body: '{"contract_version":"v1","ok":true}' });

        await new HttpTransport(options, http).send(buildRequestEnvelope('search_kb', { query: 'q' }));

        expect(seen[0].headers.has('X-Correlation-ID')).toBe(false);
        expect(seen[0].headers.has('X-Tenant-ID')).toBe(false);
    });

    test('non-2xx status is a transport error carrying the status', async () => {
        const { http } = gatewayStub({ status: 503, body: '{"error":"unavailable"}' });

        const sent = new HttpTransport(options, http).send(envelope);

        await expect(sent).rejects.toBeInstanceOf(TransportError);
        await expect(sent).rejects.toMatchObject({
            code: 'TRANSPORT_ERROR',
            status: 503,
            message: 'Tool Gateway responded with status 503'
        });
    });

    test('timeout is a transport error naming the bound', async () => {
        const { http } = gatewayStub(new AxiosError('timeout of 20000ms exceeded', AxiosError.ECONNABORTED));

        await expect(new HttpTransport(options, http).send(envelope)).rejects.toThrow(
            new TransportError('Tool Gateway request timed out after 20000ms')
        );
    });

    test('connection failure is a transport error', async () => {
        const { http } = gatewayStub(new Error('connect ECONNREFUSED 127.0.0.1:8080'));

        await expect(new HttpTransport(options, http).send(envelope)).rejects.toThrow(
            'Tool Gateway request failed: connect ECONNREFUSED 127.0.0.1:8080'
        );
    });

    test.each([
        ['not JSON', '<html>bad gateway</html>', 'Tool Gateway returned a body that is not valid JSON'],
        ['empty', '', 'Tool Gateway returned a body that is not valid JSON'],
        ['a JSON array', '[1,2]', 'Tool Gateway returned JSON that is not an object'],
        ['JSON null', 'null', 'Tool Gateway returned JSON that is not an object']
    ])('a 200 body that is %s is a transport error', async (_label, raw, message) => {
        const { http } = gatewayStub({ status: 200, body: raw });

        const sent = new HttpTransport(options, http).send(envelope);

        await expect(sent).rejects.toBeInstanceOf(TransportError);
        await expect(sent).rejects.toThrow(message);
    });
});
