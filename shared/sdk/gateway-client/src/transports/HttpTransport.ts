import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { GATEWAY_INVOKE_PATH, HTTP_HEADERS, TRANSPORT_MODES } from '@toolbridge/constants';
import { TransportError } from '../errors';
import { RequestEnvelope, ResponseEnvelope } from '../types';
import { decodeResponseEnvelope } from './decode';
import { ToolTransport } from './ToolTransport';

export interface HttpTransportOptions {
    gatewayUrl: string;
    timeoutMs: number;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export class HttpTransport implements ToolTransport {
    readonly mode = TRANSPORT_MODES.HTTP;
    private readonly url: string;

    constructor(private readonly options: HttpTransportOptions, private readonly http: AxiosInstance = axios.create()) {
        this.url = `${options.gatewayUrl.replace(/\/+$/, '')}${GATEWAY_INVOKE_PATH}`;
    }

    async send(envelope: RequestEnvelope): Promise<ResponseEnvelope> {
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (envelope.correlation_id) {
            headers[HTTP_HEADERS.CORRELATION_ID] = envelope.correlation_id;
        }
        if (envelope.tenant_id) {
            headers[HTTP_HEADERS.TENANT_ID] = envelope.tenant_id;
        }

        let response: AxiosResponse<string>;
        try {
            // Status and JSON decoding are handled below so every failure maps to TransportError.
            response = await this.http.post<string>(this.url, envelope, {
                headers,
                timeout: this.options.timeoutMs,
                responseType: 'text',
                validateStatus: () => true
            });
        } catch (error) {
            if (axios.isAxiosError(error) && error.code && TIMEOUT_CODES.has(error.code)) {
                throw new TransportError(`Tool Gateway request timed out after ${this.options.timeoutMs}ms`, { cause: error });
            }
            const reason = error instanceof Error ? error.message : String(error);
            throw new TransportError(`Tool Gateway request failed: ${reason}`, { cause: error });
        }

        if (response.status < 200 || response.status >= 300) {
            throw new TransportError(`Tool Gateway responded with status ${response.status}`, { status: response.status });
        }

        return decodeResponseEnvelope(response.data, 'Tool Gateway');
    }
}
