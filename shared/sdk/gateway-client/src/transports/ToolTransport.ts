import { TransportMode } from '@toolbridge/constants';
import { RequestEnvelope, ResponseEnvelope } from '../types';

/**
 * Sends one request envelope to the Tool Gateway and returns the decoded,
 * not yet validated, response envelope. Implementations never retry.
 */
export interface ToolTransport {
    readonly mode: TransportMode;
    send(envelope: RequestEnvelope): Promise<ResponseEnvelope>;
}
