import { TransportError } from '../errors';
import { isRecord } from '../contract';
import { ResponseEnvelope } from '../types';

export const decodeResponseEnvelope = (raw: string, source: string): ResponseEnvelope => {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new TransportError(`${source} returned a body that is not valid JSON`, { cause: error });
    }

    if (!isRecord(parsed)) {
        throw new TransportError(`${source} returned JSON that is not an object`);
    }
    return parsed;
};
