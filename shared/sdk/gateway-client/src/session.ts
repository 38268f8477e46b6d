import { v4 as uuidv4 } from 'uuid';
import { RUNTIME_SESSION_ID_PREFIX } from '@toolbridge/constants';

/**
 * Fresh id for every AgentCore invocation. A dashless v4 UUID is 32 chars, one
 * short of the runtime's minimum, so the prefix brings it to 40.
 */
export const newRuntimeSessionId = (): string => {
    return RUNTIME_SESSION_ID_PREFIX + uuidv4().replace(/-/g, '');
};
