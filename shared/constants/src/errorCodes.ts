/**
 * Error Codes
 * 
 * Every failure surfaced by the gateway client carries exactly one of these codes.
 */
export type ErrorCode =
    | 'CONFIGURATION_ERROR'   // Required setting missing or invalid for the selected transport
    | 'TRANSPORT_ERROR'       // Network/stream failure, non-2xx status, timeout or undecodable body
    | 'CONTRACT_MISMATCH'     // Envelope contract version differs from ours
    | 'TOOL_FAILURE'          // Gateway reported ok=false
    | 'MALFORMED_RESPONSE';   // ok=true but the expected result is missing or mis-shaped

export const ERROR_CODES = {
    CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
    TRANSPORT_ERROR: 'TRANSPORT_ERROR',
    CONTRACT_MISMATCH: 'CONTRACT_MISMATCH',
    TOOL_FAILURE: 'TOOL_FAILURE',
    MALFORMED_RESPONSE: 'MALFORMED_RESPONSE'
} as const satisfies Record<ErrorCode, ErrorCode>;
