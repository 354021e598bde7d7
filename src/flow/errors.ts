/**
 * Flow engine errors
 *
 * Every condition a caller can trigger carries a stable `code` so the
 * server layer can report it without matching on messages.
 */

export type FlowErrorCode =
    | 'INVALID_CAPACITY'
    | 'INVALID_ENDPOINTS'
    | 'INVALID_NETWORK'
    | 'NETWORK_NOT_FOUND'
    | 'INVALID_OUTPUT_PATH';

/**
 * Base class for engine errors
 */
export class FlowError extends Error {
    constructor(
        message: string,
        public readonly code: FlowErrorCode
    ) {
        super(message);
        this.name = 'FlowError';
    }
}

/**
 * Thrown when an edge is inserted with a negative, fractional or non-finite capacity
 */
export class InvalidCapacityError extends FlowError {
    constructor(
        public readonly from: string,
        public readonly to: string,
        public readonly capacity: number
    ) {
        super(`Capacity of edge ${from} -> ${to} must be a non-negative integer, got ${capacity}`, 'INVALID_CAPACITY');
        this.name = 'InvalidCapacityError';
    }
}

/**
 * Thrown when a solve is requested with coinciding or unknown endpoints
 */
export class InvalidEndpointsError extends FlowError {
    constructor(
        message: string,
        public readonly source: string,
        public readonly sink: string
    ) {
        super(message, 'INVALID_ENDPOINTS');
        this.name = 'InvalidEndpointsError';
    }
}

export class InvalidNetworkError extends FlowError {
    constructor(message: string) {
        super(message, 'INVALID_NETWORK');
        this.name = 'InvalidNetworkError';
    }
}

export class NetworkNotFoundError extends FlowError {
    constructor(public readonly networkId: string) {
        super(`Network ${networkId} not found`, 'NETWORK_NOT_FOUND');
        this.name = 'NetworkNotFoundError';
    }
}

/**
 * Thrown when a report directory resolves outside the permitted output root
 */
export class InvalidOutputPathError extends FlowError {
    constructor(
        public readonly requested: string,
        public readonly root: string
    ) {
        super(`Output directory ${requested} is outside ${root}`, 'INVALID_OUTPUT_PATH');
        this.name = 'InvalidOutputPathError';
    }
}

export function isFlowError(error: unknown): error is FlowError {
    return error instanceof FlowError;
}
