import type { NodeId } from '@/pure/graph'

/**
 * Bad generator or event arguments. Raised before any work begins.
 */
export type InvalidParameterError = {
    readonly _tag: 'InvalidParameterError';
    readonly parameter: string;
    readonly message: string;
};

/**
 * Graph document rejected during load. No partial graph is ever produced.
 */
export type MalformedGraphError = {
    readonly _tag: 'MalformedGraphError';
    readonly issues: readonly string[];
    readonly message: string;
};

/**
 * An operation referenced a node id absent from the current graph.
 */
export type UnknownNodeError = {
    readonly _tag: 'UnknownNodeError';
    readonly nodeId: NodeId;
    readonly message: string;
};

export type GraphError = InvalidParameterError | MalformedGraphError | UnknownNodeError;

export function createInvalidParameterError(parameter: string, reason: string): InvalidParameterError {
    return {
        _tag: 'InvalidParameterError',
        parameter,
        message: `Invalid value for ${parameter}: ${reason}`
    };
}

export function createMalformedGraphError(issues: readonly string[]): MalformedGraphError {
    return {
        _tag: 'MalformedGraphError',
        issues,
        message: `Malformed graph document: ${issues.join('; ')}`
    };
}

export function createUnknownNodeError(nodeId: NodeId): UnknownNodeError {
    return {
        _tag: 'UnknownNodeError',
        nodeId,
        message: `Unknown node id: ${nodeId}`
    };
}
