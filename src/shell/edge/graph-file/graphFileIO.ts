import { promises as fs } from 'fs';
import path from 'path';
import * as E from 'fp-ts/lib/Either.js';
import type { Graph, GraphDocument, MalformedGraphError } from '@/pure/graph';
import { createMalformedGraphError } from '@/pure/graph/errors';
import { getGraphInfo } from '@/pure/graph/graph-operations/getGraphInfo';
import { parseGraphDocument } from '@/pure/graph/graph-document/parseGraphDocument';
import { serializeGraphDocument } from '@/pure/graph/graph-document/serializeGraphDocument';
import { createLogger, type Logger } from '@/shell/edge/logging/logger';

const logger: Logger = createLogger('GraphFile');

/** The file could not be read at all (missing, permissions, a directory). */
export type GraphFileReadError = {
    readonly _tag: 'GraphFileReadError';
    readonly path: string;
    readonly message: string;
};

export type GraphFileError = MalformedGraphError | GraphFileReadError;

function createGraphFileReadError(filePath: string, cause: unknown): GraphFileReadError {
    const reason: string = cause instanceof Error ? cause.message : String(cause);
    return {
        _tag: 'GraphFileReadError',
        path: filePath,
        message: `Could not read graph file ${filePath}: ${reason}`,
    };
}

/**
 * Load a node-link JSON graph. A JSON syntax error counts as a malformed
 * document, not a read failure.
 */
export async function readGraphFile(filePath: string): Promise<E.Either<GraphFileError, Graph>> {
    let data: string;
    try {
        data = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        return E.left(createGraphFileReadError(filePath, error));
    }

    let raw: unknown;
    try {
        raw = JSON.parse(data);
    } catch (error) {
        const reason: string = error instanceof Error ? error.message : String(error);
        return E.left(createMalformedGraphError([`(root): not valid JSON (${reason})`]));
    }

    const graph: E.Either<MalformedGraphError, Graph> = parseGraphDocument(raw);
    if (E.isRight(graph)) {
        logger.info(`Loaded graph from ${filePath}: ${getGraphInfo(graph.right)}`);
    }
    return graph;
}

/** Writes the document with 2-space indentation, creating parent directories. */
export async function writeGraphFile(filePath: string, graph: Graph): Promise<void> {
    const document: GraphDocument = serializeGraphDocument(graph);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(document, null, 2), 'utf-8');
    logger.info(`Saved graph to ${filePath}: ${getGraphInfo(graph)}`);
}
