import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import * as E from 'fp-ts/lib/Either.js';
import type { Graph, GraphError, InvalidParameterError, NodeId, UnknownNodeError } from '@/pure/graph';
import { graphsAreEqual } from '@/pure/graph/graph-operations/graphsAreEqual';
import { getNeighbors } from '@/pure/graph/graph-operations/getNeighbors';
import { generateSampleGraph } from '@/pure/graph/generator/generateSampleGraph';
import { createDashboardSession, handleDashboardEvent, renderSession, type DashboardSession } from '@/pure/session';
import { readGraphFile, writeGraphFile, type GraphFileError } from './graphFileIO';

async function readOrThrow(filePath: string): Promise<Graph> {
    const result: E.Either<GraphFileError, Graph> = await readGraphFile(filePath);
    if (E.isLeft(result)) {
        throw new Error(result.left.message);
    }
    return result.right;
}

function generateOrThrow(nodeCount: number, maxOutDegree: number, directed: boolean, seed: number): Graph {
    const result: E.Either<InvalidParameterError, Graph> = generateSampleGraph(nodeCount, maxOutDegree, directed, seed);
    if (E.isLeft(result)) {
        throw new Error(result.left.message);
    }
    return result.right;
}

describe('graphFileIO', () => {
    let tempDir: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'graph-dash-file-'));
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should write into missing directories and read back an equal graph', async () => {
        const graph: Graph = generateOrThrow(15, 4, false, 3);
        const filePath: string = path.join(tempDir, 'nested', 'dir', 'graph.json');

        await writeGraphFile(filePath, graph);

        expect(graphsAreEqual(await readOrThrow(filePath), graph)).toBe(true);
    });

    it('should indent the written JSON by two spaces', async () => {
        const filePath: string = path.join(tempDir, 'one.json');
        await writeGraphFile(filePath, generateOrThrow(1, 0, true, 1));

        const text: string = await fs.readFile(filePath, 'utf-8');
        expect(text.startsWith('{\n  "directed": true,\n  "multigraph": false,')).toBe(true);
    });

    it('should report a missing file as a read error', async () => {
        const result: E.Either<GraphFileError, Graph> = await readGraphFile(path.join(tempDir, 'absent.json'));

        expect(E.isLeft(result) && result.left._tag).toBe('GraphFileReadError');
    });

    it('should report invalid JSON as a malformed document', async () => {
        const filePath: string = path.join(tempDir, 'broken.json');
        await fs.writeFile(filePath, '{"directed": true, "nodes": [');

        const result: E.Either<GraphFileError, Graph> = await readGraphFile(filePath);

        expect(E.isLeft(result) && result.left._tag).toBe('MalformedGraphError');
    });

    it('should report a dangling edge as a malformed document', async () => {
        const filePath: string = path.join(tempDir, 'dangling.json');
        await fs.writeFile(filePath, JSON.stringify({
            directed: true,
            nodes: [{ id: 'a' }],
            edges: [{ source: 'a', target: 'b' }],
        }));

        const result: E.Either<GraphFileError, Graph> = await readGraphFile(filePath);

        expect(E.isLeft(result) && result.left.message)
            .toBe('Malformed graph document: edge 0 references unknown target "b"');
    });

    it('should highlight node 0 and its successors after a seeded save and load', async () => {
        const generated: Graph = generateOrThrow(20, 5, true, 42);
        const filePath: string = path.join(tempDir, 'sample.json');
        await writeGraphFile(filePath, generated);

        const loaded: Graph = await readOrThrow(filePath);
        expect(graphsAreEqual(loaded, generated)).toBe(true);
        expect(loaded.edges.map(edge => [edge.source, edge.target]))
            .toEqual(generated.edges.map(edge => [edge.source, edge.target]));

        const session: DashboardSession = createDashboardSession(loaded, { neighborhoodPolicy: 'successors' });
        const clicked: E.Either<GraphError, DashboardSession> = handleDashboardEvent(session, { type: 'NodeClicked', nodeId: '0' });
        if (E.isLeft(clicked)) {
            throw new Error(clicked.left.message);
        }

        const outNeighbors: E.Either<UnknownNodeError, ReadonlySet<NodeId>> = getNeighbors(generated, '0', 'out');
        if (E.isLeft(outNeighbors)) {
            throw new Error(outNeighbors.left.message);
        }
        const expected: ReadonlySet<NodeId> = new Set(['0', ...outNeighbors.right]);
        const expectedFromEdges: ReadonlySet<NodeId> = new Set([
            '0',
            ...generated.edges.filter(edge => edge.source === '0').map(edge => edge.target),
        ]);

        const highlighted: ReadonlySet<NodeId> = new Set(
            renderSession(clicked.right).scene.nodes.filter(node => node.highlighted).map(node => node.id)
        );
        expect(highlighted).toEqual(expected);
        expect(highlighted).toEqual(expectedFromEdges);
    });
});
