import { parseArgs } from 'util'
import type { FastifyInstance } from 'fastify'
import * as E from 'fp-ts/lib/Either.js'
import type { Graph, InvalidParameterError } from '@/pure/graph'
import { createInvalidParameterError } from '@/pure/graph/errors'
import { isNeighborhoodPolicy } from '@/pure/selection'
import type { GraphDashSettings } from '@/pure/settings'
import type { GraphFileError } from '@/shell/edge/graph-file/graphFileIO'
import { configureLogging, createLogger, type Logger } from '@/shell/edge/logging/logger'
import { loadSettings, type SettingsError } from '@/shell/edge/settings/settings_IO'
import { generateSampleGraphCommand } from './generateSampleGraphCommand'
import { runDashboardCommand } from './runDashboardCommand'

const logger: Logger = createLogger('CLI')

export const USAGE: string = `Usage:
  generate-sample-graph <output> [--nodes N|-n N] [--max-edges M|-e M] [--directed|--undirected] [--seed S] [--config FILE]
  run-dashboard <input> [--layout L] [--color-by ATTR] [--policy successors|predecessors|both] [--port P|-p P] [--host H] [--debug] [--config FILE]`

export interface CliResult {
    readonly exitCode: number
    /** Set when run-dashboard started; the caller owns shutdown */
    readonly server?: FastifyInstance
}

const FAILURE: CliResult = { exitCode: 1 }

// ============================================================================
// ARGUMENT HELPERS
// ============================================================================

function parseIntegerOption(name: string, raw: string | undefined): E.Either<InvalidParameterError, number | undefined> {
    if (raw === undefined) {
        return E.right(undefined)
    }
    if (!/^-?\d+$/.test(raw)) {
        return E.left(createInvalidParameterError(name, `expected an integer, got "${raw}"`))
    }
    return E.right(Number(raw))
}

function singlePositional(command: string, positionals: readonly string[]): E.Either<InvalidParameterError, string> {
    if (positionals.length !== 1) {
        return E.left(createInvalidParameterError(command, `expected exactly one path argument, got ${positionals.length}`))
    }
    return E.right(positionals[0])
}

async function settingsFrom(configPath: string | undefined): Promise<GraphDashSettings | undefined> {
    const settings: E.Either<SettingsError, GraphDashSettings> = await loadSettings(configPath)
    if (E.isLeft(settings)) {
        logger.error(settings.left.message)
        return undefined
    }
    return settings.right
}

function reportError(error: InvalidParameterError | GraphFileError): CliResult {
    logger.error(error.message)
    return FAILURE
}

// ============================================================================
// COMMANDS
// ============================================================================

async function generateSampleGraph(args: readonly string[]): Promise<CliResult> {
    const { values, positionals } = parseArgs({
        args: [...args],
        allowPositionals: true,
        options: {
            nodes: { type: 'string', short: 'n' },
            'max-edges': { type: 'string', short: 'e' },
            directed: { type: 'boolean' },
            undirected: { type: 'boolean' },
            seed: { type: 'string' },
            config: { type: 'string' },
        },
    })

    const settings: GraphDashSettings | undefined = await settingsFrom(values.config)
    if (settings === undefined) {
        return FAILURE
    }
    configureLogging(settings)

    const output: E.Either<InvalidParameterError, string> = singlePositional('output', positionals)
    if (E.isLeft(output)) {
        return reportError(output.left)
    }
    const nodes: E.Either<InvalidParameterError, number | undefined> = parseIntegerOption('nodes', values.nodes)
    if (E.isLeft(nodes)) {
        return reportError(nodes.left)
    }
    const maxEdges: E.Either<InvalidParameterError, number | undefined> = parseIntegerOption('max-edges', values['max-edges'])
    if (E.isLeft(maxEdges)) {
        return reportError(maxEdges.left)
    }
    const seed: E.Either<InvalidParameterError, number | undefined> = parseIntegerOption('seed', values.seed)
    if (E.isLeft(seed)) {
        return reportError(seed.left)
    }
    if (values.directed === true && values.undirected === true) {
        return reportError(createInvalidParameterError('directed', '--directed and --undirected are mutually exclusive'))
    }

    const directed: boolean = values.undirected === true ? false : values.directed === true ? true : settings.generator.directed
    const result: E.Either<InvalidParameterError, Graph> = await generateSampleGraphCommand({
        output: output.right,
        nodes: nodes.right ?? settings.generator.nodes,
        maxEdges: maxEdges.right ?? settings.generator.maxEdges,
        directed,
        seed: seed.right,
    })
    if (E.isLeft(result)) {
        return reportError(result.left)
    }
    return { exitCode: 0 }
}

async function runDashboard(args: readonly string[]): Promise<CliResult> {
    const { values, positionals } = parseArgs({
        args: [...args],
        allowPositionals: true,
        options: {
            layout: { type: 'string' },
            'color-by': { type: 'string' },
            policy: { type: 'string' },
            port: { type: 'string', short: 'p' },
            host: { type: 'string' },
            debug: { type: 'boolean' },
            config: { type: 'string' },
        },
    })

    const settings: GraphDashSettings | undefined = await settingsFrom(values.config)
    if (settings === undefined) {
        return FAILURE
    }
    const debug: boolean = values.debug === true || settings.debug
    configureLogging({ ...settings, debug })

    const input: E.Either<InvalidParameterError, string> = singlePositional('input', positionals)
    if (E.isLeft(input)) {
        return reportError(input.left)
    }
    const port: E.Either<InvalidParameterError, number | undefined> = parseIntegerOption('port', values.port)
    if (E.isLeft(port)) {
        return reportError(port.left)
    }
    const policy: string = values.policy ?? settings.neighborhoodPolicy
    if (!isNeighborhoodPolicy(policy)) {
        return reportError(createInvalidParameterError('policy', `expected successors, predecessors or both, got "${policy}"`))
    }

    const started: E.Either<GraphFileError, FastifyInstance> = await runDashboardCommand({
        input: input.right,
        layout: values.layout ?? settings.layout,
        colorBy: values['color-by'] ?? settings.colorBy,
        neighborhoodPolicy: policy,
        port: port.right ?? settings.port,
        host: values.host ?? settings.host,
        debug,
    })
    if (E.isLeft(started)) {
        return reportError(started.left)
    }
    return { exitCode: 0, server: started.right }
}

/**
 * Dispatch `<command> ...args`. Errors are logged and turned into exit
 * code 1; nothing is thrown for bad input.
 */
export async function runCli(argv: readonly string[]): Promise<CliResult> {
    const [command, ...args] = argv
    try {
        switch (command) {
            case 'generate-sample-graph':
                return await generateSampleGraph(args)
            case 'run-dashboard':
                return await runDashboard(args)
            case '--help':
            case '-h':
                console.log(USAGE)
                return { exitCode: 0 }
            default:
                logger.error(`Unknown command: ${command ?? '(none)'}`)
                console.log(USAGE)
                return FAILURE
        }
    } catch (error) {
        // parseArgs rejects unknown or malformed flags by throwing
        logger.error(error instanceof Error ? error.message : String(error))
        return FAILURE
    }
}
