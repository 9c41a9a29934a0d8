// Entry point: tsx src/cli/main.ts <command> [options]

import { createLogger, type Logger } from '@/shell/edge/logging/logger'
import { runCli, type CliResult } from './runCli'

const logger: Logger = createLogger('CLI')

async function main(): Promise<void> {
    const result: CliResult = await runCli(process.argv.slice(2))
    process.exitCode = result.exitCode

    const server: CliResult['server'] = result.server
    if (server !== undefined) {
        process.once('SIGINT', () => {
            server.close().then(
                () => logger.info('Dashboard stopped'),
                (error: unknown) => logger.error('Failed to stop dashboard:', error)
            )
        })
    }
}

main().catch((error: unknown) => {
    logger.error('Unexpected failure:', error)
    process.exitCode = 1
})
