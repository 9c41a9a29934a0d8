import type { GraphDashSettings } from '@/pure/settings/types'

export const DEFAULT_SETTINGS: GraphDashSettings = {
    host: '127.0.0.1',
    port: 8050,
    layout: 'circle',
    colorBy: null,
    neighborhoodPolicy: 'both',
    debug: false,
    logLevel: 'info',
    logFile: null,
    generator: {
        nodes: 10,
        maxEdges: 3,
        directed: true,
    },
}
