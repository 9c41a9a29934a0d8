// Library entry: pure core plus the Node-side helpers the CLI is built from

export * from '@/pure/graph'
export { generateSampleGraph, NODE_CATEGORIES, EDGE_TYPES } from '@/pure/graph/generator/generateSampleGraph'
export { seededRandom } from '@/pure/graph/generator/seededRandom'
export * from '@/pure/selection'
export * from '@/pure/filter'
export * from '@/pure/categorical'
export * from '@/pure/layouts'
export * from '@/pure/scene'
export * from '@/pure/session'
export * from '@/pure/settings'

export { readGraphFile, writeGraphFile } from '@/shell/edge/graph-file/graphFileIO'
export type { GraphFileError, GraphFileReadError } from '@/shell/edge/graph-file/graphFileIO'
export { loadSettings } from '@/shell/edge/settings/settings_IO'
export type { SettingsError } from '@/shell/edge/settings/settings_IO'
export { configureLogging, createLogger } from '@/shell/edge/logging/logger'
export { createDashboardServer, createSessionStore, startDashboardServer } from '@/shell/edge/server/dashboardServer'
export { sceneToElements, getDashboardStylesheet } from '@/shell/UI/cytoscape-graph-ui'
