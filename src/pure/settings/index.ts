export type { GraphDashSettings, GeneratorSettings, LogLevel } from './types'
export {DEFAULT_SETTINGS} from "@/pure/settings/DEFAULT_SETTINGS"
