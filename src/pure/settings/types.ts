import type { NeighborhoodPolicy } from '@/pure/selection'

/** electron-log level names, most to least severe */
export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly'

export interface GeneratorSettings {
    readonly nodes: number;
    readonly maxEdges: number;
    readonly directed: boolean;
}

export interface GraphDashSettings {
    readonly host: string;
    readonly port: number;
    /** Layout at start-up; unknown names fall back to circle */
    readonly layout: string;
    /** Requested colour attribute; null picks the first categorical attribute */
    readonly colorBy: string | null;
    readonly neighborhoodPolicy: NeighborhoodPolicy;
    /** Lowers the log level to debug and logs every dashboard event */
    readonly debug: boolean;
    readonly logLevel: LogLevel;
    /** File transport target; null keeps logs on the console only */
    readonly logFile: string | null;
    readonly generator: GeneratorSettings;
}
