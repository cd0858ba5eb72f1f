export type ChainStatus = 'Running' | 'Completed' | 'Exhausted' | 'Failed' | 'TimedOut'

export type TerminalChainStatus = Exclude<ChainStatus, 'Running'>

export interface ChainState {
    currentUrl: string
    questionCount: number
    startTime: number
    deadlineSeconds: number
    status: ChainStatus
}

export interface ChainResult {
    status: TerminalChainStatus
    questionCount: number
    elapsedMs: number
    lastUrl: string
    error?: string
}

export type LogLevel = 'info' | 'warning' | 'error'

export interface LogEntry {
    timestamp: string
    message: string
    level: LogLevel
    scope: string
    title: string
}

export type TaskStatus = 'processing' | 'solving' | 'completed' | 'failed'

export interface TaskRecord {
    id: string
    url: string
    status: TaskStatus
    startedAt: string
    completedAt?: string
    failedAt?: string
    error?: string
    chainStatus?: TerminalChainStatus
    questionCount?: number
}
