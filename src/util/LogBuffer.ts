import { LogEntry } from '../interface/Chain'

/**
 * Bounded, append-only ring of recent log entries served by the front door.
 */
export class LogBuffer {
    private readonly capacity: number
    private entries: LogEntry[] = []

    constructor(capacity: number) {
        this.capacity = Math.max(1, Math.floor(capacity))
    }

    push(entry: LogEntry): void {
        this.entries.push(entry)
        if (this.entries.length > this.capacity) {
            this.entries.splice(0, this.entries.length - this.capacity)
        }
    }

    /** Most recent `limit` entries, oldest first */
    recent(limit?: number): LogEntry[] {
        if (limit === undefined) return [...this.entries]
        if (limit <= 0) return []
        return this.entries.slice(-limit)
    }

    clear(): void {
        this.entries = []
    }

    get size(): number {
        return this.entries.length
    }
}
