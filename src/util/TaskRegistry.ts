import { ChainResult, TaskRecord } from '../interface/Chain'

/**
 * Status of background solve tasks, keyed by task id. Each task is only written by the
 * runner that created it.
 */
export class TaskRegistry {
    private readonly tasks = new Map<string, TaskRecord>()
    private readonly timers = new Set<NodeJS.Timeout>()
    private readonly retentionMs: number

    constructor(retentionMs: number) {
        this.retentionMs = retentionMs
    }

    create(url: string, now: Date = new Date()): TaskRecord {
        const id = `quiz_${now.getTime()}_${Math.random().toString(36).slice(2, 8)}`
        const task: TaskRecord = { id, url, status: 'processing', startedAt: now.toISOString() }
        this.tasks.set(id, task)
        return task
    }

    markSolving(id: string): void {
        const task = this.tasks.get(id)
        if (task) task.status = 'solving'
    }

    /** Records the chain outcome. Only a `Failed` chain marks the task failed. */
    finish(id: string, result: ChainResult, now: Date = new Date()): void {
        const task = this.tasks.get(id)
        if (!task) return
        task.chainStatus = result.status
        task.questionCount = result.questionCount
        if (result.status === 'Failed') {
            task.status = 'failed'
            task.error = result.error
            task.failedAt = now.toISOString()
        } else {
            task.status = 'completed'
            task.completedAt = now.toISOString()
        }
        this.scheduleRemoval(id)
    }

    fail(id: string, message: string, now: Date = new Date()): void {
        const task = this.tasks.get(id)
        if (!task) return
        task.status = 'failed'
        task.error = message
        task.failedAt = now.toISOString()
        this.scheduleRemoval(id)
    }

    get(id: string): TaskRecord | undefined {
        const task = this.tasks.get(id)
        return task ? { ...task } : undefined
    }

    snapshot(): Record<string, TaskRecord> {
        const out: Record<string, TaskRecord> = {}
        for (const [id, task] of this.tasks) out[id] = { ...task }
        return out
    }

    get size(): number {
        return this.tasks.size
    }

    /** Cancels pending removals; called on shutdown */
    dispose(): void {
        for (const timer of this.timers) clearTimeout(timer)
        this.timers.clear()
    }

    private scheduleRemoval(id: string): void {
        const timer = setTimeout(() => {
            this.timers.delete(timer)
            this.tasks.delete(id)
        }, this.retentionMs)
        timer.unref()
        this.timers.add(timer)
    }
}
