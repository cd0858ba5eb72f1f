import ms from 'ms'

export default class Util {

    async wait(milliseconds: number): Promise<void> {
        if (milliseconds <= 0) return
        return new Promise<void>((resolve) => {
            setTimeout(resolve, milliseconds)
        })
    }

    /**
     * Accepts milliseconds as a number, or a duration string such as "30s" / "5min".
     */
    stringToMs(input: string | number): number {
        if (typeof input === 'number') {
            if (!Number.isFinite(input) || input < 0) throw new Error(`Invalid duration: ${input}`)
            return input
        }
        const trimmed = input.trim()
        if (/^\d+$/.test(trimmed)) return Number(trimmed)
        const milli = ms(trimmed)
        if (typeof milli !== 'number' || Number.isNaN(milli) || milli < 0) {
            throw new Error(`Invalid duration: ${input}`)
        }
        return milli
    }

    truncate(text: string, max: number): string {
        return text.length > max ? text.slice(0, max) : text
    }

    /**
     * Runs `task` over `items` with at most `limit` in flight. Results keep the input order.
     */
    async mapWithConcurrency<T, R>(items: readonly T[], limit: number, task: (item: T, index: number) => Promise<R>): Promise<R[]> {
        const results = new Array<R>(items.length)
        const workers = Math.max(1, Math.min(Math.floor(limit) || 1, items.length))
        const queue = items.map((item, index) => ({ item, index }))

        const worker = async () => {
            for (let job = queue.shift(); job; job = queue.shift()) {
                results[job.index] = await task(job.item, job.index)
            }
        }

        await Promise.all(Array.from({ length: workers }, () => worker()))
        return results
    }

    /** `scheme://host[:port]` of a URL, or null when it does not parse */
    origin(url: string): string | null {
        try {
            return new URL(url).origin
        } catch {
            return null
        }
    }
}
