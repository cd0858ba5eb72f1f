import { spawn } from 'child_process'

export interface ProcessOptions {
    cwd?: string
    env: NodeJS.ProcessEnv
    /** Written to stdin, which is then closed */
    input?: Buffer
    timeout: number
}

export type ProcessResult =
    | { kind: 'exit', exitCode: number | null, stdout: Buffer, stderr: Buffer, durationMs: number }
    | { kind: 'timeout', stdout: Buffer, stderr: Buffer, durationMs: number }
    | { kind: 'spawn', error: Error, durationMs: number }

/**
 * Spawns `command` as the leader of its own process group and waits for it.
 * Once `timeout` elapses the whole group is SIGKILLed and the result returned right away,
 * even if a grandchild still holds the output pipes. When the command exits on its own,
 * whatever it left running in its group is killed as well.
 * Resolves in every case, the caller decides what a non-zero exit means.
 */
export function runProcess(command: string, args: string[], options: ProcessOptions): Promise<ProcessResult> {
    const started = Date.now()

    return new Promise<ProcessResult>((resolve) => {
        const stdout: Buffer[] = []
        const stderr: Buffer[] = []
        let exited = false
        let exitCode: number | null = null
        let settled = false

        const child = spawn(command, args, {
            cwd: options.cwd,
            env: options.env,
            stdio: ['pipe', 'pipe', 'pipe'],
            detached: true
        })

        const killGroup = () => {
            if (child.pid === undefined) return
            try {
                process.kill(-child.pid, 'SIGKILL')
            } catch {
                // group already gone (ESRCH) or no process groups on this platform
                child.kill('SIGKILL')
            }
        }

        const collected = () => ({
            stdout: Buffer.concat(stdout),
            stderr: Buffer.concat(stderr),
            durationMs: Date.now() - started
        })

        const finish = (result: ProcessResult) => {
            if (settled) return
            settled = true
            clearTimeout(timer)
            child.stdout.destroy()
            child.stderr.destroy()
            resolve(result)
        }

        const timer = setTimeout(() => {
            killGroup()
            // the command itself finished but something kept the pipes open until now
            if (exited) {
                finish({ kind: 'exit', exitCode, ...collected() })
            } else {
                finish({ kind: 'timeout', ...collected() })
            }
        }, options.timeout)

        child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk))
        child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk))

        child.on('error', (error) => {
            finish({ kind: 'spawn', error, durationMs: Date.now() - started })
        })

        child.on('exit', (code) => {
            exited = true
            exitCode = code
            killGroup()
        })

        child.on('close', () => {
            finish({ kind: 'exit', exitCode, ...collected() })
        })

        // EPIPE when the child exits before reading everything; the exit status tells the story
        child.stdin.on('error', () => undefined)
        if (options.input) {
            child.stdin.end(options.input)
        } else {
            child.stdin.end()
        }
    })
}
