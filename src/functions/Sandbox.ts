import fs from 'fs/promises'
import os from 'os'
import path from 'path'

import { ConfigSandbox } from '../interface/Config'
import { LogFn } from '../util/Logger'
import { runProcess } from '../util/Process'
import { errorMessage } from '../errors'

export type SandboxFailureReason = 'exit' | 'timeout' | 'spawn'

export type SandboxResult =
    | { ok: true, stdout: string, stderr: string, durationMs: number }
    | { ok: false, reason: SandboxFailureReason, exitCode: number | null, stdout: string, stderr: string, durationMs: number }

/**
 * Runs generated code in a child process: fresh temp directory as cwd, a minimal environment
 * (PATH and QUIZ_BASE_URL only) and a hard timeout after which the child is SIGKILLed.
 */
export class Sandbox {
    private settings: ConfigSandbox
    private log: LogFn

    constructor(settings: ConfigSandbox, log: LogFn) {
        this.settings = settings
        this.log = log
    }

    async run(code: string, baseUrl: string | null, scope = 'main'): Promise<SandboxResult> {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'quiz-solution-'))
        const script = path.join(dir, `solution${this.settings.extension}`)

        const env: NodeJS.ProcessEnv = { PATH: process.env.PATH ?? '' }
        if (baseUrl) env.QUIZ_BASE_URL = baseUrl

        try {
            await fs.writeFile(script, code, 'utf-8')
            this.log(scope, 'SANDBOX', `Running ${this.settings.interpreter} ${path.basename(script)} (timeout ${this.settings.timeout}ms)`)

            const result = await runProcess(this.settings.interpreter, [script], {
                cwd: dir,
                env,
                timeout: this.settings.timeout
            })

            switch (result.kind) {
                case 'spawn':
                    return { ok: false, reason: 'spawn', exitCode: null, stdout: '', stderr: result.error.message, durationMs: result.durationMs }
                case 'timeout':
                    return { ok: false, reason: 'timeout', exitCode: null, stdout: result.stdout.toString('utf-8'), stderr: result.stderr.toString('utf-8'), durationMs: result.durationMs }
                case 'exit': {
                    const stdout = result.stdout.toString('utf-8')
                    const stderr = result.stderr.toString('utf-8')
                    if (result.exitCode === 0) {
                        return { ok: true, stdout, stderr, durationMs: result.durationMs }
                    }
                    return { ok: false, reason: 'exit', exitCode: result.exitCode, stdout, stderr, durationMs: result.durationMs }
                }
            }
        } finally {
            await fs.rm(dir, { recursive: true, force: true }).catch((error: unknown) => {
                this.log(scope, 'SANDBOX', `Could not remove ${dir}: ${errorMessage(error)}`, 'warn')
            })
        }
    }
}
