import { WaveFile } from 'wavefile'

import { ConfigTranscription } from '../../interface/Config'
import { SpeechGateway } from '../LlmGateway'
import { LogFn } from '../../util/Logger'
import { runProcess } from '../../util/Process'
import { errorMessage } from '../../errors'

/** Last path segment of the URL, as shown in placeholders */
export function audioFileName(url: string): string {
    return url.split('/').pop() || url
}

/**
 * Turns downloaded audio into text. Never throws: every failure becomes a
 * descriptive transcript so the planner still sees that the file existed.
 */
export class AudioTranscriber {
    private settings: ConfigTranscription
    private gateway: SpeechGateway
    private log: LogFn

    constructor(settings: ConfigTranscription, gateway: SpeechGateway, log: LogFn) {
        this.settings = settings
        this.gateway = gateway
        this.log = log
    }

    async transcribe(audio: Buffer, url: string, scope: string): Promise<string> {
        const name = audioFileName(url)

        if (!this.settings.enabled) {
            return `Transcription disabled: ${name}`
        }

        const wav = await this.toWav(audio, name, scope)
        if (!wav) {
            return `Audio file: ${name} - manual review needed`
        }

        try {
            const text = await this.gateway.transcribe(wav, name.replace(/\.[^.]*$/, '') + '.wav')
            this.log(scope, 'TRANSCRIBE', `Transcribed ${name}: ${text.slice(0, 100)}`)
            return text
        } catch (error) {
            this.log(scope, 'TRANSCRIBE', `Transcription of ${name} failed: ${errorMessage(error)}`, 'warn')
            return `Transcription failed: ${errorMessage(error)}`
        }
    }

    /**
     * ffmpeg first (any container), then an in-process WAV re-encode. Null when neither works.
     */
    async toWav(audio: Buffer, name: string, scope: string): Promise<Buffer | null> {
        const result = await runProcess(this.settings.ffmpegPath, [
            '-hide_banner', '-loglevel', 'error',
            '-i', 'pipe:0',
            '-f', 'wav',
            'pipe:1'
        ], {
            env: { PATH: process.env.PATH ?? '' },
            input: audio,
            timeout: this.settings.timeout
        })

        if (result.kind === 'exit' && result.exitCode === 0 && result.stdout.length > 0) {
            this.log(scope, 'TRANSCRIBE', `Converted ${name} to WAV via ffmpeg`)
            return result.stdout
        }

        const reason = result.kind === 'spawn'
            ? `ffmpeg not available (${result.error.message})`
            : result.kind === 'timeout'
                ? `ffmpeg timed out after ${this.settings.timeout}ms`
                : `ffmpeg exited with code ${result.exitCode}`
        this.log(scope, 'TRANSCRIBE', `${reason}, trying WAV decoder`, 'warn')

        try {
            const wave = new WaveFile(audio)
            wave.toBitDepth('16')
            this.log(scope, 'TRANSCRIBE', `Re-encoded ${name} as 16-bit WAV`)
            return Buffer.from(wave.toBuffer())
        } catch (error) {
            this.log(scope, 'TRANSCRIBE', `WAV decoder could not read ${name}: ${errorMessage(error)}`, 'warn')
            return null
        }
    }
}
