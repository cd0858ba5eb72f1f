import { describe, it, expect } from 'vitest'
import { WaveFile } from 'wavefile'

import { AudioTranscriber, audioFileName } from './Audio'
import { FakeSpeech, testConfig } from '../../test/helpers'
import { SpeechGateway } from '../LlmGateway'

const noLog = () => undefined

function transcriber(gateway: SpeechGateway, enabled = true): AudioTranscriber {
    const config = testConfig({ transcription: { enabled, ffmpegPath: '/nonexistent/ffmpeg', timeout: 2000 } })
    return new AudioTranscriber(config.transcription, gateway, noLog)
}

function eightBitWav(): Buffer {
    const wave = new WaveFile()
    wave.fromScratch(1, 8000, '8', [128, 140, 160, 140, 128, 116, 96, 116])
    return Buffer.from(wave.toBuffer())
}

describe('audioFileName', () => {
    it('takes the last path segment', () => {
        expect(audioFileName('https://quiz.test/media/clue.opus')).toBe('clue.opus')
        expect(audioFileName('https://quiz.test/media/')).toBe('https://quiz.test/media/')
    })
})

describe('AudioTranscriber', () => {
    it('returns a placeholder when disabled', async () => {
        const speech = new FakeSpeech('unused')

        const text = await transcriber(speech, false).transcribe(eightBitWav(), 'https://quiz.test/a.wav', 'main')

        expect(text).toBe('Transcription disabled: a.wav')
        expect(speech.received).toEqual([])
    })

    it('re-encodes WAV input without ffmpeg and sends it for transcription', async () => {
        const speech = new FakeSpeech('the code is 7')

        const text = await transcriber(speech).transcribe(eightBitWav(), 'https://quiz.test/media/clue.wav', 'main')

        expect(text).toBe('the code is 7')
        expect(speech.received).toHaveLength(1)
        expect(speech.received[0]?.fileName).toBe('clue.wav')
        const sent = new WaveFile(speech.received[0]?.wav ?? Buffer.alloc(0))
        expect(sent.bitDepth).toBe('16')
    })

    it('asks for manual review when the audio cannot be converted', async () => {
        const speech = new FakeSpeech('unused')

        const text = await transcriber(speech).transcribe(Buffer.from('not audio at all'), 'https://quiz.test/clip.mp3', 'main')

        expect(text).toBe('Audio file: clip.mp3 - manual review needed')
        expect(speech.received).toEqual([])
    })

    it('reports a failed transcription call', async () => {
        const failing: SpeechGateway = {
            transcribe: async () => {
                throw new Error('quota exceeded')
            }
        }

        const text = await transcriber(failing).transcribe(eightBitWav(), 'https://quiz.test/clue.wav', 'main')

        expect(text).toBe('Transcription failed: quota exceeded')
    })
})
