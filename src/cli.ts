#!/usr/bin/env node
import { QuizChainBot } from './index'
import { FrontDoor } from './server/FrontDoor'
import { loadConfig } from './util/Load'
import { errorMessage } from './errors'

/**
 * `quiz-chain-solver`            serve the HTTP front door
 * `quiz-chain-solver <quiz-url>` solve one chain in the foreground and exit
 */
async function main() {
    const { config, source, warnings } = loadConfig()
    const bot = new QuizChainBot(config)

    bot.log('main', 'MAIN', source ? `Loaded config from ${source}` : 'Running on defaults and environment')
    for (const warning of warnings) bot.log('main', 'CONFIG', warning, 'warn')

    const url = process.argv[2]
    if (url) {
        const result = await bot.runChain(url)
        bot.close()
        process.exit(result.status === 'Failed' ? 1 : 0)
    }

    const server = new FrontDoor(bot)

    const gracefulExit = (code: number) => {
        bot.log('main', 'MAIN', 'Quiz solver shutting down', 'warn')
        bot.close()
        server.close()
            .catch((error: unknown) => bot.log('main', 'MAIN', `Error closing server: ${errorMessage(error)}`, 'warn'))
            .finally(() => process.exit(code))
    }

    process.on('unhandledRejection', (reason) => {
        bot.log('main', 'FATAL', 'UnhandledRejection: ' + errorMessage(reason), 'error')
    })
    process.on('SIGTERM', () => gracefulExit(0))
    process.on('SIGINT', () => gracefulExit(0))

    await server.listen()
    bot.log('main', 'MAIN', `Configured email: ${config.student.email || '(not set)'}`)
    bot.log('main', 'MAIN', `LLM model: ${config.llm.model}`)
    bot.log('main', 'MAIN', `Timeout: ${config.chain.timeoutSeconds}s`)
    bot.log('main', 'MAIN', 'Ready to receive quiz requests', 'log', 'green')
}

main().catch(error => {
    console.error(`[MAIN-ERROR] ${errorMessage(error)}`)
    process.exit(1)
})
