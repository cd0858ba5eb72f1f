import { chromium, BrowserContext } from 'playwright-core'

import type { QuizChainBot } from '../index'
import { BROWSER, RETRY_LIMITS } from '../constants'
import { errorMessage } from '../errors'

/**
 * Launches headless Chromium for one render. Each call gets its own browser; closing the
 * returned context's browser releases everything.
 */
class Browser {
    private bot: QuizChainBot

    constructor(bot: QuizChainBot) {
        this.bot = bot
    }

    async createBrowser(scope = 'main'): Promise<BrowserContext> {
        const settings = this.bot.config.browser

        // Launch with retries
        const maxLaunchAttempts = RETRY_LIMITS.BROWSER_LAUNCH
        let launched: import('playwright-core').Browser | undefined
        let launchErr: unknown

        for (let attempt = 1; attempt <= maxLaunchAttempts; attempt++) {
            try {
                launched = await chromium.launch({
                    headless: settings.headless,
                    args: [
                        '--no-sandbox',
                        '--mute-audio',
                        '--disable-setuid-sandbox',
                        '--disable-blink-features=AutomationControlled'
                    ]
                })
                launchErr = undefined
                break
            } catch (e: unknown) {
                launchErr = e
                if (attempt < maxLaunchAttempts) {
                    const waitMs = Math.min(15000, Math.pow(2, attempt) * 500)
                    this.bot.log(scope, 'BROWSER', `Launch attempt ${attempt} failed: ${errorMessage(e)}. Retrying after ${waitMs}ms`, 'warn')
                    await this.bot.utils.wait(waitMs)
                }
            }
        }

        if (!launched) {
            throw this.bot.log(scope, 'BROWSER', `Failed to launch browser after ${maxLaunchAttempts} attempts: ${errorMessage(launchErr)}`, 'error')
        }

        try {
            const context = await launched.newContext({
                viewport: BROWSER.VIEWPORT,
                userAgent: BROWSER.USER_AGENT,
                extraHTTPHeaders: { 'Accept-Language': BROWSER.ACCEPT_LANGUAGE }
            })
            context.setDefaultTimeout(settings.navigationTimeout)
            return context
        } catch (error) {
            await launched.close().catch((closeErr: unknown) => {
                this.bot.log(scope, 'BROWSER', `Error closing browser: ${errorMessage(closeErr)}`, 'warn')
            })
            throw error
        }
    }
}

export default Browser
