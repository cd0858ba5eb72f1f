import { BrowserContext, Page } from 'playwright-core'

import type { QuizChainBot } from '../index'
import Browser from './Browser'
import { SELECTORS, TIMEOUTS } from '../constants'
import { errorMessage } from '../errors'

/** Capability the question pipeline needs from a browser */
export interface PageRenderer {
    render(url: string, scope?: string): Promise<string>
}

export default class BrowserFunc implements PageRenderer {
    private bot: QuizChainBot
    private browserFactory: Browser

    constructor(bot: QuizChainBot) {
        this.bot = bot
        this.browserFactory = new Browser(bot)
    }

    /**
     * Navigates to `url`, waits for the page to settle and returns the rendered HTML.
     * Navigation errors propagate; the browser is closed on every path.
     */
    async render(url: string, scope = 'main'): Promise<string> {
        const context = await this.browserFactory.createBrowser(scope)

        try {
            const page = await context.newPage()
            await page.goto(url, { waitUntil: 'networkidle', timeout: this.bot.config.browser.navigationTimeout })
            await this.waitForDynamicContent(page, scope)

            // Additional wait for any delayed JavaScript
            await this.bot.utils.wait(this.bot.config.browser.settleDelay)

            // Scroll to bottom to trigger lazy loading
            await page.evaluate('window.scrollTo(0, document.body.scrollHeight)')
            await this.bot.utils.wait(TIMEOUTS.SCROLL_SETTLE)

            const html = await page.content()
            this.bot.log(scope, 'RENDER', `Rendered ${url} (${html.length} chars)`)
            return html
        } catch (error) {
            throw this.bot.log(scope, 'RENDER', `Error fetching page ${url}: ${errorMessage(error)}`, 'error')
        } finally {
            await this.closeBrowser(context, scope)
        }
    }

    private async waitForDynamicContent(page: Page, scope: string): Promise<void> {
        try {
            await page.waitForSelector('body', { timeout: TIMEOUTS.BODY_WAIT })

            // A result container usually gets filled by script right after load
            if (await page.$(SELECTORS.RESULT)) {
                await this.bot.utils.wait(TIMEOUTS.RESULT_SETTLE)
            }

            for (const selector of SELECTORS.LOADERS) {
                await page.waitForSelector(selector, { state: 'hidden', timeout: TIMEOUTS.LOADER_WAIT }).catch(() => {
                    this.bot.log(scope, 'RENDER', `Loader ${selector} still visible after ${TIMEOUTS.LOADER_WAIT}ms`, 'warn')
                })
            }
        } catch (error) {
            this.bot.log(scope, 'RENDER', `Element wait timeout: ${errorMessage(error)}`, 'warn')
        }
    }

    async closeBrowser(context: BrowserContext, scope = 'main'): Promise<void> {
        const browser = context.browser()
        try {
            await context.close()
            if (browser) await browser.close()
        } catch (err) {
            this.bot.log(scope, 'CLOSE-BROWSER', `Error closing browser: ${errorMessage(err)}`, 'warn')
        }
    }
}
