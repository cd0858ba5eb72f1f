// Central constants shared by the solver pipeline

export const TIMEOUTS = {
    SANDBOX: 30000,
    FFMPEG: 30000,
    DOWNLOAD: 30000,
    SUBMIT: 10000,
    LLM: 60000,
    NAVIGATION: 30000,
    BODY_WAIT: 5000,
    LOADER_WAIT: 2000,
    RESULT_SETTLE: 1000,
    SETTLE: 3000,
    SCROLL_SETTLE: 1000
}

export const RETRY_LIMITS = {
    RESOURCE_ATTEMPTS: 3,
    BROWSER_LAUNCH: 3
}

export const DELAYS = {
    RETRY: 1000,
    RETRY_AFTER_TIMEOUT: 2000
}

export const CHAIN = {
    DEFAULT_TIMEOUT_SECONDS: 170,
    MAX_QUESTIONS: 100
}

export const LIMITS = {
    LOG_BUFFER: 200,
    LOG_QUERY_DEFAULT: 100,
    RECENT_LOGS: 10,
    CONTEXT_MAX_TOKENS: 512,
    ANALYSIS_MAX_TOKENS: 4096,
    CONTEXT_HTML_CHARS: 60000,
    TEXT_BODY_CHARS: 20000,
    DIGEST_CHARS: 500,
    TABLE_CHARS: 1000,
    PREVIEW_ROWS: 3,
    PREVIEW_PAGES: 2,
    RAW_RESPONSE_PREVIEW: 200
}

export const EXTENSIONS = {
    AUDIO: ['opus', 'mp3', 'wav', 'm4a', 'ogg', 'flac'],
    DOCUMENT: ['pdf', 'csv', 'xlsx', 'json', 'txt', 'png', 'jpg', 'jpeg']
}

export const SELECTORS = {
    RESULT: '#result',
    LOADERS: ['.loading', '.spinner', '#loading', '[data-loading]']
}

export const BROWSER = {
    VIEWPORT: { width: 1920, height: 1080 },
    USER_AGENT: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    ACCEPT_LANGUAGE: 'en-US,en;q=0.9'
}

// Any of these in solution_code means it is a program rather than a literal answer
export const CODE_MARKERS = ['import', 'def ', 'for ', 'while ', '=']
