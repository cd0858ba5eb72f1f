// src/interface/Config.ts

export interface Config {
    // Identity used for submissions and for authorizing inbound solve requests
    student: ConfigStudent;

    // Chat-completion gateway
    llm: ConfigLlm;

    // Speech-to-text for audio resources
    transcription: ConfigTranscription;

    // Chain driver
    chain: ConfigChain;

    // Resource downloads
    resources: ConfigResources;

    // Subprocess used to run generated code
    sandbox: ConfigSandbox;

    submission: ConfigSubmission;

    browser: ConfigBrowser;

    // HTTP front door
    server: ConfigServer;

    logging: ConfigLogging;
}

/* ---------------------------
   Sub-interfaces & helpers
   --------------------------- */

export interface ConfigStudent {
    email: string;
    secret: string;
}

export interface ConfigLlm {
    baseUrl: string; // OpenAI-compatible root, e.g. https://aipipe.org/openrouter/v1
    token: string;
    model: string;
    contextMaxTokens: number;
    analysisMaxTokens: number;
    contextHtmlChars: number; // raw HTML sent to the context call is cut at this length
    timeout: number; // ms
}

export interface ConfigTranscription {
    enabled: boolean;
    baseUrl: string;
    model: string;
    ffmpegPath: string;
    timeout: number; // ms, applies to the ffmpeg conversion
}

export interface ConfigChain {
    timeoutSeconds: number; // checked between questions only
    maxQuestions: number;
}

export interface ConfigResources {
    maxAttempts: number; // initial attempt included
    retryDelay: number; // ms
    timeoutRetryDelay: number; // ms, used after a timed-out attempt
    requestTimeout: number; // ms
    concurrency: number;
    maxTextChars: number;
}

export interface ConfigSandbox {
    interpreter: string;
    extension: string; // script file extension including the dot
    language: string; // named in the prompt so the model writes code the interpreter can run
    timeout: number; // ms
}

export interface ConfigSubmission {
    /** Used when the page names no endpoint of its own. */
    endpointOverride: string | null;
    timeout: number; // ms
}

export interface ConfigBrowser {
    headless: boolean;
    navigationTimeout: number; // ms
    settleDelay: number; // ms
}

export interface ConfigServer {
    host: string;
    port: number;
    logBufferSize: number;
    taskRetention: number; // ms a finished task stays visible in /status
}

export interface ConfigLogging {
    excludeFunc: string[]; // titles that are never printed
    redactEmails: boolean;
}
